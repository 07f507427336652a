/**
 * state-migration: decide whether persisted state can be read by a new encoder.
 *
 * At restore time, combine the snapshot persisted with the data, the encoder
 * that wrote it (if it could be loaded) and the new encoder's own judgment
 * into one outcome: compatible, migrate with a specific converter, or fail.
 *
 * @example
 * ```typescript
 * import { resolveWithDefaultPlaceholder } from "state-migration";
 *
 * const resolution = resolveWithDefaultPlaceholder(oldEncoder, snapshot, newEncoder, {
 *   stateName: "sessions",
 * });
 * if (resolution._tag === "RequiresMigration") {
 *   const value = resolution.converter.deserialize(bytes);
 *   store(newEncoder.serialize(value));
 * }
 * ```
 *
 * @packageDocumentation
 */

export type {
  ConfigSnapshot,
  Encoder,
  EncoderClass,
  Compatible,
  RequiresMigration,
  MigrateWith,
  Verdict,
  Resolution,
} from "./types.js";
export {
  compatible,
  requiresMigration,
  migrateWith,
  isCompatible,
  isRequiresMigration,
  hasConverter,
} from "./types.js";

export type { Either } from "./either.js";
export { Left, Right, isLeft, isRight, fold, getOrThrow } from "./either.js";

export type {
  PrecedingEncoder,
  RealPreceding,
  PlaceholderPreceding,
  AbsentPreceding,
} from "./preceding.js";
export {
  realPreceding,
  placeholderPreceding,
  absentPreceding,
  classifyPreceding,
  describePreceding,
} from "./preceding.js";

export { PlaceholderEncoder } from "./placeholder.js";

export type { MigrationUnavailable, PlaceholderOperation } from "./errors.js";
export {
  MigrationUnavailableError,
  PlaceholderEncoderError,
  MIGRATION_UNAVAILABLE_MESSAGE,
} from "./errors.js";

export type { ResolveContext } from "./resolve.js";
export {
  resolveCompatibility,
  resolveCompatibilityResult,
  resolveWithDefaultPlaceholder,
} from "./resolve.js";

export type { ResolutionAttempt, ResolutionTrace, TracerOptions } from "./trace.js";
export { CompatibilityTracer, formatResolutionTrace, globalCompatibilityTracer } from "./trace.js";

export type { StateMigrationConfig, TraceConfig, TraceLevel, ResetOptions } from "./config.js";
export { config, defineConfig } from "./config.js";

