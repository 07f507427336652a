/**
 * Compatibility resolution
 *
 * Decides, at restore time, whether state written under a preceding encoding
 * can be read by the new encoder, and which encoder converts it if not.
 *
 * The outcome is determined as follows:
 *   1. No snapshot of the preceding encoding: assume compatible.
 *   2. Confront the snapshot with the new encoder.
 *   3. Compatible: return that verdict.
 *   4. Requires migration:
 *      a. a real preceding encoder converts, overriding any offered converter;
 *      b. otherwise the new encoder's verdict, when it offers a converter;
 *      c. otherwise migration is unavailable.
 */

import { Left, Right, getOrThrow, type Either } from "./either.js";
import { MigrationUnavailableError, type MigrationUnavailable } from "./errors.js";
import { PlaceholderEncoder } from "./placeholder.js";
import { classifyPreceding, describePreceding, type PrecedingEncoder } from "./preceding.js";
import {
  globalCompatibilityTracer,
  type CompatibilityTracer,
  type ResolutionAttempt,
  type ResolutionTrace,
} from "./trace.js";
import {
  compatible,
  hasConverter,
  migrateWith,
  type ConfigSnapshot,
  type Encoder,
  type EncoderClass,
  type Resolution,
} from "./types.js";

export interface ResolveContext {
  /** Name of the state being restored, used in traces and errors */
  stateName?: string;
  /** Tracer receiving the resolution trace (default: the global tracer) */
  tracer?: CompatibilityTracer;
}

/**
 * Resolve the compatibility of `newEncoder` with data described by
 * `precedingSnapshot`. The unresolvable case is returned as a Left.
 *
 * @param preceding - what is known about the encoder that wrote the data
 * @param precedingSnapshot - snapshot persisted with the data, if any was recorded
 * @param newEncoder - the encoder the state will be read with from now on
 */
export function resolveCompatibility<T>(
  preceding: PrecedingEncoder<T>,
  precedingSnapshot: ConfigSnapshot | undefined,
  newEncoder: Encoder<T>,
  context: ResolveContext = {}
): Either<MigrationUnavailable, Resolution<T>> {
  const tracer = context.tracer ?? globalCompatibilityTracer;
  const attempts: ResolutionAttempt[] = [];
  const sought = describeState(context.stateName, precedingSnapshot);

  const resolved = (resolution: Resolution<T>): Either<MigrationUnavailable, Resolution<T>> => {
    tracer.record({ sought, attempts, finalResult: "resolved" });
    return Right(resolution);
  };

  if (precedingSnapshot === undefined) {
    attempts.push({
      step: "snapshot-lookup",
      target: "preceding snapshot",
      result: "not-found",
      reason: "assuming compatible",
    });
    return resolved(compatible());
  }

  attempts.push({
    step: "snapshot-lookup",
    target: describeSnapshot(precedingSnapshot),
    result: "found",
  });

  const initial = newEncoder.confront(precedingSnapshot);

  if (initial._tag === "Compatible") {
    attempts.push({ step: "confront", target: "new encoder", result: "found", reason: "compatible" });
    return resolved(initial);
  }

  attempts.push({
    step: "confront",
    target: "new encoder",
    result: "rejected",
    reason: "requires migration",
  });

  if (preceding._tag === "Real") {
    attempts.push({ step: "preceding-encoder", target: describePreceding(preceding), result: "found" });
    return resolved(migrateWith(preceding.encoder));
  }

  attempts.push({
    step: "preceding-encoder",
    target: describePreceding(preceding),
    result: "not-found",
    ...(preceding._tag === "Placeholder" ? { reason: "placeholder cannot read data" } : {}),
  });

  if (hasConverter(initial)) {
    attempts.push({ step: "self-supplied-converter", target: "new encoder", result: "found" });
    return resolved(initial);
  }

  attempts.push({ step: "self-supplied-converter", target: "new encoder", result: "not-found" });

  const trace: ResolutionTrace = { sought, attempts, finalResult: "failed" };
  tracer.record(trace);
  const failure: MigrationUnavailable = {
    _tag: "MigrationUnavailable",
    stateName: context.stateName,
    snapshot: precedingSnapshot,
    preceding: preceding._tag === "Placeholder" ? "placeholder" : "none",
    trace,
  };
  return Left(failure);
}

/**
 * Resolve from a raw preceding encoder instance and a placeholder class tag.
 *
 * An instance whose exact class is `placeholderTag` is treated as a
 * placeholder. Throws {@link MigrationUnavailableError} when migration is
 * required but no encoder can read the old data.
 *
 * @returns the final resolution, whose converter (if any) is never a placeholder
 */
export function resolveCompatibilityResult<T>(
  precedingEncoder: Encoder<T> | undefined,
  placeholderTag: EncoderClass,
  precedingSnapshot: ConfigSnapshot | undefined,
  newEncoder: Encoder<T>,
  context: ResolveContext = {}
): Resolution<T> {
  return getOrThrow(
    resolveCompatibility(
      classifyPreceding(precedingEncoder, placeholderTag),
      precedingSnapshot,
      newEncoder,
      context
    ),
    (failure) => new MigrationUnavailableError(failure)
  );
}

/**
 * {@link resolveCompatibilityResult} with {@link PlaceholderEncoder} as the placeholder tag.
 */
export function resolveWithDefaultPlaceholder<T>(
  precedingEncoder: Encoder<T> | undefined,
  precedingSnapshot: ConfigSnapshot | undefined,
  newEncoder: Encoder<T>,
  context: ResolveContext = {}
): Resolution<T> {
  return resolveCompatibilityResult(
    precedingEncoder,
    PlaceholderEncoder,
    precedingSnapshot,
    newEncoder,
    context
  );
}

function describeSnapshot(snapshot: ConfigSnapshot): string {
  return `${snapshot.encoderId}@v${snapshot.version}`;
}

function describeState(stateName: string | undefined, snapshot: ConfigSnapshot | undefined): string {
  const name = stateName === undefined ? "state" : `state "${stateName}"`;
  return `${name} (${snapshot === undefined ? "no snapshot" : describeSnapshot(snapshot)})`;
}
