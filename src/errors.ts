import type { ConfigSnapshot } from "./types.js";
import type { ResolutionTrace } from "./trace.js";

// ============================================================================
// Failure values
// ============================================================================

/**
 * Migration is required but neither a real preceding encoder nor a converter
 * supplied by the new encoder exists to read the old data.
 */
export interface MigrationUnavailable {
  readonly _tag: "MigrationUnavailable";
  /** Name of the state being restored, when the caller provided one. */
  readonly stateName: string | undefined;
  /** The snapshot the new encoder was confronted with. */
  readonly snapshot: ConfigSnapshot;
  /** What stood in for the preceding encoder. */
  readonly preceding: "placeholder" | "none";
  readonly trace: ResolutionTrace;
}

export const MIGRATION_UNAVAILABLE_MESSAGE =
  "State migration required, but there is no available encoder capable of reading previous data.";

// ============================================================================
// Thrown errors
// ============================================================================

/** Thrown form of {@link MigrationUnavailable}. Terminal for the state's restore attempt. */
export class MigrationUnavailableError extends Error {
  constructor(readonly failure: MigrationUnavailable) {
    super(
      failure.stateName === undefined
        ? MIGRATION_UNAVAILABLE_MESSAGE
        : `${MIGRATION_UNAVAILABLE_MESSAGE} (state "${failure.stateName}")`
    );
    this.name = "MigrationUnavailableError";
  }

  get trace(): ResolutionTrace {
    return this.failure.trace;
  }
}

export type PlaceholderOperation = "serialize" | "deserialize" | "snapshotConfiguration" | "confront";

/** Raised when a placeholder encoder is asked to do real work. */
export class PlaceholderEncoderError extends Error {
  constructor(
    readonly operation: PlaceholderOperation,
    readonly loadFailure?: unknown
  ) {
    super(`Placeholder encoder cannot ${operation}: the preceding encoder could not be loaded`);
    this.name = "PlaceholderEncoderError";
  }
}

