/**
 * Core types shared by encoders and the compatibility resolver.
 */

// ============================================================================
// Snapshots
// ============================================================================

/**
 * Persisted description of how values were encoded at write time.
 *
 * The resolver treats snapshots as opaque and only hands them to
 * {@link Encoder.confront}. `encoderId` and `version` exist so encoders can
 * recognise their own snapshots; `data` is encoder-specific.
 */
export interface ConfigSnapshot {
  readonly encoderId: string;
  readonly version: number;
  readonly data: Readonly<Record<string, unknown>>;
}

// ============================================================================
// Encoders
// ============================================================================

/**
 * Serializes and deserializes values of a fixed type, and can judge whether
 * it is able to read data described by a previously recorded snapshot.
 */
export interface Encoder<T> {
  /** Serialize a value to bytes. */
  serialize(value: T): Uint8Array;

  /** Deserialize bytes written by this encoder. */
  deserialize(buffer: Uint8Array): T;

  /** Describe the current encoding so it can be persisted alongside the data. */
  snapshotConfiguration(): ConfigSnapshot;

  /**
   * Judge compatibility with data written under `snapshot`.
   * May offer a converter able to read that data.
   */
  confront(snapshot: ConfigSnapshot): Verdict<T>;
}

/**
 * Class tag identifying encoder instances by their exact runtime class.
 */
export type EncoderClass = abstract new (...args: never[]) => Encoder<unknown>;

// ============================================================================
// Verdicts and Resolutions
// ============================================================================

/** No action needed: the new encoder reads the old data directly. */
export interface Compatible {
  readonly _tag: "Compatible";
}

/**
 * The new encoder cannot read the old format. `converter`, when present,
 * reads the old data so it can be re-encoded.
 */
export interface RequiresMigration<T> {
  readonly _tag: "RequiresMigration";
  readonly converter: Encoder<T> | undefined;
}

/** An encoder's judgment of its own compatibility with a snapshot. */
export type Verdict<T> = Compatible | RequiresMigration<T>;

/** A migration outcome that is guaranteed to carry a usable converter. */
export interface MigrateWith<T> {
  readonly _tag: "RequiresMigration";
  readonly converter: Encoder<T>;
}

/** The authoritative outcome of compatibility resolution. */
export type Resolution<T> = Compatible | MigrateWith<T>;

// ============================================================================
// Constructors
// ============================================================================

const COMPATIBLE: Compatible = Object.freeze({ _tag: "Compatible" });

/** The `Compatible` verdict. */
export function compatible(): Compatible {
  return COMPATIBLE;
}

/** A migration verdict, optionally carrying a converter. */
export function requiresMigration<T>(converter?: Encoder<T>): RequiresMigration<T> {
  return { _tag: "RequiresMigration", converter };
}

/** A migration resolution with a known converter. */
export function migrateWith<T>(converter: Encoder<T>): MigrateWith<T> {
  return { _tag: "RequiresMigration", converter };
}

// ============================================================================
// Guards
// ============================================================================

export function isCompatible<T>(v: Verdict<T> | Resolution<T>): v is Compatible {
  return v._tag === "Compatible";
}

export function isRequiresMigration<T>(v: Verdict<T>): v is RequiresMigration<T> {
  return v._tag === "RequiresMigration";
}

/** A migration verdict that already names its converter is a valid resolution as is. */
export function hasConverter<T>(v: RequiresMigration<T>): v is RequiresMigration<T> & MigrateWith<T> {
  return v.converter !== undefined;
}
