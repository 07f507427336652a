import { PlaceholderEncoderError } from "./errors.js";
import type { ConfigSnapshot, Encoder, Verdict } from "./types.js";

/**
 * Stand-in for a preceding encoder that could not be loaded.
 *
 * It fills the preceding-encoder slot so the last known snapshot (and the
 * reason loading failed) travel with the state, but every data operation
 * throws. The resolver never picks it as a converter.
 */
export class PlaceholderEncoder<T> implements Encoder<T> {
  constructor(
    readonly snapshot?: ConfigSnapshot,
    readonly loadFailure?: unknown
  ) {}

  serialize(_value: T): Uint8Array {
    throw new PlaceholderEncoderError("serialize", this.loadFailure);
  }

  deserialize(_buffer: Uint8Array): T {
    throw new PlaceholderEncoderError("deserialize", this.loadFailure);
  }

  snapshotConfiguration(): ConfigSnapshot {
    if (this.snapshot === undefined) {
      throw new PlaceholderEncoderError("snapshotConfiguration", this.loadFailure);
    }
    return this.snapshot;
  }

  confront(_snapshot: ConfigSnapshot): Verdict<T> {
    throw new PlaceholderEncoderError("confront", this.loadFailure);
  }
}
