import type { Encoder, EncoderClass } from "./types.js";

/**
 * What is known about the encoder that wrote the persisted data.
 *
 * - `Real`: a working instance of the preceding encoder.
 * - `Placeholder`: only a stand-in could be produced; it cannot decode.
 * - `Absent`: no preceding encoder was supplied at all.
 */
export type PrecedingEncoder<T> = RealPreceding<T> | PlaceholderPreceding | AbsentPreceding;

export interface RealPreceding<T> {
  readonly _tag: "Real";
  readonly encoder: Encoder<T>;
}

export interface PlaceholderPreceding {
  readonly _tag: "Placeholder";
}

export interface AbsentPreceding {
  readonly _tag: "Absent";
}

export function realPreceding<T>(encoder: Encoder<T>): RealPreceding<T> {
  return { _tag: "Real", encoder };
}

export const placeholderPreceding: PlaceholderPreceding = Object.freeze({ _tag: "Placeholder" });

export const absentPreceding: AbsentPreceding = Object.freeze({ _tag: "Absent" });

/**
 * Classify an encoder instance against a placeholder class tag.
 *
 * Only an instance whose class is exactly `placeholderTag` counts as a
 * placeholder; subclasses are real encoders.
 */
export function classifyPreceding<T>(
  encoder: Encoder<T> | undefined,
  placeholderTag: EncoderClass
): PrecedingEncoder<T> {
  if (encoder === undefined) {
    return absentPreceding;
  }
  if (encoder.constructor === placeholderTag) {
    return placeholderPreceding;
  }
  return realPreceding(encoder);
}

export function describePreceding<T>(preceding: PrecedingEncoder<T>): string {
  switch (preceding._tag) {
    case "Real":
      return preceding.encoder.constructor.name || "anonymous encoder";
    case "Placeholder":
      return "placeholder";
    case "Absent":
      return "none";
  }
}
