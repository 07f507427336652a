import { describe, expect, it, vi } from "vitest";
import { isLeft, isRight, type Either } from "../either.js";
import { MigrationUnavailableError, type MigrationUnavailable } from "../errors.js";
import { PlaceholderEncoder } from "../placeholder.js";
import {
  absentPreceding,
  placeholderPreceding,
  realPreceding,
  type PrecedingEncoder,
} from "../preceding.js";
import {
  resolveCompatibility,
  resolveCompatibilityResult,
  resolveWithDefaultPlaceholder,
} from "../resolve.js";
import { CompatibilityTracer } from "../trace.js";
import { compatible, requiresMigration, type Encoder, type Resolution } from "../types.js";
import { DummyEncoder, FakeEncoder, snapshotOf } from "./fake-encoders.js";

const quiet = () => ({ tracer: new CompatibilityTracer({ enabled: false }) });

function rightOf<A>(result: Either<MigrationUnavailable, A>): A {
  if (isLeft(result)) {
    throw new Error(`expected a resolution, got ${result.left._tag}`);
  }
  return result.right;
}

function converterOf<T>(resolution: Resolution<T>): Encoder<T> | undefined {
  return resolution._tag === "RequiresMigration" ? resolution.converter : undefined;
}

const allPreceding = (): Array<[string, PrecedingEncoder<string>]> => [
  ["real", realPreceding(new FakeEncoder("old"))],
  ["placeholder", placeholderPreceding],
  ["absent", absentPreceding],
];

describe("resolveCompatibility", () => {
  describe("without a preceding snapshot", () => {
    it.each(allPreceding())("is compatible with a %s preceding encoder", (_label, preceding) => {
      const newEncoder = new FakeEncoder("new", requiresMigration());

      const result = resolveCompatibility(preceding, undefined, newEncoder, quiet());

      expect(rightOf(result)).toEqual(compatible());
    });

    it("does not confront the new encoder", () => {
      const newEncoder = new FakeEncoder("new", requiresMigration());
      resolveCompatibility(absentPreceding, undefined, newEncoder, quiet());
      expect(newEncoder.confronted).toEqual([]);
    });
  });

  describe("when the new encoder reports compatible", () => {
    it.each(allPreceding())("passes the verdict through with a %s preceding encoder", (_label, preceding) => {
      const verdict = compatible();
      const newEncoder = new FakeEncoder("new", verdict);

      const resolution = rightOf(resolveCompatibility(preceding, snapshotOf("old"), newEncoder, quiet()));

      expect(resolution).toBe(verdict);
    });

    it("confronts the new encoder with the preceding snapshot", () => {
      const snapshot = snapshotOf("old", 3);
      const newEncoder = new FakeEncoder("new");

      resolveCompatibility(absentPreceding, snapshot, newEncoder, quiet());

      expect(newEncoder.confronted).toEqual([snapshot]);
    });
  });

  describe("when migration is required", () => {
    it("uses a real preceding encoder as converter", () => {
      const old = new FakeEncoder("old");
      const newEncoder = new FakeEncoder("new", requiresMigration());

      const resolution = rightOf(
        resolveCompatibility(realPreceding(old), snapshotOf("old"), newEncoder, quiet())
      );

      expect(resolution._tag).toBe("RequiresMigration");
      expect(converterOf(resolution)).toBe(old);
    });

    it("prefers the real preceding encoder over an offered converter", () => {
      const old = new FakeEncoder("old");
      const offered = new FakeEncoder("offered");
      const newEncoder = new FakeEncoder("new", requiresMigration(offered));

      const resolution = rightOf(
        resolveCompatibility(realPreceding(old), snapshotOf("old"), newEncoder, quiet())
      );

      expect(converterOf(resolution)).toBe(old);
    });

    const withoutRealEncoder: Array<[string, PrecedingEncoder<string>]> = [
      ["placeholder", placeholderPreceding],
      ["absent", absentPreceding],
    ];

    it.each(withoutRealEncoder)("falls back to the offered converter with a %s preceding encoder", (_label, preceding) => {
      const offered = new FakeEncoder("offered");
      const newEncoder = new FakeEncoder("new", requiresMigration(offered));

      const resolution = rightOf(resolveCompatibility(preceding, snapshotOf("old"), newEncoder, quiet()));

      expect(resolution._tag).toBe("RequiresMigration");
      expect(converterOf(resolution)).toBe(offered);
    });

    it("returns the new encoder's verdict unchanged when it offers the converter", () => {
      const verdict = requiresMigration(new FakeEncoder("offered"));
      const newEncoder = new FakeEncoder("new", verdict);

      const resolution = rightOf(resolveCompatibility(absentPreceding, snapshotOf("old"), newEncoder, quiet()));

      expect(resolution).toBe(verdict);
    });

    it("fails when there is no preceding encoder and no offered converter", () => {
      const snapshot = snapshotOf("old");
      const newEncoder = new FakeEncoder("new", requiresMigration());

      const result = resolveCompatibility(absentPreceding, snapshot, newEncoder, {
        ...quiet(),
        stateName: "sessions",
      });

      expect(isRight(result)).toBe(false);
      if (isLeft(result)) {
        expect(result.left._tag).toBe("MigrationUnavailable");
        expect(result.left.stateName).toBe("sessions");
        expect(result.left.snapshot).toBe(snapshot);
        expect(result.left.preceding).toBe("none");
        expect(result.left.trace.finalResult).toBe("failed");
      }
    });

    it("fails when the preceding encoder is a placeholder and no converter is offered", () => {
      const newEncoder = new FakeEncoder("new", requiresMigration());

      const result = resolveCompatibility(placeholderPreceding, snapshotOf("old"), newEncoder, quiet());

      expect(isLeft(result) && result.left.preceding).toBe("placeholder");
    });
  });

  describe("tracing", () => {
    it("writes the trace of a failed resolution", () => {
      const writer = vi.fn();
      const tracer = new CompatibilityTracer({ enabled: true, level: "failures", writer });
      const newEncoder = new FakeEncoder("new", requiresMigration());

      resolveCompatibility(absentPreceding, snapshotOf("fake:old"), newEncoder, {
        tracer,
        stateName: "sessions",
      });

      expect(writer).toHaveBeenCalledTimes(1);
      expect(writer).toHaveBeenCalledWith(
        [
          'resolution trace for state "sessions" (fake:old@v1):',
          "  1. snapshot-lookup: fake:old@v1 — ok",
          "  2. confront: new encoder — FAILED — requires migration",
          "  3. preceding-encoder: none — not found",
          "  4. self-supplied-converter: new encoder — not found",
        ].join("\n")
      );
    });

    it("notes why a placeholder was passed over", () => {
      const tracer = new CompatibilityTracer({ enabled: true, writer: () => {} });
      const newEncoder = new FakeEncoder("new", requiresMigration(new FakeEncoder("offered")));

      resolveCompatibility(placeholderPreceding, snapshotOf("old"), newEncoder, { tracer });

      const [trace] = tracer.getAllTraces();
      expect(trace.sought).toBe("state (old@v1)");
      expect(trace.attempts.map((a) => `${a.step}:${a.result}`)).toEqual([
        "snapshot-lookup:found",
        "confront:rejected",
        "preceding-encoder:not-found",
        "self-supplied-converter:found",
      ]);
      expect(trace.attempts[2].reason).toBe("placeholder cannot read data");
      expect(trace.finalResult).toBe("resolved");
    });

    it("records the optimistic path when no snapshot exists", () => {
      const tracer = new CompatibilityTracer({ enabled: true, writer: () => {} });

      resolveCompatibility(absentPreceding, undefined, new FakeEncoder("new"), { tracer });

      expect(tracer.getAllTraces()).toEqual([
        {
          sought: "state (no snapshot)",
          attempts: [
            {
              step: "snapshot-lookup",
              target: "preceding snapshot",
              result: "not-found",
              reason: "assuming compatible",
            },
          ],
          finalResult: "resolved",
        },
      ]);
    });
  });
});

describe("resolveCompatibilityResult", () => {
  it("scenario: no snapshot resolves compatible whatever the encoders", () => {
    const resolution = resolveCompatibilityResult(
      new PlaceholderEncoder<string>(),
      PlaceholderEncoder,
      undefined,
      new FakeEncoder("new", requiresMigration()),
      quiet()
    );
    expect(resolution).toEqual(compatible());
  });

  it("scenario: compatible verdict resolves compatible", () => {
    const resolution = resolveCompatibilityResult(
      new FakeEncoder("old"),
      PlaceholderEncoder,
      snapshotOf("old"),
      new FakeEncoder("new", compatible()),
      quiet()
    );
    expect(resolution).toEqual(compatible());
  });

  it("scenario: a real preceding encoder converts when none is offered", () => {
    const old = new FakeEncoder("old");
    const resolution = resolveCompatibilityResult(
      old,
      PlaceholderEncoder,
      snapshotOf("old"),
      new FakeEncoder("new", requiresMigration()),
      quiet()
    );
    expect(converterOf(resolution)).toBe(old);
  });

  it("scenario: a placeholder defers to the offered converter", () => {
    const offered = new FakeEncoder("offered");
    const resolution = resolveCompatibilityResult(
      new PlaceholderEncoder<string>(snapshotOf("old")),
      PlaceholderEncoder,
      snapshotOf("old"),
      new FakeEncoder("new", requiresMigration(offered)),
      quiet()
    );
    expect(converterOf(resolution)).toBe(offered);
  });

  it("scenario: throws when migration is required and nothing can read the data", () => {
    const resolve = () =>
      resolveCompatibilityResult(
        undefined,
        PlaceholderEncoder,
        snapshotOf("old"),
        new FakeEncoder("new", requiresMigration()),
        quiet()
      );

    expect(resolve).toThrow(MigrationUnavailableError);
    expect(resolve).toThrow(
      "State migration required, but there is no available encoder capable of reading previous data."
    );
  });

  it("names the state in the thrown error", () => {
    let caught: unknown;
    try {
      resolveCompatibilityResult(
        new PlaceholderEncoder<string>(),
        PlaceholderEncoder,
        snapshotOf("old"),
        new FakeEncoder("new", requiresMigration()),
        { ...quiet(), stateName: "orders" }
      );
    } catch (e) {
      caught = e;
    }

    expect(caught).toBeInstanceOf(MigrationUnavailableError);
    if (caught instanceof MigrationUnavailableError) {
      expect(caught.message).toBe(
        'State migration required, but there is no available encoder capable of reading previous data. (state "orders")'
      );
      expect(caught.failure.preceding).toBe("placeholder");
      expect(caught.trace.attempts).toHaveLength(4);
    }
  });

  it("detects placeholders by exact class, not by subclassing", () => {
    class RecoveredPlaceholder<T> extends PlaceholderEncoder<T> {}
    const preceding = new RecoveredPlaceholder<string>();

    const resolution = resolveCompatibilityResult(
      preceding,
      PlaceholderEncoder,
      snapshotOf("old"),
      new FakeEncoder("new", requiresMigration(new FakeEncoder("offered"))),
      quiet()
    );

    expect(converterOf(resolution)).toBe(preceding);
  });

  it("accepts a caller-defined placeholder tag", () => {
    const offered = new FakeEncoder("offered");

    const resolution = resolveCompatibilityResult(
      new DummyEncoder(),
      DummyEncoder,
      snapshotOf("old"),
      new FakeEncoder("new", requiresMigration(offered)),
      quiet()
    );

    expect(converterOf(resolution)).toBe(offered);
  });

  it("never returns a placeholder as converter", () => {
    const placeholder = new PlaceholderEncoder<string>();
    const offered = new FakeEncoder("offered");

    const resolution = resolveWithDefaultPlaceholder(
      placeholder,
      snapshotOf("old"),
      new FakeEncoder("new", requiresMigration(offered)),
      quiet()
    );

    expect(converterOf(resolution)).not.toBe(placeholder);
    expect(converterOf(resolution)).toBe(offered);
  });
});
