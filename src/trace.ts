/**
 * Resolution Tracing
 *
 * Records how each compatibility resolution was reached, step by step, so
 * restore failures can be explained and healthy restores audited.
 */

import { config, type TraceLevel } from "./config.js";

// ============================================================================
// Trace Types
// ============================================================================

/**
 * A single step of a compatibility resolution.
 */
export interface ResolutionAttempt {
  /** The step being attempted (e.g., "snapshot-lookup", "confront", "preceding-encoder") */
  step: string;
  /** What the step looked at (e.g., "json:User@v2", "new encoder") */
  target: string;
  /** The outcome of this attempt */
  result: "found" | "not-found" | "rejected";
  /** Human-readable reason for the outcome */
  reason?: string;
}

/**
 * A complete resolution trace: every attempt made for one state, in order.
 */
export interface ResolutionTrace {
  /** What was being resolved (e.g., `state "sessions" (json:Session@v1)`) */
  sought: string;
  /** All attempts in order */
  attempts: ResolutionAttempt[];
  /** Final outcome */
  finalResult: "resolved" | "failed";
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Format a resolution trace into lines.
 *
 * Produces output like:
 * ```
 * resolution trace for state "sessions" (json:Session@v1):
 *   1. snapshot-lookup: json:Session@v1 — ok
 *   2. confront: new encoder — FAILED — requires migration
 *   3. preceding-encoder: placeholder — not found — placeholder cannot read data
 * ```
 */
export function formatResolutionTrace(trace: ResolutionTrace): string[] {
  const lines = [`resolution trace for ${trace.sought}:`];

  trace.attempts.forEach((attempt, i) => {
    const reasonSuffix = attempt.reason ? ` — ${attempt.reason}` : "";
    lines.push(
      `  ${i + 1}. ${attempt.step}: ${attempt.target}${formatResultIndicator(attempt.result)}${reasonSuffix}`
    );
  });

  return lines;
}

function formatResultIndicator(result: ResolutionAttempt["result"]): string {
  switch (result) {
    case "found":
      return " — ok";
    case "not-found":
      return " — not found";
    case "rejected":
      return " — FAILED";
  }
}

// ============================================================================
// Tracer
// ============================================================================

export interface TracerOptions {
  /** Record traces (default: `trace.enabled` from config) */
  enabled?: boolean;
  /** Which traces to write out (default: `trace.level` from config) */
  level?: TraceLevel;
  /** Custom writer function (default: console.error) */
  writer?: (line: string) => void;
  /** Most recent traces kept in memory (default: 100) */
  maxTraces?: number;
}

const DEFAULT_MAX_TRACES = 100;

/**
 * Collects resolution traces and writes them out as they are recorded.
 *
 * Settings not given as options are read from config on first use, not at
 * construction.
 */
export class CompatibilityTracer {
  private traces: ResolutionTrace[] = [];
  private enabled: boolean | undefined;
  private level: TraceLevel | undefined;
  private readonly writer: (line: string) => void;
  private readonly maxTraces: number;

  constructor(options: TracerOptions = {}) {
    this.enabled = options.enabled;
    this.level = options.level;
    this.writer = options.writer ?? ((line: string) => console.error(line));
    this.maxTraces = Math.max(1, options.maxTraces ?? DEFAULT_MAX_TRACES);
  }

  isEnabled(): boolean {
    this.enabled ??= config.isTracingEnabled();
    return this.enabled;
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  /**
   * Record a finished resolution. Failed resolutions are always written;
   * successful ones only at level "all". Only the newest `maxTraces` are kept.
   */
  record(trace: ResolutionTrace): void {
    if (!this.isEnabled()) return;

    this.traces.push(trace);
    if (this.traces.length > this.maxTraces) {
      this.traces.splice(0, this.traces.length - this.maxTraces);
    }

    this.level ??= config.traceLevel();
    if (trace.finalResult === "failed" || this.level === "all") {
      this.writer(formatResolutionTrace(trace).join("\n"));
    }
  }

  getAllTraces(): ResolutionTrace[] {
    return [...this.traces];
  }

  getFailures(): ResolutionTrace[] {
    return this.traces.filter((t) => t.finalResult === "failed");
  }

  clear(): void {
    this.traces = [];
  }
}

/**
 * Global tracer, used when a resolution is not given one.
 */
export const globalCompatibilityTracer = new CompatibilityTracer();
