/**
 * Configuration
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: STATE_MIGRATION_* (highest priority, for CI overrides)
 * 2. Config files: .state-migrationrc, state-migration.config.js, the
 *    "state-migration" key of package.json, etc. Only formats cosmiconfig can
 *    load synchronously are searched, so ES module config files are not.
 * 3. Programmatic: config.set() calls
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "state-migration";
 *
 * config.isTracingEnabled()              // → boolean
 * config.set({ trace: { enabled: true, level: "all" } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/** Which resolutions the tracer writes out. */
export type TraceLevel = "failures" | "all";

export type TraceConfig = {
  /** Record resolution traces */
  enabled?: boolean;
  /** "failures" = only unresolved migrations are written, "all" = every resolution */
  level?: TraceLevel;
};

export type StateMigrationConfig = {
  /** Resolution tracing */
  trace?: TraceConfig;
};

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;
let searchFrom: string | undefined;

const MODULE_NAME = "state-migration";
const ENV_PREFIX = "STATE_MIGRATION_";

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   STATE_MIGRATION_TRACE_ENABLED=1      → { trace: { enabled: true } }
 *   STATE_MIGRATION_TRACE_LEVEL=all      → { trace: { level: "all" } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(ENV_PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

    setNestedValue(envConfig, configPath, parseEnvValue(value));
  }

  return envConfig;
}

function parseEnvValue(value: string): unknown {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false") return false;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return value;
}

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

function loadConfigFromFiles(): Record<string, unknown> {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.js`,
      `.${MODULE_NAME}rc.cjs`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });
  const result = explorer.search(searchFrom);
  if (result === null || result.isEmpty) {
    return {};
  }
  const loaded: unknown = result.config;
  if (!isRecord(loaded)) {
    throw new Error(`Invalid ${MODULE_NAME} configuration in ${result.filepath}: expected an object`);
  }
  configFilePath = result.filepath;
  return loaded;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Config Initialization
// ============================================================================

const DEFAULTS: StateMigrationConfig = {
  trace: {
    enabled: false,
    level: "failures",
  },
};

function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv(process.env);

  // defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(DEFAULTS, fileConfig), envConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a raw configuration value by dot path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 */
function set(values: StateMigrationConfig): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

function getAll(): Readonly<Record<string, unknown>> {
  initializeConfig();
  return configStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

export interface ResetOptions {
  /** Directory config files are searched from (default: the working directory) */
  searchFrom?: string;
}

/**
 * Reset configuration so the next read reloads every source (mainly for testing).
 */
function reset(options: ResetOptions = {}): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
  searchFrom = options.searchFrom;
}

function isTracingEnabled(): boolean {
  return get("trace.enabled") === true;
}

function traceLevel(): TraceLevel {
  return get("trace.level") === "all" ? "all" : "failures";
}

/**
 * Identity helper for typed config files.
 */
export function defineConfig(values: StateMigrationConfig): StateMigrationConfig {
  return values;
}

// ============================================================================
// Export: config object
// ============================================================================

export const config = {
  get,
  set,
  getAll,
  getConfigFilePath,
  reset,
  isTracingEnabled,
  traceLevel,
} as const;
