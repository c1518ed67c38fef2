/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: ORDKIT_* (highest priority, for CI overrides)
 * 2. Programmatic: config.set() calls
 * 3. Config files: .ordkitrc, .ordkitrc.json, ordkit.config.cjs, etc.
 * 4. package.json: "ordkit" key
 * 5. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@ordkit/core";
 *
 * config.get("debug")                // → boolean
 * config.get("checks.invariants")    // → "off" | "warn" | "error"
 * config.set({ checks: { invariants: "error" } });
 * ```
 *
 * @example Config file (ordkit.config.cjs)
 * ```javascript
 * module.exports = {
 *   checks: { invariants: "warn" },
 * };
 * ```
 */

import { cosmiconfigSync, defaultLoadersSync, type LoaderSync, type LoadersSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * What to do when a collection finds its own ordering invariant broken after
 * a mutation (which can only happen with an inconsistent comparator).
 */
export type InvariantCheckMode = "off" | "warn" | "error";

export interface ChecksConfig {
  invariants?: InvariantCheckMode;
}

export interface OrdkitConfig {
  /** Emit debug-level diagnostics */
  debug?: boolean;
  checks?: ChecksConfig;
}

/** Raised when a discovered config file cannot be loaded. */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly filepath: string | undefined,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/**
 * Identity helper giving config files type checking.
 */
export function defineConfig(c: OrdkitConfig): OrdkitConfig {
  return c;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let overrides: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;

const DEFAULTS: OrdkitConfig = {
  debug: false,
  checks: {
    invariants: "off",
  },
};

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "ORDKIT_";

/**
 * Parse ORDKIT_* variables into a config object.
 *
 * Examples:
 *   ORDKIT_DEBUG=1                   → { debug: true }
 *   ORDKIT_CHECKS_INVARIANTS=warn    → { checks: { invariants: "warn" } }
 */
export function parseEnvConfig(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(ENV_PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else {
      parsedValue = value;
    }

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const next = current[parts[i]];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[parts[i]] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence). Undefined leaves are skipped.
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    if (sourceValue === undefined) continue;
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

function toRecord(value: object): Record<string, unknown> {
  return { ...value };
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "ordkit";

/**
 * Wrap a cosmiconfig loader so a parse failure names the file it came from.
 */
function withFilepath(load: LoaderSync): LoaderSync {
  return (filepath, content) => {
    try {
      return load(filepath, content);
    } catch (err) {
      throw new ConfigError(`failed to load ${filepath}`, filepath, { cause: err });
    }
  };
}

function fileLoaders(): LoadersSync {
  const loaders: LoadersSync = {};
  for (const [ext, load] of Object.entries(defaultLoadersSync)) {
    loaders[ext] = withFilepath(load);
  }
  return loaders;
}

function loadConfigFromFiles(): Record<string, unknown> {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    loaders: fileLoaders(),
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });

  let result: ReturnType<typeof explorer.search>;
  try {
    result = explorer.search();
  } catch (err) {
    if (err instanceof ConfigError) throw err;
    const filepath = isRecord(err) && typeof err.filepath === "string" ? err.filepath : undefined;
    throw new ConfigError(`failed to load ${MODULE_NAME} configuration`, filepath, {
      cause: err,
    });
  }

  if (result && !result.isEmpty && isRecord(result.config)) {
    configFilePath = result.filepath;
    return result.config;
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = parseEnvConfig(process.env);

  // Merge: defaults < fileConfig < overrides < envConfig
  configStore = deepMerge(
    deepMerge(deepMerge(toRecord(DEFAULTS), fileConfig), overrides),
    envConfig
  );
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by dotted path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically. Environment variables still
 * win over anything set here.
 */
function set(values: OrdkitConfig): void {
  overrides = deepMerge(overrides, toRecord(values));
  configLoaded = false;
  initializeConfig();
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
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

/**
 * Drop programmatic overrides and force a reload on next access.
 */
function reset(): void {
  configStore = {};
  overrides = {};
  configLoaded = false;
  configFilePath = undefined;
}

/**
 * Resolved invariant-check mode, falling back to "off" for unknown values.
 */
function invariantCheckMode(): InvariantCheckMode {
  const mode = get("checks.invariants");
  return mode === "warn" || mode === "error" ? mode : "off";
}

// ============================================================================
// Export: config object
// ============================================================================

export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
  invariantCheckMode,
} as const;
