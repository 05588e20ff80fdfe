/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: CAUTION_* (highest priority, for CI overrides)
 * 2. Config files: .cautionrc, .cautionrc.json, caution.config.cjs, etc.
 * 3. Programmatic: config.set() calls
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@caution/core";
 *
 * config.get("backtrace");              // → "root" | "full"
 * config.set({ display: { maxElements: 20 } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * Error display options.
 */
export interface DisplayConfig {
  /** Elements shown per input section before truncating */
  maxElements?: number;
  /** Wrap rendered errors in a banner */
  banner?: boolean;
  /** Render byte input as text where it decodes */
  strHint?: boolean;
  /** Emit ANSI colors (still disabled by NO_COLOR) */
  colors?: boolean;
}

/**
 * Full configuration schema.
 */
export interface CautionConfig {
  /** Enable debug logging */
  debug?: boolean;
  /** Backtrace strategy used by `Expected.mode()` */
  backtrace?: "root" | "full";
  /** Error display configuration */
  display?: DisplayConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;
let configFileError: unknown;
let searchFrom: string | undefined;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

const PREFIX = "CAUTION_";

/**
 * Convert an environment key (without prefix) into a config path.
 * Double underscore separates nesting, single underscore joins camelCase words.
 *
 *   DISPLAY__MAX_ELEMENTS → display.maxElements
 */
export function envKeyToPath(key: string): string {
  return key
    .toLowerCase()
    .split("__")
    .map((segment) => segment.replace(/_([a-z0-9])/g, (_m, c: string) => c.toUpperCase()))
    .join(".");
}

function parseEnvValue(value: string): unknown {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return value;
}

/**
 * Load configuration from environment variables.
 *
 *   CAUTION_DEBUG=1                    → { debug: true }
 *   CAUTION_BACKTRACE=full             → { backtrace: "full" }
 *   CAUTION_DISPLAY__MAX_ELEMENTS=20   → { display: { maxElements: 20 } }
 */
function loadConfigFromEnv(): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;
    setNestedValue(envConfig, envKeyToPath(key.slice(PREFIX.length)), parseEnvValue(value));
  }
  return envConfig;
}

// ============================================================================
// Utility Functions
// ============================================================================

function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  const last = parts.pop();
  if (last === undefined) return;
  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

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
// Config File Loading
// ============================================================================

const MODULE_NAME = "caution";

function loadConfigFromFiles(): Record<string, unknown> {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });
  try {
    const result = explorer.search(searchFrom);
    if (result && !result.isEmpty && isRecord(result.config)) {
      configFilePath = result.filepath;
      return result.config;
    }
  } catch (error) {
    // Unreadable config files fall back to the defaults.
    configFileError = error;
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

const DEFAULTS: CautionConfig = {
  debug: false,
  backtrace: "root",
  display: {
    maxElements: 40,
    banner: false,
    strHint: false,
    colors: false,
  },
};

function initializeConfig(): void {
  if (configLoaded) return;
  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(DEFAULTS, loadConfigFromFiles()), loadConfigFromEnv());
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Get a boolean configuration value, falling back when unset or mistyped.
 */
function getBoolean(path: string, fallback: boolean): boolean {
  const value = get(path);
  return typeof value === "boolean" ? value : fallback;
}

/**
 * Get a numeric configuration value, falling back when unset or mistyped.
 */
function getNumber(path: string, fallback: number): number {
  const value = get(path);
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

/**
 * Set configuration values programmatically.
 */
function set(values: CautionConfig): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
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
 * Get the error raised while reading the config file (if any).
 */
function getConfigFileError(): unknown {
  initializeConfig();
  return configFileError;
}

export interface ResetOptions {
  /** Directory the config file search starts from (default: the working directory) */
  searchFrom?: string;
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(options: ResetOptions = {}): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
  configFileError = undefined;
  searchFrom = options.searchFrom;
}

export const config = {
  get,
  getBoolean,
  getNumber,
  set,
  has,
  getAll,
  getConfigFilePath,
  getConfigFileError,
  reset,
};
