/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: TOKENRULES_*
 * 3. Config files: package.json#tokenrules, .tokenrulesrc, tokenrules.config.js, ...
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@tokenrules/core";
 *
 * config.get<number>("expansion.recursionLimit") // → 128
 * config.set({ expansion: { requireBang: true } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

export interface ExpansionConfig {
  /** Maximum number of nested expansions in flight at once */
  recursionLimit?: number;
  /** Only treat `name!(...)` as an invocation, never a bare `name(...)` */
  requireBang?: boolean;
}

export interface DiagnosticsConfig {
  /** Force ANSI colors on or off; auto-detected when unset */
  colors?: boolean;
}

/**
 * Full tokenrules configuration schema.
 */
export interface TokenrulesConfig {
  /** Enable debug logging */
  debug?: boolean;
  expansion?: ExpansionConfig;
  diagnostics?: DiagnosticsConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

type ConfigRecord = Record<string, unknown>;

// ============================================================================
// Global State
// ============================================================================

const MODULE_NAME = "tokenrules";
const ENV_PREFIX = "TOKENRULES_";

export const DEFAULT_RECURSION_LIMIT = 128;

function defaults(): TokenrulesConfig {
  return {
    debug: false,
    expansion: {
      recursionLimit: DEFAULT_RECURSION_LIMIT,
      requireBang: false,
    },
    diagnostics: {},
  };
}

let configStore: ConfigRecord = {};
let programmatic: ConfigRecord = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: ConfigRecord = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigRecord = {};
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
    if (!isRecord(current)) return undefined;
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

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

/**
 * Environment variable names are upper case; restore the camelCase spelling
 * of keys the schema knows about.
 */
function canonicalizePath(lowerPath: string): string {
  const parts = lowerPath.split(".");
  const out: string[] = [];
  let shape: unknown = defaults();

  for (const part of parts) {
    const known = isRecord(shape)
      ? Object.keys(shape).find((key) => key.toLowerCase() === part)
      : undefined;
    out.push(known ?? part);
    shape = known !== undefined && isRecord(shape) ? shape[known] : undefined;
  }

  return out.join(".");
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

type EnvValueKind = "number" | "boolean";

/** Known keys parse by their declared type; `diagnostics.colors` has no default to infer it from. */
const ENV_VALUE_KINDS: Readonly<Partial<Record<string, EnvValueKind>>> = {
  debug: "boolean",
  "expansion.recursionLimit": "number",
  "expansion.requireBang": "boolean",
  "diagnostics.colors": "boolean",
};

function parseFlag(value: string): boolean | undefined {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  return undefined;
}

/**
 * `1` and `0` are flags only for boolean keys; numeric keys keep them as
 * numbers. Unknown keys accept either.
 */
function coerceEnvValue(configPath: string, value: string): unknown {
  switch (ENV_VALUE_KINDS[configPath]) {
    case "number":
      return /^-?\d+$/.test(value) ? parseInt(value, 10) : value;
    case "boolean":
      return parseFlag(value) ?? value;
    case undefined:
      break;
  }
  const flag = parseFlag(value);
  if (flag !== undefined) return flag;
  return /^\d+$/.test(value) ? parseInt(value, 10) : value;
}

/**
 * Variables prefixed with TOKENRULES_ are parsed into the config object.
 *
 * Examples:
 *   TOKENRULES_DEBUG=1                           → { debug: true }
 *   TOKENRULES_EXPANSION_RECURSIONLIMIT=64       → { expansion: { recursionLimit: 64 } }
 *   TOKENRULES_EXPANSION_RECURSIONLIMIT=1        → { expansion: { recursionLimit: 1 } }
 */
function loadConfigFromEnv(): ConfigRecord {
  const envConfig: ConfigRecord = {};

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // Consumed by the diagnostics renderer directly
    if (key === "TOKENRULES_NO_COLOR") continue;

    const configPath = canonicalizePath(
      key.slice(ENV_PREFIX.length).toLowerCase().replace(/__/g, ".").replace(/_/g, "."),
    );

    setNestedValue(envConfig, configPath, coerceEnvValue(configPath, value));
  }

  return envConfig;
}

// ============================================================================
// Config File Loading
// ============================================================================

function loadConfigFromFiles(): ConfigRecord {
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

  let result: ReturnType<typeof explorer.search>;
  try {
    result = explorer.search();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`tokenrules: failed to load configuration file: ${message}`, {
      cause: error,
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
  const envConfig = loadConfigFromEnv();

  // defaults < file < env < programmatic
  configStore = deepMerge(
    deepMerge(deepMerge(defaults(), fileConfig), envConfig),
    programmatic,
  );
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

function get<T = unknown>(path: string): T | undefined;
function get<T>(path: string, fallback: T): T;
function get<T>(path: string, fallback?: T): T | undefined {
  initializeConfig();
  const value = getNestedValue(configStore, path);
  if (value === undefined) return fallback;
  // Values are untyped at the storage level; callers name the type they read.
  return value as T;
}

function set(values: TokenrulesConfig): void {
  initializeConfig();
  programmatic = deepMerge(programmatic, values);
  configStore = deepMerge(configStore, values);
}

function has(path: string): boolean {
  return !!get(path);
}

function getAll(): Readonly<ConfigRecord> {
  initializeConfig();
  return configStore;
}

function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  programmatic = {};
  configLoaded = false;
  configFilePath = undefined;
}

function isDebugEnabled(): boolean {
  return get<boolean>("debug", false);
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
  isDebugEnabled,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: TokenrulesConfig): TokenrulesConfig {
  return cfg;
}
