/**
 * Core module exports for @tokenrules/core
 *
 * This package provides:
 * - Source spans
 * - Configuration (defaults, config files, TOKENRULES_* environment)
 * - The diagnostic catalog and its CLI renderer
 * - The generic keyed registry
 */

export * from "./span.js";

// Configuration System
export {
  config,
  defineConfig,
  DEFAULT_RECURSION_LIMIT,
  type TokenrulesConfig,
  type ExpansionConfig,
  type DiagnosticsConfig,
} from "./config.js";

// Generic Registry<K, V> abstraction
export {
  createGenericRegistry,
  type GenericRegistry,
  type RegistryOptions,
  type DuplicateStrategy,
} from "./registry.js";

// Diagnostics System
export * from "./diagnostics.js";
