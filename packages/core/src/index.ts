/**
 * Core module exports for @valuekit/core
 *
 * This package provides:
 * - The data model shared by the analyzer, the emitters and the pipeline
 * - The diagnostic catalog, builder and renderers
 * - Configuration, logging and the content-hash cache
 */

export * from "./types.js";

// Diagnostics System
export * from "./diagnostics.js";

// Configuration System
export {
  config,
  defineConfig,
  loadConfig,
  loadConfigFromEnv,
  loadConfigFromFiles,
  parseConfig,
  mergeConfig,
  matchGlob,
  ConfigError,
  DEFAULT_CONFIG,
  type ValuekitConfig,
  type ResolvedConfig,
  type ContractsConfig,
  type DiagnosticsConfig,
  type CacheConfig,
  type OutputConfig,
  type LoadConfigOptions,
  type LoadedConfigFile,
} from "./config.js";

// Logging
export { createLogger, silentLogger, type Logger, type LoggerOptions } from "./logger.js";

// Content-hash cache
export {
  ContentCache,
  computeContentKey,
  CACHE_VERSION,
  type CacheStats,
  type ContentCacheOptions,
} from "./cache.js";

// Runtime Safety Primitives
export { invariant, unreachable } from "./safety.js";
