/**
 * Unified Configuration System
 *
 * Configuration is loaded from (lowest to highest priority):
 *
 * 1. Defaults
 * 2. Config files found by cosmiconfig: package.json#valuekit, .valuekitrc, etc.
 * 3. Environment variables: VALUEKIT_*
 * 4. Programmatic: config.set() calls
 *
 * @example
 * ```typescript
 * import { config } from "@valuekit/core";
 *
 * config.get("contracts.ignoreMembers")  // → string[]
 * config.set({ diagnostics: { severity: { VO002: "error" } } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import type { DiagnosticSeverity } from "./diagnostics.js";

// ============================================================================
// Types
// ============================================================================

export interface ContractsConfig {
  /** Glob patterns of member names exempt from the missing-strategy warning */
  ignoreMembers?: string[];
}

export interface DiagnosticsConfig {
  /** Per-code severity override; only escalation takes effect */
  severity?: Record<string, DiagnosticSeverity>;
}

export interface CacheConfig {
  enabled?: boolean;
  /** Directory of the on-disk cache; in-memory only when unset */
  directory?: string;
}

export interface OutputConfig {
  /** Suffix replacing `.ts` on generated companion modules */
  extension?: string;
  /** Module specifier generated code imports its helpers from */
  runtimeModule?: string;
}

/**
 * Full valuekit configuration schema, as written in config files.
 */
export interface ValuekitConfig {
  verbose?: boolean;
  contracts?: ContractsConfig;
  diagnostics?: DiagnosticsConfig;
  cache?: CacheConfig;
  output?: OutputConfig;
}

/**
 * Configuration after defaults are applied.
 */
export interface ResolvedConfig {
  readonly verbose: boolean;
  readonly contracts: { readonly ignoreMembers: readonly string[] };
  readonly diagnostics: { readonly severity: Readonly<Record<string, DiagnosticSeverity>> };
  readonly cache: { readonly enabled: boolean; readonly directory?: string };
  readonly output: { readonly extension: string; readonly runtimeModule: string };
}

export const DEFAULT_CONFIG: ResolvedConfig = {
  verbose: false,
  contracts: { ignoreMembers: [] },
  diagnostics: { severity: {} },
  cache: { enabled: true },
  output: { extension: ".valuekit.ts", runtimeModule: "@valuekit/runtime" },
};

/**
 * Raised when a config file cannot be loaded or holds an invalid value.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly filePath?: string,
    options?: { cause?: unknown }
  ) {
    super(filePath ? `${filePath}: ${message}` : message, options);
    this.name = "ConfigError";
  }
}

/**
 * Identity helper giving config files type checking.
 */
export function defineConfig(value: ValuekitConfig): ValuekitConfig {
  return value;
}

// ============================================================================
// Validation
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSeverity(value: unknown): value is DiagnosticSeverity {
  return value === "error" || value === "warning";
}

function expectBoolean(value: unknown, key: string, filePath?: string): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw new ConfigError(`"${key}" must be a boolean`, filePath);
  }
  return value;
}

function expectString(value: unknown, key: string, filePath?: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new ConfigError(`"${key}" must be a string`, filePath);
  }
  return value;
}

function expectSection(value: unknown, key: string, filePath?: string): Record<string, unknown> {
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new ConfigError(`"${key}" must be an object`, filePath);
  }
  return value;
}

/**
 * Validate an untyped config object (from a file or a caller).
 * Unknown keys are ignored.
 */
export function parseConfig(raw: unknown, filePath?: string): ValuekitConfig {
  if (!isRecord(raw)) {
    throw new ConfigError("configuration must be an object", filePath);
  }

  const result: ValuekitConfig = {};

  const verbose = expectBoolean(raw.verbose, "verbose", filePath);
  if (verbose !== undefined) result.verbose = verbose;

  const contracts = expectSection(raw.contracts, "contracts", filePath);
  if (contracts.ignoreMembers !== undefined) {
    const patterns = contracts.ignoreMembers;
    if (!Array.isArray(patterns) || !patterns.every((p): p is string => typeof p === "string")) {
      throw new ConfigError(`"contracts.ignoreMembers" must be an array of strings`, filePath);
    }
    result.contracts = { ignoreMembers: patterns };
  }

  const diagnostics = expectSection(raw.diagnostics, "diagnostics", filePath);
  if (diagnostics.severity !== undefined) {
    const severity = expectSection(diagnostics.severity, "diagnostics.severity", filePath);
    const parsed: Record<string, DiagnosticSeverity> = {};
    for (const [code, value] of Object.entries(severity)) {
      if (!isSeverity(value)) {
        throw new ConfigError(
          `"diagnostics.severity.${code}" must be "error" or "warning"`,
          filePath
        );
      }
      parsed[code] = value;
    }
    result.diagnostics = { severity: parsed };
  }

  const cache = expectSection(raw.cache, "cache", filePath);
  const cacheEnabled = expectBoolean(cache.enabled, "cache.enabled", filePath);
  const cacheDirectory = expectString(cache.directory, "cache.directory", filePath);
  if (cacheEnabled !== undefined || cacheDirectory !== undefined) {
    result.cache = { enabled: cacheEnabled, directory: cacheDirectory };
  }

  const output = expectSection(raw.output, "output", filePath);
  const extension = expectString(output.extension, "output.extension", filePath);
  const runtimeModule = expectString(output.runtimeModule, "output.runtimeModule", filePath);
  if (extension !== undefined && !extension.endsWith(".ts")) {
    throw new ConfigError(`"output.extension" must end in ".ts"`, filePath);
  }
  if (extension !== undefined || runtimeModule !== undefined) {
    result.output = { extension, runtimeModule };
  }

  return result;
}

// ============================================================================
// Merging
// ============================================================================

/**
 * Apply a partial config on top of a resolved one (right takes precedence).
 * `diagnostics.severity` maps are merged per code; arrays are replaced.
 */
export function mergeConfig(base: ResolvedConfig, layer: ValuekitConfig): ResolvedConfig {
  return {
    verbose: layer.verbose ?? base.verbose,
    contracts: {
      ignoreMembers: layer.contracts?.ignoreMembers ?? base.contracts.ignoreMembers,
    },
    diagnostics: {
      severity: { ...base.diagnostics.severity, ...layer.diagnostics?.severity },
    },
    cache: {
      enabled: layer.cache?.enabled ?? base.cache.enabled,
      directory: layer.cache?.directory ?? base.cache.directory,
    },
    output: {
      extension: layer.output?.extension ?? base.output.extension,
      runtimeModule: layer.output?.runtimeModule ?? base.output.runtimeModule,
    },
  };
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

function parseFlag(value: string): boolean {
  return value === "1" || value.toLowerCase() === "true";
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   VALUEKIT_VERBOSE=1                           → { verbose: true }
 *   VALUEKIT_CONTRACTS_IGNORE_MEMBERS=_*,cache*  → { contracts: { ignoreMembers: [...] } }
 *   VALUEKIT_DIAGNOSTICS_SEVERITY=VO002=error    → { diagnostics: { severity: { VO002: "error" } } }
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ValuekitConfig {
  const result: ValuekitConfig = {};

  if (env.VALUEKIT_VERBOSE !== undefined) {
    result.verbose = parseFlag(env.VALUEKIT_VERBOSE);
  }
  if (env.VALUEKIT_CONTRACTS_IGNORE_MEMBERS !== undefined) {
    result.contracts = { ignoreMembers: splitList(env.VALUEKIT_CONTRACTS_IGNORE_MEMBERS) };
  }
  if (env.VALUEKIT_DIAGNOSTICS_SEVERITY !== undefined) {
    const severity: Record<string, DiagnosticSeverity> = {};
    for (const pair of splitList(env.VALUEKIT_DIAGNOSTICS_SEVERITY)) {
      const [code, level] = pair.split("=").map((s) => s.trim());
      if (code && isSeverity(level)) {
        severity[code] = level;
      } else {
        throw new ConfigError(`VALUEKIT_DIAGNOSTICS_SEVERITY: invalid entry "${pair}"`);
      }
    }
    result.diagnostics = { severity };
  }
  if (env.VALUEKIT_CACHE_ENABLED !== undefined || env.VALUEKIT_CACHE_DIRECTORY !== undefined) {
    result.cache = {
      enabled:
        env.VALUEKIT_CACHE_ENABLED === undefined ? undefined : parseFlag(env.VALUEKIT_CACHE_ENABLED),
      directory: env.VALUEKIT_CACHE_DIRECTORY,
    };
  }
  if (env.VALUEKIT_OUTPUT_EXTENSION !== undefined || env.VALUEKIT_OUTPUT_RUNTIME_MODULE !== undefined) {
    result.output = {
      extension: env.VALUEKIT_OUTPUT_EXTENSION,
      runtimeModule: env.VALUEKIT_OUTPUT_RUNTIME_MODULE,
    };
  }

  return result;
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "valuekit";

export interface LoadedConfigFile {
  readonly filePath: string;
  readonly config: ValuekitConfig;
}

/**
 * Search for a config file starting at `searchFrom`.
 *
 * Loading is synchronous, so `valuekit.config.js` must be CommonJS; a
 * project with `"type": "module"` uses `valuekit.config.cjs` instead.
 */
export function loadConfigFromFiles(searchFrom?: string): LoadedConfigFile | undefined {
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
    result = explorer.search(searchFrom);
  } catch (error) {
    const filePath = isRecord(error) && typeof error.filepath === "string" ? error.filepath : undefined;
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`failed to load configuration: ${reason}`, filePath, { cause: error });
  }

  if (!result || result.isEmpty) {
    return undefined;
  }
  const raw: unknown = result.config;
  return { filePath: result.filepath, config: parseConfig(raw, result.filepath) };
}

export interface LoadConfigOptions {
  /** Directory to start the config file search from (default: cwd) */
  searchFrom?: string;
  env?: NodeJS.ProcessEnv;
  /** Skip the config file search */
  noFile?: boolean;
}

/**
 * Resolve defaults < file < environment.
 */
export function loadConfig(options: LoadConfigOptions = {}): {
  config: ResolvedConfig;
  filePath?: string;
} {
  const file = options.noFile ? undefined : loadConfigFromFiles(options.searchFrom);
  const fromFile = file ? mergeConfig(DEFAULT_CONFIG, file.config) : DEFAULT_CONFIG;
  return {
    config: mergeConfig(fromFile, loadConfigFromEnv(options.env)),
    filePath: file?.filePath,
  };
}

// ============================================================================
// Glob Matching
// ============================================================================

/**
 * Simple glob matching for member names: `*` matches any run, `?` one character.
 */
export function matchGlob(name: string, pattern: string): boolean {
  const regexStr = pattern
    .replace(/[.+^${}()|[\]\\]/g, "\\$&")
    .replace(/\*/g, ".*")
    .replace(/\?/g, ".");
  return new RegExp(`^${regexStr}$`).test(name);
}

// ============================================================================
// Global State
// ============================================================================

let configStore: ResolvedConfig = DEFAULT_CONFIG;
let configLoaded = false;
let configFilePath: string | undefined;
/** Values given to `set()`, in call order */
let programmatic: ValuekitConfig[] = [];

function initializeConfig(): void {
  if (configLoaded) return;
  const loaded = loadConfig();
  configStore = loaded.config;
  configFilePath = loaded.filePath;
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

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
 * Get a configuration value by dotted path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 */
function set(values: ValuekitConfig): void {
  initializeConfig();
  const parsed = parseConfig(values);
  programmatic.push(parsed);
  configStore = mergeConfig(configStore, parsed);
}

/**
 * Layer the values given to `set()` over a configuration resolved elsewhere,
 * such as one loaded for another directory.
 */
function applyOverrides(base: ResolvedConfig): ResolvedConfig {
  return programmatic.reduce((resolved, layer) => mergeConfig(resolved, layer), base);
}

function getAll(): ResolvedConfig {
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
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = DEFAULT_CONFIG;
  configLoaded = false;
  configFilePath = undefined;
  programmatic = [];
}

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  getAll,
  applyOverrides,
  getConfigFilePath,
  reset,
} as const;
