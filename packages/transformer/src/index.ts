/**
 * @valuekit/transformer - pipeline, cache and CLI
 */

export {
  analyzeSourceFile,
  type AnalysisResult,
  type AnalyzeOptions,
  type DeclarationKind,
  type DeclarationResult,
} from "./pipeline.js";
export { ContractCache, type CachedKind } from "./cache.js";
export {
  createProjectProgram,
  hostModuleSpecifier,
  isCompanionCandidate,
  outputPathFor,
  projectSourceFiles,
  ProjectConfigError,
  readTsConfig,
  type OutputLayout,
} from "./program.js";
export {
  DEFAULT_CACHE_DIRECTORY,
  HELP_TEXT,
  nodeIO,
  parseArgs,
  runCli,
  UsageError,
  type CliIO,
  type CliOptions,
  type Command,
  type OutputFormat,
} from "./cli.js";
