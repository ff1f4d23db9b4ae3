/**
 * valuekit CLI -- check equality contracts and generate companion modules
 *
 * Usage:
 *   valuekit check    [--project tsconfig.json] [--format pretty|json] [--explain] [--verbose]
 *   valuekit generate [--project tsconfig.json] [--out-dir dir] [--verbose]
 */

import * as fs from "node:fs";
import * as path from "node:path";
import {
  ConfigError,
  config as globalConfig,
  createLogger,
  hasErrors,
  loadConfig,
  renderDiagnosticsCLI,
  toDiagnosticReport,
  type Diagnostic,
  type Logger,
  type ResolvedConfig,
} from "@valuekit/core";
import { ContractCache } from "./cache.js";
import { analyzeSourceFile } from "./pipeline.js";
import {
  ProjectConfigError,
  createProjectProgram,
  hostModuleSpecifier,
  outputPathFor,
  projectSourceFiles,
  readTsConfig,
} from "./program.js";

export type Command = "check" | "generate";
export type OutputFormat = "pretty" | "json";

export interface CliOptions {
  command: Command;
  project: string;
  format: OutputFormat;
  verbose: boolean;
  /** Print each diagnostic's catalog explanation (pretty format only) */
  explain: boolean;
  outDir?: string;
  /** `true` for the default directory, a path, or `false` for --no-cache */
  cache?: boolean | string;
  help: boolean;
}

export const DEFAULT_CACHE_DIRECTORY = ".valuekit-cache";

/**
 * Raised for malformed command lines; the CLI exits with status 2.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const COMMANDS: readonly Command[] = ["check", "generate"];

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function isFormat(value: string): value is OutputFormat {
  return value === "pretty" || value === "json";
}

function requireValue(args: readonly string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith("-")) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

export function parseArgs(args: readonly string[]): CliOptions {
  const first = args[0];
  if (first === undefined || first === "--help" || first === "-h") {
    return {
      command: "check",
      project: "tsconfig.json",
      format: "pretty",
      verbose: false,
      explain: false,
      help: true,
    };
  }
  if (!isCommand(first)) {
    throw new UsageError(`Unknown command: ${first}`);
  }

  const options: CliOptions = {
    command: first,
    project: "tsconfig.json",
    format: "pretty",
    verbose: false,
    explain: false,
    help: false,
  };

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--project" || arg === "-p") {
      options.project = requireValue(args, ++i, arg);
    } else if (arg === "--format") {
      const format = requireValue(args, ++i, arg);
      if (!isFormat(format)) {
        throw new UsageError(`Unknown format: ${format} (expected pretty or json)`);
      }
      options.format = format;
    } else if (arg === "--out-dir") {
      if (options.command !== "generate") {
        throw new UsageError("--out-dir is only valid with generate");
      }
      options.outDir = requireValue(args, ++i, arg);
    } else if (arg === "--explain") {
      options.explain = true;
    } else if (arg === "--verbose" || arg === "-v") {
      options.verbose = true;
    } else if (arg === "--cache") {
      // Optional directory argument
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith("-")) {
        options.cache = next;
        i++;
      } else {
        options.cache = true;
      }
    } else if (arg === "--no-cache") {
      options.cache = false;
    } else if (arg === "--help" || arg === "-h") {
      options.help = true;
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  return options;
}

export const HELP_TEXT = `
valuekit - equality contracts and enumeration tables for TypeScript

USAGE:
  valuekit <command> [options]

COMMANDS:
  check              Validate contracts and print diagnostics
  generate           Validate and write <file>.valuekit.ts companion modules

OPTIONS:
  -p, --project <path>   Path to tsconfig.json (default: tsconfig.json)
  --format <format>      Diagnostic output: pretty (stderr) or json (stdout)
  --out-dir <dir>        Write companion modules under <dir> (generate only)
  --explain              Explain each diagnostic code (pretty format)
  -v, --verbose          Enable verbose logging
  --cache [dir]          Enable disk cache (default: ${DEFAULT_CACHE_DIRECTORY})
  --no-cache             Disable disk cache
  -h, --help             Show this help message

EXIT STATUS:
  0  no errors
  1  error diagnostics, or a declaration could not be processed
  2  usage or configuration error
`;

// ============================================================================
// Running
// ============================================================================

/**
 * Process boundary of the CLI. Tests pass an in-memory implementation.
 */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  writeFile(fileName: string, text: string): void;
  readonly cwd: string;
  readonly env: NodeJS.ProcessEnv;
  /** Colored diagnostics (default: decided from the environment) */
  readonly colors?: boolean;
}

export function nodeIO(): CliIO {
  return {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    writeFile: (fileName, text) => {
      fs.mkdirSync(path.dirname(fileName), { recursive: true });
      fs.writeFileSync(fileName, text, "utf-8");
    },
    cwd: process.cwd(),
    env: process.env,
  };
}

function cacheDirectory(option: boolean | string | undefined, config: ResolvedConfig): string | undefined {
  if (option === false) return undefined;
  if (typeof option === "string") return option;
  if (option === true) return config.cache.directory ?? DEFAULT_CACHE_DIRECTORY;
  return config.cache.enabled ? config.cache.directory : undefined;
}

function run(options: CliOptions, config: ResolvedConfig, io: CliIO, logger: Logger): number {
  const projectPath = path.resolve(io.cwd, options.project);
  const parsed = readTsConfig(projectPath);
  const program = createProjectProgram(parsed);
  const checker = program.getTypeChecker();
  const sourceFiles = projectSourceFiles(program, config.output.extension);
  logger.debug(`Using config: ${projectPath}`);
  logger.debug(`Analyzing ${sourceFiles.length} files...`);

  const directory = cacheDirectory(options.cache, config);
  const cache = directory
    ? new ContractCache({ directory: path.resolve(io.cwd, directory), onError: (m) => logger.warn(m) })
    : undefined;

  const layout = {
    outDir: options.outDir === undefined ? undefined : path.resolve(io.cwd, options.outDir),
    rootDir: path.dirname(projectPath),
  };

  const diagnostics: Diagnostic[] = [];
  let failures = 0;
  let written = 0;

  for (const sourceFile of sourceFiles) {
    const outputPath = outputPathFor(sourceFile.fileName, config.output.extension, layout);
    const result = analyzeSourceFile(sourceFile, {
      config,
      checker,
      cache,
      logger,
      hostModule: hostModuleSpecifier(sourceFile.fileName, outputPath),
    });
    diagnostics.push(...result.diagnostics);
    failures += result.declarations.filter((d) => d.failure !== undefined).length;

    if (options.command === "generate" && result.code !== undefined) {
      io.writeFile(outputPath, result.code);
      written++;
      logger.debug(`Wrote ${path.relative(io.cwd, outputPath)}`);
    }
  }

  if (cache) {
    cache.save();
    logger.debug(cache.getStatsString());
  }
  if (options.command === "generate") {
    logger.info(`Generated ${written} companion module${written === 1 ? "" : "s"}`);
  }

  if (options.format === "json") {
    io.stdout(`${JSON.stringify(toDiagnosticReport(diagnostics), null, 2)}\n`);
  } else {
    const rendered = renderDiagnosticsCLI(diagnostics, {
      colors: io.colors,
      showExplanation: options.explain,
      readSource: (fileName) => program.getSourceFile(fileName)?.text,
    });
    if (rendered) io.stderr(`${rendered}\n`);
  }

  if (failures > 0) {
    logger.error(`${failures} declaration${failures === 1 ? "" : "s"} could not be processed`);
  }
  return hasErrors(diagnostics) || failures > 0 ? 1 : 0;
}

/**
 * Run the CLI and return its exit status.
 */
export function runCli(args: readonly string[], io: CliIO = nodeIO()): number {
  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`${error.message}\nUsage: valuekit <check|generate> [options]\n`);
      return 2;
    }
    throw error;
  }

  if (options.help) {
    io.stdout(HELP_TEXT);
    return 0;
  }

  let config: ResolvedConfig;
  try {
    // Values set programmatically win over the project's file and environment
    config = globalConfig.applyOverrides(loadConfig({ searchFrom: io.cwd, env: io.env }).config);
  } catch (error) {
    if (error instanceof ConfigError) {
      io.stderr(`${error.message}\n`);
      return 2;
    }
    throw error;
  }

  // Keep stdout for the JSON report
  const toStdout = (line: string): void => io.stdout(`${line}\n`);
  const toStderr = (line: string): void => io.stderr(`${line}\n`);
  const logger = createLogger({
    verbose: options.verbose || config.verbose,
    out: options.format === "json" ? toStderr : toStdout,
    err: toStderr,
  });

  try {
    return run(options, config, io, logger);
  } catch (error) {
    if (error instanceof ProjectConfigError) {
      logger.error(error.message);
      return 2;
    }
    throw error;
  }
}
