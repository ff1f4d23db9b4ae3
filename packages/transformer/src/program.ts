/**
 * Project loading and companion module paths
 */

import * as path from "node:path";
import * as ts from "typescript";

const SOURCE_EXTENSION = /\.(c|m)?tsx?$/;
const DECLARATION_EXTENSION = /\.d\.(c|m)?ts$/;

/**
 * Raised when a tsconfig file cannot be read or parsed.
 */
export class ProjectConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath: string
  ) {
    super(message);
    this.name = "ProjectConfigError";
  }
}

function flatten(diagnostic: ts.Diagnostic): string {
  return ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n");
}

export function readTsConfig(configPath: string): ts.ParsedCommandLine {
  const absolutePath = path.resolve(configPath);
  const configFile = ts.readConfigFile(absolutePath, ts.sys.readFile);

  if (configFile.error) {
    throw new ProjectConfigError(`Error reading ${configPath}: ${flatten(configFile.error)}`, absolutePath);
  }

  const parsed = ts.parseJsonConfigFileContent(configFile.config, ts.sys, path.dirname(absolutePath));
  if (parsed.errors.length > 0) {
    const messages = parsed.errors.map(flatten);
    throw new ProjectConfigError(`Config errors in ${configPath}:\n${messages.join("\n")}`, absolutePath);
  }

  return parsed;
}

export function createProjectProgram(parsed: ts.ParsedCommandLine): ts.Program {
  return ts.createProgram({
    rootNames: parsed.fileNames,
    options: { ...parsed.options, noEmit: true },
    projectReferences: parsed.projectReferences,
  });
}

/**
 * Whether a file can host declarations: a TypeScript source that is neither
 * a declaration file nor a generated companion module.
 */
export function isCompanionCandidate(fileName: string, extension: string): boolean {
  return (
    SOURCE_EXTENSION.test(fileName) &&
    !DECLARATION_EXTENSION.test(fileName) &&
    !fileName.endsWith(extension)
  );
}

/**
 * The project's own source files, in root-name order.
 */
export function projectSourceFiles(program: ts.Program, extension: string): ts.SourceFile[] {
  return program.getRootFileNames().flatMap((fileName) => {
    const sourceFile = program.getSourceFile(fileName);
    if (!sourceFile || sourceFile.isDeclarationFile) return [];
    return isCompanionCandidate(sourceFile.fileName, extension) ? [sourceFile] : [];
  });
}

export interface OutputLayout {
  /** Write companion modules under this directory instead of beside their source */
  outDir?: string;
  /** Directory the source tree is mirrored from when `outDir` is set */
  rootDir?: string;
}

/**
 * Path of the companion module generated for `fileName`.
 *
 * @example
 * outputPathFor("/p/src/money.ts", ".valuekit.ts") // "/p/src/money.valuekit.ts"
 */
export function outputPathFor(fileName: string, extension: string, layout: OutputLayout = {}): string {
  const base = path.basename(fileName).replace(SOURCE_EXTENSION, "") + extension;
  if (!layout.outDir) {
    return path.join(path.dirname(fileName), base);
  }
  const relativeDir = path.relative(layout.rootDir ?? process.cwd(), path.dirname(fileName));
  return path.join(layout.outDir, relativeDir, base);
}

const RUNTIME_EXTENSIONS: Readonly<Record<string, string>> = {
  ".ts": ".js",
  ".tsx": ".js",
  ".mts": ".mjs",
  ".cts": ".cjs",
};

/**
 * Import specifier of `sourceFile` as seen from `outputFile`, written with
 * the extension the emitted JavaScript will have.
 */
export function hostModuleSpecifier(sourceFile: string, outputFile: string): string {
  const relative = path
    .relative(path.dirname(outputFile), sourceFile)
    .split(path.sep)
    .join("/")
    .replace(SOURCE_EXTENSION, (extension) => RUNTIME_EXTENSIONS[extension] ?? ".js");
  return relative.startsWith("../") ? relative : `./${relative}`;
}
