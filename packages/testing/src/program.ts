/**
 * In-memory programs for analyzer tests
 */

import * as ts from "typescript";

/**
 * Parse a source code string into a SourceFile
 */
export function parseSource(source: string, fileName: string = "model.ts"): ts.SourceFile {
  return ts.createSourceFile(fileName, source, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
}

export interface TestProgram {
  readonly program: ts.Program;
  readonly checker: ts.TypeChecker;
  /** @throws Error when the file is not part of the program */
  sourceFile(fileName: string): ts.SourceFile;
}

export const TEST_COMPILER_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.ESNext,
  moduleResolution: ts.ModuleResolutionKind.Bundler,
  strict: true,
  noEmit: true,
};

/**
 * Create a program over in-memory files. Default library files are read
 * from the installed compiler so the checker knows `Date`, `Set` and the
 * iterator protocol.
 */
export function createTestProgram(
  files: Readonly<Record<string, string>>,
  options: ts.CompilerOptions = TEST_COMPILER_OPTIONS
): TestProgram {
  const parsed = new Map<string, ts.SourceFile>();
  const libDirectory = ts.getDirectoryPath(ts.getDefaultLibFilePath(options));

  const readFile = (fileName: string): string | undefined =>
    Object.prototype.hasOwnProperty.call(files, fileName) ? files[fileName] : ts.sys.readFile(fileName);

  const compilerHost: ts.CompilerHost = {
    getSourceFile: (fileName, languageVersion) => {
      const cached = parsed.get(fileName);
      if (cached) return cached;
      const text = readFile(fileName);
      if (text === undefined) return undefined;
      const sourceFile = ts.createSourceFile(fileName, text, languageVersion, true);
      parsed.set(fileName, sourceFile);
      return sourceFile;
    },
    getDefaultLibFileName: (compilerOptions) => ts.getDefaultLibFilePath(compilerOptions),
    getDefaultLibLocation: () => libDirectory,
    writeFile: () => undefined,
    getCurrentDirectory: () => "/",
    getCanonicalFileName: (fileName) => fileName,
    useCaseSensitiveFileNames: () => true,
    getNewLine: () => "\n",
    fileExists: (fileName) => readFile(fileName) !== undefined,
    readFile,
    directoryExists: () => true,
    getDirectories: () => [],
  };

  const program = ts.createProgram({ rootNames: Object.keys(files), options, host: compilerHost });
  return {
    program,
    checker: program.getTypeChecker(),
    sourceFile(fileName) {
      const sourceFile = program.getSourceFile(fileName);
      if (!sourceFile) {
        throw new Error(`'${fileName}' is not part of the test program`);
      }
      return sourceFile;
    },
  };
}
