/**
 * Running TypeScript modules inside the test process.
 *
 * Sources are transpiled to CommonJS with `ts.transpileModule` and evaluated
 * in the current realm, so `instanceof Map` and friends behave as they do in
 * the runtime package. Imports resolve only against the modules given.
 */

import * as vm from "node:vm";
import * as ts from "typescript";
import * as runtime from "@valuekit/runtime";
import { ValueObject, type Enumeration, type EnumerationLookup } from "@valuekit/runtime";

export type ModuleExports = Readonly<Record<string, unknown>>;

export interface LoadModuleOptions {
  fileName?: string;
  /** Modules `require` can see, by import specifier */
  modules?: Readonly<Record<string, unknown>>;
}

/** The runtime package under its published specifier */
export const RUNTIME_MODULES: Readonly<Record<string, unknown>> = {
  "@valuekit/runtime": runtime,
};

export function transpile(source: string, fileName: string): string {
  return ts.transpileModule(source, {
    fileName,
    compilerOptions: {
      module: ts.ModuleKind.CommonJS,
      target: ts.ScriptTarget.ES2022,
      esModuleInterop: true,
    },
    reportDiagnostics: false,
  }).outputText;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Transpile and evaluate a module, returning its exports.
 */
export function loadModule(source: string, options: LoadModuleOptions = {}): ModuleExports {
  const fileName = options.fileName ?? "module.ts";
  const modules = { ...RUNTIME_MODULES, ...options.modules };

  const requireModule = (specifier: string): unknown => {
    if (Object.prototype.hasOwnProperty.call(modules, specifier)) {
      return modules[specifier];
    }
    throw new Error(`Cannot find module '${specifier}' from ${fileName}`);
  };

  const record: { exports: unknown } = { exports: {} };
  const wrapper = vm.compileFunction(transpile(source, fileName), ["exports", "require", "module"], {
    filename: fileName,
  });
  wrapper(record.exports, requireModule, record);

  if (!isRecord(record.exports)) {
    throw new Error(`${fileName} did not export an object`);
  }
  return record.exports;
}

// ============================================================================
// Export Accessors
// ============================================================================

export type AnyConstructor = new (...args: unknown[]) => unknown;
export type AnyFunction = (...args: unknown[]) => unknown;

function isConstructor(value: unknown): value is AnyConstructor {
  return typeof value === "function" && value.prototype !== undefined;
}

function isFunction(value: unknown): value is AnyFunction {
  return typeof value === "function";
}

export function getClass(exports: ModuleExports, name: string): AnyConstructor {
  const value = exports[name];
  if (!isConstructor(value)) {
    throw new Error(`Module does not export a class named '${name}'`);
  }
  return value;
}

export function getFunction(exports: ModuleExports, name: string): AnyFunction {
  const value = exports[name];
  if (!isFunction(value)) {
    throw new Error(`Module does not export a function named '${name}'`);
  }
  return value;
}

const LOOKUP_METHODS = ["getAll", "fromValue", "fromName", "tryFromValue", "tryFromName", "parse"];

function isLookup(value: unknown): value is EnumerationLookup<Enumeration> {
  return isRecord(value) && LOOKUP_METHODS.every((method) => typeof value[method] === "function");
}

export function getLookup(exports: ModuleExports, name: string): EnumerationLookup<Enumeration> {
  const value = exports[name];
  if (!isLookup(value)) {
    throw new Error(`Module does not export an enumeration lookup named '${name}'`);
  }
  return value;
}

function asValueObject(value: unknown) {
  if (!(value instanceof ValueObject)) {
    throw new TypeError("Expected a value object instance");
  }
  return value;
}

/**
 * `a.equals(b)` on a value object loaded in the sandbox.
 */
export function valueEquals(a: unknown, b: unknown): boolean {
  return asValueObject(a).equals(b);
}

export function valueHash(value: unknown): number {
  return asValueObject(value).getHashCode();
}

// ============================================================================
// Host + Companion
// ============================================================================

export interface CompanionPair {
  readonly host: ModuleExports;
  readonly companion: ModuleExports;
}

/**
 * Load a source module and then its generated companion, which imports the
 * source module as `hostModule`.
 */
export function loadWithCompanion(
  hostSource: string,
  companionSource: string,
  hostModule: string = "./model.js"
): CompanionPair {
  const host = loadModule(hostSource, { fileName: "model.ts" });
  const companion = loadModule(companionSource, {
    fileName: "model.valuekit.ts",
    modules: { [hostModule]: host },
  });
  return { host, companion };
}
