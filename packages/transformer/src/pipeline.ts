/**
 * Per-file analysis pipeline
 *
 * Each class is processed on its own: classify, validate, and hand the
 * validated contract or enumeration table to the companion module emitter.
 * A declaration whose processing throws is logged and recorded as failed;
 * the other declarations of the file are unaffected.
 */

import * as path from "node:path";
import type * as ts from "typescript";
import {
  config as globalConfig,
  silentLogger,
  sortDiagnostics,
  type Diagnostic,
  type EqualityContract,
  type EnumerationTable,
  type Logger,
  type ResolvedConfig,
} from "@valuekit/core";
import {
  classifyClass,
  collectClasses,
  extractEnumeration,
  validateContract,
  validateEnumeration,
  type ValidationOptions,
} from "@valuekit/analyzer";
import { emitCompanionModule } from "@valuekit/derive";
import type { CachedKind, ContractCache } from "./cache.js";
import { hostModuleSpecifier, outputPathFor } from "./program.js";

// ============================================================================
// Types
// ============================================================================

export type DeclarationKind = CachedKind;

export interface DeclarationResult {
  readonly kind: DeclarationKind;
  readonly name: string;
  readonly diagnostics: readonly Diagnostic[];
  /** Validated contract, when the declaration has no errors */
  readonly contract?: EqualityContract;
  /** Validated table, when the enumeration is marked and has no errors */
  readonly table?: EnumerationTable;
  /** Served from the cache */
  readonly cached: boolean;
  /** Message of an internal failure; nothing was produced for the declaration */
  readonly failure?: string;
}

export interface AnalyzeOptions {
  config?: ResolvedConfig;
  /** Resolves aliased and inferred member types */
  checker?: ts.TypeChecker;
  cache?: ContractCache;
  /** Import specifier of the source module from the companion module (default: sibling file) */
  hostModule?: string;
  logger?: Logger;
}

export interface AnalysisResult {
  readonly fileName: string;
  readonly declarations: readonly DeclarationResult[];
  /** All diagnostics of the file, sorted by position */
  readonly diagnostics: readonly Diagnostic[];
  /** Companion module source; absent when nothing is generated */
  readonly code?: string;
}

// ============================================================================
// Declarations
// ============================================================================

interface PipelineContext {
  readonly sourceFile: ts.SourceFile;
  readonly settings: ValidationOptions;
  readonly checker?: ts.TypeChecker;
  readonly cache?: ContractCache;
  readonly logger: Logger;
}

function processContract(node: ts.ClassDeclaration, ctx: PipelineContext): DeclarationResult | undefined {
  const host = classifyClass(node, ctx.sourceFile, { checker: ctx.checker });
  if (!host) return undefined;

  const key = ctx.cache?.keyFor("contract", host, node.getText(ctx.sourceFile), ctx.settings);
  const cached = key === undefined ? undefined : ctx.cache?.getContract(key);
  if (cached) {
    ctx.logger.debug(`${host.name}: cached`);
    return { kind: "contract", name: host.name, diagnostics: cached.diagnostics, contract: cached.contract, cached: true };
  }

  const result = validateContract(host, ctx.settings);
  if (key !== undefined) ctx.cache?.setContract(key, result);
  return { kind: "contract", name: host.name, diagnostics: result.diagnostics, contract: result.contract, cached: false };
}

function processEnumeration(node: ts.ClassDeclaration, ctx: PipelineContext): DeclarationResult | undefined {
  const host = extractEnumeration(node, ctx.sourceFile, ctx.checker);
  if (!host) return undefined;

  const key = ctx.cache?.keyFor("enumeration", host, node.getText(ctx.sourceFile), ctx.settings);
  const cached = key === undefined ? undefined : ctx.cache?.getEnumeration(key);
  if (cached) {
    ctx.logger.debug(`${host.name}: cached`);
    return { kind: "enumeration", name: host.name, diagnostics: cached.diagnostics, table: cached.table, cached: true };
  }

  const result = validateEnumeration(host, { severity: ctx.settings.severity });
  if (key !== undefined) ctx.cache?.setEnumeration(key, result);
  return { kind: "enumeration", name: host.name, diagnostics: result.diagnostics, table: result.table, cached: false };
}

function isolate(
  kind: DeclarationKind,
  node: ts.ClassDeclaration,
  ctx: PipelineContext,
  run: (node: ts.ClassDeclaration, ctx: PipelineContext) => DeclarationResult | undefined
): DeclarationResult | undefined {
  try {
    return run(node, ctx);
  } catch (error) {
    const name = node.name?.text ?? "(anonymous)";
    const message = error instanceof Error ? error.message : String(error);
    ctx.logger.error(`${ctx.sourceFile.fileName}: ${kind} '${name}' failed: ${message}`);
    return { kind, name, diagnostics: [], cached: false, failure: message };
  }
}

// ============================================================================
// Files
// ============================================================================

/**
 * Analyze one source file and emit its companion module.
 */
export function analyzeSourceFile(sourceFile: ts.SourceFile, options: AnalyzeOptions = {}): AnalysisResult {
  const config = options.config ?? globalConfig.getAll();
  const logger = options.logger ?? silentLogger;
  const ctx: PipelineContext = {
    sourceFile,
    settings: {
      ignoreMembers: config.contracts.ignoreMembers,
      severity: config.diagnostics.severity,
    },
    checker: options.checker,
    cache: options.cache,
    logger,
  };

  const declarations: DeclarationResult[] = [];
  for (const node of collectClasses(sourceFile)) {
    const contract = isolate("contract", node, ctx, processContract);
    if (contract) declarations.push(contract);
    const enumeration = isolate("enumeration", node, ctx, processEnumeration);
    if (enumeration) declarations.push(enumeration);
  }

  const contracts = declarations.flatMap((d) => (d.contract ? [d.contract] : []));
  const tables = declarations.flatMap((d) => (d.table ? [d.table] : []));
  const hostModule =
    options.hostModule ??
    hostModuleSpecifier(sourceFile.fileName, outputPathFor(sourceFile.fileName, config.output.extension));

  const code = emitCompanionModule({
    sourceFileName: path.basename(sourceFile.fileName),
    hostModule,
    runtimeModule: config.output.runtimeModule,
    contracts,
    tables,
  });

  logger.debug(
    `${sourceFile.fileName}: ${declarations.length} declaration(s), ${contracts.length} contract(s), ${tables.length} table(s)`
  );

  return {
    fileName: sourceFile.fileName,
    declarations,
    diagnostics: sortDiagnostics(declarations.flatMap((d) => d.diagnostics)),
    code,
  };
}
