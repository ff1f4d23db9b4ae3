/**
 * ContractCache - per-declaration memoization of validation results
 *
 * Keys hash everything a result depends on: the declaration kind, file name,
 * start offset and text, the validation settings and the classified shape.
 * The shape carries checker-derived member types, so a change to an imported
 * type alias also yields a new key.
 */

import {
  ContentCache,
  computeContentKey,
  type CacheStats,
  type ContentCacheOptions,
  type EnumerationHost,
  type HostDeclaration,
} from "@valuekit/core";
import type {
  EnumerationValidationResult,
  ValidationOptions,
  ValidationResult,
} from "@valuekit/analyzer";

export type CachedKind = "contract" | "enumeration";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function hasDiagnostics(value: Record<string, unknown>): boolean {
  return Array.isArray(value.diagnostics) && value.diagnostics.every(isRecord);
}

function isValidationResult(value: unknown): value is ValidationResult {
  return isRecord(value) && hasDiagnostics(value) && (value.contract === undefined || isRecord(value.contract));
}

function isEnumerationResult(value: unknown): value is EnumerationValidationResult {
  return isRecord(value) && hasDiagnostics(value) && (value.table === undefined || isRecord(value.table));
}

function parse(text: string | undefined): unknown {
  if (text === undefined) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export class ContractCache {
  private readonly store: ContentCache;

  constructor(options: ContentCacheOptions = {}) {
    this.store = new ContentCache(options);
  }

  /**
   * Cache key of one declaration under the given validation settings.
   */
  keyFor(
    kind: CachedKind,
    host: HostDeclaration | EnumerationHost,
    declarationText: string,
    settings: ValidationOptions
  ): string {
    return computeContentKey(
      kind,
      host.fileName,
      String(host.span.start),
      declarationText,
      JSON.stringify({ ignoreMembers: settings.ignoreMembers ?? [], severity: settings.severity ?? {} }),
      JSON.stringify(host)
    );
  }

  getContract(key: string): ValidationResult | undefined {
    const value = parse(this.store.get(key));
    return isValidationResult(value) ? value : undefined;
  }

  setContract(key: string, result: ValidationResult): void {
    this.store.set(key, JSON.stringify(result));
  }

  getEnumeration(key: string): EnumerationValidationResult | undefined {
    const value = parse(this.store.get(key));
    return isEnumerationResult(value) ? value : undefined;
  }

  setEnumeration(key: string, result: EnumerationValidationResult): void {
    this.store.set(key, JSON.stringify(result));
  }

  save(): void {
    this.store.save();
  }

  get stats(): Readonly<CacheStats> {
    return this.store.stats;
  }

  getStatsString(): string {
    return this.store.getStatsString();
  }
}
