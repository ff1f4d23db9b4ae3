/**
 * Enumeration extraction and validation.
 *
 * An enumeration is a class extending `Enumeration`; its entries are the
 * `static readonly` fields initialized with `new Host(value, name)`.
 */

import * as ts from "typescript";
import {
  DiagnosticBag,
  EN001,
  EN002,
  EN003,
  type Diagnostic,
  type EnumerationEntry,
  type EnumerationHost,
  type EnumerationTable,
  type SeverityOverrides,
} from "@valuekit/core";
import { ENUMERATION_MARKER } from "./strategies.js";
import { addExportEdit } from "./suggestions.js";
import {
  baseClassChain,
  collectClasses,
  exportInfo,
  hasModifier,
  nodeLocation,
  readDecorators,
  readNumber,
  readString,
  referencedName,
} from "./syntax.js";

export const ENUMERATION_BASE = "Enumeration";

function typeReferenceIs(type: ts.TypeNode | undefined, name: string): boolean {
  return (
    type !== undefined &&
    ts.isTypeReferenceNode(type) &&
    ts.isIdentifier(type.typeName) &&
    type.typeName.text === name
  );
}

function readEntry(
  element: ts.ClassElement,
  owner: string,
  sourceFile: ts.SourceFile
): EnumerationEntry | undefined {
  if (
    !ts.isPropertyDeclaration(element) ||
    !ts.isIdentifier(element.name) ||
    !hasModifier(element, ts.SyntaxKind.StaticKeyword) ||
    !hasModifier(element, ts.SyntaxKind.ReadonlyKeyword)
  ) {
    return undefined;
  }

  const initializer = element.initializer;
  if (!initializer || !ts.isNewExpression(initializer)) return undefined;
  if (referencedName(initializer.expression) !== owner && !typeReferenceIs(element.type, owner)) {
    return undefined;
  }

  const [valueArg, nameArg] = initializer.arguments ?? [];
  return {
    ownerType: owner,
    fieldName: element.name.text,
    value: valueArg ? readNumber(valueArg) : undefined,
    name: nameArg ? readString(nameArg) : undefined,
    declarationPosition: element.getStart(sourceFile),
    location: nodeLocation(element.name, sourceFile),
  };
}

export function extractEnumeration(
  node: ts.ClassDeclaration,
  sourceFile: ts.SourceFile,
  checker?: ts.TypeChecker
): EnumerationHost | undefined {
  if (!node.name || !baseClassChain(node, sourceFile, checker).includes(ENUMERATION_BASE)) return undefined;
  const owner = node.name.text;
  const marker = readDecorators(node, sourceFile).find((d) => d.name === ENUMERATION_MARKER);
  const { exported, defaultExport, exportInsertPosition } = exportInfo(node, sourceFile);

  return {
    name: owner,
    fileName: sourceFile.fileName,
    location: nodeLocation(node.name, sourceFile),
    span: { start: node.getStart(sourceFile), end: node.getEnd() },
    exported,
    defaultExport,
    exportInsertPosition,
    marker: marker?.location,
    entries: node.members.flatMap((element) => {
      const entry = readEntry(element, owner, sourceFile);
      return entry ? [entry] : [];
    }),
  };
}

export function extractEnumerations(sourceFile: ts.SourceFile, checker?: ts.TypeChecker): EnumerationHost[] {
  return collectClasses(sourceFile).flatMap((node) => {
    const host = extractEnumeration(node, sourceFile, checker);
    return host ? [host] : [];
  });
}

// ============================================================================
// Validation
// ============================================================================

export interface EnumerationValidationOptions {
  severity?: SeverityOverrides;
}

export interface EnumerationValidationResult {
  /** Present only for marked, error-free enumerations */
  table?: EnumerationTable;
  diagnostics: Diagnostic[];
}

/**
 * Table order: value ascending, then declaration position. Entries whose
 * value is not a literal follow, in declaration order.
 */
export function compareEnumerationEntries(a: EnumerationEntry, b: EnumerationEntry): number {
  if (a.value !== undefined && b.value !== undefined && a.value !== b.value) {
    return a.value - b.value;
  }
  if (a.value === undefined && b.value !== undefined) return 1;
  if (a.value !== undefined && b.value === undefined) return -1;
  return a.declarationPosition - b.declarationPosition;
}

function reportDuplicates<K extends string | number>(
  bag: DiagnosticBag,
  host: EnumerationHost,
  keyOf: (entry: EnumerationEntry) => K | undefined,
  report: (entry: EnumerationEntry, first: EnumerationEntry, key: K) => void
): void {
  const seen = new Map<K, EnumerationEntry>();
  const ordered = [...host.entries].sort((a, b) => a.declarationPosition - b.declarationPosition);
  for (const entry of ordered) {
    const key = keyOf(entry);
    if (key === undefined) continue;
    const first = seen.get(key);
    if (first) report(entry, first, key);
    else seen.set(key, entry);
  }
}

export function validateEnumeration(
  host: EnumerationHost,
  options: EnumerationValidationOptions = {}
): EnumerationValidationResult {
  const bag = new DiagnosticBag(options.severity);

  reportDuplicates(
    bag,
    host,
    (entry) => entry.value,
    (entry, first, value) =>
      bag
        .diagnostic(EN001)
        .at(entry.location)
        .withArgs({ type: host.name, value })
        .related(first.location, `'${first.fieldName}' already has value ${value}`)
        .emit()
  );

  reportDuplicates(
    bag,
    host,
    (entry) => entry.name,
    (entry, first, name) =>
      bag
        .diagnostic(EN002)
        .at(entry.location)
        .withArgs({ type: host.name, name })
        .related(first.location, `'${first.fieldName}' already has name '${name}'`)
        .emit()
  );

  if (host.marker && !host.exported) {
    bag
      .diagnostic(EN003)
      .at(host.location)
      .withArgs({ type: host.name })
      .suggestion(
        "add-export",
        `Export '${host.name}'`,
        [addExportEdit(host.fileName, host.exportInsertPosition)],
        true
      )
      .emit();
  }

  const diagnostics = bag.toArray();
  if (!host.marker || bag.hasErrors) return { diagnostics };
  return {
    table: { host, entries: [...host.entries].sort(compareEnumerationEntries) },
    diagnostics,
  };
}
