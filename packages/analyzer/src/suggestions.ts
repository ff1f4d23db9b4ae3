/**
 * Repair suggestions attached to validator diagnostics.
 *
 * Each builder returns plain text edits; applying the edits of one suggestion
 * to the original text resolves the diagnostic it is attached to.
 */

import type {
  CompanionFunctionRef,
  EqualityStrategy,
  HostDeclaration,
  Member,
  StrategyAnnotation,
  TextEdit,
} from "@valuekit/core";
import { strategyDecoratorText } from "./strategies.js";

function insert(fileName: string, position: number, newText: string): TextEdit {
  return { fileName, start: position, end: position, newText };
}

export function addExportEdit(fileName: string, position: number): TextEdit {
  return insert(fileName, position, "export ");
}

export function addDecoratorEdit(host: HostDeclaration, member: Member, decoratorText: string): TextEdit {
  return insert(host.fileName, member.memberStart, `${decoratorText} `);
}

export function addReadonlyEdit(host: HostDeclaration, member: Member): TextEdit {
  return insert(host.fileName, member.readonlyInsertPosition, "readonly ");
}

export function removeDecoratorEdit(fileName: string, annotation: StrategyAnnotation): TextEdit {
  return { fileName, start: annotation.location.start, end: annotation.removalEnd, newText: "" };
}

/**
 * Delete every strategy decorator except `keep`.
 */
export function keepOnlyEdits(
  host: HostDeclaration,
  member: Member,
  keep: StrategyAnnotation
): TextEdit[] {
  return member.strategies
    .filter((annotation) => annotation !== keep)
    .map((annotation) => removeDecoratorEdit(host.fileName, annotation));
}

export function replaceDecoratorEdit(
  fileName: string,
  annotation: StrategyAnnotation,
  strategy: EqualityStrategy
): TextEdit {
  return {
    fileName,
    start: annotation.location.start,
    end: annotation.location.end,
    newText: strategyDecoratorText(strategy),
  };
}

export function companionEqualsStub(companion: CompanionFunctionRef, memberType: string): string {
  return (
    `\n  static ${companion.equalsName}(a: ${memberType}, b: ${memberType}): boolean {\n` +
    `    throw new Error("${companion.equalsName} is not implemented");\n` +
    `  }\n`
  );
}

export function companionHashStub(companion: CompanionFunctionRef, memberType: string): string {
  return (
    `\n  static ${companion.hashName}(value: ${memberType}): number {\n` +
    `    throw new Error("${companion.hashName} is not implemented");\n` +
    `  }\n`
  );
}

export function insertCompanionEdit(host: HostDeclaration, stub: string): TextEdit {
  return insert(host.fileName, host.bodyEnd, stub);
}
