/**
 * Member Classifier
 *
 * Finds the host declarations of a source file and describes each one's
 * stored members together with the strategies annotated on them. Pure: the
 * result depends only on the syntax (and, when given, the checker's view of
 * member types).
 *
 * A class is a host when it carries `@valueObject`, derives from `ValueObject`
 * or `SimpleValueObject` (directly or through other classes), or has a
 * strategy decorator on any member.
 */

import * as ts from "typescript";
import type {
  Accessibility,
  BaseShape,
  HostDeclaration,
  Member,
  UnsupportedMember,
  UnsupportedReason,
} from "@valuekit/core";
import { ENUMERATION_BASE } from "./enumeration.js";
import { describeMemberType } from "./type-descriptor.js";
import { CONTRACT_MARKER, isStrategyDecorator, readStrategies } from "./strategies.js";
import {
  baseClassChain,
  collectClasses,
  exportInfo,
  hasModifier,
  nodeLocation,
  readDecorators,
} from "./syntax.js";

export const VALUE_OBJECT_BASE = "ValueObject";
export const WRAPPER_BASE = "SimpleValueObject";

export interface ClassifyOptions {
  /** Resolves aliases and inferred member types */
  checker?: ts.TypeChecker;
}

/**
 * Shape given by the nearest known base in the chain.
 */
function baseShapeOf(chain: readonly string[]): BaseShape {
  for (const name of chain) {
    switch (name) {
      case VALUE_OBJECT_BASE:
        return "value-object";
      case WRAPPER_BASE:
        return "wrapper";
      case ENUMERATION_BASE:
        return "none";
    }
  }
  return "none";
}

function accessibilityOf(node: ts.Node): Accessibility {
  if (hasModifier(node, ts.SyntaxKind.PrivateKeyword)) return "private";
  if (hasModifier(node, ts.SyntaxKind.ProtectedKeyword)) return "protected";
  return "public";
}

/**
 * Name text of a stored slot, when it is addressable from generated code.
 */
function slotName(name: ts.PropertyName): string | undefined {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name)) return name.text;
  return undefined;
}

function unsupportedReason(member: ts.ClassElement): UnsupportedReason | undefined {
  if (member.name && ts.isPrivateIdentifier(member.name)) return "private-name";
  if (hasModifier(member, ts.SyntaxKind.StaticKeyword)) return "static";
  if (ts.isGetAccessorDeclaration(member) || ts.isSetAccessorDeclaration(member)) return "accessor";
  if (ts.isMethodDeclaration(member)) return "method";
  if (ts.isPropertyDeclaration(member) && slotName(member.name) === undefined) return "computed-name";
  return undefined;
}

function displayName(name: ts.PropertyName | undefined, sourceFile: ts.SourceFile): string {
  if (!name) return "(anonymous)";
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isPrivateIdentifier(name)) {
    return name.text;
  }
  return name.getText(sourceFile);
}

interface ClassifiedMembers {
  members: Member[];
  unsupported: UnsupportedMember[];
  staticMethods: string[];
  annotated: boolean;
}

function classifyMembers(
  node: ts.ClassDeclaration,
  sourceFile: ts.SourceFile,
  checker: ts.TypeChecker | undefined
): ClassifiedMembers {
  const result: ClassifiedMembers = { members: [], unsupported: [], staticMethods: [], annotated: false };

  for (const element of node.members) {
    if (ts.isConstructorDeclaration(element)) {
      result.members.push(...parameterProperties(element, sourceFile, checker));
      continue;
    }

    const decorators = readDecorators(element, sourceFile);
    const strategies = readStrategies(decorators.filter(isStrategyDecorator));
    if (strategies.length > 0) result.annotated = true;

    if (
      ts.isMethodDeclaration(element) &&
      hasModifier(element, ts.SyntaxKind.StaticKeyword) &&
      ts.isIdentifier(element.name)
    ) {
      result.staticMethods.push(element.name.text);
    }

    const reason = unsupportedReason(element);
    if (reason !== undefined) {
      if (strategies.length > 0) {
        result.unsupported.push({
          name: displayName(element.name, sourceFile),
          reason,
          location: element.name ? nodeLocation(element.name, sourceFile) : nodeLocation(element, sourceFile),
          strategies,
        });
      }
      continue;
    }

    if (!ts.isPropertyDeclaration(element)) continue;
    const name = slotName(element.name);
    if (name === undefined) continue;

    const autoAccessor = ts.isAutoAccessorPropertyDeclaration(element);
    const memberStart = element.getStart(sourceFile);
    result.members.push({
      name,
      kind: autoAccessor ? "property" : "field",
      type: describeMemberType(element.type, element.name, sourceFile, checker),
      declarationPosition: memberStart,
      readonly: !autoAccessor && hasModifier(element, ts.SyntaxKind.ReadonlyKeyword),
      accessibility: accessibilityOf(element),
      location: nodeLocation(element.name, sourceFile),
      memberStart,
      readonlyInsertPosition: element.name.getStart(sourceFile),
      strategies,
    });
  }

  return result;
}

function parameterProperties(
  constructor: ts.ConstructorDeclaration,
  sourceFile: ts.SourceFile,
  checker: ts.TypeChecker | undefined
): Member[] {
  return constructor.parameters.flatMap((parameter): Member[] => {
    if (!ts.isParameterPropertyDeclaration(parameter, constructor) || !ts.isIdentifier(parameter.name)) {
      return [];
    }
    const start = parameter.getStart(sourceFile);
    return [
      {
        name: parameter.name.text,
        kind: "field",
        type: describeMemberType(parameter.type, parameter.name, sourceFile, checker),
        declarationPosition: start,
        readonly: hasModifier(parameter, ts.SyntaxKind.ReadonlyKeyword),
        accessibility: accessibilityOf(parameter),
        location: nodeLocation(parameter.name, sourceFile),
        memberStart: start,
        readonlyInsertPosition: parameter.name.getStart(sourceFile),
        strategies: [],
        parameterProperty: true,
      },
    ];
  });
}

/**
 * Describe one class. Returns undefined when it is not a host.
 */
export function classifyClass(
  node: ts.ClassDeclaration,
  sourceFile: ts.SourceFile,
  options: ClassifyOptions = {}
): HostDeclaration | undefined {
  if (!node.name) return undefined;

  const marker = readDecorators(node, sourceFile).find((d) => d.name === CONTRACT_MARKER);
  const baseShape = baseShapeOf(baseClassChain(node, sourceFile, options.checker));
  const classified = classifyMembers(node, sourceFile, options.checker);

  if (!marker && baseShape === "none" && !classified.annotated) {
    return undefined;
  }

  const { exported, defaultExport, exportInsertPosition } = exportInfo(node, sourceFile);
  const start = node.getStart(sourceFile);
  return {
    name: node.name.text,
    fileName: sourceFile.fileName,
    location: nodeLocation(node.name, sourceFile),
    span: { start, end: node.getEnd() },
    exported,
    defaultExport,
    exportInsertPosition,
    marker: marker?.location,
    markerRemovalEnd: marker?.removalEnd,
    baseShape,
    members: classified.members,
    unsupported: classified.unsupported,
    staticMethods: classified.staticMethods,
    bodyEnd: node.getEnd() - 1,
  };
}

/**
 * All host declarations of a file, in source order.
 */
export function classifySourceFile(
  sourceFile: ts.SourceFile,
  options: ClassifyOptions = {}
): HostDeclaration[] {
  return collectClasses(sourceFile).flatMap((node) => {
    const host = classifyClass(node, sourceFile, options);
    return host ? [host] : [];
  });
}
