/**
 * Structural classification of member types.
 *
 * Syntax decides the common cases (`string[]`, `Set<T>`, `number`); the type
 * checker, when one is available, resolves aliases, interfaces and inferred
 * types. Nullable unions are classified by their non-nullish part.
 */

import * as ts from "typescript";
import type { TypeDescriptor } from "@valuekit/core";

const SEQUENCE_TYPES = new Set([
  "Array",
  "ReadonlyArray",
  "Set",
  "ReadonlySet",
  "Iterable",
  "IterableIterator",
  "Generator",
]);

const MAP_TYPES = new Set(["Map", "ReadonlyMap"]);

function isNullish(node: ts.TypeNode): boolean {
  return (
    node.kind === ts.SyntaxKind.UndefinedKeyword ||
    node.kind === ts.SyntaxKind.NullKeyword ||
    (ts.isLiteralTypeNode(node) && node.literal.kind === ts.SyntaxKind.NullKeyword)
  );
}

function isScalarLiteral(node: ts.TypeNode): boolean {
  if (!ts.isLiteralTypeNode(node)) return false;
  const literal = node.literal;
  return (
    ts.isNumericLiteral(literal) ||
    ts.isBigIntLiteral(literal) ||
    literal.kind === ts.SyntaxKind.TrueKeyword ||
    literal.kind === ts.SyntaxKind.FalseKeyword ||
    ts.isPrefixUnaryExpression(literal)
  );
}

function isTextNode(node: ts.TypeNode): boolean {
  return (
    node.kind === ts.SyntaxKind.StringKeyword ||
    ts.isTemplateLiteralTypeNode(node) ||
    (ts.isLiteralTypeNode(node) && ts.isStringLiteral(node.literal))
  );
}

function isScalarNode(node: ts.TypeNode): boolean {
  return (
    node.kind === ts.SyntaxKind.NumberKeyword ||
    node.kind === ts.SyntaxKind.BooleanKeyword ||
    node.kind === ts.SyntaxKind.BigIntKeyword ||
    isScalarLiteral(node) ||
    (ts.isTypeReferenceNode(node) && ts.isIdentifier(node.typeName) && node.typeName.text === "Date")
  );
}

function typeReferenceName(node: ts.TypeReferenceNode): string {
  return ts.isIdentifier(node.typeName) ? node.typeName.text : node.typeName.right.text;
}

/**
 * Classify a type node without the checker. Returns undefined when syntax
 * alone cannot tell.
 */
function describeSyntactically(
  node: ts.TypeNode,
  text: string,
  sourceFile: ts.SourceFile
): TypeDescriptor | undefined {
  if (ts.isParenthesizedTypeNode(node)) {
    return describeSyntactically(node.type, text, sourceFile);
  }

  if (ts.isUnionTypeNode(node)) {
    const present = node.types.filter((t) => !isNullish(t));
    if (present.length === 1) return describeSyntactically(present[0], text, sourceFile);
    if (present.length > 0 && present.every(isTextNode)) return { kind: "text", text };
    if (present.length > 0 && present.every(isScalarNode)) return { kind: "scalar", text };
    return undefined;
  }

  if (isTextNode(node)) return { kind: "text", text };
  if (isScalarNode(node)) return { kind: "scalar", text };

  if (ts.isArrayTypeNode(node)) {
    return { kind: "sequence", text, elementText: node.elementType.getText(sourceFile) };
  }
  if (ts.isTupleTypeNode(node)) {
    const elements = node.elements.map((e) => e.getText(sourceFile));
    return { kind: "sequence", text, elementText: elements.length > 0 ? elements.join(" | ") : "never" };
  }
  if (ts.isTypeOperatorNode(node) && node.operator === ts.SyntaxKind.ReadonlyKeyword) {
    return describeSyntactically(node.type, text, sourceFile);
  }

  if (ts.isTypeReferenceNode(node)) {
    const name = typeReferenceName(node);
    const args = node.typeArguments ?? [];
    if (SEQUENCE_TYPES.has(name)) {
      return { kind: "sequence", text, elementText: args[0]?.getText(sourceFile) ?? "unknown" };
    }
    if (MAP_TYPES.has(name)) {
      const [key, value] = args;
      return {
        kind: "sequence",
        text,
        elementText: key && value ? `[${key.getText(sourceFile)}, ${value.getText(sourceFile)}]` : "unknown",
      };
    }
    return undefined;
  }

  if (ts.isTypeLiteralNode(node) || ts.isFunctionTypeNode(node)) {
    return { kind: "reference", text };
  }
  return undefined;
}

// ============================================================================
// Checker-based classification
// ============================================================================

function hasIteratorMember(type: ts.Type, checker: ts.TypeChecker): boolean {
  return checker
    .getPropertiesOfType(type)
    .some((property) => property.getName().startsWith("__@iterator"));
}

function describeType(type: ts.Type, checker: ts.TypeChecker, text: string): TypeDescriptor {
  const present = type.isUnion()
    ? type.types.filter((t) => !(t.flags & (ts.TypeFlags.Null | ts.TypeFlags.Undefined | ts.TypeFlags.Void)))
    : [type];

  if (present.length > 0 && present.every((t) => t.flags & ts.TypeFlags.StringLike)) {
    return { kind: "text", text };
  }
  const scalarFlags = ts.TypeFlags.NumberLike | ts.TypeFlags.BooleanLike | ts.TypeFlags.BigIntLike;
  if (present.length > 0 && present.every((t) => t.flags & scalarFlags)) {
    return { kind: "scalar", text };
  }
  if (present.length === 1 && hasIteratorMember(present[0], checker)) {
    const element = checker.getIndexTypeOfType(present[0], ts.IndexKind.Number);
    return {
      kind: "sequence",
      text,
      elementText: element ? checker.typeToString(element) : "unknown",
    };
  }
  if (present.length === 1 && present[0].getSymbol()?.getName() === "Date") {
    return { kind: "scalar", text };
  }
  return { kind: "reference", text };
}

/**
 * Describe the declared type of a member. `declaration` supplies the inferred
 * type when there is no annotation.
 */
export function describeMemberType(
  typeNode: ts.TypeNode | undefined,
  declaration: ts.Node,
  sourceFile: ts.SourceFile,
  checker: ts.TypeChecker | undefined
): TypeDescriptor {
  if (typeNode) {
    const text = typeNode.getText(sourceFile);
    const syntactic = describeSyntactically(typeNode, text, sourceFile);
    if (syntactic) return syntactic;
    if (checker) return describeType(checker.getTypeFromTypeNode(typeNode), checker, text);
    return { kind: "reference", text };
  }

  if (checker) {
    const type = checker.getTypeAtLocation(declaration);
    return describeType(type, checker, checker.typeToString(type));
  }
  return { kind: "reference", text: "unknown" };
}
