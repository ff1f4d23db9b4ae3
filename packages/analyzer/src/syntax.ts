/**
 * Small helpers over the TypeScript AST shared by the classifiers.
 */

import * as ts from "typescript";
import type { SourceLocation } from "@valuekit/core";

export function locationOf(sourceFile: ts.SourceFile, start: number, end: number): SourceLocation {
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(start);
  return { fileName: sourceFile.fileName, start, end, line: line + 1, column: character + 1 };
}

export function nodeLocation(node: ts.Node, sourceFile: ts.SourceFile): SourceLocation {
  return locationOf(sourceFile, node.getStart(sourceFile), node.getEnd());
}

/**
 * The name a decorator or base class is written with: an identifier, or the
 * last segment of a property access (`vk.include` → `include`).
 */
export function referencedName(expression: ts.Expression): string | undefined {
  if (ts.isIdentifier(expression)) return expression.text;
  if (ts.isPropertyAccessExpression(expression)) return expression.name.text;
  return undefined;
}

export interface DecoratorInfo {
  readonly decorator: ts.Decorator;
  readonly name: string;
  /** Call arguments; undefined for the bare form */
  readonly args: readonly ts.Expression[] | undefined;
  readonly location: SourceLocation;
  readonly removalEnd: number;
}

/**
 * Decorators of a node with the position each one's removal extends to:
 * the start of whatever follows it (another decorator, a modifier, the name
 * or the `class` keyword).
 */
export function readDecorators(node: ts.Node, sourceFile: ts.SourceFile): DecoratorInfo[] {
  if (!ts.canHaveDecorators(node)) return [];
  const decorators = ts.getDecorators(node);
  if (!decorators) return [];

  const following = followingTokens(node, sourceFile);
  return decorators.flatMap((decorator) => {
    const expression = decorator.expression;
    const callee = ts.isCallExpression(expression) ? expression.expression : expression;
    const name = referencedName(callee);
    if (name === undefined) return [];
    const start = decorator.getStart(sourceFile);
    const end = decorator.getEnd();
    const removalEnd = following.find((pos) => pos >= end) ?? end;
    return [
      {
        decorator,
        name,
        args: ts.isCallExpression(expression) ? Array.from(expression.arguments) : undefined,
        location: locationOf(sourceFile, start, end),
        removalEnd,
      },
    ];
  });
}

/**
 * Start offsets of the modifiers and tokens of `node`, ascending.
 */
function followingTokens(node: ts.Node, sourceFile: ts.SourceFile): number[] {
  return node
    .getChildren(sourceFile)
    .flatMap((child) =>
      child.kind === ts.SyntaxKind.SyntaxList ? child.getChildren(sourceFile) : [child]
    )
    .map((child) => child.getStart(sourceFile))
    .sort((a, b) => a - b);
}

export function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
  if (!ts.canHaveModifiers(node)) return false;
  return ts.getModifiers(node)?.some((m) => m.kind === kind) ?? false;
}

/**
 * Read a numeric literal, including a negated one (`-1`).
 */
export function readNumber(expression: ts.Expression): number | undefined {
  if (ts.isNumericLiteral(expression)) return Number(expression.text);
  if (
    ts.isPrefixUnaryExpression(expression) &&
    expression.operator === ts.SyntaxKind.MinusToken &&
    ts.isNumericLiteral(expression.operand)
  ) {
    return -Number(expression.operand.text);
  }
  if (ts.isParenthesizedExpression(expression)) return readNumber(expression.expression);
  return undefined;
}

export function readBoolean(expression: ts.Expression): boolean | undefined {
  if (expression.kind === ts.SyntaxKind.TrueKeyword) return true;
  if (expression.kind === ts.SyntaxKind.FalseKeyword) return false;
  return undefined;
}

export function readString(expression: ts.Expression): string | undefined {
  if (ts.isStringLiteral(expression) || ts.isNoSubstitutionTemplateLiteral(expression)) {
    return expression.text;
  }
  return undefined;
}

/**
 * Value of a named property in an object literal argument.
 */
export function objectProperty(
  literal: ts.ObjectLiteralExpression,
  name: string
): ts.Expression | undefined {
  for (const property of literal.properties) {
    if (
      ts.isPropertyAssignment(property) &&
      (ts.isIdentifier(property.name) || ts.isStringLiteral(property.name)) &&
      property.name.text === name
    ) {
      return property.initializer;
    }
  }
  return undefined;
}

/**
 * How a class is exported, and where `export ` would go when it is not.
 */
export function exportInfo(
  node: ts.ClassDeclaration,
  sourceFile: ts.SourceFile
): { exported: boolean; defaultExport: boolean; exportInsertPosition: number } {
  const name = node.name?.text;
  const modifiers = ts.getModifiers(node) ?? [];
  const hasExport = modifiers.some((m) => m.kind === ts.SyntaxKind.ExportKeyword);
  const hasDefault = modifiers.some((m) => m.kind === ts.SyntaxKind.DefaultKeyword);

  let namedLater = false;
  let defaultLater = false;
  if (name !== undefined && node.parent === sourceFile) {
    for (const statement of sourceFile.statements) {
      if (
        ts.isExportDeclaration(statement) &&
        !statement.isTypeOnly &&
        statement.moduleSpecifier === undefined &&
        statement.exportClause &&
        ts.isNamedExports(statement.exportClause)
      ) {
        for (const element of statement.exportClause.elements) {
          const local = (element.propertyName ?? element.name).text;
          if (local !== name) continue;
          if (element.name.text === "default") defaultLater = true;
          else if (element.name.text === name) namedLater = true;
        }
      }
      if (
        ts.isExportAssignment(statement) &&
        !statement.isExportEquals &&
        ts.isIdentifier(statement.expression) &&
        statement.expression.text === name
      ) {
        defaultLater = true;
      }
    }
  }

  const firstModifier = modifiers[0];
  const classKeyword = node
    .getChildren(sourceFile)
    .find((child) => child.kind === ts.SyntaxKind.ClassKeyword);
  const exportInsertPosition = firstModifier
    ? firstModifier.getStart(sourceFile)
    : (classKeyword?.getStart(sourceFile) ?? node.getStart(sourceFile));

  const named = (hasExport && !hasDefault) || namedLater;
  const asDefault = (hasExport && hasDefault) || defaultLater;
  return {
    exported: node.parent === sourceFile && (named || asDefault),
    defaultExport: !named && asDefault,
    exportInsertPosition,
  };
}

function extendsClause(node: ts.ClassLikeDeclaration): ts.ExpressionWithTypeArguments | undefined {
  for (const clause of node.heritageClauses ?? []) {
    if (clause.token === ts.SyntaxKind.ExtendsKeyword) return clause.types[0];
  }
  return undefined;
}

interface ResolvedBase {
  readonly declaration: ts.ClassLikeDeclaration;
  readonly sourceFile: ts.SourceFile;
}

function resolveBase(
  base: ts.ExpressionWithTypeArguments,
  sourceFile: ts.SourceFile,
  checker: ts.TypeChecker | undefined
): ResolvedBase | undefined {
  if (checker) {
    const target = ts.isPropertyAccessExpression(base.expression) ? base.expression.name : base.expression;
    let symbol = checker.getSymbolAtLocation(target);
    if (symbol && symbol.flags & ts.SymbolFlags.Alias) {
      symbol = checker.getAliasedSymbol(symbol);
    }
    const declaration = symbol?.declarations?.find(ts.isClassLike);
    if (declaration) return { declaration, sourceFile: declaration.getSourceFile() };
  }
  const name = referencedName(base.expression);
  if (name === undefined) return undefined;
  const declaration = collectClasses(sourceFile).find((candidate) => candidate.name?.text === name);
  return declaration ? { declaration, sourceFile } : undefined;
}

/**
 * Names of every class `node` derives from, nearest first.
 *
 * Bases resolve through the checker when one is given, and otherwise to
 * classes declared in the same file. The walk stops at the first base it
 * cannot resolve, after recording that base's written name.
 */
export function baseClassChain(
  node: ts.ClassLikeDeclaration,
  sourceFile: ts.SourceFile,
  checker?: ts.TypeChecker
): string[] {
  const chain: string[] = [];
  const visited = new Set<ts.Node>([node]);
  let current: ResolvedBase = { declaration: node, sourceFile };

  for (;;) {
    const base = extendsClause(current.declaration);
    if (!base) break;
    const resolved = resolveBase(base, current.sourceFile, checker);
    const name = resolved?.declaration.name?.text ?? referencedName(base.expression);
    if (name === undefined) break;
    chain.push(name);
    if (!resolved || visited.has(resolved.declaration)) break;
    visited.add(resolved.declaration);
    current = resolved;
  }
  return chain;
}

/**
 * Every named class declaration in the file, nested ones included.
 */
export function collectClasses(sourceFile: ts.SourceFile): ts.ClassDeclaration[] {
  const classes: ts.ClassDeclaration[] = [];
  const visit = (node: ts.Node): void => {
    if (ts.isClassDeclaration(node) && node.name) {
      classes.push(node);
    }
    ts.forEachChild(node, visit);
  };
  visit(sourceFile);
  return classes;
}
