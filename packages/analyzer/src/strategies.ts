/**
 * Reading equality strategies from decorators.
 */

import * as ts from "typescript";
import type { EqualityStrategy, StrategyAnnotation } from "@valuekit/core";
import { objectProperty, readBoolean, readNumber, type DecoratorInfo } from "./syntax.js";

export const CONTRACT_MARKER = "valueObject";
export const ENUMERATION_MARKER = "enumeration";

const STRATEGY_NAMES = new Set(["include", "ignore", "sequence", "custom"]);

export function isStrategyDecorator(info: DecoratorInfo): boolean {
  return STRATEGY_NAMES.has(info.name);
}

interface OrderReading {
  readonly order: number;
  readonly explicitOrder: boolean;
}

const UNSPECIFIED: OrderReading = { order: 0, explicitOrder: false };

/**
 * `@x(2)` or `@x({ order: 2 })`. A non-literal order counts as unspecified.
 */
function readOrder(first: ts.Expression | undefined): OrderReading {
  if (!first) return UNSPECIFIED;
  const direct = readNumber(first);
  if (direct !== undefined) return { order: direct, explicitOrder: true };
  if (ts.isObjectLiteralExpression(first)) {
    const property = objectProperty(first, "order");
    const value = property ? readNumber(property) : undefined;
    if (value !== undefined) return { order: value, explicitOrder: true };
  }
  return UNSPECIFIED;
}

function readFlag(first: ts.Expression | undefined, name: string): boolean {
  if (!first || !ts.isObjectLiteralExpression(first)) return true;
  const property = objectProperty(first, name);
  return (property ? readBoolean(property) : undefined) ?? true;
}

export function readStrategy(info: DecoratorInfo): EqualityStrategy | undefined {
  const first = info.args?.[0];
  switch (info.name) {
    case "include":
      return { kind: "include", ...readOrder(first) };
    case "custom":
      return { kind: "custom", ...readOrder(first) };
    case "ignore":
      return { kind: "ignore" };
    case "sequence":
      return {
        kind: "sequence",
        ...readOrder(first),
        orderMatters: readFlag(first, "orderMatters"),
        deepEquality: readFlag(first, "deepEquality"),
      };
    default:
      return undefined;
  }
}

export function readStrategies(decorators: readonly DecoratorInfo[]): StrategyAnnotation[] {
  return decorators.flatMap((info) => {
    const strategy = readStrategy(info);
    return strategy ? [{ strategy, location: info.location, removalEnd: info.removalEnd }] : [];
  });
}

/**
 * Decorator text for a strategy, as a repair would write it.
 */
export function strategyDecoratorText(strategy: EqualityStrategy): string {
  switch (strategy.kind) {
    case "ignore":
      return "@ignore()";
    case "include":
    case "custom":
      return strategy.explicitOrder ? `@${strategy.kind}(${strategy.order})` : `@${strategy.kind}()`;
    case "sequence": {
      const options: string[] = [];
      if (strategy.explicitOrder) options.push(`order: ${strategy.order}`);
      if (!strategy.orderMatters) options.push("orderMatters: false");
      if (!strategy.deepEquality) options.push("deepEquality: false");
      return options.length > 0 ? `@sequence({ ${options.join(", ")} })` : "@sequence()";
    }
  }
}
