/**
 * Runtime Safety Primitives
 *
 * - `invariant(condition, message)`: assertion for states the analyzer rules out
 * - `unreachable(value)`: exhaustiveness check over closed unions
 *
 * @example
 * ```typescript
 * function describe(strategy: EqualityStrategy): string {
 *   switch (strategy.kind) {
 *     case "include": return "include";
 *     case "ignore": return "ignore";
 *     case "sequence": return "sequence";
 *     case "custom": return "custom";
 *     default: return unreachable(strategy);
 *   }
 * }
 * ```
 */

/**
 * @throws Error if condition is false
 */
export function invariant(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new Error(message ?? "Invariant violation");
  }
}

/**
 * Mark a code path that the type system proves impossible.
 */
export function unreachable(value: never, message?: string): never {
  throw new Error(message ?? `Unreachable code reached with value: ${JSON.stringify(value)}`);
}
