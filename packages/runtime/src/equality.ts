/**
 * Equality and hash helpers called by generated `equals<Name>` / `hash<Name>`
 * functions.
 *
 * Two element modes exist:
 * - value (`deep = true`): primitives by value, `Date` by time, objects with
 *   both `equals` and `getHashCode` through those, anything else by reference
 * - identity (`deep = false`): primitives by value, every object by reference
 *
 * In both modes `NaN` equals `NaN` and `0` equals `-0`.
 */

import {
  HASH_SEED,
  hashBigint,
  hashBoolean,
  hashCombine,
  hashNumber,
  hashString,
  identityHash,
} from "./hashing.js";

// ============================================================================
// Structural Capabilities
// ============================================================================

export interface Equatable {
  equals(other: unknown): boolean;
}

export interface Hashable {
  getHashCode(): number;
}

function isEquatable(value: object): value is Equatable {
  return "equals" in value && typeof value.equals === "function";
}

function isHashable(value: object): value is Hashable {
  return "getHashCode" in value && typeof value.getHashCode === "function";
}

function sameNumber(a: number, b: number): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

// ============================================================================
// Scalars
// ============================================================================

function primitiveHash(value: unknown): number | undefined {
  switch (typeof value) {
    case "number":
      return hashNumber(value);
    case "string":
      return hashString(value);
    case "boolean":
      return hashBoolean(value);
    case "bigint":
      return hashBigint(value);
    case "symbol":
      return hashString(value.description ?? "");
    case "undefined":
      return 1;
    default:
      return value === null ? 0 : undefined;
  }
}

/**
 * Value equality of two member values.
 */
export function defaultEquals(a: unknown, b: unknown): boolean {
  if (typeof a === "number" && typeof b === "number") {
    return sameNumber(a, b);
  }
  if (a === b) return true;
  if (typeof a !== "object" || a === null || typeof b !== "object" || b === null) {
    return false;
  }
  if (a instanceof Date && b instanceof Date) {
    return sameNumber(a.getTime(), b.getTime());
  }
  // equals without getHashCode would disagree with defaultHash
  if (isEquatable(a) && isHashable(a)) {
    return a.equals(b);
  }
  return false;
}

/**
 * Hash consistent with `defaultEquals`.
 */
export function defaultHash(value: unknown): number {
  const primitive = primitiveHash(value);
  if (primitive !== undefined) return primitive;
  if (value instanceof Date) return hashNumber(value.getTime());
  if (typeof value === "object" && value !== null) {
    return isHashable(value) ? value.getHashCode() | 0 : identityHash(value);
  }
  if (typeof value === "function") {
    return identityHash(value);
  }
  return 0;
}

/**
 * Primitives by value, objects by reference.
 */
export function identityEquals(a: unknown, b: unknown): boolean {
  if (typeof a === "number" && typeof b === "number") {
    return sameNumber(a, b);
  }
  return a === b;
}

export function identityHashOf(value: unknown): number {
  const primitive = primitiveHash(value);
  if (primitive !== undefined) return primitive;
  if (typeof value === "object" && value !== null) return identityHash(value);
  if (typeof value === "function") return identityHash(value);
  return 0;
}

// ============================================================================
// Sequences
// ============================================================================

interface ElementOps {
  equals(a: unknown, b: unknown): boolean;
  hash(value: unknown): number;
}

function elementOps(deep: boolean, pairs: boolean): ElementOps {
  const equals = deep ? defaultEquals : identityEquals;
  const hash = deep ? defaultHash : identityHashOf;
  if (!pairs) {
    return { equals, hash };
  }
  // Map entries arrive as fresh [key, value] arrays
  return {
    equals: (a, b) =>
      Array.isArray(a) && Array.isArray(b) && equals(a[0], b[0]) && equals(a[1], b[1]),
    hash: (entry) =>
      Array.isArray(entry) ? hashCombine(hash(entry[0]), hash(entry[1])) : hash(entry),
  };
}

function isIterable(value: object): value is Iterable<unknown> {
  return Symbol.iterator in value && typeof value[Symbol.iterator] === "function";
}

function toElements(sequence: unknown): unknown[] {
  if (typeof sequence === "string") return Array.from(sequence);
  if (typeof sequence === "object" && sequence !== null && isIterable(sequence)) {
    return Array.from(sequence);
  }
  throw new TypeError(`Expected an iterable sequence, got ${typeof sequence}`);
}

interface EquivalenceClass {
  readonly representative: unknown;
  readonly hash: number;
  count: number;
}

/**
 * Group elements into classes of mutually equal elements, bucketed by hash.
 */
function groupElements(elements: readonly unknown[], ops: ElementOps): EquivalenceClass[] {
  const buckets = new Map<number, EquivalenceClass[]>();
  const classes: EquivalenceClass[] = [];
  for (const element of elements) {
    const hash = ops.hash(element);
    let bucket = buckets.get(hash);
    if (!bucket) {
      bucket = [];
      buckets.set(hash, bucket);
    }
    const existing = bucket.find((c) => ops.equals(c.representative, element));
    if (existing) {
      existing.count++;
    } else {
      const created: EquivalenceClass = { representative: element, hash, count: 1 };
      bucket.push(created);
      classes.push(created);
    }
  }
  return classes;
}

function countMatches(classes: readonly EquivalenceClass[], elements: readonly unknown[], ops: ElementOps): boolean {
  const remaining = new Map<EquivalenceClass, number>(classes.map((c) => [c, c.count]));
  for (const element of elements) {
    const hash = ops.hash(element);
    const match = classes.find(
      (c) => c.hash === hash && (remaining.get(c) ?? 0) > 0 && ops.equals(c.representative, element)
    );
    if (!match) return false;
    remaining.set(match, (remaining.get(match) ?? 0) - 1);
  }
  return true;
}

/**
 * Compare two iterable members.
 *
 * The same reference (two `null`s or two `undefined`s included) is equal; a
 * nullish sequence never equals a present one. With `orderMatters` the
 * comparison is positional, otherwise it is multiset equality.
 */
export function sequenceEquals(
  a: unknown,
  b: unknown,
  orderMatters: boolean = true,
  deep: boolean = true
): boolean {
  if (a === b) return true;
  if (a === null || a === undefined || b === null || b === undefined) return false;

  const pairs = a instanceof Map && b instanceof Map;
  const ops = elementOps(deep, pairs);
  const left = toElements(a);
  const right = toElements(b);
  if (left.length !== right.length) return false;

  if (orderMatters) {
    for (let i = 0; i < left.length; i++) {
      if (!ops.equals(left[i], right[i])) return false;
    }
    return true;
  }

  return countMatches(groupElements(left, ops), right, ops);
}

/**
 * Hash consistent with `sequenceEquals` under the same flags.
 *
 * Without `orderMatters` the result is independent of element order: classes
 * are folded as `(representative hash, count)` pairs sorted by hash, then count.
 */
export function sequenceHash(
  sequence: unknown,
  orderMatters: boolean = true,
  deep: boolean = true
): number {
  if (sequence === null || sequence === undefined) return 0;

  const ops = elementOps(deep, sequence instanceof Map);
  const elements = toElements(sequence);
  let hash = HASH_SEED;

  if (orderMatters) {
    for (const element of elements) {
      hash = hashCombine(hash, ops.hash(element));
    }
    return hash;
  }

  const classes = groupElements(elements, ops).sort((x, y) => x.hash - y.hash || x.count - y.count);
  for (const c of classes) {
    hash = hashCombine(hashCombine(hash, c.hash), c.count);
  }
  return hash;
}
