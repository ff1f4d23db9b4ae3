/**
 * Closed named-constant enumerations.
 *
 * @example
 * ```typescript
 * @enumeration
 * export class Color extends Enumeration {
 *   static readonly Red = new Color(1, "Red");
 *   static readonly Green = new Color(2, "Green");
 * }
 *
 * // after the generated Color lookup is installed:
 * Color.fromValue(2)      // Color.Green
 * Color.tryFromName("x")  // undefined
 * ```
 */

import {
  DuplicateEnumerationKeyError,
  EnumerationNotInstalledError,
  LookupError,
} from "./errors.js";
import { hashCombine, hashNumber, hashString } from "./hashing.js";

/**
 * Accessors generated for one enumeration type.
 */
export interface EnumerationLookup<T extends Enumeration> {
  /** Every member, ordered by value */
  getAll(): readonly T[];
  /** @throws LookupError */
  fromValue(value: number): T;
  /** @throws LookupError */
  fromName(name: string): T;
  tryFromValue(value: number): T | undefined;
  tryFromName(name: string): T | undefined;
  /**
   * Read a serialized member: a number is a value, a string is a name.
   * @throws LookupError
   */
  parse(json: unknown): T;
}

/** Constructor of an enumeration type, private and protected constructors included */
export type EnumerationClass<T extends Enumeration> = Function & { readonly prototype: T };

const lookups = new WeakMap<object, EnumerationLookup<Enumeration>>();

/** Static field holding `member`, or its display name when none does */
function fieldNameOf(owner: object, member: Enumeration): string {
  const field = Object.entries(owner).find(([, value]) => value === member);
  return field ? field[0] : member.name;
}

/**
 * Register the generated lookup for `owner` after checking that no two members
 * share a value or a name.
 *
 * @throws DuplicateEnumerationKeyError
 */
export function installEnumeration<T extends Enumeration>(
  owner: EnumerationClass<T>,
  lookup: EnumerationLookup<T>
): void {
  const byValue = new Map<number, T>();
  const byName = new Map<string, T>();
  const clash = (first: T, second: T): [string, string] => [fieldNameOf(owner, first), fieldNameOf(owner, second)];
  for (const member of lookup.getAll()) {
    const sameValue = byValue.get(member.value);
    if (sameValue) {
      throw new DuplicateEnumerationKeyError(owner.name, "value", member.value, clash(sameValue, member));
    }
    const sameName = byName.get(member.name);
    if (sameName) {
      throw new DuplicateEnumerationKeyError(owner.name, "name", member.name, clash(sameName, member));
    }
    byValue.set(member.value, member);
    byName.set(member.name, member);
  }
  lookups.set(owner, lookup);
}

function lookupFor(owner: object & { readonly name: string }): EnumerationLookup<Enumeration> {
  const lookup = lookups.get(owner);
  if (!lookup) {
    throw new EnumerationNotInstalledError(owner.name);
  }
  return lookup;
}

export abstract class Enumeration {
  constructor(
    public readonly value: number,
    public readonly name: string
  ) {}

  static getAll<T extends Enumeration>(this: EnumerationClass<T>): readonly T[] {
    return lookupFor(this)
      .getAll()
      .filter((member): member is T => member instanceof this);
  }

  static fromValue<T extends Enumeration>(this: EnumerationClass<T>, value: number): T {
    const found = lookupFor(this).tryFromValue(value);
    if (found instanceof this) return found;
    throw new LookupError(this.name, "value", value);
  }

  static fromName<T extends Enumeration>(this: EnumerationClass<T>, name: string): T {
    const found = lookupFor(this).tryFromName(name);
    if (found instanceof this) return found;
    throw new LookupError(this.name, "name", name);
  }

  static tryFromValue<T extends Enumeration>(this: EnumerationClass<T>, value: number): T | undefined {
    const found = lookupFor(this).tryFromValue(value);
    return found instanceof this ? found : undefined;
  }

  static tryFromName<T extends Enumeration>(this: EnumerationClass<T>, name: string): T | undefined {
    const found = lookupFor(this).tryFromName(name);
    return found instanceof this ? found : undefined;
  }

  /**
   * Same concrete type and same value.
   */
  equals(other: unknown): boolean {
    return (
      other instanceof Enumeration &&
      other.constructor === this.constructor &&
      other.value === this.value
    );
  }

  getHashCode(): number {
    return hashCombine(hashString(this.constructor.name), hashNumber(this.value));
  }

  /**
   * Orders members by value.
   */
  compareTo(other: Enumeration): number {
    return Math.sign(this.value - other.value);
  }

  toString(): string {
    return this.name;
  }

  toJSON(): number {
    return this.value;
  }
}
