/**
 * Base classes for value objects.
 *
 * `ValueObject` has no equality of its own: the generated companion module
 * installs `equals<Name>` / `hash<Name>` for each annotated subclass through
 * `installEquality`. `SimpleValueObject` wraps a single value and compares it
 * directly.
 */

import { defaultEquals, defaultHash } from "./equality.js";
import { EqualityNotInstalledError } from "./errors.js";
import { hashCombine, hashString } from "./hashing.js";

export interface EqualityImplementation<T> {
  equals(a: T, b: T): boolean;
  hash(value: T): number;
}

interface InstalledEquality {
  equals(a: unknown, b: unknown): boolean;
  hash(value: unknown): number;
}

/** Constructor of a value object type, private and protected constructors included */
export type ValueObjectClass<T> = Function & { readonly prototype: T };

const installed = new WeakMap<object, InstalledEquality>();

/**
 * Register generated equality for `host`. Subclasses without their own
 * installation use the nearest ancestor's.
 *
 * A host that derives from another installed value object also compares and
 * hashes the ancestor's members. The ancestor is looked up on each call, so
 * companion modules may load in any order.
 */
export function installEquality<T extends ValueObject<T>>(
  host: ValueObjectClass<T>,
  implementation: EqualityImplementation<T>
): void {
  const inherited = (): InstalledEquality | undefined => findInstalled(Object.getPrototypeOf(host));
  installed.set(host, {
    equals: (a, b) =>
      a instanceof host &&
      b instanceof host &&
      (inherited()?.equals(a, b) ?? true) &&
      implementation.equals(a, b),
    hash: (value) => {
      if (!(value instanceof host)) return 0;
      const own = implementation.hash(value);
      const ancestor = inherited();
      return ancestor ? hashCombine(ancestor.hash(value), own) : own;
    },
  });
}

export function hasInstalledEquality(host: object): boolean {
  return findInstalled(host) !== undefined;
}

function findInstalled(constructor: object): InstalledEquality | undefined {
  let current: object | null = constructor;
  while (current !== null && current !== Function.prototype) {
    const found = installed.get(current);
    if (found) return found;
    current = Object.getPrototypeOf(current);
  }
  return undefined;
}

function typeNameOf(value: object): string {
  return value.constructor.name || "anonymous value object";
}

// ============================================================================
// ValueObject
// ============================================================================

export abstract class ValueObject<TSelf extends ValueObject<TSelf>> {
  /**
   * @throws EqualityNotInstalledError when no generated equality is installed
   */
  equals(other: TSelf | null | undefined): boolean {
    const implementation = findInstalled(this.constructor);
    if (!implementation) {
      throw new EqualityNotInstalledError(typeNameOf(this));
    }
    if (other === null || other === undefined) return false;
    return implementation.equals(this, other);
  }

  /**
   * @throws EqualityNotInstalledError when no generated equality is installed
   */
  getHashCode(): number {
    const implementation = findInstalled(this.constructor);
    if (!implementation) {
      throw new EqualityNotInstalledError(typeNameOf(this));
    }
    return implementation.hash(this);
  }
}

// ============================================================================
// SimpleValueObject
// ============================================================================

/**
 * Single-value wrapper with built-in equality over `value`. Other members
 * never take part in equality.
 */
export abstract class SimpleValueObject<
  TSelf extends SimpleValueObject<TSelf, TValue>,
  TValue,
> extends ValueObject<TSelf> {
  constructor(public readonly value: TValue) {
    super();
  }

  override equals(other: TSelf | null | undefined): boolean {
    if (other === null || other === undefined) return false;
    if (other === this) return true;
    return (
      Object.getPrototypeOf(other) === Object.getPrototypeOf(this) &&
      defaultEquals(this.value, other.value)
    );
  }

  override getHashCode(): number {
    return hashCombine(hashString(typeNameOf(this)), defaultHash(this.value));
  }

  toString(): string {
    return String(this.value);
  }

  toJSON(): TValue {
    return this.value;
  }
}
