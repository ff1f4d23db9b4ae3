/**
 * Errors raised by value objects and enumerations at run time.
 */

export class ValuekitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A value object was compared or hashed before its generated companion
 * module was loaded. There is no reflective fallback.
 */
export class EqualityNotInstalledError extends ValuekitError {
  constructor(public readonly typeName: string) {
    super(
      `No generated equality is installed for '${typeName}'; import its .valuekit module before comparing instances`
    );
  }
}

export class EnumerationNotInstalledError extends ValuekitError {
  constructor(public readonly typeName: string) {
    super(
      `No generated lookup table is installed for '${typeName}'; import its .valuekit module before looking up members`
    );
  }
}

export type EnumerationKey = "value" | "name";

/**
 * `fromValue` / `fromName` / `parse` found no member for the key.
 */
export class LookupError extends ValuekitError {
  constructor(
    public readonly typeName: string,
    public readonly keyKind: EnumerationKey,
    public readonly key: string | number
  ) {
    super(
      keyKind === "value"
        ? `'${typeName}' has no member with value ${key}`
        : `'${typeName}' has no member named '${key}'`
    );
  }
}

/**
 * Two members of one enumeration share a value or a name. Raised when the
 * lookup table is installed, which covers keys computed at run time.
 */
export class DuplicateEnumerationKeyError extends ValuekitError {
  constructor(
    public readonly typeName: string,
    public readonly keyKind: EnumerationKey,
    public readonly key: string | number,
    /** Static field names of the two clashing members, in declaration order */
    public readonly members: readonly [string, string]
  ) {
    super(
      `'${typeName}' members '${members[0]}' and '${members[1]}' share the ${keyKind} ${
        keyKind === "value" ? key : `'${key}'`
      }`
    );
  }
}
