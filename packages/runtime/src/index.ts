/**
 * @valuekit/runtime
 *
 * Annotations, base classes and the helpers generated companion modules call.
 */

export {
  include,
  ignore,
  sequence,
  custom,
  valueObject,
  enumeration,
  type MemberDecorator,
  type MemberDecoratorContext,
  type ClassMarker,
  type OrderOptions,
  type SequenceOptions,
} from "./decorators.js";

export {
  ValueObject,
  SimpleValueObject,
  installEquality,
  hasInstalledEquality,
  type EqualityImplementation,
  type ValueObjectClass,
} from "./value-object.js";

export {
  Enumeration,
  installEnumeration,
  type EnumerationLookup,
  type EnumerationClass,
} from "./enumeration.js";

export {
  defaultEquals,
  defaultHash,
  identityEquals,
  identityHashOf,
  sequenceEquals,
  sequenceHash,
  type Equatable,
  type Hashable,
} from "./equality.js";

export {
  HASH_SEED,
  hashCombine,
  hashString,
  hashNumber,
  hashBoolean,
  hashBigint,
  identityHash,
} from "./hashing.js";

export {
  ValuekitError,
  EqualityNotInstalledError,
  EnumerationNotInstalledError,
  LookupError,
  DuplicateEnumerationKeyError,
  type EnumerationKey,
} from "./errors.js";
