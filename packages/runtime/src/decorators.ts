/**
 * Equality annotations.
 *
 * These are standard (TC39) decorators that do nothing at run time: the
 * analyzer reads them from source and the generated companion module carries
 * the behavior. Each may be written bare (`@include`) or called
 * (`@include(1)`, `@sequence({ orderMatters: false })`).
 *
 * @example
 * ```typescript
 * @valueObject
 * export class Person extends ValueObject<Person> {
 *   @include() readonly city: string;
 *   @custom(1) readonly lastName: string;
 *   @sequence({ order: 2, orderMatters: false }) readonly tags: readonly string[];
 *   @ignore() readonly cachedLabel: string;
 *
 *   static Equals_LastName(a: string, b: string): boolean { ... }
 *   static GetHashCode_LastName(value: string): number { ... }
 * }
 * ```
 */

// ============================================================================
// Types
// ============================================================================

export type MemberDecoratorContext<This, Value> =
  | ClassFieldDecoratorContext<This, Value>
  | ClassAccessorDecoratorContext<This, Value>;

/**
 * Decorator accepted on instance fields and auto-accessors.
 */
export type MemberDecorator = <This, Value>(
  value: undefined | ClassAccessorDecoratorTarget<This, Value>,
  context: MemberDecoratorContext<This, Value>
) => void;

export type ClassMarker = (target: unknown, context: ClassDecoratorContext) => void;

export interface OrderOptions {
  /** Evaluation order; lower runs first (default 0) */
  order?: number;
}

export interface SequenceOptions extends OrderOptions {
  /** Positional comparison when true, multiset comparison when false (default true) */
  orderMatters?: boolean;
  /** Compare elements by value when true, by reference when false (default true) */
  deepEquality?: boolean;
}

// ============================================================================
// Implementation
// ============================================================================

const noopMember: MemberDecorator = () => undefined;
const noopClass: ClassMarker = () => undefined;

/**
 * True when the decorator itself was applied (bare form) rather than called
 * as a factory.
 */
function isDecoratorApplication(args: readonly unknown[]): boolean {
  const context = args[1];
  return args.length === 2 && typeof context === "object" && context !== null && "kind" in context;
}

function memberDecoratorOrFactory(args: readonly unknown[]): MemberDecorator | undefined {
  return isDecoratorApplication(args) ? undefined : noopMember;
}

/**
 * Compare the member with its own value equality.
 */
export function include(order?: number | OrderOptions): MemberDecorator;
export function include<This, Value>(
  value: undefined | ClassAccessorDecoratorTarget<This, Value>,
  context: MemberDecoratorContext<This, Value>
): void;
export function include(...args: unknown[]): MemberDecorator | undefined {
  return memberDecoratorOrFactory(args);
}

/**
 * Leave the member out of equality and hashing.
 */
export function ignore(): MemberDecorator;
export function ignore<This, Value>(
  value: undefined | ClassAccessorDecoratorTarget<This, Value>,
  context: MemberDecoratorContext<This, Value>
): void;
export function ignore(...args: unknown[]): MemberDecorator | undefined {
  return memberDecoratorOrFactory(args);
}

/**
 * Compare an iterable member element by element.
 */
export function sequence(options?: SequenceOptions): MemberDecorator;
export function sequence<This, Value>(
  value: undefined | ClassAccessorDecoratorTarget<This, Value>,
  context: MemberDecoratorContext<This, Value>
): void;
export function sequence(...args: unknown[]): MemberDecorator | undefined {
  return memberDecoratorOrFactory(args);
}

/**
 * Delegate to the static `Equals_<Name>` and `GetHashCode_<Name>` methods of
 * the same class.
 */
export function custom(order?: number | OrderOptions): MemberDecorator;
export function custom<This, Value>(
  value: undefined | ClassAccessorDecoratorTarget<This, Value>,
  context: MemberDecoratorContext<This, Value>
): void;
export function custom(...args: unknown[]): MemberDecorator | undefined {
  return memberDecoratorOrFactory(args);
}

/**
 * Marks a class extending `ValueObject` as an equality contract.
 */
export function valueObject(): ClassMarker;
export function valueObject(target: unknown, context: ClassDecoratorContext): void;
export function valueObject(...args: unknown[]): ClassMarker | undefined {
  return isDecoratorApplication(args) ? undefined : noopClass;
}

/**
 * Marks a class extending `Enumeration` for lookup table generation.
 */
export function enumeration(): ClassMarker;
export function enumeration(target: unknown, context: ClassDecoratorContext): void;
export function enumeration(...args: unknown[]): ClassMarker | undefined {
  return isDecoratorApplication(args) ? undefined : noopClass;
}
