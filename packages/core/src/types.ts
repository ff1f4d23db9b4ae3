/**
 * Core types for the valuekit equality-contract compiler
 */

// ============================================================================
// Source Positions
// ============================================================================

/**
 * A span in a source file. `line` and `column` are 1-based; `start`/`end`
 * are 0-based character offsets.
 */
export interface SourceLocation {
  readonly fileName: string;
  readonly start: number;
  readonly end: number;
  readonly line: number;
  readonly column: number;
}

// ============================================================================
// Member Types
// ============================================================================

/**
 * Structural descriptor of a member's declared type. Only the distinctions the
 * validator and synthesizer act on are kept.
 */
export type TypeDescriptor =
  | { readonly kind: "scalar"; readonly text: string }
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "sequence"; readonly text: string; readonly elementText: string }
  | { readonly kind: "reference"; readonly text: string };

/** `field` = instance property declaration, `property` = auto-accessor */
export type MemberKind = "field" | "property";

export type Accessibility = "public" | "protected" | "private";

// ============================================================================
// Equality Strategies
// ============================================================================

export type EqualityStrategy =
  | { readonly kind: "include"; readonly order: number; readonly explicitOrder: boolean }
  | { readonly kind: "ignore" }
  | {
      readonly kind: "sequence";
      readonly order: number;
      readonly explicitOrder: boolean;
      readonly orderMatters: boolean;
      readonly deepEquality: boolean;
    }
  | { readonly kind: "custom"; readonly order: number; readonly explicitOrder: boolean };

export type StrategyKind = EqualityStrategy["kind"];

/** Strategies that place a member in the evaluation plan */
export type OrderedStrategy = Exclude<EqualityStrategy, { kind: "ignore" }>;

/**
 * A strategy as it was found in source, together with the decorator that
 * declared it.
 */
export interface StrategyAnnotation {
  readonly strategy: EqualityStrategy;
  /** Span of the whole decorator, `@` included */
  readonly location: SourceLocation;
  /** End of the text a removal deletes: up to the next decorator, modifier or name */
  readonly removalEnd: number;
}

/**
 * One stored slot of a host declaration.
 */
export interface Member {
  readonly name: string;
  readonly kind: MemberKind;
  readonly type: TypeDescriptor;
  /** Source offset; used only to break order ties */
  readonly declarationPosition: number;
  readonly readonly: boolean;
  readonly accessibility: Accessibility;
  /** Span of the member name */
  readonly location: SourceLocation;
  /** Offset of the member's first token (decorators included) */
  readonly memberStart: number;
  /** Offset where a `readonly` modifier would be inserted */
  readonly readonlyInsertPosition: number;
  readonly strategies: readonly StrategyAnnotation[];
  /** Declared as a constructor parameter property; cannot carry decorators */
  readonly parameterProperty?: boolean;
  /** Set on the implicit `value` member of a wrapper */
  readonly builtin?: boolean;
}

export type UnsupportedReason = "accessor" | "method" | "static" | "private-name" | "computed-name";

/**
 * A strategy-annotated member that is not a simple stored slot.
 */
export interface UnsupportedMember {
  readonly name: string;
  readonly reason: UnsupportedReason;
  readonly location: SourceLocation;
  readonly strategies: readonly StrategyAnnotation[];
}

// ============================================================================
// Host Declarations
// ============================================================================

export type BaseShape = "value-object" | "wrapper" | "none";

export interface HostDeclaration {
  readonly name: string;
  readonly fileName: string;
  /** Span of the class name */
  readonly location: SourceLocation;
  /** Span of the whole declaration */
  readonly span: { readonly start: number; readonly end: number };
  /** Extensibility flag: the generated module can only reach exported classes */
  readonly exported: boolean;
  /** Exported as the module's default export */
  readonly defaultExport: boolean;
  readonly exportInsertPosition: number;
  /** Span of the `@valueObject` decorator, when present */
  readonly marker?: SourceLocation;
  readonly markerRemovalEnd?: number;
  readonly baseShape: BaseShape;
  readonly members: readonly Member[];
  readonly unsupported: readonly UnsupportedMember[];
  readonly staticMethods: readonly string[];
  /** Offset of the closing brace of the class body */
  readonly bodyEnd: number;
}

// ============================================================================
// Equality Contract
// ============================================================================

/**
 * Companion functions a `custom` member delegates to.
 */
export interface CompanionFunctionRef {
  readonly suffix: string;
  readonly equalsName: string;
  readonly hashName: string;
}

export interface ContractEntry {
  readonly member: Member;
  readonly strategy: OrderedStrategy;
  readonly companion?: CompanionFunctionRef;
}

/**
 * The validated, ordered evaluation plan for one host declaration.
 */
export interface EqualityContract {
  readonly host: HostDeclaration;
  readonly shape: "composite" | "wrapper";
  readonly entries: readonly ContractEntry[];
}

// ============================================================================
// Enumerations
// ============================================================================

export interface EnumerationEntry {
  readonly ownerType: string;
  readonly fieldName: string;
  /** Undefined when the constructor argument is not a literal */
  readonly value: number | undefined;
  readonly name: string | undefined;
  readonly declarationPosition: number;
  readonly location: SourceLocation;
}

export interface EnumerationHost {
  readonly name: string;
  readonly fileName: string;
  readonly location: SourceLocation;
  readonly span: { readonly start: number; readonly end: number };
  readonly exported: boolean;
  readonly defaultExport: boolean;
  readonly exportInsertPosition: number;
  /** Span of the `@enumeration` decorator, when present */
  readonly marker?: SourceLocation;
  readonly entries: readonly EnumerationEntry[];
}

/**
 * A validated enumeration, entries in table order.
 */
export interface EnumerationTable {
  readonly host: EnumerationHost;
  readonly entries: readonly EnumerationEntry[];
}
