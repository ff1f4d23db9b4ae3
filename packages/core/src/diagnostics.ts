/**
 * Diagnostics System for valuekit
 *
 * Every rule violation found by the contract and enumeration validators is
 * reported as a structured diagnostic:
 * - Stable codes partitioned into two families (VO = contract, EN = enumeration)
 * - A primary location plus related locations
 * - Machine-applicable suggestions made of plain text edits
 * - Builder API used by the validators
 *
 * @example
 * ```typescript
 * bag.diagnostic(VO003)
 *   .at(member.location)
 *   .withArgs({ member: "lastName", suffix: "LastName" })
 *   .related(host.location, "declared in this value object")
 *   .help("Add `static Equals_LastName(a, b): boolean` to the class")
 *   .suggestion("add-companion-equals", "Generate Equals_LastName", [edit])
 *   .emit();
 * ```
 */

import type { SourceLocation } from "./types.js";

// ============================================================================
// Diagnostic Families & Severities
// ============================================================================

export type DiagnosticFamily = "contract" | "enumeration";

/** Error blocks synthesis, warning does not */
export type DiagnosticSeverity = "error" | "warning";

// ============================================================================
// Diagnostic Descriptor (Catalog Entry)
// ============================================================================

export interface DiagnosticDescriptor {
  /** Stable code, e.g. `VO003` */
  readonly code: string;

  /** Stable kebab-case identity, unique within a family */
  readonly id: string;

  readonly family: DiagnosticFamily;

  readonly severity: DiagnosticSeverity;

  /** Message template with {placeholders} for interpolation */
  readonly messageTemplate: string;

  /** Long-form explanation, printed by the CLI's `--explain` */
  readonly explanation: string;
}

// ============================================================================
// Diagnostic Types
// ============================================================================

/**
 * A secondary location with a message, e.g. the first of two duplicates.
 */
export interface RelatedLocation {
  readonly location: SourceLocation;
  readonly message: string;
}

/**
 * A single replacement of the text in `[start, end)`.
 */
export interface TextEdit {
  readonly fileName: string;
  readonly start: number;
  readonly end: number;
  readonly newText: string;
}

/**
 * A machine-applicable fix. The edits of one suggestion never overlap.
 */
export interface CodeSuggestion {
  /** Identifier of the fix kind, e.g. `add-readonly` */
  readonly id: string;
  readonly description: string;
  readonly edits: readonly TextEdit[];
  readonly isPreferred: boolean;
}

export interface Diagnostic {
  readonly code: string;
  readonly id: string;
  readonly family: DiagnosticFamily;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location: SourceLocation;
  readonly related: readonly RelatedLocation[];
  readonly notes: readonly string[];
  readonly help?: string;
  readonly suggestions: readonly CodeSuggestion[];
}

// ============================================================================
// Diagnostic Builder
// ============================================================================

/**
 * Fluent builder for constructing diagnostics.
 */
export class DiagnosticBuilder {
  private location: SourceLocation | undefined;
  private args: Record<string, string> = {};
  private readonly relatedLocations: RelatedLocation[] = [];
  private readonly notes: string[] = [];
  private helpText: string | undefined;
  private readonly suggestions: CodeSuggestion[] = [];

  constructor(
    private readonly descriptor: DiagnosticDescriptor,
    private readonly emitter: (diagnostic: Diagnostic) => void
  ) {}

  /**
   * Set the primary location.
   */
  at(location: SourceLocation): this {
    this.location = location;
    return this;
  }

  /**
   * Provide arguments for message template interpolation.
   */
  withArgs(args: Record<string, string | number | undefined>): this {
    for (const [key, value] of Object.entries(args)) {
      if (value !== undefined) {
        this.args[key] = String(value);
      }
    }
    return this;
  }

  related(location: SourceLocation, message: string): this {
    this.relatedLocations.push({ location, message });
    return this;
  }

  note(message: string): this {
    this.notes.push(message);
    return this;
  }

  help(message: string): this {
    this.helpText = message;
    return this;
  }

  suggestion(
    id: string,
    description: string,
    edits: readonly TextEdit[],
    isPreferred: boolean = false
  ): this {
    this.suggestions.push({ id, description, edits, isPreferred });
    return this;
  }

  private interpolateMessage(): string {
    let message = this.descriptor.messageTemplate;
    for (const [key, value] of Object.entries(this.args)) {
      message = message.replace(new RegExp(`\\{${key}\\}`, "g"), value);
    }
    return message;
  }

  emit(): void {
    if (!this.location) {
      throw new Error(`Diagnostic ${this.descriptor.code} emitted without a location`);
    }
    this.emitter({
      code: this.descriptor.code,
      id: this.descriptor.id,
      family: this.descriptor.family,
      severity: this.descriptor.severity,
      message: this.interpolateMessage(),
      location: this.location,
      related: [...this.relatedLocations],
      notes: [...this.notes],
      help: this.helpText,
      suggestions: [...this.suggestions],
    });
  }
}

// ============================================================================
// Diagnostic Bag
// ============================================================================

export type SeverityOverrides = Readonly<Record<string, DiagnosticSeverity>>;

/**
 * Collects the diagnostics of one declaration (or one file).
 *
 * Severity overrides may escalate a warning to an error; an error is never
 * downgraded, since error-severity rules guard synthesis.
 */
export class DiagnosticBag {
  private readonly items: Diagnostic[] = [];

  constructor(private readonly overrides: SeverityOverrides = {}) {}

  diagnostic(descriptor: DiagnosticDescriptor): DiagnosticBuilder {
    return new DiagnosticBuilder(descriptor, (d) => this.add(d));
  }

  add(diagnostic: Diagnostic): void {
    const override = this.overrides[diagnostic.code];
    if (override === "error" && diagnostic.severity === "warning") {
      this.items.push({ ...diagnostic, severity: "error" });
    } else {
      this.items.push(diagnostic);
    }
  }

  get hasErrors(): boolean {
    return this.items.some((d) => d.severity === "error");
  }

  /**
   * Diagnostics sorted by file, start offset, then code.
   */
  toArray(): Diagnostic[] {
    return sortDiagnostics(this.items);
  }
}

export function sortDiagnostics(diagnostics: readonly Diagnostic[]): Diagnostic[] {
  return [...diagnostics].sort(
    (a, b) =>
      compareStrings(a.location.fileName, b.location.fileName) ||
      a.location.start - b.location.start ||
      compareStrings(a.code, b.code)
  );
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === "error");
}

// ============================================================================
// Catalog: Contract Family (VO001-VO099)
// ============================================================================

export const VO001: DiagnosticDescriptor = {
  code: "VO001",
  id: "not-extensible",
  family: "contract",
  severity: "error",
  messageTemplate: "The value object '{type}' must be exported so its equality members can be generated",
  explanation: `The generated companion module imports the value object and installs
its equality and hash functions on it. A class that is not exported is closed
to the generator, so nothing is synthesized for the whole declaration.

Correct:
  @valueObject
  export class Address extends ValueObject<Address> { ... }`,
};

export const VO002: DiagnosticDescriptor = {
  code: "VO002",
  id: "missing-strategy",
  family: "contract",
  severity: "warning",
  messageTemplate: "The {kind} '{member}' in value object '{type}' should have an equality decorator",
  explanation: `Every stored member of a value object should state how it takes part in
equality: @include, @sequence, @custom, or @ignore. An unclassified member is
left out of equality and hashing.`,
};

export const VO003: DiagnosticDescriptor = {
  code: "VO003",
  id: "missing-companion-equals",
  family: "contract",
  severity: "error",
  messageTemplate:
    "The member '{member}' has @custom but the class is missing 'static Equals_{suffix}(a: {memberType}, b: {memberType}): boolean'",
  explanation: `@custom delegates equality to a static method named after the member.
The name is derived by stripping one leading "_" or "m_" and upper-casing the
first remaining character:

  @custom() readonly lastName: string;
  static Equals_LastName(a: string, b: string): boolean { ... }`,
};

export const VO004: DiagnosticDescriptor = {
  code: "VO004",
  id: "missing-companion-hash",
  family: "contract",
  severity: "error",
  messageTemplate:
    "The member '{member}' has @custom but the class is missing 'static GetHashCode_{suffix}(value: {memberType}): number'",
  explanation: `@custom delegates hashing to a static method named after the member:

  @custom() readonly lastName: string;
  static GetHashCode_LastName(value: string): number { ... }

Values that Equals_<Name> considers equal must hash equally.`,
};

export const VO005: DiagnosticDescriptor = {
  code: "VO005",
  id: "multiple-strategies",
  family: "contract",
  severity: "error",
  messageTemplate:
    "The {kind} '{member}' in value object '{type}' has multiple equality decorators; only one of @include, @custom, @sequence or @ignore is allowed",
  explanation: `A member takes part in equality in exactly one way. The member is
left out of the contract until only one decorator remains.`,
};

export const VO006: DiagnosticDescriptor = {
  code: "VO006",
  id: "sequence-on-non-sequence",
  family: "contract",
  severity: "error",
  messageTemplate:
    "The {kind} '{member}' has @sequence but its type '{memberType}' is not an iterable sequence; consider @include instead",
  explanation: `@sequence compares the elements of an iterable member. Strings are
iterable but are compared as text, so they are not accepted.`,
};

export const VO007: DiagnosticDescriptor = {
  code: "VO007",
  id: "strategy-outside-contract",
  family: "contract",
  severity: "error",
  messageTemplate:
    "The {kind} '{member}' has @{decorator} but the containing class '{type}' is not marked with @valueObject",
  explanation: `Equality decorators only have an effect inside a @valueObject class.`,
};

export const VO008: DiagnosticDescriptor = {
  code: "VO008",
  id: "contract-without-base-shape",
  family: "contract",
  severity: "error",
  messageTemplate: "The class '{type}' is marked with @valueObject but does not extend ValueObject",
  explanation: `The generated equality functions are installed through the ValueObject
base class:

  @valueObject
  export class Money extends ValueObject<Money> { ... }`,
};

export const VO009: DiagnosticDescriptor = {
  code: "VO009",
  id: "duplicate-companion-names",
  family: "contract",
  severity: "error",
  messageTemplate:
    "The members '{first}' and '{second}' resolve to the same companion functions (Equals_{suffix}/GetHashCode_{suffix}); rename one of them",
  explanation: `Companion names drop a leading "_" or "m_" and capitalize the rest, so
"_amount" and "amount" both resolve to Equals_Amount.`,
};

export const VO010: DiagnosticDescriptor = {
  code: "VO010",
  id: "mutable-property",
  family: "contract",
  severity: "warning",
  messageTemplate:
    "The property '{member}' in value object '{type}' is an auto-accessor and can be reassigned; use a readonly field",
  explanation: `Value objects should be immutable: a hash computed before a mutation no
longer matches after it. Auto-accessors always have a setter.`,
};

export const VO011: DiagnosticDescriptor = {
  code: "VO011",
  id: "mutable-field",
  family: "contract",
  severity: "warning",
  messageTemplate: "The field '{member}' in value object '{type}' should be declared readonly",
  explanation: `Value objects should be immutable: a hash computed before a mutation no
longer matches after it.`,
};

export const VO012: DiagnosticDescriptor = {
  code: "VO012",
  id: "extra-member-in-wrapper",
  family: "contract",
  severity: "warning",
  messageTemplate:
    "The simple value object '{type}' should not declare additional {kind} '{member}'; only 'value' takes part in equality",
  explanation: `SimpleValueObject compares and hashes its wrapped value only. Any other
stored member is ignored by equality.`,
};

export const VO013: DiagnosticDescriptor = {
  code: "VO013",
  id: "duplicate-order",
  family: "contract",
  severity: "warning",
  messageTemplate:
    "Members {members} in value object '{type}' share order {order}; evaluation falls back to declaration order",
  explanation: `Members are compared by ascending order, then by declaration order.
Two members with the same explicit order are still compared deterministically,
but the intent is ambiguous to a reader.`,
};

export const VO014: DiagnosticDescriptor = {
  code: "VO014",
  id: "unnecessary-contract-marker",
  family: "contract",
  severity: "warning",
  messageTemplate:
    "The class '{type}' extends SimpleValueObject; @valueObject is unnecessary and ignored",
  explanation: `SimpleValueObject already has built-in equality over its wrapped value.`,
};

export const VO015: DiagnosticDescriptor = {
  code: "VO015",
  id: "strategy-on-unsupported-member",
  family: "contract",
  severity: "error",
  messageTemplate:
    "The equality decorator on '{member}' is invalid: {reason}. Only instance fields and auto-accessors are supported",
  explanation: `Only simple stored slots can take part in a contract: instance fields
and auto-accessors. Getters, setters, methods, static members and #private
members are rejected.`,
};

// ============================================================================
// Catalog: Enumeration Family (EN001-EN099)
// ============================================================================

export const EN001: DiagnosticDescriptor = {
  code: "EN001",
  id: "duplicate-value",
  family: "enumeration",
  severity: "error",
  messageTemplate:
    "The enumeration '{type}' has duplicate value {value}. Values must be unique within an enumeration type",
  explanation: `fromValue() needs every value to identify exactly one instance. No
lookup table is generated while duplicates remain.`,
};

export const EN002: DiagnosticDescriptor = {
  code: "EN002",
  id: "duplicate-name",
  family: "enumeration",
  severity: "error",
  messageTemplate:
    "The enumeration '{type}' has duplicate name '{name}'. Names must be unique within an enumeration type",
  explanation: `fromName() needs every name to identify exactly one instance. No lookup
table is generated while duplicates remain.`,
};

export const EN003: DiagnosticDescriptor = {
  code: "EN003",
  id: "not-extensible",
  family: "enumeration",
  severity: "error",
  messageTemplate: "The enumeration '{type}' must be exported so its lookup tables can be generated",
  explanation: `The generated companion module imports the enumeration and installs
its lookup tables on it.`,
};

// ============================================================================
// Code Registry
// ============================================================================

export const DIAGNOSTIC_CATALOG: ReadonlyMap<string, DiagnosticDescriptor> = new Map(
  [
    VO001,
    VO002,
    VO003,
    VO004,
    VO005,
    VO006,
    VO007,
    VO008,
    VO009,
    VO010,
    VO011,
    VO012,
    VO013,
    VO014,
    VO015,
    EN001,
    EN002,
    EN003,
  ].map((d) => [d.code, d])
);

export function getDiagnosticDescriptor(code: string): DiagnosticDescriptor | undefined {
  return DIAGNOSTIC_CATALOG.get(code);
}

export function getDiagnosticsByFamily(family: DiagnosticFamily): DiagnosticDescriptor[] {
  return Array.from(DIAGNOSTIC_CATALOG.values()).filter((d) => d.family === family);
}

// ============================================================================
// Single-line Formatter
// ============================================================================

/**
 * `file.ts:3:5 - error VO003: message`
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const { fileName, line, column } = diagnostic.location;
  return `${fileName}:${line}:${column} - ${diagnostic.severity} ${diagnostic.code}: ${diagnostic.message}`;
}

// ============================================================================
// CLI Renderer: Rust-Style Error Output
// ============================================================================

/**
 * ANSI color codes for terminal output.
 * Set NO_COLOR or VALUEKIT_NO_COLOR to disable.
 */
const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
} as const;

type ColorName = keyof typeof COLORS;

function colorsEnabledByEnv(): boolean {
  if (typeof process === "undefined") return false;
  const env = process.env;
  return !env.NO_COLOR && !env.VALUEKIT_NO_COLOR && env.FORCE_COLOR !== "0";
}

export interface CLIRenderOptions {
  /** Whether to use colors (default: auto-detect) */
  colors?: boolean;
  /** Context lines before/after the primary line (default: 1) */
  contextLines?: number;
  /** Whether to show the catalog explanation (default: false) */
  showExplanation?: boolean;
  /** Source text lookup; without it only the header and notes are rendered */
  readSource?: (fileName: string) => string | undefined;
}

/**
 * Render a diagnostic in Rust-style format.
 *
 * @example Output:
 * ```
 * error[VO003]: The member 'lastName' has @custom but ...
 *   --> src/person.ts:7:22
 *    |
 *  7 |   @custom() readonly lastName: string;
 *    |                      ^^^^^^^^
 *    |
 *    = help: Add the missing static method
 * ```
 */
export function renderDiagnosticCLI(diagnostic: Diagnostic, options: CLIRenderOptions = {}): string {
  const useColors = options.colors ?? colorsEnabledByEnv();
  const color = (text: string, ...styles: ColorName[]): string =>
    useColors ? `${styles.map((s) => COLORS[s]).join("")}${text}${COLORS.reset}` : text;
  const severityClr: ColorName = diagnostic.severity === "error" ? "red" : "yellow";
  const contextLines = options.contextLines ?? 1;

  const lines: string[] = [];
  lines.push(
    `${color(diagnostic.severity, "bold", severityClr)}${color(`[${diagnostic.code}]`, "bold", severityClr)}: ${color(diagnostic.message, "bold")}`
  );

  const { fileName, line, column } = diagnostic.location;
  lines.push(`  ${color("-->", "blue")} ${fileName}:${line}:${column}`);

  const text = options.readSource?.(fileName);
  if (text !== undefined) {
    const sourceLines = text.split("\n");
    const minLine = Math.max(1, line - contextLines);
    const maxLine = Math.min(sourceLines.length, line + contextLines);
    const width = Math.max(3, String(maxLine).length);
    const gutter = " ".repeat(width);

    lines.push(` ${gutter} ${color("|", "blue")}`);
    for (let lineNum = minLine; lineNum <= maxLine; lineNum++) {
      const lineText = sourceLines[lineNum - 1] ?? "";
      lines.push(` ${color(String(lineNum).padStart(width), "blue")} ${color("|", "blue")} ${lineText}`);
      if (lineNum === line) {
        const spanLength = Math.max(
          1,
          Math.min(diagnostic.location.end - diagnostic.location.start, lineText.length - column + 1)
        );
        const underline = " ".repeat(column - 1) + "^".repeat(spanLength);
        lines.push(` ${gutter} ${color("|", "blue")} ${color(underline, severityClr)}`);
      }
    }
    lines.push(` ${gutter} ${color("|", "blue")}`);
  }

  for (const related of diagnostic.related) {
    const loc = related.location;
    lines.push(`   ${color("= related:", "bold", "blue")} ${loc.fileName}:${loc.line}:${loc.column} ${related.message}`);
  }

  for (const note of diagnostic.notes) {
    lines.push(`   ${color("= note:", "bold")} ${note}`);
  }

  if (diagnostic.help) {
    lines.push(`   ${color("= help:", "bold", "green")} ${diagnostic.help}`);
  }

  for (const suggestion of diagnostic.suggestions) {
    lines.push(`   ${color("= suggestion:", "bold", "cyan")} ${suggestion.description}`);
  }

  if (options.showExplanation) {
    const descriptor = getDiagnosticDescriptor(diagnostic.code);
    if (descriptor) {
      lines.push("");
      lines.push(color("Explanation:", "bold"));
      for (const expLine of descriptor.explanation.split("\n")) {
        lines.push(`  ${expLine}`);
      }
    }
  }

  return lines.join("\n");
}

/**
 * Render multiple diagnostics with a summary.
 */
export function renderDiagnosticsCLI(
  diagnostics: readonly Diagnostic[],
  options: CLIRenderOptions = {}
): string {
  if (diagnostics.length === 0) {
    return "";
  }

  const useColors = options.colors ?? colorsEnabledByEnv();
  const color = (text: string, clr: ColorName): string =>
    useColors ? `${COLORS.bold}${COLORS[clr]}${text}${COLORS.reset}` : text;

  const lines: string[] = [];
  for (const diag of diagnostics) {
    lines.push(renderDiagnosticCLI(diag, options));
    lines.push("");
  }

  const errorCount = diagnostics.filter((d) => d.severity === "error").length;
  const warnCount = diagnostics.filter((d) => d.severity === "warning").length;

  const parts: string[] = [];
  if (errorCount > 0) {
    parts.push(color(`${errorCount} error${errorCount > 1 ? "s" : ""}`, "red"));
  }
  if (warnCount > 0) {
    parts.push(color(`${warnCount} warning${warnCount > 1 ? "s" : ""}`, "yellow"));
  }
  lines.push(`${parts.join(", ")} generated`);

  return lines.join("\n");
}

// ============================================================================
// JSON Output
// ============================================================================

export interface DiagnosticReport {
  readonly version: 1;
  readonly errorCount: number;
  readonly warningCount: number;
  readonly diagnostics: readonly Diagnostic[];
}

/**
 * Serializable report consumed by editors, build pipelines and repair tools.
 */
export function toDiagnosticReport(diagnostics: readonly Diagnostic[]): DiagnosticReport {
  const sorted = sortDiagnostics(diagnostics);
  return {
    version: 1,
    errorCount: sorted.filter((d) => d.severity === "error").length,
    warningCount: sorted.filter((d) => d.severity === "warning").length,
    diagnostics: sorted,
  };
}
