/**
 * Source emitters.
 *
 * An emitter turns one validated declaration into TypeScript statements. The
 * statements are plain source text; helpers they call from the runtime module
 * are recorded on the context so the module header imports exactly those.
 */

// ============================================================================
// Emit Context
// ============================================================================

/**
 * Runtime helper names referenced by emitted code.
 */
export class RuntimeImports {
  private readonly names = new Set<string>();

  use(name: string): string {
    this.names.add(name);
    return name;
  }

  /** Sorted, so output does not depend on emission order */
  list(): string[] {
    return [...this.names].sort();
  }
}

export interface EmitContext {
  readonly runtime: RuntimeImports;
}

export function createEmitContext(): EmitContext {
  return { runtime: new RuntimeImports() };
}

// ============================================================================
// Emitter Definition
// ============================================================================

export interface Emitter<TInput> {
  readonly name: string;
  readonly description: string;
  emit(ctx: EmitContext, input: TInput): string;
}

export function defineEmitter<TInput>(definition: Emitter<TInput>): Emitter<TInput> {
  return definition;
}

// ============================================================================
// Source Helpers
// ============================================================================

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/**
 * `target.name`, or `target["name"]` where dot access is not allowed: names
 * that are not identifiers, and members that are not public.
 */
export function memberAccess(target: string, name: string, bracket: boolean = false): string {
  if (!bracket && IDENTIFIER.test(name)) {
    return `${target}.${name}`;
  }
  return `${target}[${JSON.stringify(name)}]`;
}

export function stringLiteral(value: string): string {
  return JSON.stringify(value);
}
