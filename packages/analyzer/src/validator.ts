/**
 * Contract Validator
 *
 * Decides whether a host declaration forms a valid equality contract. Every
 * independently detectable violation of a declaration is reported in one
 * pass; the contract is produced only when none of them is an error.
 */

import {
  DiagnosticBag,
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
  matchGlob,
  type ContractEntry,
  type Diagnostic,
  type EqualityContract,
  type HostDeclaration,
  type Member,
  type OrderedStrategy,
  type SeverityOverrides,
  type UnsupportedReason,
} from "@valuekit/core";
import { companionFor } from "./clean-name.js";
import {
  addDecoratorEdit,
  addExportEdit,
  addReadonlyEdit,
  companionEqualsStub,
  companionHashStub,
  insertCompanionEdit,
  keepOnlyEdits,
  removeDecoratorEdit,
  replaceDecoratorEdit,
} from "./suggestions.js";
import { strategyDecoratorText } from "./strategies.js";

export interface ValidationOptions {
  /** Member name globs exempt from the missing-strategy warning */
  ignoreMembers?: readonly string[];
  /** Per-code severity escalation */
  severity?: SeverityOverrides;
}

export interface ValidationResult {
  /** Present only when no error was reported */
  contract?: EqualityContract;
  diagnostics: Diagnostic[];
}

const UNSUPPORTED_REASONS: Readonly<Record<UnsupportedReason, string>> = {
  accessor: "get and set accessors compute their value",
  method: "methods are not stored state",
  static: "static members are not instance state",
  "private-name": "#private members cannot be reached by generated code",
  "computed-name": "members with computed names cannot be addressed by generated code",
};

/**
 * Compare entries by (order, declarationPosition).
 */
export function compareEntries(a: ContractEntry, b: ContractEntry): number {
  return a.strategy.order - b.strategy.order || a.member.declarationPosition - b.member.declarationPosition;
}

function quoteList(names: readonly string[]): string {
  return names.map((n) => `'${n}'`).join(", ");
}

/**
 * The implicit member a wrapper compares.
 */
function wrapperValueMember(host: HostDeclaration): Member {
  return {
    name: "value",
    kind: "field",
    type: { kind: "reference", text: "TValue" },
    declarationPosition: host.span.start,
    readonly: true,
    accessibility: "public",
    location: host.location,
    memberStart: host.span.start,
    readonlyInsertPosition: host.span.start,
    strategies: [],
    builtin: true,
  };
}

class ContractValidator {
  private readonly bag: DiagnosticBag;

  constructor(
    private readonly host: HostDeclaration,
    private readonly options: ValidationOptions
  ) {
    this.bag = new DiagnosticBag(options.severity);
  }

  run(): ValidationResult {
    if (this.host.baseShape === "wrapper") {
      return this.validateWrapper();
    }
    if (!this.host.marker) {
      this.reportStrategiesOutsideContract();
      return this.result(undefined);
    }
    return this.validateComposite();
  }

  private result(contract: EqualityContract | undefined): ValidationResult {
    const diagnostics = this.bag.toArray();
    return this.bag.hasErrors ? { diagnostics } : { contract, diagnostics };
  }

  // ==========================================================================
  // Wrapper shape
  // ==========================================================================

  private validateWrapper(): ValidationResult {
    const { host } = this;
    if (host.marker) {
      const edits =
        host.markerRemovalEnd !== undefined
          ? [{ fileName: host.fileName, start: host.marker.start, end: host.markerRemovalEnd, newText: "" }]
          : [];
      this.bag
        .diagnostic(VO014)
        .at(host.marker)
        .withArgs({ type: host.name })
        .suggestion("remove-contract-marker", "Remove @valueObject", edits, true)
        .emit();
    }

    for (const member of host.members) {
      this.bag
        .diagnostic(VO012)
        .at(member.location)
        .withArgs({ type: host.name, kind: member.kind, member: member.name })
        .emit();
    }
    this.reportUnsupported();

    return this.result({
      host,
      shape: "wrapper",
      entries: [
        {
          member: wrapperValueMember(host),
          strategy: { kind: "include", order: 0, explicitOrder: false },
        },
      ],
    });
  }

  // ==========================================================================
  // Unmarked classes
  // ==========================================================================

  private reportStrategiesOutsideContract(): void {
    const { host } = this;
    const annotated = [
      ...host.members.map((m) => ({ name: m.name, kind: m.kind, strategies: m.strategies })),
      ...host.unsupported.map((m) => ({ name: m.name, kind: "member", strategies: m.strategies })),
    ];
    for (const member of annotated) {
      for (const annotation of member.strategies) {
        this.bag
          .diagnostic(VO007)
          .at(annotation.location)
          .withArgs({
            kind: member.kind,
            member: member.name,
            decorator: annotation.strategy.kind,
            type: host.name,
          })
          .related(host.location, "class declared here")
          .help("Add @valueObject to the class, or remove the decorator")
          .emit();
      }
    }
  }

  private reportUnsupported(): void {
    for (const member of this.host.unsupported) {
      this.bag
        .diagnostic(VO015)
        .at(member.location)
        .withArgs({ member: member.name, reason: UNSUPPORTED_REASONS[member.reason] })
        .suggestion(
          "remove-equality-decorator",
          "Remove the equality decorator",
          member.strategies.map((a) => removeDecoratorEdit(this.host.fileName, a)),
          true
        )
        .emit();
    }
  }

  // ==========================================================================
  // Composite shape
  // ==========================================================================

  private validateComposite(): ValidationResult {
    const { host } = this;

    if (host.baseShape === "none") {
      this.bag
        .diagnostic(VO008)
        .at(host.location)
        .withArgs({ type: host.name })
        .help(`Declare the class as 'class ${host.name} extends ValueObject<${host.name}>'`)
        .emit();
    }

    if (!host.exported) {
      this.bag
        .diagnostic(VO001)
        .at(host.location)
        .withArgs({ type: host.name })
        .suggestion(
          "add-export",
          `Export '${host.name}'`,
          [addExportEdit(host.fileName, host.exportInsertPosition)],
          true
        )
        .emit();
    }

    this.reportUnsupported();

    const entries: ContractEntry[] = [];
    for (const member of host.members) {
      const entry = this.validateMember(member);
      if (entry) entries.push(entry);
    }

    this.reportCompanionCollisions(entries);
    this.reportDuplicateOrders(entries);

    return this.result({ host, shape: "composite", entries: [...entries].sort(compareEntries) });
  }

  private validateMember(member: Member): ContractEntry | undefined {
    const { host } = this;
    const [first, ...rest] = member.strategies;

    if (!first) {
      this.reportMissingStrategy(member);
      return undefined;
    }

    if (rest.length > 0) {
      const builder = this.bag
        .diagnostic(VO005)
        .at(member.location)
        .withArgs({ kind: member.kind, member: member.name, type: host.name });
      for (const annotation of member.strategies) {
        builder.related(annotation.location, `@${annotation.strategy.kind} applied here`);
        builder.suggestion(
          `keep-${annotation.strategy.kind}`,
          `Keep only ${strategyDecoratorText(annotation.strategy)}`,
          keepOnlyEdits(host, member, annotation)
        );
      }
      builder.emit();
      return undefined;
    }

    const strategy = first.strategy;
    if (strategy.kind === "ignore") return undefined;

    if (strategy.kind === "sequence" && member.type.kind !== "sequence") {
      this.bag
        .diagnostic(VO006)
        .at(first.location)
        .withArgs({ kind: member.kind, member: member.name, memberType: member.type.text })
        .suggestion(
          "replace-with-include",
          "Replace with @include()",
          [
            replaceDecoratorEdit(host.fileName, first, {
              kind: "include",
              order: strategy.order,
              explicitOrder: strategy.explicitOrder,
            }),
          ],
          true
        )
        .emit();
      return undefined;
    }

    this.checkImmutability(member);

    if (strategy.kind === "custom") {
      return this.resolveCompanion(member, strategy);
    }
    return { member, strategy };
  }

  private reportMissingStrategy(member: Member): void {
    const { host } = this;
    if ((this.options.ignoreMembers ?? []).some((pattern) => matchGlob(member.name, pattern))) {
      return;
    }

    const builder = this.bag
      .diagnostic(VO002)
      .at(member.location)
      .withArgs({ kind: member.kind, member: member.name, type: host.name });

    if (member.parameterProperty) {
      builder.help("Parameter properties cannot be decorated; declare it as a class field to annotate it");
    } else {
      builder
        .suggestion("add-include", "Add @include()", [addDecoratorEdit(host, member, "@include()")], true)
        .suggestion("add-ignore", "Add @ignore()", [addDecoratorEdit(host, member, "@ignore()")]);
      if (member.type.kind === "sequence") {
        builder.suggestion("add-sequence", "Add @sequence()", [addDecoratorEdit(host, member, "@sequence()")]);
      }
    }
    builder.emit();
  }

  private checkImmutability(member: Member): void {
    const { host } = this;
    if (member.kind === "property") {
      this.bag
        .diagnostic(VO010)
        .at(member.location)
        .withArgs({ member: member.name, type: host.name })
        .emit();
    } else if (!member.readonly) {
      this.bag
        .diagnostic(VO011)
        .at(member.location)
        .withArgs({ member: member.name, type: host.name })
        .suggestion("add-readonly", `Make '${member.name}' readonly`, [addReadonlyEdit(host, member)], true)
        .emit();
    }
  }

  private resolveCompanion(
    member: Member,
    strategy: Extract<OrderedStrategy, { kind: "custom" }>
  ): ContractEntry {
    const { host } = this;
    const companion = companionFor(member.name);
    const args = { member: member.name, suffix: companion.suffix, memberType: member.type.text };

    if (!host.staticMethods.includes(companion.equalsName)) {
      this.bag
        .diagnostic(VO003)
        .at(member.location)
        .withArgs(args)
        .related(host.location, "declared in this value object")
        .suggestion(
          "add-companion-equals",
          `Add static ${companion.equalsName}`,
          [insertCompanionEdit(host, companionEqualsStub(companion, member.type.text))],
          true
        )
        .emit();
    }
    if (!host.staticMethods.includes(companion.hashName)) {
      this.bag
        .diagnostic(VO004)
        .at(member.location)
        .withArgs(args)
        .related(host.location, "declared in this value object")
        .suggestion(
          "add-companion-hash",
          `Add static ${companion.hashName}`,
          [insertCompanionEdit(host, companionHashStub(companion, member.type.text))],
          true
        )
        .emit();
    }
    return { member, strategy, companion };
  }

  // ==========================================================================
  // Cross-member rules
  // ==========================================================================

  private reportCompanionCollisions(entries: readonly ContractEntry[]): void {
    const firstBySuffix = new Map<string, Member>();
    const customs = entries
      .filter((e) => e.companion !== undefined)
      .sort((a, b) => a.member.declarationPosition - b.member.declarationPosition);

    for (const entry of customs) {
      const suffix = entry.companion?.suffix;
      if (suffix === undefined) continue;
      const first = firstBySuffix.get(suffix);
      if (!first) {
        firstBySuffix.set(suffix, entry.member);
        continue;
      }
      this.bag
        .diagnostic(VO009)
        .at(entry.member.location)
        .withArgs({ first: first.name, second: entry.member.name, suffix })
        .related(first.location, `'${first.name}' also resolves to Equals_${suffix}`)
        .emit();
    }
  }

  private reportDuplicateOrders(entries: readonly ContractEntry[]): void {
    const groups = new Map<number, ContractEntry[]>();
    for (const entry of entries) {
      if (!entry.strategy.explicitOrder) continue;
      const group = groups.get(entry.strategy.order) ?? [];
      group.push(entry);
      groups.set(entry.strategy.order, group);
    }

    for (const [order, group] of groups) {
      if (group.length < 2) continue;
      const sorted = [...group].sort((a, b) => a.member.declarationPosition - b.member.declarationPosition);
      const [first, second, ...others] = sorted;
      const builder = this.bag
        .diagnostic(VO013)
        .at(second.member.location)
        .withArgs({ members: quoteList(sorted.map((e) => e.member.name)), type: this.host.name, order });
      for (const other of [first, ...others]) {
        builder.related(other.member.location, `'${other.member.name}' also has order ${order}`);
      }
      builder.emit();
    }
  }
}

/**
 * Validate one host declaration.
 */
export function validateContract(
  host: HostDeclaration,
  options: ValidationOptions = {}
): ValidationResult {
  return new ContractValidator(host, options).run();
}
