/**
 * Equality Synthesizer
 *
 * Emits `equals<Name>` and `hash<Name>` for a validated composite contract and
 * installs them on the host class.
 *
 * @example
 * ```typescript
 * export function equalsPerson(a: Person, b: Person): boolean {
 *   if (a === b) return true;
 *   if (Object.getPrototypeOf(a) !== Object.getPrototypeOf(b)) return false;
 *   // order 0: city
 *   if (!defaultEquals(a.city, b.city)) return false;
 *   // order 1: lastName
 *   if (!Person.Equals_LastName(a.lastName, b.lastName)) return false;
 *   return true;
 * }
 * ```
 */

import { invariant, unreachable, type CompanionFunctionRef, type ContractEntry, type EqualityContract } from "@valuekit/core";
import { defineEmitter, memberAccess, stringLiteral, type EmitContext } from "./emitter.js";

function access(target: string, entry: ContractEntry): string {
  return memberAccess(target, entry.member.name, entry.member.accessibility !== "public");
}

function companionOf(entry: ContractEntry): CompanionFunctionRef {
  const { companion } = entry;
  invariant(companion !== undefined, `Custom member '${entry.member.name}' has no resolved companion`);
  return companion;
}

function equalsCondition(ctx: EmitContext, host: string, entry: ContractEntry): string {
  const a = access("a", entry);
  const b = access("b", entry);
  const { strategy } = entry;
  switch (strategy.kind) {
    case "include":
      return `${ctx.runtime.use("defaultEquals")}(${a}, ${b})`;
    case "custom":
      return `${host}.${companionOf(entry).equalsName}(${a}, ${b})`;
    case "sequence":
      return `${ctx.runtime.use("sequenceEquals")}(${a}, ${b}, ${strategy.orderMatters}, ${strategy.deepEquality})`;
    default:
      return unreachable(strategy);
  }
}

function hashContribution(ctx: EmitContext, host: string, entry: ContractEntry): string {
  const value = access("value", entry);
  const { strategy } = entry;
  switch (strategy.kind) {
    case "include":
      return `${ctx.runtime.use("defaultHash")}(${value})`;
    case "custom":
      return `${host}.${companionOf(entry).hashName}(${value})`;
    case "sequence":
      return `${ctx.runtime.use("sequenceHash")}(${value}, ${strategy.orderMatters}, ${strategy.deepEquality})`;
    default:
      return unreachable(strategy);
  }
}

/**
 * Consecutive entries sharing an order value.
 */
function orderGroups(entries: readonly ContractEntry[]): ContractEntry[][] {
  const groups: ContractEntry[][] = [];
  for (const entry of entries) {
    const last = groups[groups.length - 1];
    if (last && last[0].strategy.order === entry.strategy.order) {
      last.push(entry);
    } else {
      groups.push([entry]);
    }
  }
  return groups;
}

export function equalsFunctionName(contract: EqualityContract): string {
  return `equals${contract.host.name}`;
}

export function hashFunctionName(contract: EqualityContract): string {
  return `hash${contract.host.name}`;
}

export const EqualityEmitter = defineEmitter<EqualityContract>({
  name: "Equality",
  description: "Generate the equality predicate and hash function of a value object",

  emit(ctx, contract) {
    // Wrappers keep the built-in equality of SimpleValueObject
    if (contract.shape === "wrapper") return "";

    const host = contract.host.name;
    const equalsName = equalsFunctionName(contract);
    const hashName = hashFunctionName(contract);

    const comparisons = orderGroups(contract.entries)
      .map((group) => {
        const header = `  // order ${group[0].strategy.order}: ${group.map((e) => e.member.name).join(", ")}`;
        const checks = group.map((entry) => `  if (!${equalsCondition(ctx, host, entry)}) return false;`);
        return [header, ...checks].join("\n");
      })
      .join("\n");

    const seed = `${ctx.runtime.use("hashString")}(${stringLiteral(host)})`;
    const combine = ctx.runtime.use("hashCombine");
    const contributions = contract.entries
      .map((entry) => `  hash = ${combine}(hash, ${hashContribution(ctx, host, entry)});`)
      .join("\n");

    const install = ctx.runtime.use("installEquality");

    return `export function ${equalsName}(a: ${host}, b: ${host}): boolean {
  if (a === b) return true;
  if (Object.getPrototypeOf(a) !== Object.getPrototypeOf(b)) return false;
${comparisons ? `${comparisons}\n` : ""}  return true;
}

export function ${hashName}(value: ${host}): number {
  let hash = ${seed};
${contributions ? `${contributions}\n` : ""}  return hash;
}

${install}(${host}, { equals: ${equalsName}, hash: ${hashName} });
`;
  },
});
