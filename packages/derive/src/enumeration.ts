/**
 * Enumeration Table Synthesizer
 *
 * Emits the value and name tables of a validated enumeration, the
 * `<Name>Lookup` accessors over them, and the call that installs the lookup
 * on the class.
 */

import type { EnumerationEntry, EnumerationTable } from "@valuekit/core";
import { defineEmitter, memberAccess, stringLiteral } from "./emitter.js";

function valueKey(owner: string, entry: EnumerationEntry): string {
  return entry.value !== undefined ? String(entry.value) : `${memberAccess(owner, entry.fieldName)}.value`;
}

function nameKey(owner: string, entry: EnumerationEntry): string {
  return entry.name !== undefined ? stringLiteral(entry.name) : `${memberAccess(owner, entry.fieldName)}.name`;
}

export function lookupName(table: EnumerationTable): string {
  return `${table.host.name}Lookup`;
}

export const EnumerationEmitter = defineEmitter<EnumerationTable>({
  name: "Enumeration",
  description: "Generate lookup tables and accessors for an enumeration",

  emit(ctx, table) {
    const owner = table.host.name;
    const lookup = lookupName(table);
    const typeName = stringLiteral(owner);
    const lookupError = ctx.runtime.use("LookupError");
    const lookupType = ctx.runtime.use("EnumerationLookup");
    const install = ctx.runtime.use("installEnumeration");

    const instances = table.entries.map((entry) => memberAccess(owner, entry.fieldName));
    const byValue = table.entries.map(
      (entry, i) => `  [${valueKey(owner, entry)}, ${instances[i]}],`
    );
    const byName = table.entries.map(
      (entry, i) => `  [${nameKey(owner, entry)}, ${instances[i]}],`
    );

    const list = (lines: readonly string[]): string => (lines.length > 0 ? `\n${lines.join("\n")}\n` : "");

    return `const ${owner}All: readonly ${owner}[] = [${list(instances.map((i) => `  ${i},`))}];

const ${owner}ByValue = new Map<number, ${owner}>([${list(byValue)}]);

const ${owner}ByName = new Map<string, ${owner}>([${list(byName)}]);

export const ${lookup}: ${lookupType}<${owner}> = {
  getAll: () => ${owner}All,
  fromValue(value: number): ${owner} {
    const found = ${owner}ByValue.get(value);
    if (found === undefined) throw new ${lookupError}(${typeName}, "value", value);
    return found;
  },
  fromName(name: string): ${owner} {
    const found = ${owner}ByName.get(name);
    if (found === undefined) throw new ${lookupError}(${typeName}, "name", name);
    return found;
  },
  tryFromValue: (value: number) => ${owner}ByValue.get(value),
  tryFromName: (name: string) => ${owner}ByName.get(name),
  parse(json: unknown): ${owner} {
    if (typeof json === "number") return ${lookup}.fromValue(json);
    if (typeof json === "string") return ${lookup}.fromName(json);
    throw new ${lookupError}(${typeName}, "value", String(json));
  },
};

${install}(${owner}, ${lookup});
`;
  },
});
