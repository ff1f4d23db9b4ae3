/**
 * Companion module assembly.
 *
 * One companion module is written per source file. It imports the hosts it
 * extends from the source module and the helpers its code calls from the
 * runtime module.
 */

import type { EqualityContract, EnumerationTable } from "@valuekit/core";
import { createEmitContext } from "./emitter.js";
import { EqualityEmitter } from "./equality.js";
import { EnumerationEmitter } from "./enumeration.js";

export interface CompanionModuleInput {
  /** Source file the hosts are declared in, for the header */
  sourceFileName: string;
  /** Import specifier of the source module, as seen from the companion module */
  hostModule: string;
  /** Import specifier of the runtime helpers */
  runtimeModule: string;
  contracts: readonly EqualityContract[];
  tables: readonly EnumerationTable[];
}

interface HostImport {
  readonly name: string;
  readonly defaultExport: boolean;
}

function hostImportLine(hosts: readonly HostImport[], specifier: string): string | undefined {
  const named = [...new Set(hosts.filter((h) => !h.defaultExport).map((h) => h.name))].sort();
  const defaultHost = hosts.find((h) => h.defaultExport);
  const clauses: string[] = [];
  if (defaultHost) clauses.push(defaultHost.name);
  if (named.length > 0) clauses.push(`{ ${named.join(", ")} }`);
  if (clauses.length === 0) return undefined;
  return `import ${clauses.join(", ")} from ${JSON.stringify(specifier)};`;
}

/**
 * Source of the companion module, or undefined when nothing is generated
 * for the file.
 */
export function emitCompanionModule(input: CompanionModuleInput): string | undefined {
  const ctx = createEmitContext();
  const emitted: { host: HostImport; code: string }[] = [];

  for (const contract of input.contracts) {
    const code = EqualityEmitter.emit(ctx, contract);
    if (code) emitted.push({ host: contract.host, code });
  }
  for (const table of input.tables) {
    emitted.push({ host: table.host, code: EnumerationEmitter.emit(ctx, table) });
  }
  if (emitted.length === 0) return undefined;

  const typeOnly = new Set(["EnumerationLookup"]);
  const runtimeNames = ctx.runtime.list().map((name) => (typeOnly.has(name) ? `type ${name}` : name));

  const header = [
    `// Generated by valuekit from ${input.sourceFileName}. Do not edit.`,
    "",
    hostImportLine(
      emitted.map((e) => e.host),
      input.hostModule
    ),
    `import { ${runtimeNames.join(", ")} } from ${JSON.stringify(input.runtimeModule)};`,
  ].filter((line): line is string => line !== undefined);

  return `${header.join("\n")}\n\n${emitted.map((e) => e.code).join("\n")}`;
}
