// pattern: Functional Core
// Human- and machine-readable renderings for the shim inspector

import type { Arity, ArityTable } from "./arity-table.js";
import type { SplitResult } from "./split.js";

export type InspectFormat = "nice" | "json";

function quoteToken(token: string): string {
  return token === "" || /\s|"/.test(token) ? JSON.stringify(token) : token;
}

function joinTokens(tokens: readonly string[]): string {
  return tokens.length === 0 ? "(none)" : tokens.map(quoteToken).join(" ");
}

export function formatSplitResult(
  result: SplitResult,
  format: InspectFormat
): string {
  if (format === "json") {
    return JSON.stringify(
      {
        discarded: result.discarded,
        command: result.command,
        terminatedBy: result.terminatedBy,
      },
      null,
      2
    );
  }

  return [
    `Discarded (ended by ${result.terminatedBy}): ${joinTokens(result.discarded)}`,
    `Command: ${joinTokens(result.command)}`,
  ].join("\n");
}

/**
 * One `name arity` line per option, sorted by name
 */
export function formatArityTable(table: ArityTable, arity?: Arity): string[] {
  return [...table]
    .filter(([, value]) => arity === undefined || value === arity)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([name, value]) => `${name} ${value}`);
}
