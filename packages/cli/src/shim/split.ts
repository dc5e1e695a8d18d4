// pattern: Functional Core

import { BWRAP_OPTION_ARITY, type ArityTable } from "./arity-table.js";

export const END_OF_OPTIONS = "--";

/**
 * Which rule ended the scan:
 * - "separator": a literal `--` was found
 * - "command": the first token not starting with `--` was found
 * - "exhausted": the input ran out while still reading options
 */
export type SplitTermination = "separator" | "command" | "exhausted";

export interface SplitResult {
  /** Sandbox flags and the arguments they consumed, including a `--` separator */
  discarded: string[];
  /** The command to run, possibly empty */
  command: string[];
  terminatedBy: SplitTermination;
}

/**
 * The version probe is only recognized as the sole argument
 */
export function isVersionProbe(argv: readonly string[]): boolean {
  return argv.length === 1 && argv[0] === "--version";
}

/**
 * Partition a sandbox command line into the flags to discard and the
 * command to run.
 *
 * Known options consume their fixed number of arguments (fewer if the input
 * ends first). Unknown `--` options are assumed to take no argument, so an
 * unknown option that does take one leaves its value to be read as the
 * start of the command.
 */
export function splitSandboxArgs(
  argv: readonly string[],
  table: ArityTable = BWRAP_OPTION_ARITY
): SplitResult {
  const discarded: string[] = [];
  let cursor = 0;

  while (cursor < argv.length) {
    const token = argv[cursor];
    if (token === undefined) break;

    if (token === END_OF_OPTIONS) {
      discarded.push(token);
      return {
        discarded,
        command: argv.slice(cursor + 1),
        terminatedBy: "separator",
      };
    }

    const arity = table.get(token);
    if (arity !== undefined) {
      const end = Math.min(cursor + 1 + arity, argv.length);
      discarded.push(...argv.slice(cursor, end));
      cursor = end;
      continue;
    }

    if (token.startsWith("--")) {
      discarded.push(token);
      cursor += 1;
      continue;
    }

    return {
      discarded,
      command: argv.slice(cursor),
      terminatedBy: "command",
    };
  }

  return { discarded, command: [], terminatedBy: "exhausted" };
}
