// pattern: Functional Core
// The bubblewrap option arity table: how many trailing arguments each
// recognized flag consumes. Loaded once from the packaged data file.

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { type Static, Type } from "@sinclair/typebox";

import { compileValidator } from "../utils/ajv.js";
import { FileSystemError, ValidationError } from "../utils/errors.js";

export type Arity = 0 | 1 | 2 | 3;

export type ArityTable = ReadonlyMap<string, Arity>;

const OptionName = Type.String({ pattern: "^--[a-z0-9][a-z0-9-]*$" });

export const ArityTableFile = Type.Object(
  {
    "0": Type.Array(OptionName),
    "1": Type.Array(OptionName),
    "2": Type.Array(OptionName),
    "3": Type.Array(OptionName),
  },
  { additionalProperties: false }
);
export type ArityTableFile = Static<typeof ArityTableFile>;

const ARITIES: readonly Arity[] = [0, 1, 2, 3];

const validateArityTableFile = compileValidator<ArityTableFile>(
  ArityTableFile,
  "Option arity table"
);

/** Location of the table shipped with the package (src/ and dist/ sit at the same depth) */
export const DEFAULT_ARITY_TABLE_PATH = fileURLToPath(
  new URL("../../data/bwrap-options.json", import.meta.url)
);

/**
 * Build the lookup map from the grouped file layout.
 * Every option name may appear once across all groups.
 */
export function buildArityTable(data: unknown): ArityTable {
  const file = validateArityTableFile(data);
  const table = new Map<string, Arity>();
  const duplicates: string[] = [];

  for (const arity of ARITIES) {
    for (const name of file[arity]) {
      if (table.has(name)) {
        duplicates.push(name);
        continue;
      }
      table.set(name, arity);
    }
  }

  if (duplicates.length > 0) {
    throw new ValidationError(
      `Option arity table lists options more than once: ${duplicates.join(", ")}`,
      duplicates.map(name => `${name}: duplicate option name`)
    );
  }

  return table;
}

/**
 * Read and validate an arity table file
 */
export function loadArityTable(
  path: string = DEFAULT_ARITY_TABLE_PATH
): ArityTable {
  let content: string;
  try {
    content = readFileSync(path, "utf8");
  } catch (error) {
    throw new FileSystemError(
      `Cannot read option arity table ${path}: ${error instanceof Error ? error.message : String(error)}`,
      "read",
      path
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ValidationError(
      `Option arity table ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return buildArityTable(data);
}

/** The bubblewrap option table, built once per process */
export const BWRAP_OPTION_ARITY: ArityTable = loadArityTable();
