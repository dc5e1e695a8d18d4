// pattern: Functional Core
import { parse as parseToml } from "@iarna/toml";
import { readFile } from "node:fs/promises";

import { type Static, Type } from "@sinclair/typebox";

import { compileValidator } from "../utils/ajv.js";
import { FileSystemError, ValidationError } from "../utils/errors.js";

// Only the keys the doctor inspects are described; sccache accepts many more
export const SccacheClientConfig = Type.Object({
  dist: Type.Optional(
    Type.Object({
      scheduler_url: Type.Optional(Type.String()),
      auth: Type.Optional(
        Type.Object({
          type: Type.Optional(Type.String()),
          token: Type.Optional(Type.String()),
        })
      ),
    })
  ),
});
export type SccacheClientConfig = Static<typeof SccacheClientConfig>;

const validateSccacheClientConfig = compileValidator<SccacheClientConfig>(
  SccacheClientConfig,
  "sccache config"
);

/**
 * Parse the TOML text of an sccache client config
 */
export function parseSccacheClientConfig(content: string): SccacheClientConfig {
  let data: unknown;
  try {
    data = parseToml(content);
  } catch (error) {
    throw new ValidationError(
      `sccache config is not valid TOML: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return validateSccacheClientConfig(data);
}

export interface LoadedClientConfig {
  path: string;
  config: SccacheClientConfig;
}

/**
 * Read and parse the sccache client config file.
 * A missing file raises FileSystemError with operation "find".
 */
export async function loadSccacheClientConfig(
  path: string
): Promise<LoadedClientConfig> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (error) {
    const code =
      error instanceof Error && "code" in error ? error.code : undefined;
    if (code === "ENOENT") {
      throw new FileSystemError(`Config file not found at ${path}`, "find", path);
    }
    throw new FileSystemError(
      `Cannot read config file ${path}: ${error instanceof Error ? error.message : String(error)}`,
      "read",
      path
    );
  }

  return { path, config: parseSccacheClientConfig(content) };
}
