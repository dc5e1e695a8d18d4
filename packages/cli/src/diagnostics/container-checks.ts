// pattern: Functional Core
// Checks run inside the box container through a ContainerProbe

import { coerce as semverCoerce, gte as semverGte } from "semver";

import { maskToken } from "./redact.js";
import { check, type CheckResult, type CheckSection } from "./types.js";

import type { ClientConfigState } from "./config-checks.js";
import type { ContainerProbe } from "./container-probe.js";

export const MIN_BWRAP_VERSION = "0.3.0";

const TOOLCHAIN_DIR_CHECK = [
  "sh",
  "-c",
  "test -w /tmp/toolchains && echo OK || echo NO",
] as const;

export interface ContainerCheckInput {
  containerName: string;
  tokenFile: string;
  env: NodeJS.ProcessEnv;
  clientConfig: ClientConfigState;
}

export interface ContainerCheckOutcome {
  section: CheckSection;
  /** Token read from the container */
  token?: string;
  /** Why the token could not be read */
  tokenError?: string;
}

/**
 * Version reported by `bwrap --version`, normalised by semver.
 * Unparseable output yields 0.0.0.
 */
export function parseBwrapVersion(output: string): string {
  let line = output.trim();
  if (line.startsWith("bubblewrap ")) {
    line = line.slice("bubblewrap ".length);
  }
  return semverCoerce(line)?.version ?? "0.0.0";
}

function tokenChecks(
  token: string,
  input: ContainerCheckInput
): CheckResult[] {
  const { clientConfig } = input;
  const results = [
    check(
      "Container token matches local SCCACHE_DIST_TOKEN",
      token === (input.env["SCCACHE_DIST_TOKEN"] ?? "")
    ),
  ];

  if (clientConfig.kind === "loaded") {
    results.push(
      check(
        "Container token matches sccache config token",
        (clientConfig.config.dist?.auth?.token ?? "") === token
      )
    );
  } else if (clientConfig.kind === "missing") {
    results.push(
      check(
        "Local sccache config file found for token check",
        false,
        clientConfig.path
      )
    );
  } else {
    results.push(
      check(
        "Local sccache config file readable for token check",
        false,
        clientConfig.message
      )
    );
  }
  return results;
}

export async function checkContainer(
  probe: ContainerProbe,
  input: ContainerCheckInput
): Promise<ContainerCheckOutcome> {
  const { containerName: name, tokenFile } = input;
  const section: CheckSection = {
    title: "Container-based checks (inside Docker)",
    counted: false,
    checks: [],
    notes: [],
  };

  const running = await probe.isRunning(name);
  section.checks.push(
    check(`Docker container '${name}' is running`, running)
  );
  if (!running) {
    section.notes.push(
      "Skipping in-container checks because container is not running."
    );
    return {
      section,
      tokenError: `Container '${name}' is not running.`,
    };
  }

  const [tokenResult, bwrap, toolchains] = await Promise.all([
    probe.exec(name, ["cat", tokenFile]),
    probe.exec(name, ["bwrap", "--version"]),
    probe.exec(name, TOOLCHAIN_DIR_CHECK),
  ]);

  const retrieveLabel = `Retrieve ${tokenFile} from container`;
  const outcome: ContainerCheckOutcome = { section };
  if (tokenResult.success) {
    outcome.token = tokenResult.output;
    section.checks.push(
      check(retrieveLabel, true, maskToken(tokenResult.output)),
      ...tokenChecks(tokenResult.output, input)
    );
  } else {
    outcome.tokenError = tokenResult.output;
    section.checks.push(check(retrieveLabel, false, tokenResult.output));
  }

  if (bwrap.success) {
    section.checks.push(
      check(
        `Bubblewrap version >= ${MIN_BWRAP_VERSION} in container`,
        semverGte(parseBwrapVersion(bwrap.output), MIN_BWRAP_VERSION),
        bwrap.output
      )
    );
  } else {
    section.checks.push(
      check("Bubblewrap is installed in container", false, bwrap.output)
    );
  }

  const toolchainLabel =
    "Toolchain cache directory is accessible inside container";
  section.checks.push(
    toolchains.success
      ? check(toolchainLabel, toolchains.output.trim() === "OK")
      : check(toolchainLabel, false, toolchains.output)
  );

  return outcome;
}

/**
 * Shell exports that keep the client token in step with the container
 */
export function tokenExportHints(
  outcome: ContainerCheckOutcome,
  input: Pick<ContainerCheckInput, "containerName" | "tokenFile">
): CheckSection {
  const notes =
    outcome.token === undefined
      ? [
          `Failed to retrieve auth token from container: ${outcome.tokenError ?? "unknown error"}`,
        ]
      : [
          `Container auth token: ${maskToken(outcome.token)}`,
          "Consider adding the following to your shell profile:",
          `export SCCACHE_DIST_TOKEN="$(docker exec ${input.containerName} cat ${input.tokenFile})"`,
        ];

  return {
    title: "Configs from the container",
    counted: false,
    checks: [],
    notes,
  };
}
