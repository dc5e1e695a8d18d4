// pattern: Mixed (unavoidable)
// Host-side tools: sccache-dist, docker and the sccache client

import { createCommand, type CommandProbeResult } from "../utils/command/index.js";

import { check, type CheckSection } from "./types.js";

import type { Logger } from "pino";

export type ToolProbe = (
  command: string,
  args: readonly string[],
  timeoutMs?: number
) => Promise<CommandProbeResult>;

export const SCCACHE_STATUS_TIMEOUT_MS = 10_000;

export function createToolProbe(logger: Logger): ToolProbe {
  return (command, args, timeoutMs) => {
    const builder = createCommand(command, logger).addArgs(args);
    if (timeoutMs !== undefined) {
      builder.timeout(timeoutMs);
    }
    return builder.probe();
  };
}

function describeFailure(result: CommandProbeResult): string {
  return (
    result.stderr ||
    result.error ||
    (result.exitCode === undefined
      ? "command failed"
      : `exit code ${result.exitCode}`)
  );
}

export async function checkLocalInstallation(
  probe: ToolProbe
): Promise<CheckSection> {
  const [dist, processes, docker] = await Promise.all([
    probe("sccache-dist", ["--version"]),
    probe("pgrep", ["-f", "sccache-dist"]),
    probe("docker", ["--version"]),
  ]);

  const running = processes.success && processes.stdout !== "";

  return {
    title: "Local sccache-dist installation and processes",
    counted: false,
    checks: [
      check("sccache-dist is installed", dist.success),
      check(
        "sccache-dist processes are running",
        running,
        running ? undefined : describeFailure(processes)
      ),
      check(
        "Docker is installed",
        docker.success,
        docker.success ? docker.stdout : describeFailure(docker)
      ),
    ],
    notes: [],
  };
}

/**
 * Output of `sccache <flag>` with stderr folded in, as the user would see it
 */
export async function sccacheOutput(
  probe: ToolProbe,
  flag: string
): Promise<string> {
  const result = await probe("sccache", [flag], SCCACHE_STATUS_TIMEOUT_MS);
  if (result.timedOut) {
    return "Timeout expired";
  }
  if (result.success || result.exitCode !== undefined) {
    return [result.stdout, result.stderr].filter(Boolean).join("\n");
  }
  return `Error running sccache ${flag}: ${result.error ?? "unknown error"}`;
}

export async function collectDistStatus(
  probe: ToolProbe
): Promise<CheckSection> {
  const [status, auth] = await Promise.all([
    sccacheOutput(probe, "--dist-status"),
    sccacheOutput(probe, "--dist-auth"),
  ]);

  return {
    title: "sccache distributed status",
    counted: false,
    checks: [],
    notes: [
      "sccache --dist-status:",
      status,
      "sccache --dist-auth:",
      auth,
    ],
  };
}
