// pattern: Functional Core
import { describe, expect, it } from "vitest";

import {
  checkContainer,
  type ContainerCheckInput,
  parseBwrapVersion,
  tokenExportHints,
} from "./container-checks.js";

import type { ContainerExecResult, ContainerProbe } from "./container-probe.js";

class FakeContainerProbe implements ContainerProbe {
  readonly commands: string[][] = [];

  constructor(
    private readonly running: boolean,
    private readonly responses: Record<string, ContainerExecResult>
  ) {}

  isRunning(): Promise<boolean> {
    return Promise.resolve(this.running);
  }

  exec(_name: string, cmd: readonly string[]): Promise<ContainerExecResult> {
    this.commands.push([...cmd]);
    return Promise.resolve(
      this.responses[cmd[0] ?? ""] ?? { success: false, output: "no response" }
    );
  }
}

const healthy: Record<string, ContainerExecResult> = {
  cat: { success: true, output: "test-secret-token" },
  bwrap: { success: true, output: "bubblewrap 0.11.0" },
  sh: { success: true, output: "OK" },
};

const input: ContainerCheckInput = {
  containerName: "sccache-dist",
  tokenFile: "/root/.sccache_dist_token",
  env: { SCCACHE_DIST_TOKEN: "test-secret-token" },
  clientConfig: {
    kind: "loaded",
    path: "/c",
    config: { dist: { auth: { type: "token", token: "test-secret-token" } } },
  },
};

describe("parseBwrapVersion", () => {
  it.each([
    ["bubblewrap 0.11.0", "0.11.0"],
    ["bubblewrap 0.4.1\n", "0.4.1"],
    ["0.8", "0.8.0"],
    ["not a version", "0.0.0"],
    ["", "0.0.0"],
  ])("should read %j as %s", (output, expected) => {
    expect(parseBwrapVersion(output)).toBe(expected);
  });
});

describe("checkContainer", () => {
  it("should skip in-container checks when the container is not running", async () => {
    const probe = new FakeContainerProbe(false, healthy);

    const outcome = await checkContainer(probe, input);

    expect(outcome.section.counted).toBe(false);
    expect(outcome.section.checks).toEqual([
      { label: "Docker container 'sccache-dist' is running", passed: false },
    ]);
    expect(outcome.section.notes).toEqual([
      "Skipping in-container checks because container is not running.",
    ]);
    expect(outcome.token).toBeUndefined();
    expect(outcome.tokenError).toBe("Container 'sccache-dist' is not running.");
    expect(probe.commands).toEqual([]);
  });

  it("should pass a healthy container", async () => {
    const probe = new FakeContainerProbe(true, healthy);

    const outcome = await checkContainer(probe, input);

    expect(outcome.token).toBe("test-secret-token");
    expect(outcome.section.checks).toEqual([
      { label: "Docker container 'sccache-dist' is running", passed: true },
      {
        label: "Retrieve /root/.sccache_dist_token from container",
        passed: true,
        value: "test…(17 chars)",
      },
      {
        label: "Container token matches local SCCACHE_DIST_TOKEN",
        passed: true,
      },
      { label: "Container token matches sccache config token", passed: true },
      {
        label: "Bubblewrap version >= 0.3.0 in container",
        passed: true,
        value: "bubblewrap 0.11.0",
      },
      {
        label: "Toolchain cache directory is accessible inside container",
        passed: true,
      },
    ]);
    expect(probe.commands).toEqual([
      ["cat", "/root/.sccache_dist_token"],
      ["bwrap", "--version"],
      ["sh", "-c", "test -w /tmp/toolchains && echo OK || echo NO"],
    ]);
  });

  it("should fail an old bubblewrap and an unwritable toolchain dir", async () => {
    const probe = new FakeContainerProbe(true, {
      ...healthy,
      bwrap: { success: true, output: "bubblewrap 0.2.1" },
      sh: { success: true, output: "NO" },
    });

    const outcome = await checkContainer(probe, input);
    const byLabel = new Map(outcome.section.checks.map(c => [c.label, c]));

    expect(byLabel.get("Bubblewrap version >= 0.3.0 in container")).toEqual({
      label: "Bubblewrap version >= 0.3.0 in container",
      passed: false,
      value: "bubblewrap 0.2.1",
    });
    expect(
      byLabel.get("Toolchain cache directory is accessible inside container")
        ?.passed
    ).toBe(false);
  });

  it("should report a missing bwrap", async () => {
    const probe = new FakeContainerProbe(true, {
      ...healthy,
      bwrap: { success: false, output: "Error code 127 running bwrap" },
    });

    const outcome = await checkContainer(probe, input);

    expect(outcome.section.checks).toContainEqual({
      label: "Bubblewrap is installed in container",
      passed: false,
      value: "Error code 127 running bwrap",
    });
  });

  it("should compare the container token with env and config", async () => {
    const probe = new FakeContainerProbe(true, healthy);

    const outcome = await checkContainer(probe, {
      ...input,
      env: {},
      clientConfig: { kind: "missing", path: "/home/dev/.config/sccache/config" },
    });
    const labels = outcome.section.checks.map(c => [c.label, c.passed, c.value]);

    expect(labels).toContainEqual([
      "Container token matches local SCCACHE_DIST_TOKEN",
      false,
      undefined,
    ]);
    expect(labels).toContainEqual([
      "Local sccache config file found for token check",
      false,
      "/home/dev/.config/sccache/config",
    ]);
  });

  it("should record why the token could not be read", async () => {
    const probe = new FakeContainerProbe(true, {
      ...healthy,
      cat: { success: false, output: "Error code 1 running cat: no such file" },
    });

    const outcome = await checkContainer(probe, input);

    expect(outcome.token).toBeUndefined();
    expect(outcome.tokenError).toBe("Error code 1 running cat: no such file");
    expect(outcome.section.checks[1]).toEqual({
      label: "Retrieve /root/.sccache_dist_token from container",
      passed: false,
      value: "Error code 1 running cat: no such file",
    });
  });
});

describe("tokenExportHints", () => {
  it("should suggest reading the token from the container", () => {
    const section = tokenExportHints(
      {
        section: { title: "", counted: false, checks: [], notes: [] },
        token: "test-secret-token",
      },
      input
    );

    expect(section.counted).toBe(false);
    expect(section.notes).toEqual([
      "Container auth token: test…(17 chars)",
      "Consider adding the following to your shell profile:",
      'export SCCACHE_DIST_TOKEN="$(docker exec sccache-dist cat /root/.sccache_dist_token)"',
    ]);
  });

  it("should explain a missing token", () => {
    const section = tokenExportHints(
      {
        section: { title: "", counted: false, checks: [], notes: [] },
        tokenError: "Container 'sccache-dist' is not running.",
      },
      input
    );

    expect(section.notes).toEqual([
      "Failed to retrieve auth token from container: Container 'sccache-dist' is not running.",
    ]);
  });
});
