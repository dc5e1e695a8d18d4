import { describe, expect, it } from "vitest";

import {
  checkLocalInstallation,
  collectDistStatus,
  SCCACHE_STATUS_TIMEOUT_MS,
  sccacheOutput,
  type ToolProbe,
} from "./local-checks.js";

import type { CommandProbeResult } from "../utils/command/index.js";

function ok(stdout: string, stderr = ""): CommandProbeResult {
  return { success: true, stdout, stderr, exitCode: 0, timedOut: false };
}

function exited(exitCode: number, stderr = "", stdout = ""): CommandProbeResult {
  return { success: false, stdout, stderr, exitCode, timedOut: false };
}

function notFound(command: string): CommandProbeResult {
  return {
    success: false,
    stdout: "",
    stderr: "",
    timedOut: false,
    error: `spawn ${command} ENOENT`,
  };
}

interface ProbeCall {
  command: string;
  args: string[];
  timeoutMs: number | undefined;
}

function fakeProbe(responses: Record<string, CommandProbeResult>): {
  probe: ToolProbe;
  calls: ProbeCall[];
} {
  const calls: ProbeCall[] = [];
  const probe: ToolProbe = (command, args, timeoutMs) => {
    calls.push({ command, args: [...args], timeoutMs });
    const key = [command, ...args].join(" ");
    return Promise.resolve(responses[key] ?? notFound(command));
  };
  return { probe, calls };
}

describe("checkLocalInstallation", () => {
  it("should pass when sccache-dist runs and docker is installed", async () => {
    const { probe } = fakeProbe({
      "sccache-dist --version": ok("sccache-dist 0.8.1"),
      "pgrep -f sccache-dist": ok("1234\n1240"),
      "docker --version": ok("Docker version 27.0.1"),
    });

    const section = await checkLocalInstallation(probe);

    expect(section.title).toBe("Local sccache-dist installation and processes");
    expect(section.counted).toBe(false);
    expect(section.checks).toEqual([
      { label: "sccache-dist is installed", passed: true },
      { label: "sccache-dist processes are running", passed: true },
      {
        label: "Docker is installed",
        passed: true,
        value: "Docker version 27.0.1",
      },
    ]);
  });

  it("should describe why each tool check failed", async () => {
    const { probe } = fakeProbe({
      "pgrep -f sccache-dist": exited(1),
    });

    const section = await checkLocalInstallation(probe);

    expect(section.checks).toEqual([
      { label: "sccache-dist is installed", passed: false },
      {
        label: "sccache-dist processes are running",
        passed: false,
        value: "exit code 1",
      },
      {
        label: "Docker is installed",
        passed: false,
        value: "spawn docker ENOENT",
      },
    ]);
  });

  it("should prefer stderr when describing a failure", async () => {
    const { probe } = fakeProbe({
      "pgrep -f sccache-dist": exited(2, "pgrep: invalid option"),
    });

    const section = await checkLocalInstallation(probe);

    expect(section.checks[1]).toEqual({
      label: "sccache-dist processes are running",
      passed: false,
      value: "pgrep: invalid option",
    });
  });

  it("should not count a successful pgrep with no output as running", async () => {
    const { probe } = fakeProbe({ "pgrep -f sccache-dist": ok("") });

    const section = await checkLocalInstallation(probe);

    expect(section.checks[1]).toEqual({
      label: "sccache-dist processes are running",
      passed: false,
      value: "exit code 0",
    });
  });
});

describe("sccacheOutput", () => {
  it("should join stdout and stderr", async () => {
    const { probe, calls } = fakeProbe({
      "sccache --dist-status": ok('{"SchedulerStatus":[]}', "warning: slow"),
    });

    await expect(sccacheOutput(probe, "--dist-status")).resolves.toBe(
      '{"SchedulerStatus":[]}\nwarning: slow'
    );
    expect(calls).toEqual([
      {
        command: "sccache",
        args: ["--dist-status"],
        timeoutMs: SCCACHE_STATUS_TIMEOUT_MS,
      },
    ]);
  });

  it("should keep the output of a non-zero exit", async () => {
    const { probe } = fakeProbe({
      "sccache --dist-auth": exited(2, "no scheduler configured"),
    });

    await expect(sccacheOutput(probe, "--dist-auth")).resolves.toBe(
      "no scheduler configured"
    );
  });

  it("should report a timeout", async () => {
    const { probe } = fakeProbe({
      "sccache --dist-status": {
        success: false,
        stdout: "",
        stderr: "",
        timedOut: true,
        error: "Command timed out after 10000 milliseconds",
      },
    });

    await expect(sccacheOutput(probe, "--dist-status")).resolves.toBe(
      "Timeout expired"
    );
  });

  it("should report a command that could not start", async () => {
    const { probe } = fakeProbe({});

    await expect(sccacheOutput(probe, "--dist-status")).resolves.toBe(
      "Error running sccache --dist-status: spawn sccache ENOENT"
    );
  });
});

describe("collectDistStatus", () => {
  it("should list both outputs under their headings", async () => {
    const { probe } = fakeProbe({
      "sccache --dist-status": ok("status output"),
      "sccache --dist-auth": ok("auth output"),
    });

    const section = await collectDistStatus(probe);

    expect(section).toEqual({
      title: "sccache distributed status",
      counted: false,
      checks: [],
      notes: [
        "sccache --dist-status:",
        "status output",
        "sccache --dist-auth:",
        "auth output",
      ],
    });
  });
});
