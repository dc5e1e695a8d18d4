// pattern: Functional Core
import { describe, expect, it } from "vitest";

import { checkClientConfig } from "./config-checks.js";

const env = {
  SCCACHE_DIST_TOKEN: "test-secret",
  SCCACHE_SCHEDULER_URL: "http://10.0.0.5:10600",
};

describe("checkClientConfig", () => {
  it("should pass a config that agrees with the environment", () => {
    const section = checkClientConfig(
      {
        kind: "loaded",
        path: "/home/dev/.config/sccache/config",
        config: {
          dist: {
            scheduler_url: "http://10.0.0.5:10600",
            auth: { type: "token", token: "test-secret" },
          },
        },
      },
      env
    );

    expect(section.counted).toBe(true);
    expect(section.notes).toEqual([
      "Using config file: /home/dev/.config/sccache/config",
    ]);
    expect(section.checks).toEqual([
      { label: "scheduler_url present", passed: true },
      { label: "auth type == token", passed: true },
      { label: "env SCCACHE_DIST_TOKEN matches config token", passed: true },
      {
        label: "env SCCACHE_SCHEDULER_URL matches config scheduler_url",
        passed: true,
      },
    ]);
  });

  it("should fail each disagreement separately", () => {
    const section = checkClientConfig(
      {
        kind: "loaded",
        path: "/c",
        config: { dist: { auth: { type: "mozilla", token: "other" } } },
      },
      env
    );

    expect(section.checks.map(c => c.passed)).toEqual([
      false,
      false,
      false,
      false,
    ]);
  });

  it("should treat a missing token on both sides as matching", () => {
    const section = checkClientConfig(
      { kind: "loaded", path: "/c", config: {} },
      {}
    );

    expect(section.checks.map(c => [c.label, c.passed])).toEqual([
      ["scheduler_url present", false],
      ["auth type == token", false],
      ["env SCCACHE_DIST_TOKEN matches config token", true],
      ["env SCCACHE_SCHEDULER_URL matches config scheduler_url", true],
    ]);
  });

  it("should give a single failing check for a missing file", () => {
    const section = checkClientConfig({ kind: "missing", path: "/c" }, env);

    expect(section.checks).toEqual([
      { label: "Config file found", passed: false, value: "/c" },
    ]);
  });

  it("should give a single failing check for an unreadable file", () => {
    const section = checkClientConfig(
      { kind: "invalid", path: "/c", message: "sccache config is not valid TOML: x" },
      env
    );

    expect(section.checks).toEqual([
      {
        label: "Config file readable",
        passed: false,
        value: "sccache config is not valid TOML: x",
      },
    ]);
  });
});
