// pattern: Functional Core
import { describe, expect, it } from "vitest";

import { checkEnvironment } from "./env-checks.js";

describe("checkEnvironment", () => {
  it("should pass a fully configured environment", () => {
    const section = checkEnvironment({
      SCCACHE_NO_DAEMON: "1",
      SCCACHE_DIST_AUTH: "token",
      SCCACHE_DIST_TOKEN: "test-secret-token",
      SCCACHE_SCHEDULER_URL: "http://10.0.0.5:10600",
    });

    expect(section.counted).toBe(true);
    expect(section.checks).toEqual([
      { label: "SCCACHE_NO_DAEMON", passed: true, value: "1" },
      { label: "SCCACHE_DIST_AUTH", passed: true, value: "token" },
      {
        label: "SCCACHE_DIST_TOKEN is set",
        passed: true,
        value: "test…(17 chars)",
      },
      {
        label: "SCCACHE_SCHEDULER_URL is set",
        passed: true,
        value: "http://10.0.0.5:10600",
      },
    ]);
    expect(section.notes).toEqual([]);
  });

  it("should fail unset and mismatched variables", () => {
    const section = checkEnvironment({
      SCCACHE_NO_DAEMON: "0",
      SCCACHE_DIST_TOKEN: "",
    });

    expect(section.checks).toEqual([
      { label: "SCCACHE_NO_DAEMON", passed: false, value: "0" },
      { label: "SCCACHE_DIST_AUTH", passed: false },
      { label: "SCCACHE_DIST_TOKEN is set", passed: false, value: "" },
      { label: "SCCACHE_SCHEDULER_URL is set", passed: false },
    ]);
  });

  it("should list optional variables as notes", () => {
    const section = checkEnvironment({
      SCCACHE_LOG: "debug",
      SCCACHE_CONF: "/etc/sccache.toml",
    });

    expect(section.notes).toEqual([
      "Optional: SCCACHE_LOG=debug",
      "Optional: SCCACHE_CONF=/etc/sccache.toml",
    ]);
  });
});
