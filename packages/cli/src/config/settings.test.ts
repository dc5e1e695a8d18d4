// pattern: Functional Core
import { resolve } from "node:path";

import { describe, expect, it } from "vitest";

import { ConfigurationError } from "../utils/errors.js";

import {
  defaultClientConfigPath,
  parseIntegerSetting,
  parsePort,
  resolveSettings,
} from "./settings.js";

describe("resolveSettings", () => {
  it("should use defaults for an empty environment", () => {
    expect(resolveSettings({}, "/home/dev")).toEqual({
      containerName: "sccache-dist",
      builderPort: 10501,
      schedulerPort: 10600,
      tokenFile: "/root/.sccache_dist_token",
      schedulerConfig: "/root/scheduler.conf",
      serverConfig: "/root/server.conf",
      schedulerStartupDelayMs: 2000,
      sccacheLog: "debug",
      clientConfigPath: "/home/dev/.config/sccache/config",
    });
  });

  it("should read overrides from the environment", () => {
    const settings = resolveSettings(
      {
        SCCACHE_CONTAINER_NAME: "build-box",
        SCCACHE_BUILDER_PORT: "20501",
        SCCACHE_SCHEDULER_PORT: "20600",
        SCCACHE_BOX_TOKEN_FILE: "/run/token",
        SCCACHE_BOX_SCHEDULER_CONFIG: "/etc/sched.conf",
        SCCACHE_BOX_SERVER_CONFIG: "/etc/server.conf",
        SCCACHE_BOX_STARTUP_DELAY_MS: "0",
        SCCACHE_LOG: "info",
        SCCACHE_CONF: "/etc/sccache.toml",
      },
      "/home/dev"
    );

    expect(settings).toEqual({
      containerName: "build-box",
      builderPort: 20501,
      schedulerPort: 20600,
      tokenFile: "/run/token",
      schedulerConfig: "/etc/sched.conf",
      serverConfig: "/etc/server.conf",
      schedulerStartupDelayMs: 0,
      sccacheLog: "info",
      clientConfigPath: "/etc/sccache.toml",
    });
  });

  it("should resolve a relative SCCACHE_CONF against the working directory", () => {
    const settings = resolveSettings({ SCCACHE_CONF: "sccache.toml" }, "/h");

    expect(settings.clientConfigPath).toBe(resolve("sccache.toml"));
  });

  it("should ignore empty values", () => {
    const settings = resolveSettings(
      { SCCACHE_CONTAINER_NAME: "", SCCACHE_BUILDER_PORT: "  " },
      "/h"
    );

    expect(settings.containerName).toBe("sccache-dist");
    expect(settings.builderPort).toBe(10501);
  });

  it("should reject a non-numeric port", () => {
    expect(() =>
      resolveSettings({ SCCACHE_BUILDER_PORT: "http" }, "/h")
    ).toThrow(
      expect.objectContaining({
        message: 'SCCACHE_BUILDER_PORT must be a whole number, got "http"',
        variable: "SCCACHE_BUILDER_PORT",
      })
    );
    expect(() =>
      resolveSettings({ SCCACHE_BUILDER_PORT: "http" }, "/h")
    ).toThrow(ConfigurationError);
  });

  it("should reject an out-of-range port", () => {
    expect(() =>
      resolveSettings({ SCCACHE_SCHEDULER_PORT: "70000" }, "/h")
    ).toThrow(
      "SCCACHE_SCHEDULER_PORT must be between 1 and 65535, got 70000"
    );
  });

  it("should name the variable on the error", () => {
    try {
      resolveSettings({ SCCACHE_BOX_STARTUP_DELAY_MS: "-5" }, "/h");
      expect.fail("expected a ConfigurationError");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ variable: "SCCACHE_BOX_STARTUP_DELAY_MS" });
    }
  });
});

describe("parseIntegerSetting", () => {
  const range = { min: 0, max: 10 };

  it("should accept digits with surrounding whitespace", () => {
    expect(parseIntegerSetting(" 7 ", "N", range)).toBe(7);
  });

  it.each(["1.5", "1e3", "0x10", "", "+3"])("should reject %j", value => {
    expect(() => parseIntegerSetting(value, "N", range)).toThrow(
      ConfigurationError
    );
  });

  it("should reject values above the maximum", () => {
    expect(() => parseIntegerSetting("11", "N", range)).toThrow(
      "N must be between 0 and 10, got 11"
    );
  });
});

describe("parsePort", () => {
  it("should accept the full port range", () => {
    expect(parsePort("1", "P")).toBe(1);
    expect(parsePort("65535", "P")).toBe(65535);
  });

  it("should reject port 0", () => {
    expect(() => parsePort("0", "P")).toThrow(
      "P must be between 1 and 65535, got 0"
    );
  });
});

describe("defaultClientConfigPath", () => {
  it("should live under ~/.config/sccache", () => {
    expect(defaultClientConfigPath("/home/dev")).toBe(
      "/home/dev/.config/sccache/config"
    );
  });
});
