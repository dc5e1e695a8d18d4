// pattern: Functional Core
// Resolve box settings from environment variables with defaults

import { homedir } from "node:os";
import { join, resolve } from "node:path";

import { ConfigurationError } from "../utils/errors.js";

export interface BoxSettings {
  /** Name of the container running the scheduler and builder */
  containerName: string;
  /** Port the builder (sccache-dist server) listens on */
  builderPort: number;
  /** Port the scheduler listens on */
  schedulerPort: number;
  /** File inside the container holding the shared auth token */
  tokenFile: string;
  schedulerConfig: string;
  serverConfig: string;
  /** Time the scheduler gets to bind before the builder starts */
  schedulerStartupDelayMs: number;
  /** SCCACHE_LOG value handed to the scheduler and builder */
  sccacheLog: string;
  /** sccache client config on the developer machine */
  clientConfigPath: string;
}

export const DEFAULT_SETTINGS = {
  containerName: "sccache-dist",
  builderPort: 10501,
  schedulerPort: 10600,
  tokenFile: "/root/.sccache_dist_token",
  schedulerConfig: "/root/scheduler.conf",
  serverConfig: "/root/server.conf",
  schedulerStartupDelayMs: 2000,
  sccacheLog: "debug",
} as const satisfies Omit<BoxSettings, "clientConfigPath">;

export function defaultClientConfigPath(home: string = homedir()): string {
  return join(home, ".config", "sccache", "config");
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== "" ? value : undefined;
}

/**
 * Parse an integer setting; rejects anything but plain decimal digits
 */
export function parseIntegerSetting(
  value: string,
  name: string,
  { min, max }: { min: number; max: number }
): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigurationError(
      `${name} must be a whole number, got "${value}"`,
      name
    );
  }
  const parsed = Number.parseInt(trimmed, 10);
  if (parsed < min || parsed > max) {
    throw new ConfigurationError(
      `${name} must be between ${min} and ${max}, got ${parsed}`,
      name
    );
  }
  return parsed;
}

export function parsePort(value: string, name: string): number {
  return parseIntegerSetting(value, name, { min: 1, max: 65535 });
}

function portFromEnv(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number
): number {
  const raw = nonEmpty(env[name]);
  return raw === undefined ? fallback : parsePort(raw, name);
}

/**
 * Resolve settings from the environment.
 * Invalid numeric values raise ConfigurationError naming the variable.
 */
export function resolveSettings(
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir()
): BoxSettings {
  const delay = nonEmpty(env["SCCACHE_BOX_STARTUP_DELAY_MS"]);
  const clientConfig = nonEmpty(env["SCCACHE_CONF"]);

  return {
    containerName:
      nonEmpty(env["SCCACHE_CONTAINER_NAME"]) ?? DEFAULT_SETTINGS.containerName,
    builderPort: portFromEnv(
      env,
      "SCCACHE_BUILDER_PORT",
      DEFAULT_SETTINGS.builderPort
    ),
    schedulerPort: portFromEnv(
      env,
      "SCCACHE_SCHEDULER_PORT",
      DEFAULT_SETTINGS.schedulerPort
    ),
    tokenFile:
      nonEmpty(env["SCCACHE_BOX_TOKEN_FILE"]) ?? DEFAULT_SETTINGS.tokenFile,
    schedulerConfig:
      nonEmpty(env["SCCACHE_BOX_SCHEDULER_CONFIG"]) ??
      DEFAULT_SETTINGS.schedulerConfig,
    serverConfig:
      nonEmpty(env["SCCACHE_BOX_SERVER_CONFIG"]) ??
      DEFAULT_SETTINGS.serverConfig,
    schedulerStartupDelayMs:
      delay === undefined
        ? DEFAULT_SETTINGS.schedulerStartupDelayMs
        : parseIntegerSetting(delay, "SCCACHE_BOX_STARTUP_DELAY_MS", {
            min: 0,
            max: 600_000,
          }),
    sccacheLog: nonEmpty(env["SCCACHE_LOG"]) ?? DEFAULT_SETTINGS.sccacheLog,
    clientConfigPath:
      clientConfig === undefined
        ? defaultClientConfigPath(home)
        : resolve(clientConfig),
  };
}
