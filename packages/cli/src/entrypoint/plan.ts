// pattern: Functional Core
// What the container entrypoint does, expressed as data

import type { BoxSettings } from "../config/settings.js";

/** Placeholder left in the shipped scheduler and server configs */
export const TOKEN_PLACEHOLDER = "<TODO:PUT SCCACHE_DIST_TOKEN>";

export interface PlannedCommand {
  command: string;
  args: string[];
}

export interface EntrypointPlan {
  /** Added to the inherited environment of both processes */
  env: Record<string, string>;
  /** Config files whose placeholder is replaced with the token */
  configFiles: string[];
  scheduler: PlannedCommand;
  server: PlannedCommand;
  startupDelayMs: number;
}

export type EntrypointSettings = Pick<
  BoxSettings,
  | "schedulerConfig"
  | "serverConfig"
  | "schedulerStartupDelayMs"
  | "sccacheLog"
>;

/**
 * Replace every placeholder occurrence with the token
 */
export function substituteToken(content: string, token: string): string {
  return content.split(TOKEN_PLACEHOLDER).join(token);
}

export function buildEntrypointPlan(
  settings: EntrypointSettings,
  token: string
): EntrypointPlan {
  return {
    env: {
      SCCACHE_DIST_TOKEN: token,
      SCCACHE_DIST_AUTH: "token",
      SCCACHE_NO_DAEMON: "1",
      SCCACHE_LOG: settings.sccacheLog,
    },
    configFiles: [settings.schedulerConfig, settings.serverConfig],
    scheduler: {
      command: "sccache-dist",
      args: ["scheduler", "--config", settings.schedulerConfig],
    },
    server: {
      command: "sccache-dist",
      args: ["server", "--config", settings.serverConfig],
    },
    startupDelayMs: settings.schedulerStartupDelayMs,
  };
}
