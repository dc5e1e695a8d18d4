// pattern: Functional Core
// Consistency of the sccache client config with the environment

import { check, type CheckSection } from "./types.js";

import type { SccacheClientConfig } from "../config/sccache-client.js";

export type ClientConfigState =
  | { kind: "loaded"; path: string; config: SccacheClientConfig }
  | { kind: "missing"; path: string }
  | { kind: "invalid"; path: string; message: string };

export function checkClientConfig(
  state: ClientConfigState,
  env: NodeJS.ProcessEnv
): CheckSection {
  const section: CheckSection = {
    title: "sccache client config",
    counted: true,
    checks: [],
    notes: [`Using config file: ${state.path}`],
  };

  if (state.kind === "missing") {
    section.checks.push(check("Config file found", false, state.path));
    return section;
  }
  if (state.kind === "invalid") {
    section.checks.push(check("Config file readable", false, state.message));
    return section;
  }

  const schedulerUrl = state.config.dist?.scheduler_url;
  const auth = state.config.dist?.auth;

  section.checks.push(
    check("scheduler_url present", schedulerUrl !== undefined),
    check("auth type == token", auth?.type === "token"),
    check(
      "env SCCACHE_DIST_TOKEN matches config token",
      auth?.token === env["SCCACHE_DIST_TOKEN"]
    ),
    check(
      "env SCCACHE_SCHEDULER_URL matches config scheduler_url",
      schedulerUrl === env["SCCACHE_SCHEDULER_URL"]
    )
  );
  return section;
}
