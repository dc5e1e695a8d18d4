// pattern: Functional Core
// Environment variables the sccache client needs for distributed compilation

import { maskToken } from "./redact.js";
import { check, type CheckResult, type CheckSection } from "./types.js";

const OPTIONAL_VARIABLES = ["SCCACHE_LOG", "SCCACHE_CONF"] as const;

function expectValue(
  env: NodeJS.ProcessEnv,
  name: string,
  expected: string
): CheckResult {
  const value = env[name];
  return check(name, value === expected, value);
}

function expectSet(
  env: NodeJS.ProcessEnv,
  name: string,
  display: (value: string) => string = value => value
): CheckResult {
  const value = env[name];
  const isSet = value !== undefined && value !== "";
  return check(`${name} is set`, isSet, isSet ? display(value) : value);
}

export function checkEnvironment(env: NodeJS.ProcessEnv): CheckSection {
  const notes: string[] = [];
  for (const name of OPTIONAL_VARIABLES) {
    const value = env[name];
    if (value !== undefined) {
      notes.push(`Optional: ${name}=${value}`);
    }
  }

  return {
    title: "Environment variables",
    counted: true,
    checks: [
      expectValue(env, "SCCACHE_NO_DAEMON", "1"),
      expectValue(env, "SCCACHE_DIST_AUTH", "token"),
      expectSet(env, "SCCACHE_DIST_TOKEN", maskToken),
      expectSet(env, "SCCACHE_SCHEDULER_URL"),
    ],
    notes,
  };
}
