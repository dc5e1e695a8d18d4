// pattern: Imperative Shell
// Container entrypoint: inject the auth token, then run the scheduler in the
// background and the builder in the foreground.

import { readFile, writeFile } from "node:fs/promises";
import { setTimeout as sleep } from "node:timers/promises";

import {
  createCommand,
  type CommandStatus,
  relaySignals,
  type RunningCommand,
  signalExitCode,
  type SignalSource,
} from "../utils/command/index.js";
import { ConfigurationError, FileSystemError } from "../utils/errors.js";

import {
  buildEntrypointPlan,
  type EntrypointSettings,
  type PlannedCommand,
  substituteToken,
} from "./plan.js";

import type { BoxSettings } from "../config/settings.js";
import type { Logger } from "pino";

export interface CommandRunner {
  start(command: PlannedCommand, env: Record<string, string>): RunningCommand;
}

export interface EntrypointDeps {
  logger: Logger;
  runner?: CommandRunner;
  /** Resolves after ms; rejects once the abort signal fires */
  delay?: (ms: number, abort: AbortSignal) => Promise<unknown>;
  /** Defaults to the current process */
  signalSource?: SignalSource;
  /** Grace period between SIGTERM and SIGKILL for the scheduler */
  stopTimeoutMs?: number;
}

/** Relayed to whichever process is in the foreground */
export const RELAYED_SIGNALS = ["SIGTERM", "SIGINT", "SIGHUP"] as const;

export const SCHEDULER_STOP_TIMEOUT_MS = 10_000;

function abortableSleep(ms: number, abort: AbortSignal): Promise<unknown> {
  return sleep(ms, undefined, { signal: abort });
}

export function createCommandRunner(logger: Logger): CommandRunner {
  return {
    start: (planned, env) =>
      createCommand(planned.command, logger)
        .addArgs(planned.args)
        .envs(env)
        .start(),
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Read the shared auth token; surrounding whitespace is dropped
 */
export async function readToken(tokenFile: string): Promise<string> {
  let raw: string;
  try {
    raw = await readFile(tokenFile, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      throw new ConfigurationError(
        `Token file ${tokenFile} does not exist`,
        "SCCACHE_BOX_TOKEN_FILE"
      );
    }
    throw new FileSystemError(
      `Cannot read token file ${tokenFile}: ${error instanceof Error ? error.message : String(error)}`,
      "read",
      tokenFile
    );
  }

  const token = raw.trim();
  if (!token) {
    throw new ConfigurationError(
      `Token file ${tokenFile} is empty`,
      "SCCACHE_BOX_TOKEN_FILE"
    );
  }
  return token;
}

/**
 * Write the token into each config file in place.
 * Returns the files that were changed.
 */
export async function applyTokenToConfigs(
  files: readonly string[],
  token: string
): Promise<string[]> {
  const changed: string[] = [];

  for (const file of files) {
    let content: string;
    try {
      content = await readFile(file, "utf8");
    } catch (error) {
      throw new FileSystemError(
        isMissingFile(error)
          ? `Config file ${file} does not exist`
          : `Cannot read config file ${file}: ${error instanceof Error ? error.message : String(error)}`,
        "read",
        file
      );
    }

    const updated = substituteToken(content, token);
    if (updated === content) continue;

    try {
      await writeFile(file, updated, "utf8");
    } catch (error) {
      throw new FileSystemError(
        `Cannot write config file ${file}: ${error instanceof Error ? error.message : String(error)}`,
        "write",
        file
      );
    }
    changed.push(file);
  }

  return changed;
}

/**
 * Send SIGTERM, then SIGKILL if the process has not exited within timeoutMs
 */
async function stopWithin(
  proc: RunningCommand,
  exited: Promise<void>,
  timeoutMs: number,
  logger: Logger
): Promise<void> {
  proc.kill("SIGTERM");

  let timer: NodeJS.Timeout | undefined;
  const timedOut = new Promise<boolean>(resolve => {
    timer = setTimeout(() => resolve(true), timeoutMs);
  });
  const expired = await Promise.race([exited.then(() => false), timedOut]);
  clearTimeout(timer);

  if (expired) {
    logger.warn(
      { pid: proc.pid, timeoutMs },
      "Scheduler ignored SIGTERM, sending SIGKILL"
    );
    proc.kill("SIGKILL");
    await exited;
  }
}

/**
 * Run the entrypoint and resolve with the builder's exit status.
 * The scheduler is stopped once the builder exits. A signal received while
 * the scheduler starts up stops it and the builder is never launched.
 */
export async function runEntrypoint(
  settings: EntrypointSettings & Pick<BoxSettings, "tokenFile">,
  deps: EntrypointDeps
): Promise<CommandStatus> {
  const { logger } = deps;
  const runner = deps.runner ?? createCommandRunner(logger);
  const delay = deps.delay ?? abortableSleep;
  const signalSource = deps.signalSource ?? process;
  const stopTimeoutMs = deps.stopTimeoutMs ?? SCHEDULER_STOP_TIMEOUT_MS;

  const token = await readToken(settings.tokenFile);
  logger.debug({ tokenLength: token.length }, "Loaded auth token");

  const plan = buildEntrypointPlan(settings, token);

  const changed = await applyTokenToConfigs(plan.configFiles, token);
  logger.debug({ changed }, "Injected auth token into configs");

  logger.info(
    { config: settings.schedulerConfig },
    "Launching sccache-dist scheduler"
  );
  const scheduler = runner.start(plan.scheduler, plan.env);
  let schedulerRunning = true;
  const schedulerDone = scheduler.wait().then(
    status => {
      schedulerRunning = false;
      logger.warn({ exitCode: status.exitCode }, "Scheduler exited");
    },
    (error: unknown) => {
      schedulerRunning = false;
      logger.error({ err: error }, "Scheduler failed to start");
    }
  );

  const stopScheduler = async (): Promise<void> => {
    if (schedulerRunning) {
      logger.debug("Stopping scheduler");
      await stopWithin(scheduler, schedulerDone, stopTimeoutMs, logger);
    }
    await schedulerDone;
  };

  // Signals during startup go to the scheduler and cancel the builder launch
  const startup = new AbortController();
  let startupSignal: NodeJS.Signals | undefined;
  const onStartupSignal = (signal: NodeJS.Signals): void => {
    startupSignal ??= signal;
    startup.abort();
  };
  const startupListeners = RELAYED_SIGNALS.map(
    (signal): [NodeJS.Signals, () => void] => [
      signal,
      () => onStartupSignal(signal),
    ]
  );
  for (const [signal, listener] of startupListeners) {
    signalSource.on(signal, listener);
  }
  const stopRelayingToScheduler = relaySignals(
    signalSource,
    RELAYED_SIGNALS,
    scheduler,
    logger
  );

  let delayError: unknown;
  try {
    await delay(plan.startupDelayMs, startup.signal);
  } catch (error) {
    if (!startup.signal.aborted) delayError = error;
  } finally {
    stopRelayingToScheduler();
    for (const [signal, listener] of startupListeners) {
      signalSource.off(signal, listener);
    }
  }

  if (delayError !== undefined) {
    await stopScheduler();
    throw delayError;
  }

  if (startupSignal !== undefined) {
    logger.info(
      { signal: startupSignal },
      "Received signal during scheduler startup, not launching server"
    );
    await stopScheduler();
    return {
      exitCode: signalExitCode(startupSignal),
      signal: startupSignal,
    };
  }

  logger.info({ config: settings.serverConfig }, "Launching sccache-dist server");
  const server = runner.start(plan.server, plan.env);
  const stopRelaying = relaySignals(
    signalSource,
    RELAYED_SIGNALS,
    server,
    logger
  );
  try {
    const status = await server.wait();
    logger.info({ exitCode: status.exitCode }, "Server exited");
    return status;
  } finally {
    stopRelaying();
    await stopScheduler();
  }
}
