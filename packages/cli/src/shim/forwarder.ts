// pattern: Imperative Shell
// Stands in for bubblewrap: drops every sandbox flag and runs the
// remaining command unsandboxed with this process's stdio.

import {
  createCommand,
  relaySignals,
  type SignalListener,
  type SignalSource,
} from "../utils/command/index.js";

import { isVersionProbe, splitSandboxArgs } from "./split.js";

import type { ArityTable } from "./arity-table.js";
import type { Logger } from "pino";

/**
 * Printed for `--version`. Callers probe for a bubblewrap version line and
 * refuse to use the sandbox without a recognizable one.
 */
export const FAKE_BWRAP_VERSION = "bubblewrap 0.11.0";

/** Relayed to the child while it runs */
export const RELAYED_SIGNALS = ["SIGTERM", "SIGHUP"] as const;

/**
 * Not relayed: the terminal already delivers it to the child's process
 * group. The forwarder keeps waiting so it can report the child's status.
 */
export const IGNORED_SIGNALS = ["SIGINT"] as const;

export type ForwardOutcome =
  | { kind: "version"; exitCode: 0 }
  | { kind: "empty"; exitCode: 0 }
  | { kind: "executed"; exitCode: number; signal?: string };

export interface ForwarderDeps {
  logger: Logger;
  /** Where the version line goes; defaults to process.stdout */
  stdout?: { write(chunk: string): unknown };
  table?: ArityTable;
  /** Defaults to the current process */
  signalSource?: SignalSource;
}

/**
 * Strip sandbox flags from argv and run what is left.
 *
 * Resolves with the exit status to terminate with. Rejects with
 * ProcessError (exit code 127 or 126) when the command cannot be launched.
 */
export async function runForwarder(
  argv: readonly string[],
  deps: ForwarderDeps
): Promise<ForwardOutcome> {
  const { logger } = deps;

  if (isVersionProbe(argv)) {
    (deps.stdout ?? process.stdout).write(`${FAKE_BWRAP_VERSION}\n`);
    return { kind: "version", exitCode: 0 };
  }

  const { discarded, command, terminatedBy } = splitSandboxArgs(
    argv,
    deps.table
  );
  logger.debug({ discarded, terminatedBy }, "Discarded sandbox arguments");

  const [executable, ...args] = command;
  if (executable === undefined) {
    logger.debug("No command left after discarding sandbox arguments");
    return { kind: "empty", exitCode: 0 };
  }

  const running = createCommand(executable, logger).addArgs(args).start();

  const source = deps.signalSource ?? process;
  const stopRelaying = relaySignals(source, RELAYED_SIGNALS, running, logger);
  const ignored = IGNORED_SIGNALS.map(
    (signal): [NodeJS.Signals, SignalListener] => [
      signal,
      () => {
        logger.debug({ signal }, "Waiting for command after signal");
      },
    ]
  );
  for (const [signal, listener] of ignored) {
    source.on(signal, listener);
  }

  try {
    const status = await running.wait();
    return {
      kind: "executed",
      exitCode: status.exitCode,
      ...(status.signal !== undefined && { signal: status.signal }),
    };
  } finally {
    stopRelaying();
    for (const [signal, listener] of ignored) {
      source.off(signal, listener);
    }
  }
}
