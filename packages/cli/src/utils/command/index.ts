// pattern: Mixed (unavoidable)
// Command execution requires integration of pure logic with side effects
import { constants } from "node:os";

import { execa, ExecaError } from "execa";

import { ProcessError } from "../errors.js";

import type { Logger } from "pino";

/** Exit status of a process that ran to completion or was killed */
export interface CommandStatus {
  exitCode: number;
  signal?: string;
}

/** Outcome of a diagnostic probe; never throws */
export interface CommandProbeResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode?: number;
  timedOut: boolean;
  error?: string;
}

/** A command started in the background */
export interface RunningCommand {
  readonly pid: number | undefined;
  /** Resolves once the process exits; rejects with ProcessError if it could not start */
  wait(): Promise<CommandStatus>;
  kill(signal?: string): void;
}

export type SignalListener = () => void;

/** Where process signals come from; the current process in production */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: SignalListener): unknown;
  off(event: NodeJS.Signals, listener: SignalListener): unknown;
}

/**
 * Forward the given signals to a running command until the returned
 * function is called
 */
export function relaySignals(
  source: SignalSource,
  signals: readonly NodeJS.Signals[],
  target: RunningCommand,
  logger: Logger
): () => void {
  const listeners = signals.map((signal): [NodeJS.Signals, SignalListener] => [
    signal,
    () => {
      logger.debug({ signal, pid: target.pid }, "Relaying signal");
      target.kill(signal);
    },
  ]);
  for (const [signal, listener] of listeners) {
    source.on(signal, listener);
  }
  return () => {
    for (const [signal, listener] of listeners) {
      source.off(signal, listener);
    }
  };
}

interface BaseOptions {
  env: Record<string, string>;
  extendEnv: boolean;
  timeout?: number;
}

const SIGNAL_NUMBERS = new Map<string, number>(
  Object.entries(constants.signals)
);

const SIGTERM = SIGNAL_NUMBERS.get("SIGTERM") ?? 15;

/**
 * Shell convention for a process terminated by a signal: 128 + signal number
 */
export function signalExitCode(signal: string): number {
  return 128 + (SIGNAL_NUMBERS.get(signal) ?? 0);
}

/**
 * Shell convention for a command that could not be launched:
 * 127 when not found, 126 when found but not executable
 */
export function launchFailureExitCode(code: string | undefined): number {
  return code === "ENOENT" ? 127 : 126;
}

/**
 * A fluent command builder with logging integration.
 * Handles environment variables, timeouts and stderr logging.
 */
export class CommandBuilder {
  private command: string;
  private args: string[];
  private env: Record<string, string>;
  private childLogger: Logger;
  private timeoutMs?: number;

  constructor(command: string, logger: Logger) {
    this.command = command;
    this.args = [];
    this.env = {};

    // Extract process name (last path segment, without extension)
    const processName = command.split(/[/\\]/).pop()?.split(".")[0] ?? command;
    this.childLogger = logger.child({ process: processName || command });
  }

  /**
   * Add multiple command arguments
   */
  addArgs(args: readonly string[]): this {
    this.args.push(...args);
    return this;
  }

  /**
   * Set environment variables (merged with parent)
   */
  envs(envVars: Record<string, string>): this {
    Object.assign(this.env, envVars);
    return this;
  }

  /**
   * Kill the command if it runs longer than the given number of milliseconds
   */
  timeout(ms: number): this {
    this.timeoutMs = ms;
    return this;
  }

  private baseOptions(): BaseOptions {
    return {
      env: this.env,
      extendEnv: true,
      ...(this.timeoutMs !== undefined && { timeout: this.timeoutMs }),
    };
  }

  /**
   * Execute the command and return its trimmed stdout.
   * stderr is logged at DEBUG level; a failing command rejects.
   */
  async output(): Promise<string> {
    this.childLogger.debug(
      { command: this.command, argCount: this.args.length },
      "Executing command"
    );

    try {
      const result = await execa(this.command, this.args, {
        ...this.baseOptions(),
        stdin: "ignore",
        stdout: "pipe",
        stderr: "pipe",
      });

      const stdout = typeof result.stdout === "string" ? result.stdout : "";
      const stderr = typeof result.stderr === "string" ? result.stderr : "";

      if (stderr.trim()) {
        this.childLogger.debug(
          { stderr },
          "Command stderr output"
        );
      }

      this.childLogger.debug(
        { exitCode: result.exitCode, duration: result.durationMs },
        "Command completed successfully"
      );

      return stdout.trim();
    } catch (error) {
      if (error instanceof ExecaError) {
        this.childLogger.debug(
          {
            error: error.shortMessage,
            stderr: error.stderr,
            exitCode: error.exitCode,
          },
          "Command execution failed"
        );
      }
      throw error;
    }
  }

  /**
   * Run the command for diagnostics: capture stdout and stderr and report
   * success instead of throwing.
   */
  async probe(): Promise<CommandProbeResult> {
    try {
      const stdout = await this.output();
      return { success: true, stdout, stderr: "", exitCode: 0, timedOut: false };
    } catch (error) {
      if (error instanceof ExecaError) {
        const stdout = typeof error.stdout === "string" ? error.stdout : "";
        const stderr = typeof error.stderr === "string" ? error.stderr : "";
        return {
          success: false,
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          ...(error.exitCode !== undefined && { exitCode: error.exitCode }),
          timedOut: error.timedOut,
          error: error.shortMessage,
        };
      }
      return {
        success: false,
        stdout: "",
        stderr: "",
        timedOut: false,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  /**
   * Start the command in the background with stdin, stdout and stderr
   * inherited from this process. Signals sent through kill() are delivered
   * as given, never escalated.
   */
  start(): RunningCommand {
    const { command, childLogger } = this;
    childLogger.debug(
      { command, args: this.args },
      "Starting command with inherited stdio"
    );

    const subprocess = execa(command, this.args, {
      ...this.baseOptions(),
      stdio: "inherit",
      forceKillAfterDelay: false,
    });

    const settled: Promise<CommandStatus> = subprocess.then(
      result => ({ exitCode: result.exitCode ?? 0 }),
      (error: unknown) => {
        if (!(error instanceof ExecaError)) {
          throw error;
        }
        if (error.signal !== undefined) {
          childLogger.debug({ signal: error.signal }, "Command was terminated");
          return {
            exitCode: signalExitCode(error.signal),
            signal: error.signal,
          };
        }
        if (error.exitCode !== undefined) {
          return { exitCode: error.exitCode };
        }
        throw new ProcessError(
          `Failed to launch ${command}: ${error.code ?? error.shortMessage}`,
          command,
          launchFailureExitCode(error.code)
        );
      }
    );

    return {
      pid: subprocess.pid,
      wait: () => settled,
      kill: (signal = "SIGTERM"): void => {
        subprocess.kill(SIGNAL_NUMBERS.get(signal) ?? SIGTERM);
      },
    };
  }
}

/**
 * Create a new command builder with the specified command and logger
 */
export function createCommand(command: string, logger: Logger): CommandBuilder {
  return new CommandBuilder(command, logger);
}
