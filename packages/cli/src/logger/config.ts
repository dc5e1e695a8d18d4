// pattern: Functional Core

import pino from "pino";

import { createRenderer } from "./renderer.js";
import { isLogFormat, isLogLevel } from "./types.js";

import type { LogFormat, LogLevel } from "./types.js";
import type { Writable } from "node:stream";

export interface LoggerOptions {
  format: LogFormat;
  level: LogLevel;
  /** Disables colours in the nice format */
  nonInteractive: boolean;
  /** Logger name attached to every record */
  name?: string;
  /** Defaults to stderr; stdout is reserved for command output */
  destination?: Writable;
}

// Resolve a log level from an environment value, falling back when unset or unknown
export function resolveLogLevel(
  value: string | undefined,
  fallback: LogLevel
): LogLevel {
  return value !== undefined && isLogLevel(value) ? value : fallback;
}

export function resolveLogFormat(
  value: string | undefined,
  fallback: LogFormat
): LogFormat {
  return value !== undefined && isLogFormat(value) ? value : fallback;
}

export function isNonInteractive(
  env: NodeJS.ProcessEnv = process.env
): boolean {
  return !process.stderr.isTTY || env["SCCACHE_BOX_NON_INTERACTIVE"] === "1";
}

// Create pino logger with stream configuration
export function createLogger(options: LoggerOptions): pino.Logger {
  const { format, level, nonInteractive } = options;

  const baseConfig: pino.LoggerOptions = {
    name: options.name ?? "sccache-dist-box",
    level,
    serializers: {
      err: (err: unknown) => {
        if (!(err instanceof Error)) return err;

        // The nice renderer prints message and a short stack itself
        if (format === "nice") {
          return {
            message: err.message,
            stack: err.stack,
          };
        }

        return pino.stdSerializers.err(err);
      },
    },
  };

  if (format === "nice") {
    const renderer = createRenderer({ colorize: !nonInteractive });
    renderer.pipe(options.destination ?? process.stderr);
    return pino(baseConfig, renderer);
  }

  if (options.destination) {
    return pino(baseConfig, options.destination);
  }

  // For JSON format, output JSON directly to stderr
  return pino(baseConfig, pino.destination(2));
}
