// pattern: Imperative Shell

import pino from "pino";

import { createLogger, type LoggerOptions } from "./config.js";

import type { LogLevel } from "./types.js";

// Global logger instance
let LOGGER: pino.Logger | undefined;

// Initialize logger with format and interactive preferences
export function initializeLogger(options: LoggerOptions): pino.Logger {
  LOGGER = createLogger(options);
  return LOGGER;
}

// Set the log level on the global logger
export function setCliLogLevel(logLevel: LogLevel): void {
  if (!LOGGER) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  LOGGER.level = logLevel;
}

// Create a proxy object that always refers to the current logger instance
export const CLI_LOGGER = new Proxy({} as pino.Logger, {
  get(_target, prop) {
    if (!LOGGER) {
      throw new Error("Logger not initialized. Call initializeLogger() first.");
    }
    const value: unknown = Reflect.get(LOGGER, prop);
    if (typeof value === "function") {
      return value.bind(LOGGER);
    }
    return value;
  },
});
