// pattern: Imperative Shell

import { ProcessError } from "../../utils/errors.js";
import { CLI_LOGGER } from "../_deps.js";

import { analyzeError } from "./error-analysis.js";

/**
 * Exit status for a failed command: a ProcessError carries its own, else 1
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ProcessError && error.exitCode !== undefined) {
    return error.exitCode;
  }
  return 1;
}

/**
 * Higher-order function that wraps Commander.js actions with consistent error handling
 *
 * This HOF provides centralized error handling for CLI commands by:
 * 1. Catching all errors from wrapped actions
 * 2. Using the error analysis utility to provide user-friendly error messages
 * 3. Handling debug logging when --log-level debug is enabled
 * 4. Ensuring proper process exit codes
 */
export function withErrorHandling<T extends unknown[]>(
  action: (...args: T) => Promise<void> | void
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      const isDebugMode = CLI_LOGGER.isLevelEnabled("debug");

      const analyzed = analyzeError(error);

      if (analyzed.userMessage) {
        CLI_LOGGER.error(analyzed.userMessage);
      }

      analyzed.suggestions.forEach(suggestion => {
        CLI_LOGGER.error(`  • ${suggestion}`);
      });

      if (isDebugMode) {
        CLI_LOGGER.debug("Technical error details:");
        CLI_LOGGER.debug(analyzed.technicalMessage);
        if (error instanceof Error && error.stack) {
          CLI_LOGGER.debug("Stack trace:");
          CLI_LOGGER.debug(error.stack);
        }
        CLI_LOGGER.debug({ err: error, analyzed }, "Full error analysis");
      }

      // Ensure logs are flushed before exit
      CLI_LOGGER.flush();

      const exitCode = exitCodeFor(error);
      setTimeout(() => {
        process.exit(exitCode);
      }, 100);
    }
  };
}
