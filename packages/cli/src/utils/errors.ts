// pattern: Functional Core

export type ErrorCategory =
  | "configuration"
  | "filesystem"
  | "network"
  | "process"
  | "validation";

/**
 * Base class for sccache-dist-box errors
 * Subclasses carry a category used by the CLI error analysis
 */
export abstract class SccacheBoxError extends Error {
  public readonly category: ErrorCategory;

  protected constructor(category: ErrorCategory, message: string) {
    super(message);
    this.name = this.constructor.name;
    this.category = category;

    // Maintain proper stack trace for where our error was thrown
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Errors related to settings, environment variables and config files
 */
export class ConfigurationError extends SccacheBoxError {
  public readonly variable?: string;

  constructor(message: string, variable?: string) {
    super("configuration", message);
    if (variable) {
      this.variable = variable;
    }
  }
}

/**
 * Errors related to file system operations
 */
export class FileSystemError extends SccacheBoxError {
  public readonly operation?: string;
  public readonly filePath?: string;

  constructor(message: string, operation?: string, filePath?: string) {
    super("filesystem", message);
    if (operation) {
      this.operation = operation;
    }
    if (filePath) {
      this.filePath = filePath;
    }
  }
}

/**
 * Errors related to launching or running child processes.
 * exitCode is the status the CLI should terminate with.
 */
export class ProcessError extends SccacheBoxError {
  public readonly processName?: string;
  public readonly exitCode?: number;

  constructor(message: string, processName?: string, exitCode?: number) {
    super("process", message);
    if (processName) {
      this.processName = processName;
    }
    if (exitCode !== undefined) {
      this.exitCode = exitCode;
    }
  }
}

/**
 * Errors related to validation failures
 */
export class ValidationError extends SccacheBoxError {
  public readonly validationErrors?: string[];

  constructor(message: string, validationErrors?: string[]) {
    super("validation", message);
    if (validationErrors) {
      this.validationErrors = validationErrors;
    }
  }
}
