// pattern: Functional Core

import {
  ConfigurationError,
  type ErrorCategory,
  FileSystemError,
  ProcessError,
  SccacheBoxError,
  ValidationError,
} from "../../utils/errors.js";

/**
 * Represents a categorized error with user-friendly messaging
 */
export interface AnalyzedError {
  category: ErrorCategory | "unknown";
  userMessage: string;
  technicalMessage: string;
  suggestions: string[];
}

const DEBUG_HINT = "Run with --log-level debug for more detailed information";

function suggestionsFor(error: SccacheBoxError): string[] {
  if (error instanceof FileSystemError) {
    const suggestions = [
      "Verify the file or directory path exists",
      "Check that you have the necessary permissions",
    ];
    if (error.operation === "read" || error.operation === "find") {
      suggestions.push("Ensure the file exists and is readable");
    } else if (error.operation === "write") {
      suggestions.push("Ensure the file is writable");
    }
    return suggestions;
  }

  if (error instanceof ProcessError) {
    if (error.exitCode === 127) {
      return [
        `Check that ${error.processName ?? "the command"} is installed and on PATH`,
      ];
    }
    if (error.exitCode === 126) {
      return [
        `Check that ${error.processName ?? "the command"} is executable`,
      ];
    }
    return [
      "Check that required processes are running",
      "Verify you have the necessary permissions",
    ];
  }

  if (error instanceof ValidationError) {
    const suggestions = [
      "Check the file syntax",
      "Verify all required fields are present",
    ];
    if (error.validationErrors && error.validationErrors.length > 0) {
      suggestions.push(...error.validationErrors.map(e => `- ${e}`));
    }
    return suggestions;
  }

  if (error instanceof ConfigurationError) {
    const suggestions: string[] = [];
    if (error.variable) {
      suggestions.push(`Check the value of ${error.variable}`);
    }
    if (error.message.toLowerCase().includes("token file")) {
      suggestions.push(
        "Generate a token and write it to the token file, e.g. openssl rand -hex 64"
      );
    }
    suggestions.push(DEBUG_HINT);
    return suggestions;
  }

  return ["Check the error message for details", DEBUG_HINT];
}

/**
 * Analyzes an error and provides structured information with user-friendly messages
 *
 * Typed errors keep their own message; anything else is classified by the
 * errno-style codes that Node.js puts in error messages.
 */
export function analyzeError(error: unknown): AnalyzedError {
  if (error instanceof SccacheBoxError) {
    return {
      category: error.category,
      userMessage: error.message,
      technicalMessage: error.message,
      suggestions: suggestionsFor(error),
    };
  }

  const errorMessage = getErrorMessage(error);
  const errorString = errorMessage.toLowerCase();

  // File system errors
  if (
    errorString.includes("eacces") ||
    errorString.includes("permission denied")
  ) {
    return {
      category: "filesystem",
      userMessage: "Permission denied accessing files or directories",
      technicalMessage: errorMessage,
      suggestions: [
        "Check that you have the necessary permissions on the target paths",
        "Verify the file or directory ownership is correct",
      ],
    };
  }

  if (errorString.includes("enoent")) {
    return {
      category: "filesystem",
      userMessage: "Required file or directory not found",
      technicalMessage: errorMessage,
      suggestions: [
        "Verify the file or directory path exists",
        "Check that prerequisite tools are installed",
      ],
    };
  }

  if (errorString.includes("eisdir")) {
    return {
      category: "filesystem",
      userMessage: "Expected a file but found a directory",
      technicalMessage: errorMessage,
      suggestions: ["Check the file path is correct"],
    };
  }

  // Network errors
  if (errorString.includes("econnrefused")) {
    return {
      category: "network",
      userMessage: "Connection refused",
      technicalMessage: errorMessage,
      suggestions: [
        "Verify the service is running and accessible",
        "Check the host and port are correct",
      ],
    };
  }

  if (errorString.includes("etimedout")) {
    return {
      category: "network",
      userMessage: "Connection timed out",
      technicalMessage: errorMessage,
      suggestions: [
        "Verify the host is reachable",
        "Try again as this may be a temporary issue",
      ],
    };
  }

  if (
    errorString.includes("ehostunreach") ||
    errorString.includes("getaddrinfo")
  ) {
    return {
      category: "network",
      userMessage: "Unable to reach the specified host",
      technicalMessage: errorMessage,
      suggestions: [
        "Check the hostname is correct",
        "Verify your DNS settings",
      ],
    };
  }

  // Process errors
  if (errorString.includes("eperm")) {
    return {
      category: "process",
      userMessage: "Operation not permitted",
      technicalMessage: errorMessage,
      suggestions: [
        "Check you have the necessary permissions",
        "Try running with elevated privileges if appropriate",
      ],
    };
  }

  if (
    errorString.includes("toml") &&
    (errorString.includes("unexpected") ||
      errorString.includes("expected") ||
      errorString.includes("syntax"))
  ) {
    return {
      category: "validation",
      userMessage: "Configuration file could not be parsed",
      technicalMessage: errorMessage,
      suggestions: [
        "Check the file for TOML syntax errors",
        "Check that strings are properly quoted",
      ],
    };
  }

  return {
    category: "unknown",
    userMessage: "An unexpected error occurred",
    technicalMessage: errorMessage,
    suggestions: [
      "Try the operation again",
      "Check the command syntax and arguments",
      DEBUG_HINT,
    ],
  };
}

/**
 * Extracts a string message from various error types
 */
function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  if (error && typeof error === "object" && "message" in error) {
    return String(error.message);
  }
  return String(error);
}
