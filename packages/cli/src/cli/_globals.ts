// pattern: Imperative Shell

import { resolveSettings, type BoxSettings } from "../config/settings.js";

import type { LogFormat } from "../logger/index.js";

// Output format chosen with --format; also the log format
let OUTPUT_FORMAT: LogFormat = "nice";

// Format given explicitly with --format on the command line
let REQUESTED_FORMAT: LogFormat | undefined;

// Whether terminal colours are allowed on stdout
let COLOR_ENABLED = false;

// Settings resolved from the environment on first use
let SETTINGS: BoxSettings | undefined;

export function setOutputFormat(format: LogFormat): void {
  OUTPUT_FORMAT = format;
}

export function getOutputFormat(): LogFormat {
  return OUTPUT_FORMAT;
}

export function setRequestedOutputFormat(format: LogFormat | undefined): void {
  REQUESTED_FORMAT = format;
}

export function getRequestedOutputFormat(): LogFormat | undefined {
  return REQUESTED_FORMAT;
}

export function setColorEnabled(enabled: boolean): void {
  COLOR_ENABLED = enabled;
}

export function isColorEnabled(): boolean {
  return COLOR_ENABLED;
}

/**
 * Settings from the environment; invalid values raise ConfigurationError
 * when first requested, inside the command's error handling
 */
export function getSettings(): BoxSettings {
  SETTINGS ??= resolveSettings(process.env);
  return SETTINGS;
}
