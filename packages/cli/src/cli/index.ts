// pattern: Imperative Shell

import {
  Command,
  InvalidArgumentError,
  Option,
} from "@commander-js/extra-typings";

import {
  isLogFormat,
  isLogLevel,
  isNonInteractive,
  LOG_FORMATS,
  LOG_LEVELS,
  type LogFormat,
  type LogLevel,
  resolveLogFormat,
  resolveLogLevel,
} from "../logger/index.js";

import { CLI_LOGGER, initializeLogger, setCliLogLevel } from "./_deps.js";
import {
  setColorEnabled,
  setOutputFormat,
  setRequestedOutputFormat,
} from "./_globals.js";
import { makeDoctorCommand } from "./doctor.js";
import { makeEntrypointCommand } from "./entrypoint.js";
import { makeShimCommand } from "./shim.js";

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError(
      `Invalid log level: ${value}. Valid levels are: ${LOG_LEVELS.join(", ")}`
    );
  }
  return value;
}

function parseLogFormat(value: string): LogFormat {
  if (!isLogFormat(value)) {
    throw new InvalidArgumentError(
      `Invalid format: ${value}. Valid formats are: ${LOG_FORMATS.join(", ")}`
    );
  }
  return value;
}

// Determine defaults based on environment
export function getDefaultLogLevel(
  env: NodeJS.ProcessEnv = process.env
): LogLevel {
  return resolveLogLevel(env["SCCACHE_BOX_LOG_LEVEL"], "info");
}

export function getDefaultLogFormat(
  env: NodeJS.ProcessEnv = process.env
): LogFormat {
  return resolveLogFormat(
    env["SCCACHE_BOX_LOG_FORMAT"],
    isNonInteractive(env) ? "json" : "nice"
  );
}

// Define the root command
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeRootCommand() {
  return new Command("sccache-dist-box")
    .version("0.1.0")
    .description(
      "Single-container sccache-dist scheduler and builder, with setup checks"
    )
    .enablePositionalOptions()
    .addOption(
      new Option("-l, --log-level <level>", "Set log level")
        .choices(LOG_LEVELS)
        .default(getDefaultLogLevel())
        .argParser(parseLogLevel)
    )
    .addOption(
      new Option("-f, --format <format>", "Log and output format")
        .choices(LOG_FORMATS)
        .default(getDefaultLogFormat())
        .argParser(parseLogFormat)
    )
    .hook("preAction", thisCommand => {
      // Configure CLI_LOGGER and output format before any action runs
      const { logLevel, format } = thisCommand.opts();
      const nonInteractive = isNonInteractive();

      initializeLogger({ format, level: logLevel, nonInteractive });
      setCliLogLevel(logLevel);
      setOutputFormat(format);
      setRequestedOutputFormat(
        thisCommand.getOptionValueSource("format") === "cli" ? format : undefined
      );
      setColorEnabled(
        process.stdout.isTTY && process.env["SCCACHE_BOX_NON_INTERACTIVE"] !== "1"
      );
      CLI_LOGGER.debug(
        `Log level configured to: ${logLevel}, format: ${format}, non-interactive: ${nonInteractive}`
      );
    })
    .addCommand(makeDoctorCommand())
    .addCommand(makeEntrypointCommand())
    .addCommand(makeShimCommand());
}

export const rootCommand = makeRootCommand();
