#!/usr/bin/env node
// pattern: Imperative Shell

import {
  getDefaultLogFormat,
  getDefaultLogLevel,
  rootCommand,
} from "../cli/index.js";
import { initializeLogger, isNonInteractive } from "../logger/index.js";

// Errors raised while parsing arguments are logged with the defaults;
// the preAction hook re-initializes from the parsed flags
initializeLogger({
  format: getDefaultLogFormat(),
  level: getDefaultLogLevel(),
  nonInteractive: isNonInteractive(),
});

await rootCommand.parseAsync(process.argv);
