#!/usr/bin/env node
// pattern: Imperative Shell
// Installed in place of bwrap inside the box

import {
  createLogger,
  isNonInteractive,
  resolveLogFormat,
  resolveLogLevel,
} from "../logger/index.js";
import { runForwarder } from "../shim/index.js";
import { ProcessError } from "../utils/errors.js";

const nonInteractive = isNonInteractive();
const logger = createLogger({
  name: "bwrap-shim",
  level: resolveLogLevel(process.env["SCCACHE_BOX_LOG_LEVEL"], "warn"),
  format: resolveLogFormat(
    process.env["SCCACHE_BOX_LOG_FORMAT"],
    nonInteractive ? "json" : "nice"
  ),
  nonInteractive,
});

try {
  const outcome = await runForwarder(process.argv.slice(2), { logger });
  process.exitCode = outcome.exitCode;
} catch (error) {
  if (!(error instanceof ProcessError)) {
    throw error;
  }
  logger.error(error.message);
  process.exitCode = error.exitCode ?? 1;
}
