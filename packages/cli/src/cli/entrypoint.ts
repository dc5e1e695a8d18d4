// pattern: Imperative Shell
// CLI command run as the box container's entrypoint

import { Command, Option } from "@commander-js/extra-typings";

import { parseIntegerSetting } from "../config/settings.js";
import { runEntrypoint } from "../entrypoint/index.js";

import { asArgumentParser } from "./_utils/arguments.js";
import { withErrorHandling } from "./_utils/with-error-handling.js";
import { CLI_LOGGER } from "./_deps.js";
import { getSettings } from "./_globals.js";
import { HelpTextPatterns } from "./utils/command-factory.js";

interface EntrypointCommandOptions {
  tokenFile?: string | undefined;
  schedulerConfig?: string | undefined;
  serverConfig?: string | undefined;
  startupDelay?: number | undefined;
  sccacheLog?: string | undefined;
}

async function entrypointCli(options: EntrypointCommandOptions): Promise<void> {
  const settings = getSettings();

  const status = await runEntrypoint(
    {
      tokenFile: options.tokenFile ?? settings.tokenFile,
      schedulerConfig: options.schedulerConfig ?? settings.schedulerConfig,
      serverConfig: options.serverConfig ?? settings.serverConfig,
      schedulerStartupDelayMs:
        options.startupDelay ?? settings.schedulerStartupDelayMs,
      sccacheLog: options.sccacheLog ?? settings.sccacheLog,
    },
    { logger: CLI_LOGGER }
  );

  process.exitCode = status.exitCode;
}

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeEntrypointCommand() {
  return new Command("entrypoint")
    .description(
      "Inject the auth token, then run the sccache-dist scheduler and builder"
    )
    .addHelpText(
      "before",
      HelpTextPatterns.beforeHelp(
        "Container entrypoint for the box. The scheduler runs in the background and is stopped once the builder exits.",
        ["The command exits with the builder's exit code."]
      )
    )
    .addHelpText(
      "after",
      HelpTextPatterns.examples([
        "sccache-dist-box entrypoint",
        "sccache-dist-box entrypoint --startup-delay 5000",
        "sccache-dist-box entrypoint --token-file /run/secrets/sccache_token",
      ])
    )
    .addOption(
      new Option(
        "--token-file <path>",
        "File holding the auth token (default: /root/.sccache_dist_token)"
      )
    )
    .addOption(
      new Option(
        "--scheduler-config <path>",
        "Scheduler config file (default: /root/scheduler.conf)"
      )
    )
    .addOption(
      new Option(
        "--server-config <path>",
        "Builder config file (default: /root/server.conf)"
      )
    )
    .addOption(
      new Option(
        "--startup-delay <ms>",
        "Milliseconds to wait for the scheduler before starting the builder (default: 2000)"
      ).argParser(
        asArgumentParser(value =>
          parseIntegerSetting(value, "--startup-delay", {
            min: 0,
            max: 600_000,
          })
        )
      )
    )
    .addOption(
      new Option(
        "--sccache-log <level>",
        "SCCACHE_LOG value for the scheduler and builder (default: debug)"
      )
    )
    .action(withErrorHandling(entrypointCli));
}
