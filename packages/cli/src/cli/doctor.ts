// pattern: Imperative Shell
// CLI command checking the local sccache and box container setup

import { Command, Option } from "@commander-js/extra-typings";

import { parsePort } from "../config/settings.js";
import {
  formatDoctorReport,
  formatDoctorReportJson,
  runDoctor,
} from "../diagnostics/index.js";

import { asArgumentParser } from "./_utils/arguments.js";
import { withErrorHandling } from "./_utils/with-error-handling.js";
import { CLI_LOGGER } from "./_deps.js";
import { getOutputFormat, getSettings, isColorEnabled } from "./_globals.js";
import { HelpTextPatterns } from "./utils/command-factory.js";

interface DoctorCommandOptions {
  container?: string | undefined;
  builderPort?: number | undefined;
  schedulerPort?: number | undefined;
}

async function doctorCli(options: DoctorCommandOptions): Promise<void> {
  const settings = getSettings();

  const report = await runDoctor(
    {
      containerName: options.container ?? settings.containerName,
      builderPort: options.builderPort ?? settings.builderPort,
      schedulerPort: options.schedulerPort ?? settings.schedulerPort,
      tokenFile: settings.tokenFile,
      clientConfigPath: settings.clientConfigPath,
    },
    { logger: CLI_LOGGER }
  );

  const output =
    getOutputFormat() === "json"
      ? formatDoctorReportJson(report)
      : formatDoctorReport(report, { colorize: isColorEnabled() });

  // eslint-disable-next-line no-console
  console.log(output);

  process.exitCode = report.passed === report.total ? 0 : 1;
}

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeDoctorCommand() {
  return new Command("doctor")
    .description("Check the sccache client setup and the box container")
    .addHelpText(
      "before",
      HelpTextPatterns.beforeHelp(
        "Runs a series of checks against the sccache client environment, its config file, the box container and the scheduler and builder ports.",
        [
          "Only environment, client config and connectivity checks count towards the summary;",
          "the command exits non-zero when any of them fails.",
        ]
      )
    )
    .addHelpText(
      "after",
      HelpTextPatterns.examples([
        "sccache-dist-box doctor",
        "sccache-dist-box doctor --container my-box",
        "sccache-dist-box --format json doctor",
      ])
    )
    .addOption(
      new Option(
        "--container <name>",
        "Name of the box container (default: $SCCACHE_CONTAINER_NAME or sccache-dist)"
      )
    )
    .addOption(
      new Option(
        "--builder-port <port>",
        "Port the builder listens on (default: $SCCACHE_BUILDER_PORT or 10501)"
      ).argParser(
        asArgumentParser(value => parsePort(value, "--builder-port"))
      )
    )
    .addOption(
      new Option(
        "--scheduler-port <port>",
        "Scheduler port when SCCACHE_SCHEDULER_URL has none (default: $SCCACHE_SCHEDULER_PORT or 10600)"
      ).argParser(
        asArgumentParser(value => parsePort(value, "--scheduler-port"))
      )
    )
    .action(withErrorHandling(doctorCli));
}
