// pattern: Imperative Shell
// CLI commands for looking at how the bubblewrap shim reads a command line

import { Command, Option } from "@commander-js/extra-typings";

import { parseIntegerSetting } from "../config/settings.js";
import {
  type Arity,
  BWRAP_OPTION_ARITY,
  formatArityTable,
  formatSplitResult,
  splitSandboxArgs,
} from "../shim/index.js";

import { asArgumentParser } from "./_utils/arguments.js";
import { withErrorHandling } from "./_utils/with-error-handling.js";
import { CLI_LOGGER } from "./_deps.js";
import { getRequestedOutputFormat } from "./_globals.js";
import { HelpTextPatterns } from "./utils/command-factory.js";

function isArity(value: number): value is Arity {
  return value === 0 || value === 1 || value === 2 || value === 3;
}

function parseArity(value: string): Arity {
  const parsed = parseIntegerSetting(value, "--arity", { min: 0, max: 3 });
  if (!isArity(parsed)) {
    throw new Error(`--arity must be between 0 and 3, got ${parsed}`);
  }
  return parsed;
}

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
function makeInspectCommand() {
  return new Command("inspect")
    .description(
      "Show which arguments the shim discards and which command it runs"
    )
    .argument("[args...]", "Arguments as they would be given to bwrap")
    .helpOption(false)
    .allowUnknownOption()
    .passThroughOptions()
    .action(
      withErrorHandling((args: string[]) => {
        const result = splitSandboxArgs(args);
        CLI_LOGGER.debug(
          { argCount: args.length, terminatedBy: result.terminatedBy },
          "Split sandbox arguments"
        );
        // eslint-disable-next-line no-console
        console.log(
          formatSplitResult(result, getRequestedOutputFormat() ?? "json")
        );
      })
    );
}

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
function makeOptionsCommand() {
  return new Command("options")
    .description("List the bubblewrap options the shim knows and their arity")
    .addOption(
      new Option("--arity <n>", "Only list options taking n arguments").argParser(
        asArgumentParser(parseArity)
      )
    )
    .action(
      withErrorHandling((options: { arity?: Arity | undefined }) => {
        for (const line of formatArityTable(BWRAP_OPTION_ARITY, options.arity)) {
          // eslint-disable-next-line no-console
          console.log(line);
        }
      })
    );
}

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeShimCommand() {
  return new Command("shim")
    .description("Inspect the bubblewrap stand-in used inside the box")
    .enablePositionalOptions()
    .addHelpText(
      "after",
      HelpTextPatterns.examples([
        "sccache-dist-box shim inspect --unshare-all --bind /a /b -- gcc -c x.c",
        "sccache-dist-box --format nice shim inspect --tmpfs /tmp sh -c true",
        "sccache-dist-box shim options --arity 2",
      ])
    )
    .addCommand(makeInspectCommand())
    .addCommand(makeOptionsCommand());
}
