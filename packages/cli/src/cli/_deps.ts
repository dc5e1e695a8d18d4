// pattern: Imperative Shell
// Process-wide services shared by the CLI commands

export {
  CLI_LOGGER,
  initializeLogger,
  setCliLogLevel,
} from "../logger/index.js";
