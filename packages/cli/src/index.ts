// pattern: Functional Core
// Library entry point

export * from "./config/sccache-client.js";
export * from "./config/settings.js";
export * from "./diagnostics/index.js";
export * from "./entrypoint/index.js";
export * from "./shim/index.js";
export * from "./utils/errors.js";

// Both barrels export RELAYED_SIGNALS; the package root names the entrypoint's.
export { RELAYED_SIGNALS } from "./entrypoint/index.js";
