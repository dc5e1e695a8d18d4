// pattern: Functional Core
// Barrel file for the bubblewrap shim

export * from "./arity-table.js";
export * from "./format.js";
export * from "./forwarder.js";
export * from "./split.js";
