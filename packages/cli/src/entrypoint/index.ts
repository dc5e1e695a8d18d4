// pattern: Functional Core
// Barrel file for the container entrypoint

export * from "./plan.js";
export * from "./run.js";
