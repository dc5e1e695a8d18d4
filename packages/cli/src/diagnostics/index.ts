// pattern: Functional Core
// Barrel file for setup doctor exports

export * from "./config-checks.js";
export * from "./connectivity.js";
export * from "./container-checks.js";
export * from "./container-probe.js";
export * from "./doctor.js";
export * from "./env-checks.js";
export * from "./formatter.js";
export * from "./local-checks.js";
export * from "./redact.js";
export * from "./types.js";
