// pattern: Functional Core
// Barrel file for logger exports

export * from "./config.js";
export * from "./instance.js";
export * from "./renderer.js";
export * from "./types.js";
