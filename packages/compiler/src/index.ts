export * from "./sem-ir/index.js";
export * from "./check/index.js";
export * from "./diagnostics/index.js";
export * from "./perf.js";
export * from "./config.js";
