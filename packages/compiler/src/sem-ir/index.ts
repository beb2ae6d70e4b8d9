export * from "./ids.js";
export * from "./inst.js";
export * from "./write-once.js";
export * from "./contracts.js";
export * from "./inst-store.js";
export * from "./constant-store.js";
export * from "./types.js";
export * from "./generic-store.js";
export * from "./generic-instance-store.js";
export * from "./mem-usage.js";
export * from "./file.js";
export * from "./substitution.js";
