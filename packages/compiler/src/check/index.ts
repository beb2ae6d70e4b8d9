export * from "./context.js";
export * from "./eval.js";
export * from "./generic.js";
export * from "./generic-region-stack.js";
