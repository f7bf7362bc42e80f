export * from "./errors.js";
export * from "./evaluator.js";
export * from "./graph.js";
export * from "./memory-provider.js";
export * from "./reconciler.js";
export * from "./registry.js";
export * from "./run-context.js";
export * from "./run.js";
export * from "./template.js";
export * from "./transforms.js";
export * from "./types.js";
