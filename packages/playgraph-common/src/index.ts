export * from "./cli-parser.js";
export * from "./concurrency.js";
export * from "./config.js";
export * from "./fs.js";
export * from "./json.js";
export * from "./keyed-lock.js";
export * from "./logger.js";
export * from "./retry.js";
export * from "./timeout.js";
