export * from "./cli.js";
export * from "./spotify-provider.js";
export * from "./user-config.js";
