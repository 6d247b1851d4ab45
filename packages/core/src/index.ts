export * from "./errors.js";
export * from "./statistics/moments.js";
export * from "./statistics/state.js";
export * from "./statistics/keyed.js";
export * from "./statistics/shards.js";
export * from "./input/parse.js";
export * from "./config/schema.js";
export * from "./config/loader.js";
