export * from "./binary.js";
export * from "./hex.js";
export * from "./logger.js";
