export * from "./types.js";
export * from "./schemas.js";
export * from "./errors.js";
export * from "./config.js";
export * from "./logger.js";
