export * from "./errors.js";
export * from "./json.js";
export * from "./logger.js";
export * from "./objects.js";
