export * from "./logger.js";
export * from "./hex.js";
export * from "./encoding.js";
export * from "./typed-emitter.js";
