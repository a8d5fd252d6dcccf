/**
 * Shared building blocks of the spool tag system: key derivation, the tag
 * codec and dump formats, the agent wire protocol, errors and logging.
 */

export * from "./errors.js";
export * from "./utils/index.js";
export * from "./crypto/key-derivation.js";
export * from "./tag/index.js";
export * from "./protocol/index.js";
export * from "./ws/index.js";
