export type * from "./messages.js";
export * from "./parse.js";
export * from "./builders.js";
