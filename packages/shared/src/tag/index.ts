export * from "./layout.js";
export * from "./image.js";
export * from "./codec.js";
export * from "./filament-json.js";
