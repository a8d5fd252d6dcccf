export * from "./raw-data.js";
export * from "./reconnecting-socket.js";
