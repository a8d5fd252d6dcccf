/**
 * @spooltag/agent
 * Phone/desktop side of the bridge: reads and writes spool tags on request.
 */

export * from "./lib/index.js";
