/**
 * CLI Library - Public API
 * The commands in src/cli are thin wrappers around these.
 */

export {
  BridgeClient,
  DEFAULT_BRIDGE_URL,
  errorFromResponse,
} from "./bridge-client.js";
export type {
  BridgeClientConfig,
  BridgeStatus,
  CloneOptions,
  ReadOptions,
  TagReadResponse,
  TagWriteResponse,
  WriteOptions,
} from "./bridge-client.js";
export {
  formatEvent,
  formatFilament,
  formatKeys,
  formatSectorSummary,
  formatStatus,
  formatWriteResult,
} from "./format.js";
export { readDumpFile, readFilamentFile, writeDumpFile } from "./dump-file.js";
