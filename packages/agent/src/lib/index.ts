/**
 * Agent Library - Public API
 * The runtime layer (runtime/main.ts) wires these together.
 */

export { AgentService } from "./agent-service.js";
export {
  AgentConfigManager,
  DEFAULT_BRIDGE_URL,
  DEFAULT_RECONNECT_DELAY_MS,
  parseAgentConfig,
} from "./config-manager.js";
export { DEFAULT_NFC_AGENT_URL, NfcAgentTagPlatform } from "./nfc-agent-platform.js";
export { TagLostError } from "./platform.js";
export { SimulatedTag, SimulatedTagPlatform } from "./simulated-platform.js";
export {
  DEFAULT_CANDIDATE_KEYS,
  parseCandidateKeys,
  readSectors,
  writeSectors,
} from "./tag-operations.js";
export { TagWorker } from "./tag-worker.js";

export type { AgentServiceConfig } from "./agent-service.js";
export type { AgentPersistedConfig } from "./config-manager.js";
export type { NfcAgentPlatformOptions } from "./nfc-agent-platform.js";
export type { KeyType, TagConnection, TagPlatform } from "./platform.js";
export type { SimulatedPlatformOptions, SimulatedTagOptions } from "./simulated-platform.js";
export type { SectorReadResult, SectorWriteResult } from "./tag-operations.js";
export type { TagJob, TagWorkerOptions, WorkerStage } from "./tag-worker.js";
