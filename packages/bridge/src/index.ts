/**
 * @spooltag/bridge
 * Single-flight coordinator between request initiators and the NFC agent,
 * with its HTTP API and WebSocket endpoints.
 */

export { Bridge, toStatusEvent } from "./bridge.js";
export { DEFAULT_BRIDGE_CONFIG, loadBridgeConfig, type BridgeConfig } from "./config.js";
export { createApp, startServer, type BridgeRuntime } from "./server.js";
export {
  BridgeSession,
  formatUid,
  parseUid,
  type BridgeSessionEvents,
  type BridgeSessionOptions,
  type BridgeStatus,
  type CloneOptions,
  type ReadOptions,
  type ReadResult,
  type RequestKind,
  type SessionState,
  type WriteOptions,
  type WriteResult,
} from "./session/bridge-session.js";
export type { AgentLink } from "./session/agent-link.js";
export { SubscriberRepository, type EventSubscriber } from "./repository/subscriber-repository.js";
export { statusForError, type ErrorStatus } from "./presentation/rest/http-errors.js";
