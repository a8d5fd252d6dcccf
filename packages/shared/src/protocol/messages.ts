/**
 * Envelopes exchanged between the bridge and the NFC agent over the agent
 * WebSocket. Field names are snake_case on the wire.
 *
 * Blocks are base64 of exactly 16 bytes; keys are 12 hex characters;
 * uids are 8 hex characters.
 */

// ── bridge → agent ──

export interface ReadTagCommand {
  action: "READ_TAG";
  request_id: string;
  /** Sixteen sector keys. When absent the agent derives keys from the touched tag. */
  keys?: string[];
}

export interface WriteTagCommand {
  action: "WRITE_TAG";
  request_id: string;
  /** Sixteen sector keys; a null entry means the sector is skipped. */
  keys: (string | null)[];
  blocks: string[];
  /** Target uid for tags whose identifier can be rewritten. */
  uid?: string;
}

/** Abandon a request that is still waiting for a tag touch. */
export interface CancelCommand {
  action: "CANCEL";
  request_id: string;
}

export type BridgeCommand = ReadTagCommand | WriteTagCommand | CancelCommand;

// ── agent → bridge ──

export interface StatusMessage {
  action: "STATUS";
  connected: boolean;
  device: string;
}

export interface TagDetectedMessage {
  action: "TAG_DETECTED";
  uid: string;
}

export interface TagDataMessage {
  action: "TAG_DATA";
  uid: string;
  blocks: string[];
  request_id?: string;
  /** Bit s set when sector s was read under authentication. */
  readable_sectors?: number;
}

export type WriteErrorCode = "UNSUPPORTED_OPERATION" | "TAG_ERROR";

export interface WriteResultMessage {
  action: "WRITE_RESULT";
  success: boolean;
  blocks_written: number;
  error?: string;
  error_code?: string;
  uid?: string;
  request_id?: string;
}

export interface ErrorMessage {
  action: "ERROR";
  message: string;
  request_id?: string;
  code?: string;
}

export type AgentMessage =
  | StatusMessage
  | TagDetectedMessage
  | TagDataMessage
  | WriteResultMessage
  | ErrorMessage;

/** Responses that carry a correlation id back to the bridge. */
export type AgentResponse = TagDataMessage | WriteResultMessage | ErrorMessage;

// ── bridge → event subscribers (/ws/events) ──

export interface BridgeStatusEvent {
  type: "bridge_status";
  connected: boolean;
  device: string | null;
  state: "idle" | "awaiting_tag";
  pending_request_id: string | null;
  last_uid: string | null;
}

export interface TagDetectedEvent {
  type: "tag_detected";
  uid: string;
}

export type BridgeEvent = BridgeStatusEvent | TagDetectedEvent;
