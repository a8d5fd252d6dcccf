import type { BridgeCommand } from "@spooltag/shared";

/**
 * The bridge's handle on a connected NFC agent. One link is active at a
 * time; the session sends commands through it and closes it when a newer
 * agent connection replaces it.
 */
export interface AgentLink {
  readonly id: string;
  readonly remoteAddress?: string;
  send(command: BridgeCommand): void;
  close(code?: number, reason?: string): void;
}
