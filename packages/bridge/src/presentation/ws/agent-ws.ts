/**
 * Agent WebSocket Handler
 * The NFC agent's transport. The newest connection becomes the active link;
 * a close detaches it only while it is still the active one.
 */

import { randomBytes } from "node:crypto";
import type { IncomingMessage } from "node:http";

import { WebSocket } from "ws";
import { NoBridgeConnectedError, createLogger, rawDataToString } from "@spooltag/shared";

import type { Bridge } from "../../bridge.js";
import type { AgentLink } from "../../session/agent-link.js";

const logger = createLogger("bridge:agent-ws");

export function handleAgentWebSocket(ws: WebSocket, req: IncomingMessage, bridge: Bridge): void {
  const linkId = `agent-${Date.now()}-${randomBytes(3).toString("hex")}`;
  const remoteAddress = req.socket.remoteAddress;

  const link: AgentLink = {
    id: linkId,
    remoteAddress,
    send(command) {
      if (ws.readyState !== WebSocket.OPEN) {
        throw new NoBridgeConnectedError("Agent socket is not open");
      }
      ws.send(JSON.stringify(command));
    },
    close(code, reason) {
      ws.close(code, reason);
    },
  };

  logger.info("Agent WebSocket connection established", { linkId, remoteAddress });
  bridge.session.attach(link);

  ws.on("message", (data) => {
    bridge.session.handleAgentMessage(linkId, rawDataToString(data));
  });

  ws.on("close", (code) => {
    bridge.session.detach(linkId);
    logger.info("Agent WebSocket connection closed", { linkId, code });
  });

  ws.on("error", (err) => {
    logger.error("Agent WebSocket error", err, { linkId });
  });
}
