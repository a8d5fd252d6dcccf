/**
 * Event feed WebSocket Handler
 * Read-only stream of bridge_status and tag_detected events.
 */

import { randomBytes } from "node:crypto";

import { WebSocket } from "ws";
import { createLogger } from "@spooltag/shared";

import type { Bridge } from "../../bridge.js";

const logger = createLogger("bridge:events-ws");

export function handleEventsWebSocket(ws: WebSocket, bridge: Bridge): void {
  const id = `sub-${Date.now()}-${randomBytes(3).toString("hex")}`;

  ws.on("message", () => {
    logger.debug("Ignoring message on read-only event feed", { subscriberId: id });
  });

  ws.on("close", () => {
    bridge.removeSubscriber(id);
    logger.debug("Event subscriber disconnected", { subscriberId: id });
  });

  ws.on("error", (err) => {
    logger.error("Event feed WebSocket error", err, { subscriberId: id });
  });

  bridge.addSubscriber({
    id,
    connectedAt: new Date(),
    send(event) {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(JSON.stringify(event));
      }
    },
    close(code, reason) {
      ws.close(code, reason);
    },
  });
  logger.debug("Event subscriber connected", { subscriberId: id });
}
