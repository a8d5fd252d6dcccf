/**
 * Bridge REST Routes
 * Health and live status of the agent link.
 */

import { Hono } from "hono";

import type { Bridge } from "../../bridge.js";

export function createBridgeRoutes(bridge: Bridge): Hono {
  const app = new Hono();

  app.get("/health", (c) => {
    return c.json({ ok: true, running: bridge.isRunning() });
  });

  /**
   * GET /api/bridge/status
   * Response: connection state, device name, pending request and counters
   */
  app.get("/api/bridge/status", (c) => {
    const stats = bridge.getStats();
    return c.json({
      running: stats.running,
      connected: stats.connected,
      device: stats.device,
      state: stats.state,
      pending_request_id: stats.pendingRequestId,
      pending_kind: stats.pendingKind,
      last_uid: stats.lastUid,
      subscribers: stats.subscribers,
      completed: stats.completed,
      failed: stats.failed,
      protocol_violations: stats.protocolViolations,
      discarded_responses: stats.discardedResponses,
    });
  });

  return app;
}
