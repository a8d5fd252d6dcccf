/**
 * Bridge Server
 * Hono HTTP API and the agent/event WebSockets on one Node http server.
 * Can be started in-process for testing or standalone.
 */

import { createServer, type Server } from "node:http";

import { getRequestListener } from "@hono/node-server";
import { Hono } from "hono";
import { WebSocketServer } from "ws";
import { createLogger, toError } from "@spooltag/shared";

import { Bridge } from "./bridge.js";
import { DEFAULT_BRIDGE_CONFIG, type BridgeConfig } from "./config.js";
import { createBridgeRoutes } from "./presentation/rest/bridge-routes.js";
import { createTagRoutes } from "./presentation/rest/tag-routes.js";
import { handleAgentWebSocket } from "./presentation/ws/agent-ws.js";
import { handleEventsWebSocket } from "./presentation/ws/events-ws.js";

const logger = createLogger("bridge:server");

export interface BridgeRuntime {
  bridge: Bridge;
  server: Server;
  wss: WebSocketServer;
  /** Bound port; differs from the configured one when that was 0. */
  port: number;
  stop: () => Promise<void>;
}

export function createApp(bridge: Bridge): Hono {
  const app = new Hono();
  app.route("/", createBridgeRoutes(bridge));
  app.route("/", createTagRoutes(bridge));
  app.notFound((c) => c.json({ error: { code: "NOT_FOUND", message: "Not found" } }, 404));
  return app;
}

/**
 * Start the bridge HTTP/WebSocket server.
 */
export async function startServer(config: Partial<BridgeConfig> = {}): Promise<BridgeRuntime> {
  const resolved: BridgeConfig = { ...DEFAULT_BRIDGE_CONFIG, ...config };
  logger.setLevel(resolved.logLevel);

  const bridge = new Bridge(resolved);
  bridge.start();

  const app = createApp(bridge);
  const httpServer = createServer(getRequestListener(app.fetch));
  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws, req) => {
    const path = new URL(req.url ?? "/", "http://bridge.local").pathname;

    if (path === "/ws/agent") {
      handleAgentWebSocket(ws, req, bridge);
    } else if (path === "/ws/events") {
      handleEventsWebSocket(ws, bridge);
    } else {
      logger.warn("Rejecting WebSocket on unknown path", { path });
      ws.close(1008, "Invalid WebSocket path");
    }
  });

  wss.on("error", (err) => {
    logger.error("WebSocket server error", err);
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(resolved.port, resolved.host, () => {
      httpServer.off("error", reject);
      resolve();
    });
  });

  const address = httpServer.address();
  const port = typeof address === "object" && address !== null ? address.port : resolved.port;
  logger.info("Bridge server listening", { host: resolved.host, port });

  return {
    bridge,
    server: httpServer,
    wss,
    port,
    async stop() {
      bridge.stop();
      for (const client of wss.clients) {
        client.terminate();
      }
      await new Promise<void>((resolve) => {
        wss.close(() => resolve());
      });
      await new Promise<void>((resolve, reject) => {
        httpServer.close((err) => {
          if (err) {
            reject(toError(err));
            return;
          }
          logger.info("Bridge server stopped");
          resolve();
        });
      });
    },
  };
}
