#!/usr/bin/env node
/**
 * Bridge Runtime - Standalone Server
 * Reads configuration from the environment and runs until SIGINT/SIGTERM.
 */

import { createLogger, toError } from "@spooltag/shared";

import { loadBridgeConfig } from "../config.js";
import { startServer } from "../server.js";

const logger = createLogger("bridge:main");

async function main(): Promise<void> {
  const config = loadBridgeConfig();
  logger.setLevel(config.logLevel);
  const runtime = await startServer(config);

  console.log(`Bridge listening on http://${config.host}:${runtime.port}`);
  console.log(`  agent socket:  ws://${config.host}:${runtime.port}/ws/agent`);
  console.log(`  event feed:    ws://${config.host}:${runtime.port}/ws/events`);

  const shutdown = async (): Promise<void> => {
    console.log("\nShutting down bridge...");
    await runtime.stop();
    console.log("✓ Stopped");
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      logger.error("Shutdown failed", toError(error));
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

if (!process.env.VITEST) {
  main().catch((error: unknown) => {
    logger.error("Fatal error", toError(error));
    process.exit(1);
  });
}
