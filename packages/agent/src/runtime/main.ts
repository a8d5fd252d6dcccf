#!/usr/bin/env node
/**
 * Agent Runtime - Standalone Service
 * Thin wrapper around AgentService: loads the persisted config, applies
 * flags and environment, picks a tag platform and runs until SIGINT.
 */

import { createLogger, deriveKeys, parseHexToBytes, parseLogLevel, toError } from "@spooltag/shared";

import {
  AgentConfigManager,
  AgentService,
  DEFAULT_NFC_AGENT_URL,
  NfcAgentTagPlatform,
  SimulatedTag,
  SimulatedTagPlatform,
  type TagPlatform,
} from "../lib/index.js";

const logger = createLogger("agent:main", parseLogLevel(process.env.LOG_LEVEL));

const DEMO_UID = "7AD43F1C";

interface RuntimeArgs {
  bridgeUrl?: string;
  deviceName?: string;
  useSimulator: boolean;
  nfcAgentUrl: string;
  readerIndex: number;
}

function printHelp(): void {
  console.log(`
spooltag agent - NFC side of the spool tag bridge

Usage: spooltag-agent [options]

Options:
  --bridge <url>      Bridge URL (default: from config, $BRIDGE_URL or http://localhost:8000)
  --device <name>     Device name announced to the bridge
  --simulate          Use the simulated tag platform instead of a reader
  --nfc-agent <url>   nfc-agent service URL (default: ${DEFAULT_NFC_AGENT_URL})
  --reader <index>    Reader index on the nfc-agent service (default: 0)
  --help, -h          Show this help message

Environment Variables:
  BRIDGE_URL          Bridge URL
  USE_SIMULATOR       Set to 'true' to use the simulated platform
  NFC_AGENT_URL       nfc-agent service URL
  LOG_LEVEL           debug | info | warn | error

Configuration:
  Config file: ~/.spooltag-agent/config.json
`);
}

function parseArgs(argv: readonly string[]): RuntimeArgs {
  const args: RuntimeArgs = {
    bridgeUrl: process.env.BRIDGE_URL,
    useSimulator: process.env.USE_SIMULATOR === "true",
    nfcAgentUrl: process.env.NFC_AGENT_URL ?? DEFAULT_NFC_AGENT_URL,
    readerIndex: 0,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (arg === "--bridge" && next) {
      args.bridgeUrl = next;
      i++;
    } else if (arg === "--device" && next) {
      args.deviceName = next;
      i++;
    } else if (arg === "--nfc-agent" && next) {
      args.nfcAgentUrl = next;
      i++;
    } else if (arg === "--reader" && next) {
      args.readerIndex = Number.parseInt(next, 10);
      i++;
    } else if (arg === "--simulate") {
      args.useSimulator = true;
    } else if (arg === "--help" || arg === "-h") {
      printHelp();
      process.exit(0);
    }
  }

  if (!Number.isInteger(args.readerIndex) || args.readerIndex < 0) {
    throw new Error("--reader must be a non-negative integer");
  }
  return args;
}

/** One simulated tag, personalised with derived keys, touched two seconds into every job. */
async function createDemoPlatform(): Promise<SimulatedTagPlatform> {
  const uid = parseHexToBytes(DEMO_UID);
  const tag = SimulatedTag.withKeys(uid, await deriveKeys(uid));
  return new SimulatedTagPlatform({ autoPresent: tag, autoPresentDelayMs: 2000 });
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const configManager = new AgentConfigManager();
  const config = configManager.loadOrCreate({ bridgeUrl: args.bridgeUrl, deviceName: args.deviceName });
  const bridgeUrl = args.bridgeUrl ?? config.bridgeUrl;
  const deviceName = args.deviceName ?? config.deviceName;

  const platform: TagPlatform = args.useSimulator
    ? await createDemoPlatform()
    : new NfcAgentTagPlatform({ baseUrl: args.nfcAgentUrl, readerIndex: args.readerIndex });

  console.log("Starting spooltag agent...");
  console.log(`Bridge URL: ${bridgeUrl}`);
  console.log(`Platform: ${args.useSimulator ? "Simulated" : `nfc-agent (${args.nfcAgentUrl})`}`);

  const service = new AgentService({
    bridgeUrl,
    platform,
    deviceName,
    candidateKeys: config.candidateKeys,
    reconnectDelayMs: config.reconnectDelayMs,
    logger: createLogger("agent:service", parseLogLevel(process.env.LOG_LEVEL)),
  });
  service.start();

  const shutdown = async (): Promise<void> => {
    console.log("\nShutting down agent...");
    await service.stop();
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
