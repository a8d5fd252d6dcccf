/**
 * Full system test: bridge server, agent on a simulated reader and the CLI
 * client, all in this process over real HTTP and WebSocket connections on
 * an ephemeral port.
 */

import { describe, it, expect, beforeAll, afterAll, vi } from "vitest";
import { WebSocket } from "ws";

import { startServer, type BridgeRuntime } from "@spooltag/bridge";
import { AgentService, SimulatedTag, SimulatedTagPlatform } from "@spooltag/agent";
import { BridgeClient } from "@spooltag/cli";
import {
  NoBridgeConnectedError,
  createLogger,
  defaultFilamentFields,
  deriveKeys,
  encodeTag,
  parseBridgeEvent,
  parseHexToBytes,
  rawDataToString,
  type BridgeEvent,
} from "@spooltag/shared";

const UID = "7AD43F1C";

describe("Full system: bridge ⇄ agent ⇄ client", () => {
  let runtime: BridgeRuntime;
  let platform: SimulatedTagPlatform;
  let agent: AgentService;
  let client: BridgeClient;
  let tag: SimulatedTag;
  let baseUrl: string;

  beforeAll(async () => {
    runtime = await startServer({ port: 0, host: "127.0.0.1", logLevel: "error" });
    baseUrl = `http://127.0.0.1:${runtime.port}`;

    const uid = parseHexToBytes(UID);
    tag = SimulatedTag.withKeys(uid, await deriveKeys(uid));

    platform = new SimulatedTagPlatform({ deviceName: "Bench reader" });
    agent = new AgentService({
      bridgeUrl: baseUrl,
      platform,
      reconnectDelayMs: 100,
      logger: createLogger("test:agent", "error"),
    });
    agent.start();

    client = new BridgeClient({ bridgeUrl: baseUrl });

    await vi.waitFor(() => {
      expect(runtime.bridge.getStats().device).toBe("Bench reader");
    });
  });

  afterAll(async () => {
    await agent?.stop();
    await runtime?.stop();
  });

  async function presentWhenWaiting(): Promise<void> {
    await vi.waitFor(() => {
      expect(platform.isWaiting()).toBe(true);
    });
    platform.present(tag);
  }

  it("reports the connected agent", async () => {
    const status = await client.getStatus();

    expect(status.connected).toBe(true);
    expect(status.device).toBe("Bench reader");
    expect(status.state).toBe("idle");
  });

  it("reads a blank personalised tag", async () => {
    const reading = client.read({ timeoutMs: 5000 });
    await presentWhenWaiting();
    const result = await reading;

    expect(result.uid).toBe(UID);
    expect(result.readableSectors).toHaveLength(16);
    expect(result.unreadableSectors).toEqual([]);
    expect(result.record.filamentType).toBe("");
  });

  it("writes filament data and reads it back", async () => {
    const image = encodeTag({
      ...defaultFilamentFields(),
      filamentType: "PETG",
      detailedFilamentType: "PETG Basic",
      spoolWeightG: 1000,
    });

    const writing = client.write(image, { uid: UID, timeoutMs: 5000 });
    await presentWhenWaiting();
    const written = await writing;

    expect(written.success).toBe(true);
    expect(written.blocksWritten).toBe(47);
    expect(written.expectedBlocks).toBe(47);

    const reading = client.read({ timeoutMs: 5000 });
    await presentWhenWaiting();
    const result = await reading;

    expect(result.record.filamentType).toBe("PETG");
    expect(result.record.detailedFilamentType).toBe("PETG Basic");
    expect(result.record.spoolWeightG).toBe(1000);
  });

  it("announces detected tags on the event feed", async () => {
    const events: BridgeEvent[] = [];
    const feed = new WebSocket(`ws://127.0.0.1:${runtime.port}/ws/events`);
    feed.on("message", (data) => events.push(parseBridgeEvent(rawDataToString(data))));
    await new Promise<void>((resolve, reject) => {
      feed.once("open", () => resolve());
      feed.once("error", reject);
    });

    const reading = client.read({ timeoutMs: 5000 });
    await presentWhenWaiting();
    await reading;

    await vi.waitFor(() => {
      expect(events).toContainEqual({ type: "tag_detected", uid: UID });
    });
    feed.close();
  });

  it("fails fast once the agent is gone", async () => {
    await agent.stop();
    await vi.waitFor(() => {
      expect(runtime.bridge.getStats().connected).toBe(false);
    });

    await expect(client.read({ timeoutMs: 5000 })).rejects.toBeInstanceOf(NoBridgeConnectedError);
  });
});
