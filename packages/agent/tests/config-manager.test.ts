/**
 * Unit tests for AgentConfigManager
 */

import { existsSync, mkdtempSync, rmSync, statSync, writeFileSync, readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { InvalidInputError } from "@spooltag/shared";

import { AgentConfigManager, parseAgentConfig } from "../src/lib/config-manager.js";

describe("AgentConfigManager", () => {
  let testDir: string;
  let configFile: string;
  let manager: AgentConfigManager;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), "spooltag-agent-test-"));
    configFile = join(testDir, "config.json");
    manager = new AgentConfigManager(configFile, testDir);
  });

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true });
    }
  });

  it("creates a config with defaults on first run", () => {
    const config = manager.loadOrCreate({ bridgeUrl: "http://192.168.1.20:8000", deviceName: "Pixel" });

    expect(config).toMatchObject({
      bridgeUrl: "http://192.168.1.20:8000",
      deviceName: "Pixel",
      candidateKeys: ["FFFFFFFFFFFF", "A0A1A2A3A4A5", "D3F7D3F7D3F7"],
      reconnectDelayMs: 5000,
    });
    expect(existsSync(configFile)).toBe(true);
  });

  it("writes the file readable by the owner only", () => {
    manager.loadOrCreate({ bridgeUrl: "http://localhost:8000" });

    expect(statSync(configFile).mode & 0o777).toBe(0o600);
  });

  it("loads the same config in a new manager", () => {
    const created = manager.loadOrCreate({ bridgeUrl: "http://localhost:8000", deviceName: "bench" });

    const loaded = new AgentConfigManager(configFile, testDir).loadOrCreate();

    expect(loaded).toEqual(created);
  });

  it("normalizes candidate keys on update", () => {
    manager.loadOrCreate({ bridgeUrl: "http://localhost:8000" });

    const updated = manager.update({ candidateKeys: ["a0:a1:a2:a3:a4:a5"] });

    expect(updated.candidateKeys).toEqual(["A0A1A2A3A4A5"]);
    expect(JSON.parse(readFileSync(configFile, "utf8")).candidateKeys).toEqual(["A0A1A2A3A4A5"]);
  });

  it("rejects a corrupt config file", () => {
    writeFileSync(configFile, "{ not json");

    expect(() => manager.loadOrCreate()).toThrow(InvalidInputError);
    expect(() => manager.loadOrCreate()).toThrow(/^Failed to load config from /);
  });

  it("requires loadOrCreate before getConfig", () => {
    expect(() => manager.getConfig()).toThrow("Config not loaded. Call loadOrCreate() first.");
  });
});

describe("parseAgentConfig", () => {
  const valid = {
    bridgeUrl: "http://localhost:8000",
    deviceName: "bench",
    candidateKeys: ["FFFFFFFFFFFF"],
    reconnectDelayMs: 5000,
    createdAt: "2026-01-01T00:00:00.000Z",
  };

  it("accepts a valid config and drops unknown fields", () => {
    expect(parseAgentConfig({ ...valid, extra: true })).toEqual(valid);
  });

  it("rejects a bridge URL without a scheme", () => {
    expect(() => parseAgentConfig({ ...valid, bridgeUrl: "localhost:8000" })).toThrow(
      "Invalid config: bridgeUrl must be an http(s) or ws(s) URL: localhost:8000",
    );
  });

  it("rejects a short candidate key", () => {
    expect(() => parseAgentConfig({ ...valid, candidateKeys: ["FFFF"] })).toThrow(
      "Invalid config: candidate key FFFF must be 12 hex characters",
    );
  });

  it("rejects a tiny reconnect delay", () => {
    expect(() => parseAgentConfig({ ...valid, reconnectDelayMs: 10 })).toThrow(InvalidInputError);
  });
});
