/**
 * Configuration Manager for the NFC agent
 * Persists bridge URL, device name, candidate keys and reconnect delay in
 * ~/.spooltag-agent/config.json (mode 0600).
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir, hostname } from "node:os";
import { join } from "node:path";

import { InvalidInputError, cleanHex, toError } from "@spooltag/shared";

import { DEFAULT_CANDIDATE_KEYS } from "./tag-operations.js";

export interface AgentPersistedConfig {
  bridgeUrl: string;
  deviceName: string;
  /** Hex keys tried on sectors the supplied key does not open. */
  candidateKeys: string[];
  reconnectDelayMs: number;
  createdAt: string;
}

export const DEFAULT_BRIDGE_URL = "http://localhost:8000";
export const DEFAULT_RECONNECT_DELAY_MS = 5000;

const CONFIG_DIR = join(homedir(), ".spooltag-agent");
const CONFIG_FILE = join(CONFIG_DIR, "config.json");

function requireString(source: object, key: string): string {
  const value: unknown = Reflect.get(source, key);
  if (typeof value !== "string" || value.trim() === "") {
    throw new InvalidInputError(`Invalid config: ${key} must be a non-empty string`);
  }
  return value;
}

function normalizeKey(key: string): string {
  const hex = cleanHex(key).toUpperCase();
  if (!/^[0-9A-F]{12}$/.test(hex)) {
    throw new InvalidInputError(`Invalid config: candidate key ${key} must be 12 hex characters`);
  }
  return hex;
}

/**
 * Validate a parsed config file. Unknown fields are dropped.
 */
export function parseAgentConfig(value: unknown): AgentPersistedConfig {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new InvalidInputError("Invalid config: expected a JSON object");
  }

  const bridgeUrl = requireString(value, "bridgeUrl");
  if (!/^(https?|wss?):\/\//.test(bridgeUrl)) {
    throw new InvalidInputError(`Invalid config: bridgeUrl must be an http(s) or ws(s) URL: ${bridgeUrl}`);
  }

  const candidateKeys: unknown = Reflect.get(value, "candidateKeys");
  if (!Array.isArray(candidateKeys) || !candidateKeys.every((k): k is string => typeof k === "string")) {
    throw new InvalidInputError("Invalid config: candidateKeys must be an array of hex strings");
  }

  const reconnectDelayMs: unknown = Reflect.get(value, "reconnectDelayMs");
  if (typeof reconnectDelayMs !== "number" || !Number.isInteger(reconnectDelayMs) || reconnectDelayMs < 100) {
    throw new InvalidInputError("Invalid config: reconnectDelayMs must be an integer of at least 100");
  }

  return {
    bridgeUrl,
    deviceName: requireString(value, "deviceName"),
    candidateKeys: candidateKeys.map(normalizeKey),
    reconnectDelayMs,
    createdAt: requireString(value, "createdAt"),
  };
}

/**
 * Loads the agent config, creating it with defaults on first run.
 */
export class AgentConfigManager {
  private config: AgentPersistedConfig | null = null;

  constructor(
    private readonly configPath: string = CONFIG_FILE,
    private readonly configDir: string = CONFIG_DIR,
  ) {}

  loadOrCreate(defaults: Partial<Pick<AgentPersistedConfig, "bridgeUrl" | "deviceName">> = {}): AgentPersistedConfig {
    if (this.config) {
      return this.config;
    }

    this.ensureConfigDir();
    if (existsSync(this.configPath)) {
      return this.loadExisting();
    }

    this.config = {
      bridgeUrl: defaults.bridgeUrl ?? process.env.BRIDGE_URL ?? DEFAULT_BRIDGE_URL,
      deviceName: defaults.deviceName ?? `spooltag-agent@${hostname()}`,
      candidateKeys: [...DEFAULT_CANDIDATE_KEYS],
      reconnectDelayMs: DEFAULT_RECONNECT_DELAY_MS,
      createdAt: new Date().toISOString(),
    };
    this.save();
    return this.config;
  }

  getConfig(): AgentPersistedConfig {
    if (!this.config) {
      throw new Error("Config not loaded. Call loadOrCreate() first.");
    }
    return this.config;
  }

  update(changes: Partial<Omit<AgentPersistedConfig, "createdAt">>): AgentPersistedConfig {
    const next = parseAgentConfig({ ...this.getConfig(), ...changes });
    this.config = next;
    this.save();
    return next;
  }

  private loadExisting(): AgentPersistedConfig {
    try {
      const content = readFileSync(this.configPath, "utf8");
      this.config = parseAgentConfig(JSON.parse(content));
      return this.config;
    } catch (error) {
      throw new InvalidInputError(
        `Failed to load config from ${this.configPath}: ${toError(error).message}`,
      );
    }
  }

  private save(): void {
    const config = this.getConfig();
    try {
      writeFileSync(this.configPath, JSON.stringify(config, null, 2), { mode: 0o600 });
    } catch (error) {
      throw new Error(`Failed to save config to ${this.configPath}: ${toError(error).message}`);
    }
  }

  private ensureConfigDir(): void {
    if (!existsSync(this.configDir)) {
      mkdirSync(this.configDir, { recursive: true, mode: 0o700 });
    }
  }
}
