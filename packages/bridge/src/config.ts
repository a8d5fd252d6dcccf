/**
 * Bridge configuration from the environment.
 */

import { InvalidInputError, parseLogLevel, type LogLevel } from "@spooltag/shared";

export interface BridgeConfig {
  port: number;
  host: string;
  /** Default per-request deadline for tag operations. */
  requestTimeoutMs: number;
  logLevel: LogLevel;
}

export const DEFAULT_BRIDGE_CONFIG: BridgeConfig = {
  port: 8000,
  host: "0.0.0.0",
  requestTimeoutMs: 30_000,
  logLevel: "info",
};

function parseInteger(
  env: Record<string, string | undefined>,
  name: string,
  fallback: number,
  min: number,
  max: number,
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new InvalidInputError(`${name} must be an integer between ${min} and ${max}: ${raw}`);
  }
  return value;
}

export function loadBridgeConfig(
  env: Record<string, string | undefined> = process.env,
): BridgeConfig {
  return {
    port: parseInteger(env, "PORT", DEFAULT_BRIDGE_CONFIG.port, 0, 65535),
    host: env.HOST?.trim() || DEFAULT_BRIDGE_CONFIG.host,
    requestTimeoutMs: parseInteger(
      env,
      "REQUEST_TIMEOUT_MS",
      DEFAULT_BRIDGE_CONFIG.requestTimeoutMs,
      1,
      10 * 60_000,
    ),
    logLevel: parseLogLevel(env.LOG_LEVEL, DEFAULT_BRIDGE_CONFIG.logLevel),
  };
}
