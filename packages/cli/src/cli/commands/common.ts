import chalk from "chalk";
import { isSpoolTagError, toError, type DumpFormat } from "@spooltag/shared";

import { DEFAULT_BRIDGE_URL } from "../../lib/bridge-client.js";

export type BridgeArgs = {
  bridge?: string;
};

export function resolveBridgeUrl(bridge?: string): string {
  return bridge ?? process.env.SPOOLTAG_BRIDGE_URL ?? DEFAULT_BRIDGE_URL;
}

/**
 * Print a failure and set the exit code: 2 for bad input, 1 otherwise.
 */
export function reportFailure(what: string, error: unknown): void {
  const err = toError(error);
  const code = isSpoolTagError(error) ? ` [${error.code}]` : "";
  console.error(chalk.red(`${what}: ${err.message}${code}`));
  process.exitCode = isSpoolTagError(error) && error.code === "INVALID_INPUT" ? 2 : 1;
}

export function isDumpFormat(value: string): value is DumpFormat {
  return value === "binary" || value === "hex" || value === "base64" || value === "proxmark";
}

export function secondsToMs(seconds?: number): number | undefined {
  return seconds === undefined ? undefined : Math.round(seconds * 1000);
}
