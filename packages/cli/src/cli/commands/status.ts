import chalk from "chalk";

import { BridgeClient } from "../../lib/bridge-client.js";
import { formatStatus } from "../../lib/format.js";
import { reportFailure, resolveBridgeUrl, type BridgeArgs } from "./common.js";

export type StatusCommandArgs = BridgeArgs & {
  json?: boolean;
};

/**
 * Show whether an agent is connected and what the bridge is waiting for.
 */
export async function run(argv: StatusCommandArgs): Promise<void> {
  const client = new BridgeClient({ bridgeUrl: resolveBridgeUrl(argv.bridge) });

  try {
    const status = await client.getStatus();
    if (argv.json) {
      console.info(JSON.stringify(status, null, 2));
      return;
    }
    const color = status.connected ? chalk.green : chalk.yellow;
    for (const line of formatStatus(status)) {
      console.info(color(line));
    }
  } catch (error) {
    reportFailure("Status failed", error);
  }
}
