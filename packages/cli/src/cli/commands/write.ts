import chalk from "chalk";

import { BridgeClient } from "../../lib/bridge-client.js";
import { readDumpFile } from "../../lib/dump-file.js";
import { formatWriteResult } from "../../lib/format.js";
import { reportFailure, resolveBridgeUrl, secondsToMs, type BridgeArgs } from "./common.js";

export type WriteCommandArgs = BridgeArgs & {
  file?: string;
  uid?: string;
  timeout?: number;
};

/**
 * Write the payload blocks of a dump to the next tag touched.
 * Sector keys come from --uid, or from the uid in block 0 of the dump.
 */
export async function run(argv: WriteCommandArgs): Promise<void> {
  const { file } = argv;
  if (!file) {
    console.error(chalk.red("Missing required option: --file <dump>"));
    process.exitCode = 2;
    return;
  }

  const client = new BridgeClient({ bridgeUrl: resolveBridgeUrl(argv.bridge) });

  try {
    const image = await readDumpFile(file);
    console.info(chalk.gray("Waiting for a tag. Hold it near the reader..."));
    const result = await client.write(image, { uid: argv.uid, timeoutMs: secondsToMs(argv.timeout) });

    const line = formatWriteResult(result);
    if (result.success) {
      console.info(chalk.green(line));
    } else {
      console.error(chalk.yellow(line));
      process.exitCode = 1;
    }
  } catch (error) {
    reportFailure("Write failed", error);
  }
}
