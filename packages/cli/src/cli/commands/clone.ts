import chalk from "chalk";

import { BridgeClient } from "../../lib/bridge-client.js";
import { readDumpFile } from "../../lib/dump-file.js";
import { formatWriteResult } from "../../lib/format.js";
import { reportFailure, resolveBridgeUrl, secondsToMs, type BridgeArgs } from "./common.js";

export type CloneCommandArgs = BridgeArgs & {
  file?: string;
  sourceUid?: string;
  rewriteUid?: boolean;
  timeout?: number;
};

/**
 * Copy a dump onto a blank tag. The target's keys are derived from the
 * source uid; --rewrite-uid also copies the uid to a uid-changeable tag.
 */
export async function run(argv: CloneCommandArgs): Promise<void> {
  const { file } = argv;
  if (!file) {
    console.error(chalk.red("Missing required option: --file <dump>"));
    process.exitCode = 2;
    return;
  }

  const client = new BridgeClient({ bridgeUrl: resolveBridgeUrl(argv.bridge) });

  try {
    const image = await readDumpFile(file);
    console.info(chalk.gray("Waiting for the target tag. Hold it near the reader..."));
    const result = await client.clone(image, {
      sourceUid: argv.sourceUid,
      rewriteUid: argv.rewriteUid,
      timeoutMs: secondsToMs(argv.timeout),
    });

    const line = formatWriteResult(result);
    if (result.success) {
      console.info(chalk.green(line));
    } else {
      console.error(chalk.yellow(line));
      process.exitCode = 1;
    }
  } catch (error) {
    reportFailure("Clone failed", error);
  }
}
