import chalk from "chalk";
import { filamentRecordToJson, imageToBase64Blocks } from "@spooltag/shared";

import { BridgeClient } from "../../lib/bridge-client.js";
import { writeDumpFile } from "../../lib/dump-file.js";
import { formatFilament, formatSectorSummary } from "../../lib/format.js";
import { isDumpFormat, reportFailure, resolveBridgeUrl, secondsToMs, type BridgeArgs } from "./common.js";

export type ReadCommandArgs = BridgeArgs & {
  uid?: string;
  timeout?: number;
  json?: boolean;
  out?: string;
  format?: string;
};

/**
 * Read the next tag touched to the agent's reader and show its filament data.
 */
export async function run(argv: ReadCommandArgs): Promise<void> {
  const format = argv.format ?? "binary";
  if (!isDumpFormat(format)) {
    console.error(chalk.red(`Unknown dump format: ${format}`));
    process.exitCode = 2;
    return;
  }

  const client = new BridgeClient({ bridgeUrl: resolveBridgeUrl(argv.bridge) });

  try {
    if (!argv.json) {
      console.info(chalk.gray("Waiting for a tag. Hold it near the reader..."));
    }
    const result = await client.read({ uid: argv.uid, timeoutMs: secondsToMs(argv.timeout) });

    if (argv.out) {
      await writeDumpFile(argv.out, result.image, format);
    }

    if (argv.json) {
      console.info(
        JSON.stringify(
          {
            request_id: result.requestId,
            uid: result.uid,
            readable_sectors: result.readableSectors,
            unreadable_sectors: result.unreadableSectors,
            filament: filamentRecordToJson(result.record),
            blocks: imageToBase64Blocks(result.image),
          },
          null,
          2,
        ),
      );
      return;
    }

    const summary = formatSectorSummary(result.readableSectors, result.unreadableSectors);
    console.info(result.unreadableSectors.length > 0 ? chalk.yellow(summary) : chalk.green(summary));
    for (const line of formatFilament(filamentRecordToJson(result.record))) {
      console.info(line);
    }
    if (argv.out) {
      console.info(chalk.gray(`Dump written to ${argv.out} (${format})`));
    }
  } catch (error) {
    reportFailure("Read failed", error);
  }
}
