import chalk from "chalk";
import { decodeTag, filamentRecordToJson } from "@spooltag/shared";

import { readDumpFile } from "../../lib/dump-file.js";
import { formatFilament } from "../../lib/format.js";
import { reportFailure } from "./common.js";

export type DecodeCommandArgs = {
  file?: string;
  json?: boolean;
};

/**
 * Decode a dump file without talking to the bridge.
 */
export async function run(argv: DecodeCommandArgs): Promise<void> {
  const { file } = argv;
  if (!file) {
    console.error(chalk.red("Missing required option: --file <dump>"));
    process.exitCode = 2;
    return;
  }

  try {
    const filament = filamentRecordToJson(decodeTag(await readDumpFile(file)));
    if (argv.json) {
      console.info(JSON.stringify(filament, null, 2));
      return;
    }
    for (const line of formatFilament(filament)) {
      console.info(line);
    }
  } catch (error) {
    reportFailure("Decode failed", error);
  }
}
