import chalk from "chalk";
import { encodeTag, formatDump } from "@spooltag/shared";

import { readFilamentFile, writeDumpFile } from "../../lib/dump-file.js";
import { isDumpFormat, reportFailure } from "./common.js";

export type EncodeCommandArgs = {
  file?: string;
  format?: string;
  out?: string;
};

/**
 * Build a tag image from a JSON file of filament fields. Works offline.
 */
export async function run(argv: EncodeCommandArgs): Promise<void> {
  const { file, out } = argv;
  const format = argv.format ?? "hex";
  if (!file) {
    console.error(chalk.red("Missing required option: --file <fields.json>"));
    process.exitCode = 2;
    return;
  }
  if (!isDumpFormat(format)) {
    console.error(chalk.red(`Unknown dump format: ${format}`));
    process.exitCode = 2;
    return;
  }
  if (format === "binary" && !out) {
    console.error(chalk.red("Binary output needs --out <file>"));
    process.exitCode = 2;
    return;
  }

  try {
    const image = encodeTag(await readFilamentFile(file));
    if (out) {
      await writeDumpFile(out, image, format);
      console.info(chalk.green(`Wrote ${format} dump to ${out}`));
      return;
    }
    const data = formatDump(image, format);
    if (typeof data === "string") {
      console.info(data);
    }
  } catch (error) {
    reportFailure("Encode failed", error);
  }
}
