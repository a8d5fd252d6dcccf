/**
 * Dump and encode-input files on disk.
 */

import { readFile, writeFile } from "node:fs/promises";

import {
  InvalidInputError,
  filamentFieldsFromJson,
  formatDump,
  parseDump,
  toError,
  type DumpFormat,
  type FilamentFields,
  type TagImage,
} from "@spooltag/shared";

async function readBytes(path: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await readFile(path));
  } catch (error) {
    throw new InvalidInputError(`Failed to read ${path}: ${toError(error).message}`);
  }
}

/**
 * Load a dump in any supported format (binary, hex, base64, Proxmark3 text).
 */
export async function readDumpFile(path: string): Promise<Uint8Array[]> {
  return parseDump(await readBytes(path));
}

/**
 * Load encode input: a JSON object of snake_case filament fields.
 */
export async function readFilamentFile(path: string): Promise<FilamentFields> {
  const text = new TextDecoder().decode(await readBytes(path));
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new InvalidInputError(`Invalid JSON in ${path}: ${toError(error).message}`);
  }
  return filamentFieldsFromJson(value);
}

export async function writeDumpFile(path: string, image: TagImage, format: DumpFormat): Promise<void> {
  const data = formatDump(image, format);
  await writeFile(path, typeof data === "string" ? `${data}\n` : data);
}
