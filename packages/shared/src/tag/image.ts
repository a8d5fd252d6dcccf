/**
 * Tag images: 64 blocks of 16 bytes, plus the dump formats they are
 * imported from and exported to.
 */

import { InvalidInputError, MalformedImageError } from "../errors.js";
import { fromBase64, toBase64 } from "../utils/encoding.js";
import { bytesToHex, cleanHex, isValidEvenHex, parseHexToBytes } from "../utils/hex.js";
import {
  BLOCK_COUNT,
  BLOCK_SIZE,
  IMAGE_SIZE,
  SECTOR_COUNT,
  blocksOfSector,
  isPayloadBlock,
  type SectorMask,
} from "./layout.js";

export type TagImage = readonly Uint8Array[];

export type DumpFormat = "binary" | "hex" | "base64" | "proxmark";

export function assertTagImage(blocks: readonly Uint8Array[]): void {
  if (blocks.length !== BLOCK_COUNT) {
    throw new MalformedImageError(`Expected ${BLOCK_COUNT} blocks, got ${blocks.length}`);
  }
  blocks.forEach((block, i) => {
    if (block.length !== BLOCK_SIZE) {
      throw new MalformedImageError(
        `Block ${i} must be ${BLOCK_SIZE} bytes, got ${block.length}`,
      );
    }
  });
}

export function emptyImage(): Uint8Array[] {
  return Array.from({ length: BLOCK_COUNT }, () => new Uint8Array(BLOCK_SIZE));
}

export function cloneImage(image: TagImage): Uint8Array[] {
  assertTagImage(image);
  return image.map((block) => new Uint8Array(block));
}

/** The 4-byte uid stored in block 0. */
export function uidOfImage(image: TagImage): Uint8Array {
  assertTagImage(image);
  return image[0].slice(0, 4);
}

/**
 * Block 0 and every trailer from `template`, every payload block from `payload`.
 */
export function mergeImage(payload: TagImage, template: TagImage): Uint8Array[] {
  assertTagImage(payload);
  assertTagImage(template);
  return payload.map((block, i) =>
    new Uint8Array(isPayloadBlock(i) ? block : template[i]),
  );
}

/** Copy of `image` with block 0 and every trailer zeroed. */
export function payloadOnly(image: TagImage): Uint8Array[] {
  assertTagImage(image);
  return image.map((block, i) =>
    isPayloadBlock(i) ? new Uint8Array(block) : new Uint8Array(BLOCK_SIZE),
  );
}

/**
 * Guess readability from content: a sector that is entirely zero is
 * treated as unreadable. Only used when the agent reports no mask.
 */
export function inferSectorMask(image: TagImage): SectorMask {
  assertTagImage(image);
  let mask = 0;
  for (let sector = 0; sector < SECTOR_COUNT; sector++) {
    const populated = blocksOfSector(sector).some((b) => image[b].some((byte) => byte !== 0));
    if (populated) {
      mask |= 1 << sector;
    }
  }
  return mask;
}

// ── raw binary ──

export function imageFromBinary(data: Uint8Array): Uint8Array[] {
  if (data.length !== IMAGE_SIZE) {
    throw new MalformedImageError(`Expected ${IMAGE_SIZE} bytes, got ${data.length}`);
  }
  return Array.from({ length: BLOCK_COUNT }, (_, i) =>
    data.slice(i * BLOCK_SIZE, (i + 1) * BLOCK_SIZE),
  );
}

export function imageToBinary(image: TagImage): Uint8Array {
  assertTagImage(image);
  const out = new Uint8Array(IMAGE_SIZE);
  image.forEach((block, i) => out.set(block, i * BLOCK_SIZE));
  return out;
}

// ── hex ──

export function imageFromHex(hex: string): Uint8Array[] {
  return imageFromBinary(parseHexToBytes(hex, "hex dump"));
}

export function imageToHex(image: TagImage): string {
  return bytesToHex(imageToBinary(image));
}

export function imageFromHexBlocks(blocks: readonly string[]): Uint8Array[] {
  const image = blocks.map((hex, i) => parseHexToBytes(hex, `hex block ${i}`));
  assertTagImage(image);
  return image;
}

export function imageToHexBlocks(image: TagImage): string[] {
  assertTagImage(image);
  return image.map((block) => bytesToHex(block));
}

// ── base64 blocks (wire form) ──

export function imageFromBase64Blocks(blocks: readonly string[]): Uint8Array[] {
  const image = blocks.map((text, i) => {
    try {
      return fromBase64(text);
    } catch {
      throw new MalformedImageError(`Block ${i} is not valid base64`);
    }
  });
  assertTagImage(image);
  return image;
}

export function imageToBase64Blocks(image: TagImage): string[] {
  assertTagImage(image);
  return image.map((block) => toBase64(block));
}

// ── Proxmark3 text dump ──

/**
 * Parse `Block NN: xx xx ...` lines. Blank lines and `#` comments are
 * ignored, as is any line whose data part is not exactly one block.
 */
export function imageFromProxmarkDump(text: string): Uint8Array[] {
  const blocks: Uint8Array[] = [];
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) {
      continue;
    }
    const colon = line.indexOf(":");
    const data = cleanHex(colon >= 0 ? line.slice(colon + 1) : line);
    if (data.length === BLOCK_SIZE * 2) {
      blocks.push(parseHexToBytes(data, `block ${blocks.length}`));
    }
  }
  if (blocks.length !== BLOCK_COUNT) {
    throw new MalformedImageError(
      `Proxmark3 dump should have ${BLOCK_COUNT} blocks, found ${blocks.length}`,
    );
  }
  return blocks;
}

export function imageToProxmarkDump(image: TagImage): string {
  assertTagImage(image);
  return image
    .map((block, i) => `Block ${String(i).padStart(2, "0")}: ${bytesToHex(block, " ")}`)
    .join("\n");
}

// ── format sniffing ──

export function detectDumpFormat(input: string | Uint8Array): DumpFormat {
  if (typeof input !== "string") {
    if (input.length === IMAGE_SIZE) {
      return "binary";
    }
    return detectDumpFormat(new TextDecoder().decode(input));
  }
  if (/^\s*Block\s+\d+\s*:/im.test(input)) {
    return "proxmark";
  }
  const compact = cleanHex(input);
  if (isValidEvenHex(compact)) {
    return "hex";
  }
  return "base64";
}

/**
 * Parse a dump in any supported format: 1024 raw bytes, a Proxmark3 text
 * dump, hex text, or base64 of the whole image.
 */
export function parseDump(input: string | Uint8Array): Uint8Array[] {
  const format = detectDumpFormat(input);
  if (format === "binary" && typeof input !== "string") {
    return imageFromBinary(input);
  }
  const text = typeof input === "string" ? input : new TextDecoder().decode(input);
  switch (format) {
    case "proxmark":
      return imageFromProxmarkDump(text);
    case "hex":
      return imageFromHex(text);
    default: {
      let data: Uint8Array;
      try {
        data = fromBase64(text.replace(/\s+/g, ""));
      } catch {
        throw new InvalidInputError("Unrecognized dump format");
      }
      return imageFromBinary(data);
    }
  }
}

export function formatDump(image: TagImage, format: DumpFormat): string | Uint8Array {
  switch (format) {
    case "binary":
      return imageToBinary(image);
    case "hex":
      return imageToHex(image);
    case "base64":
      return toBase64(imageToBinary(image));
    case "proxmark":
      return imageToProxmarkDump(image);
  }
}
