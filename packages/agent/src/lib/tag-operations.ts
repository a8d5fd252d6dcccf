/**
 * Sector read/write loops over a TagConnection.
 *
 * Authentication and block read failures are local: an unreadable sector
 * is zero-filled and cleared from the mask, an unwritable one is skipped.
 * A lost tag propagates.
 */

import {
  BLOCK_SIZE,
  SECTOR_COUNT,
  assertTagImage,
  blocksOfSector,
  createLogger,
  isPayloadBlock,
  parseSectorKey,
  toError,
  type KeySet,
  type SectorMask,
  type TagImage,
} from "@spooltag/shared";

import { TagLostError, type KeyType, type TagConnection } from "./platform.js";

const logger = createLogger("agent:tag");

const KEY_TYPES: readonly KeyType[] = ["A", "B"];

/** Transport and well-known defaults tried after the supplied key. */
export const DEFAULT_CANDIDATE_KEYS: readonly string[] = [
  "FFFFFFFFFFFF",
  "A0A1A2A3A4A5",
  "D3F7D3F7D3F7",
];

export function parseCandidateKeys(keys: readonly string[]): Uint8Array[] {
  return keys.map((key) => parseSectorKey(key));
}

export interface SectorReadResult {
  blocks: Uint8Array[];
  readableSectors: SectorMask;
}

export interface SectorWriteResult {
  blocksWritten: number;
  skippedSectors: number[];
}

async function authenticateSector(
  tag: TagConnection,
  sector: number,
  keys: readonly Uint8Array[],
): Promise<boolean> {
  for (const key of keys) {
    for (const keyType of KEY_TYPES) {
      if (await tag.authenticate(sector, key, keyType)) {
        return true;
      }
    }
  }
  return false;
}

/** Null when a block of the authenticated sector could not be read. */
async function readSectorBlocks(tag: TagConnection, sector: number): Promise<Uint8Array[] | null> {
  const sectorBlocks: Uint8Array[] = [];
  try {
    for (const block of blocksOfSector(sector)) {
      sectorBlocks.push(await tag.readBlock(block));
    }
  } catch (err) {
    if (err instanceof TagLostError) {
      throw err;
    }
    logger.warn("Sector read failed after authentication", { sector, error: toError(err).message });
    return null;
  }
  return sectorBlocks;
}

/**
 * Read all 16 sectors. Per sector the supplied key is tried as key A then
 * key B, followed by each candidate key the same way.
 */
export async function readSectors(
  tag: TagConnection,
  keys: KeySet | undefined,
  candidateKeys: readonly Uint8Array[] = parseCandidateKeys(DEFAULT_CANDIDATE_KEYS),
): Promise<SectorReadResult> {
  const blocks: Uint8Array[] = [];
  let readableSectors: SectorMask = 0;

  for (let sector = 0; sector < SECTOR_COUNT; sector++) {
    const supplied = keys?.[sector];
    const attempts = supplied ? [supplied, ...candidateKeys] : [...candidateKeys];

    const sectorBlocks = (await authenticateSector(tag, sector, attempts))
      ? await readSectorBlocks(tag, sector)
      : null;
    if (sectorBlocks) {
      blocks.push(...sectorBlocks);
      readableSectors |= 1 << sector;
    } else {
      logger.debug("Sector unreadable", { sector });
      for (let i = 0; i < blocksOfSector(sector).length; i++) {
        blocks.push(new Uint8Array(BLOCK_SIZE));
      }
    }
  }

  return { blocks, readableSectors };
}

/**
 * Write the payload blocks (never block 0, never trailers) of every sector
 * that has a key and accepts it as key A or key B.
 */
export async function writeSectors(
  tag: TagConnection,
  image: TagImage,
  keys: readonly (Uint8Array | null)[],
): Promise<SectorWriteResult> {
  assertTagImage(image);
  let blocksWritten = 0;
  const skippedSectors: number[] = [];

  for (let sector = 0; sector < SECTOR_COUNT; sector++) {
    const key = keys[sector];
    if (!key || !(await authenticateSector(tag, sector, [key]))) {
      skippedSectors.push(sector);
      continue;
    }
    for (const block of blocksOfSector(sector)) {
      if (!isPayloadBlock(block)) continue;
      await tag.writeBlock(block, image[block]);
      blocksWritten++;
    }
  }

  if (skippedSectors.length > 0) {
    logger.warn("Sectors skipped during write", { skippedSectors: skippedSectors.join(",") });
  }
  return { blocksWritten, skippedSectors };
}
