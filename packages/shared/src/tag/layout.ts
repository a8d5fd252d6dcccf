/**
 * MIFARE Classic 1K geometry: 16 sectors × 4 blocks × 16 bytes.
 * Block 0 holds manufacturer data; the last block of each sector is its trailer.
 */

export const BLOCK_SIZE = 16;
export const BLOCKS_PER_SECTOR = 4;
export const SECTOR_COUNT = 16;
export const BLOCK_COUNT = SECTOR_COUNT * BLOCKS_PER_SECTOR;
export const IMAGE_SIZE = BLOCK_COUNT * BLOCK_SIZE;
export const UID_LENGTH = 4;

export function sectorOfBlock(block: number): number {
  return Math.floor(block / BLOCKS_PER_SECTOR);
}

export function firstBlockOfSector(sector: number): number {
  return sector * BLOCKS_PER_SECTOR;
}

export function trailerBlockOfSector(sector: number): number {
  return sector * BLOCKS_PER_SECTOR + BLOCKS_PER_SECTOR - 1;
}

export function isSectorTrailer(block: number): boolean {
  return block % BLOCKS_PER_SECTOR === BLOCKS_PER_SECTOR - 1;
}

export function isManufacturerBlock(block: number): boolean {
  return block === 0;
}

/** Blocks a writer may populate: everything except block 0 and trailers. */
export function isPayloadBlock(block: number): boolean {
  return !isManufacturerBlock(block) && !isSectorTrailer(block);
}

/** Blocks of a sector in address order. */
export function blocksOfSector(sector: number): number[] {
  const first = firstBlockOfSector(sector);
  return Array.from({ length: BLOCKS_PER_SECTOR }, (_, i) => first + i);
}

export interface SectorTrailer {
  keyA: Uint8Array;
  accessBits: Uint8Array;
  keyB: Uint8Array;
}

export function parseSectorTrailer(block: Uint8Array): SectorTrailer {
  return {
    keyA: block.slice(0, 6),
    accessBits: block.slice(6, 10),
    keyB: block.slice(10, 16),
  };
}

/**
 * Per-sector readability: bit s is set when sector s was read under
 * authentication. A cleared bit means the sector was zero-filled.
 */
export type SectorMask = number;

export const FULL_SECTOR_MASK: SectorMask = (1 << SECTOR_COUNT) - 1;

export function sectorMaskFromList(sectors: Iterable<number>): SectorMask {
  let mask = 0;
  for (const sector of sectors) {
    if (Number.isInteger(sector) && sector >= 0 && sector < SECTOR_COUNT) {
      mask |= 1 << sector;
    }
  }
  return mask;
}

export function isSectorReadable(mask: SectorMask, sector: number): boolean {
  return (mask & (1 << sector)) !== 0;
}

export function readableSectors(mask: SectorMask): number[] {
  return Array.from({ length: SECTOR_COUNT }, (_, s) => s).filter((s) =>
    isSectorReadable(mask, s),
  );
}

export function unreadableSectors(mask: SectorMask): number[] {
  return Array.from({ length: SECTOR_COUNT }, (_, s) => s).filter(
    (s) => !isSectorReadable(mask, s),
  );
}

export function isValidSectorMask(value: unknown): value is SectorMask {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= FULL_SECTOR_MASK
  );
}
