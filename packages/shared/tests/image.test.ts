import { describe, it, expect } from "vitest";

import {
  detectDumpFormat,
  emptyImage,
  imageFromBase64Blocks,
  imageFromBinary,
  imageFromHex,
  imageFromHexBlocks,
  imageFromProxmarkDump,
  imageToBase64Blocks,
  imageToBinary,
  imageToHex,
  imageToProxmarkDump,
  inferSectorMask,
  mergeImage,
  parseDump,
  payloadOnly,
} from "../src/tag/image.js";
import {
  FULL_SECTOR_MASK,
  isPayloadBlock,
  isSectorTrailer,
  parseSectorTrailer,
  sectorMaskFromList,
  sectorOfBlock,
  trailerBlockOfSector,
  unreadableSectors,
} from "../src/tag/layout.js";
import { InvalidInputError, MalformedImageError } from "../src/errors.js";
import { toBase64 } from "../src/utils/encoding.js";

function patternedImage(): Uint8Array[] {
  return Array.from({ length: 64 }, (_, block) =>
    Uint8Array.from({ length: 16 }, (_, i) => (block * 16 + i) & 0xff),
  );
}

describe("layout", () => {
  it("classifies blocks", () => {
    expect(sectorOfBlock(0)).toBe(0);
    expect(sectorOfBlock(63)).toBe(15);
    expect(trailerBlockOfSector(2)).toBe(11);
    expect(isSectorTrailer(7)).toBe(true);
    expect(isSectorTrailer(8)).toBe(false);
    expect(isPayloadBlock(0)).toBe(false);
    expect(isPayloadBlock(3)).toBe(false);
    expect(isPayloadBlock(1)).toBe(true);
  });

  it("splits a sector trailer", () => {
    const trailer = Uint8Array.from({ length: 16 }, (_, i) => i);
    const parsed = parseSectorTrailer(trailer);

    expect(Array.from(parsed.keyA)).toEqual([0, 1, 2, 3, 4, 5]);
    expect(Array.from(parsed.accessBits)).toEqual([6, 7, 8, 9]);
    expect(Array.from(parsed.keyB)).toEqual([10, 11, 12, 13, 14, 15]);
  });

  it("lists unreadable sectors from a mask", () => {
    const mask = FULL_SECTOR_MASK & ~sectorMaskFromList([2, 5]);

    expect(unreadableSectors(mask)).toEqual([2, 5]);
  });
});

describe("image formats", () => {
  it("converts to and from raw binary", () => {
    const image = patternedImage();
    const binary = imageToBinary(image);

    expect(binary.length).toBe(1024);
    expect(binary[17]).toBe(17);
    expect(imageFromBinary(binary)).toEqual(image);
  });

  it("rejects binary of the wrong size", () => {
    expect(() => imageFromBinary(new Uint8Array(1023))).toThrow(MalformedImageError);
  });

  it("parses hex with whitespace", () => {
    const hex = imageToHex(patternedImage());
    const spaced = hex.replace(/(.{32})/g, "$1\n");

    expect(hex.slice(0, 8)).toBe("00010203");
    expect(imageFromHex(spaced)).toEqual(patternedImage());
  });

  it("parses base64 and hex blocks", () => {
    const image = patternedImage();

    expect(imageFromBase64Blocks(imageToBase64Blocks(image))).toEqual(image);
    expect(imageFromHexBlocks(image.map((b) => Buffer.from(b).toString("hex")))).toEqual(image);
  });

  it("rejects a base64 block that is not 16 bytes", () => {
    const blocks = imageToBase64Blocks(emptyImage());
    blocks[4] = toBase64(new Uint8Array(15));

    expect(() => imageFromBase64Blocks(blocks)).toThrow("Block 4 must be 16 bytes, got 15");
  });

  it("rejects invalid base64", () => {
    const blocks = imageToBase64Blocks(emptyImage());
    blocks[0] = "not base64!";

    expect(() => imageFromBase64Blocks(blocks)).toThrow("Block 0 is not valid base64");
  });

  it("writes Proxmark3 lines", () => {
    const dump = imageToProxmarkDump(patternedImage());
    const lines = dump.split("\n");

    expect(lines).toHaveLength(64);
    expect(lines[0]).toBe("Block 00: 00 01 02 03 04 05 06 07 08 09 0A 0B 0C 0D 0E 0F");
    expect(lines[63].startsWith("Block 63: F0 F1")).toBe(true);
  });

  it("reads Proxmark3 dumps with comments", () => {
    const dump = `# dumped from spool\n\n${imageToProxmarkDump(patternedImage())}\n`;

    expect(imageFromProxmarkDump(dump)).toEqual(patternedImage());
  });

  it("rejects a Proxmark3 dump with missing blocks", () => {
    const lines = imageToProxmarkDump(patternedImage()).split("\n").slice(0, 60);

    expect(() => imageFromProxmarkDump(lines.join("\n"))).toThrow(
      "Proxmark3 dump should have 64 blocks, found 60",
    );
  });
});

describe("parseDump", () => {
  it("sniffs each format", () => {
    const image = patternedImage();

    expect(detectDumpFormat(imageToBinary(image))).toBe("binary");
    expect(detectDumpFormat(imageToProxmarkDump(image))).toBe("proxmark");
    expect(detectDumpFormat(imageToHex(image))).toBe("hex");
    expect(detectDumpFormat(toBase64(imageToBinary(image)))).toBe("base64");
  });

  it("parses every format to the same image", () => {
    const image = patternedImage();

    expect(parseDump(imageToBinary(image))).toEqual(image);
    expect(parseDump(imageToProxmarkDump(image))).toEqual(image);
    expect(parseDump(imageToHex(image))).toEqual(image);
    expect(parseDump(toBase64(imageToBinary(image)))).toEqual(image);
    expect(parseDump(new TextEncoder().encode(imageToHex(image)))).toEqual(image);
  });

  it("rejects text it cannot read", () => {
    expect(() => parseDump("definitely not a dump")).toThrow(InvalidInputError);
  });
});

describe("image helpers", () => {
  it("merges payload with block 0 and trailers of a template", () => {
    const payload = patternedImage();
    const templateImage = emptyImage().map((b) => b.fill(0xee));

    const merged = mergeImage(payload, templateImage);

    expect(merged[0][0]).toBe(0xee);
    expect(merged[3][0]).toBe(0xee);
    expect(merged[1]).toEqual(payload[1]);
    expect(merged[62]).toEqual(payload[62]);
  });

  it("zeroes block 0 and trailers for a payload-only copy", () => {
    const image = patternedImage();
    const payload = payloadOnly(image);

    expect(payload[0].every((b) => b === 0)).toBe(true);
    expect(payload[63].every((b) => b === 0)).toBe(true);
    expect(payload[2]).toEqual(image[2]);
    expect(image[0][1]).toBe(1);
  });

  it("infers readability from non-zero sectors", () => {
    const image = emptyImage();
    image[1][0] = 1;
    image[22][5] = 1;

    expect(inferSectorMask(image)).toBe(sectorMaskFromList([0, 5]));
  });
});
