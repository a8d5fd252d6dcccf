/**
 * Filament tag codec: positional decode of a 64-block image into a
 * FilamentRecord and the inverse encode of the fields a writer controls.
 *
 * Multi-byte numbers are little-endian. Strings are ASCII, NUL-terminated
 * within their slot, and trimmed after truncation.
 */

import { FieldOutOfRangeError } from "../errors.js";
import { BLOCK_SIZE, firstBlockOfSector } from "./layout.js";
import { assertTagImage, emptyImage, payloadOnly, type TagImage } from "./image.js";

export interface RgbaColor {
  r: number;
  g: number;
  b: number;
  a: number;
}

export interface FilamentRecord {
  uid: Uint8Array;
  manufacturerData: Uint8Array;
  materialVariantId: string;
  materialId: string;
  filamentType: string;
  detailedFilamentType: string;
  color: RgbaColor;
  spoolWeightG: number;
  filamentDiameterMm: number;
  dryingTempC: number;
  dryingTimeH: number;
  bedTempType: number;
  bedTempC: number;
  maxHotendTempC: number;
  minHotendTempC: number;
  xcamInfo: Uint8Array;
  nozzleDiameter: number;
  trayUid: string;
  spoolWidthMm: number;
  productionDatetime: string;
  shortProductionDatetime: string;
  filamentLengthM: number;
  colorFormat: number;
  colorCount: number;
  /** Raw ABGR bytes, present only when colorFormat is 2. */
  secondaryColor: Uint8Array | null;
  signature: Uint8Array;
  hasRsaSignature: boolean;
}

/** The attributes encode writes. Block 0 data and the signature are not among them. */
export type FilamentFields = Omit<
  FilamentRecord,
  "uid" | "manufacturerData" | "signature" | "hasRsaSignature"
>;

export interface EncodeOptions {
  /**
   * Source image for clone mode. Its payload blocks seed the output so
   * uncontrolled content (signature sectors, padding) is carried over.
   */
  base?: TagImage;
}

export const SECONDARY_COLOR_FORMAT = 2;

const SIGNATURE_SECTORS = [10, 11, 12, 13, 14, 15];
const SIGNATURE_LENGTH = 256;
const UINT16_MAX = 0xffff;

/** Data blocks carrying the signature, in order. */
export const SIGNATURE_BLOCKS: readonly number[] = SIGNATURE_SECTORS.flatMap((sector) => {
  const first = firstBlockOfSector(sector);
  return [first, first + 1, first + 2];
});

function view(block: Uint8Array): DataView {
  return new DataView(block.buffer, block.byteOffset, block.byteLength);
}

function readString(block: Uint8Array, offset: number, width: number): string {
  const slot = block.subarray(offset, offset + width);
  const nul = slot.indexOf(0);
  const raw = nul >= 0 ? slot.subarray(0, nul) : slot;
  return Array.from(raw, (b) => (b < 0x80 ? String.fromCharCode(b) : "\uFFFD"))
    .join("")
    .trim();
}

function readUint16(block: Uint8Array, offset: number): number {
  return view(block).getUint16(offset, true);
}

function readFloat32(block: Uint8Array, offset: number): number {
  return view(block).getFloat32(offset, true);
}

export function decodeTag(image: TagImage): FilamentRecord {
  assertTagImage(image);
  const b = image;

  const colorFormat = readUint16(b[16], 0);
  const signature = new Uint8Array(SIGNATURE_LENGTH);
  SIGNATURE_BLOCKS.forEach((block, i) => {
    const offset = i * BLOCK_SIZE;
    if (offset < SIGNATURE_LENGTH) {
      signature.set(b[block].subarray(0, SIGNATURE_LENGTH - offset), offset);
    }
  });

  return {
    uid: b[0].slice(0, 4),
    manufacturerData: b[0].slice(4, 16),
    materialVariantId: readString(b[1], 0, 8),
    materialId: readString(b[1], 8, 8),
    filamentType: readString(b[2], 0, 16),
    detailedFilamentType: readString(b[4], 0, 16),
    color: { r: b[5][0], g: b[5][1], b: b[5][2], a: b[5][3] },
    spoolWeightG: readUint16(b[5], 4),
    filamentDiameterMm: readFloat32(b[5], 8),
    dryingTempC: readUint16(b[6], 0),
    dryingTimeH: readUint16(b[6], 2),
    bedTempType: readUint16(b[6], 4),
    bedTempC: readUint16(b[6], 6),
    maxHotendTempC: readUint16(b[6], 8),
    minHotendTempC: readUint16(b[6], 10),
    xcamInfo: b[8].slice(0, 12),
    nozzleDiameter: readFloat32(b[8], 12),
    trayUid: readString(b[9], 0, 16),
    spoolWidthMm: readUint16(b[10], 4) / 100,
    productionDatetime: readString(b[12], 0, 16),
    shortProductionDatetime: readString(b[13], 0, 16),
    filamentLengthM: readUint16(b[14], 4),
    colorFormat,
    colorCount: readUint16(b[16], 2),
    secondaryColor: colorFormat === SECONDARY_COLOR_FORMAT ? b[16].slice(4, 8) : null,
    signature,
    hasRsaSignature: signature.some((byte) => byte !== 0),
  };
}

// ── encode ──

function writeString(
  block: Uint8Array,
  offset: number,
  width: number,
  field: string,
  value: string,
): void {
  const text = value.trim();
  if (text.length > width) {
    throw new FieldOutOfRangeError(field, value, `at most ${width} characters`);
  }
  const slot = new Uint8Array(width);
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code < 0x20 || code > 0x7e) {
      throw new FieldOutOfRangeError(field, value, "printable ASCII");
    }
    slot[i] = code;
  }
  block.set(slot, offset);
}

function checkInteger(field: string, value: number, max: number): number {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new FieldOutOfRangeError(field, value, `integer 0..${max}`);
  }
  return value;
}

function writeUint16(block: Uint8Array, offset: number, field: string, value: number): void {
  view(block).setUint16(offset, checkInteger(field, value, UINT16_MAX), true);
}

function writeFloat32(block: Uint8Array, offset: number, field: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new FieldOutOfRangeError(field, value, "finite number");
  }
  view(block).setFloat32(offset, value, true);
}

function writeRaw(
  block: Uint8Array,
  offset: number,
  width: number,
  field: string,
  value: Uint8Array,
): void {
  if (value.length !== width) {
    throw new FieldOutOfRangeError(field, `${value.length} bytes`, `exactly ${width} bytes`);
  }
  block.set(value, offset);
}

/**
 * Encode the controlled fields into a 64-block image. Block 0 and the
 * sector trailers are always zero; merge with a template
 * ({@link mergeImage}) to obtain a complete writable image.
 *
 * Values that do not fit their slot throw FieldOutOfRangeError.
 */
export function encodeTag(fields: FilamentFields, options: EncodeOptions = {}): Uint8Array[] {
  const b = options.base ? payloadOnly(options.base) : emptyImage();

  writeString(b[1], 0, 8, "materialVariantId", fields.materialVariantId);
  writeString(b[1], 8, 8, "materialId", fields.materialId);
  writeString(b[2], 0, 16, "filamentType", fields.filamentType);
  writeString(b[4], 0, 16, "detailedFilamentType", fields.detailedFilamentType);

  const { r, g, b: blue, a } = fields.color;
  b[5].set([
    checkInteger("color.r", r, 0xff),
    checkInteger("color.g", g, 0xff),
    checkInteger("color.b", blue, 0xff),
    checkInteger("color.a", a, 0xff),
  ]);
  writeUint16(b[5], 4, "spoolWeightG", fields.spoolWeightG);
  writeFloat32(b[5], 8, "filamentDiameterMm", fields.filamentDiameterMm);

  writeUint16(b[6], 0, "dryingTempC", fields.dryingTempC);
  writeUint16(b[6], 2, "dryingTimeH", fields.dryingTimeH);
  writeUint16(b[6], 4, "bedTempType", fields.bedTempType);
  writeUint16(b[6], 6, "bedTempC", fields.bedTempC);
  writeUint16(b[6], 8, "maxHotendTempC", fields.maxHotendTempC);
  writeUint16(b[6], 10, "minHotendTempC", fields.minHotendTempC);

  writeRaw(b[8], 0, 12, "xcamInfo", fields.xcamInfo);
  writeFloat32(b[8], 12, "nozzleDiameter", fields.nozzleDiameter);
  writeString(b[9], 0, 16, "trayUid", fields.trayUid);

  if (!Number.isFinite(fields.spoolWidthMm)) {
    throw new FieldOutOfRangeError("spoolWidthMm", fields.spoolWidthMm, "finite number");
  }
  const rawWidth = Math.round(fields.spoolWidthMm * 100);
  if (rawWidth < 0 || rawWidth > UINT16_MAX) {
    throw new FieldOutOfRangeError("spoolWidthMm", fields.spoolWidthMm, "0..655.35 mm");
  }
  writeUint16(b[10], 4, "spoolWidthMm", rawWidth);

  writeString(b[12], 0, 16, "productionDatetime", fields.productionDatetime);
  writeString(b[13], 0, 16, "shortProductionDatetime", fields.shortProductionDatetime);
  writeUint16(b[14], 4, "filamentLengthM", fields.filamentLengthM);

  writeUint16(b[16], 0, "colorFormat", fields.colorFormat);
  writeUint16(b[16], 2, "colorCount", fields.colorCount);
  if (fields.secondaryColor !== null) {
    if (fields.colorFormat !== SECONDARY_COLOR_FORMAT) {
      throw new FieldOutOfRangeError(
        "secondaryColor",
        `colorFormat ${fields.colorFormat}`,
        `requires colorFormat ${SECONDARY_COLOR_FORMAT}`,
      );
    }
    writeRaw(b[16], 4, 4, "secondaryColor", fields.secondaryColor);
  }

  return b;
}

/** Defaults for a blank spool: empty strings, zero numbers, opaque black. */
export function defaultFilamentFields(): FilamentFields {
  return {
    materialVariantId: "",
    materialId: "",
    filamentType: "",
    detailedFilamentType: "",
    color: { r: 0, g: 0, b: 0, a: 0xff },
    spoolWeightG: 0,
    filamentDiameterMm: 1.75,
    dryingTempC: 0,
    dryingTimeH: 0,
    bedTempType: 0,
    bedTempC: 0,
    maxHotendTempC: 0,
    minHotendTempC: 0,
    xcamInfo: new Uint8Array(12),
    nozzleDiameter: 0,
    trayUid: "",
    spoolWidthMm: 0,
    productionDatetime: "",
    shortProductionDatetime: "",
    filamentLengthM: 0,
    colorFormat: 0,
    colorCount: 0,
    secondaryColor: null,
  };
}
