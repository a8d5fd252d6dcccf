/**
 * snake_case JSON view of a FilamentRecord, as served by the bridge API
 * and accepted by encode.
 */

import { InvalidInputError } from "../errors.js";
import { bytesToHex, parseHexToBytes } from "../utils/hex.js";
import { defaultFilamentFields, type FilamentFields, type FilamentRecord, type RgbaColor } from "./codec.js";

export interface FilamentJson {
  uid: string;
  material_variant_id: string;
  material_id: string;
  filament_type: string;
  detailed_filament_type: string;
  color_hex: string;
  color_alpha: number;
  spool_weight_g: number;
  filament_diameter_mm: number;
  drying_temp_c: number;
  drying_time_h: number;
  bed_temp_type: number;
  bed_temp_c: number;
  max_hotend_temp_c: number;
  min_hotend_temp_c: number;
  xcam_info: string;
  nozzle_diameter: number;
  tray_uid: string;
  spool_width_mm: number;
  production_datetime: string;
  short_production_datetime: string;
  filament_length_m: number;
  color_format: number;
  color_count: number;
  secondary_color: string | null;
  has_rsa_signature: boolean;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function hex2(value: number): string {
  return value.toString(16).padStart(2, "0").toUpperCase();
}

/** `#RRGGBB`, uppercase. */
export function colorHex(color: RgbaColor): string {
  return `#${hex2(color.r)}${hex2(color.g)}${hex2(color.b)}`;
}

export function colorAlpha(color: RgbaColor): number {
  return color.a;
}

export function filamentRecordToJson(record: FilamentRecord): FilamentJson {
  return {
    uid: bytesToHex(record.uid),
    material_variant_id: record.materialVariantId,
    material_id: record.materialId,
    filament_type: record.filamentType,
    detailed_filament_type: record.detailedFilamentType,
    color_hex: colorHex(record.color),
    color_alpha: colorAlpha(record.color),
    spool_weight_g: record.spoolWeightG,
    filament_diameter_mm: round2(record.filamentDiameterMm),
    drying_temp_c: record.dryingTempC,
    drying_time_h: record.dryingTimeH,
    bed_temp_type: record.bedTempType,
    bed_temp_c: record.bedTempC,
    max_hotend_temp_c: record.maxHotendTempC,
    min_hotend_temp_c: record.minHotendTempC,
    xcam_info: bytesToHex(record.xcamInfo),
    nozzle_diameter: round2(record.nozzleDiameter),
    tray_uid: record.trayUid,
    spool_width_mm: round2(record.spoolWidthMm),
    production_datetime: record.productionDatetime,
    short_production_datetime: record.shortProductionDatetime,
    filament_length_m: record.filamentLengthM,
    color_format: record.colorFormat,
    color_count: record.colorCount,
    secondary_color: record.secondaryColor ? bytesToHex(record.secondaryColor) : null,
    has_rsa_signature: record.hasRsaSignature,
  };
}

export function parseColorHex(text: string): Omit<RgbaColor, "a"> {
  const match = /^#?([0-9a-fA-F]{2})([0-9a-fA-F]{2})([0-9a-fA-F]{2})$/.exec(text.trim());
  if (!match) {
    throw new InvalidInputError(`Invalid color_hex: ${text}`);
  }
  return {
    r: parseInt(match[1], 16),
    g: parseInt(match[2], 16),
    b: parseInt(match[3], 16),
  };
}

function stringField(source: object, key: string, fallback: string): string {
  const value: unknown = Reflect.get(source, key);
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "string") {
    throw new InvalidInputError(`${key} must be a string`);
  }
  return value;
}

function numberField(source: object, key: string, fallback: number): number {
  const value: unknown = Reflect.get(source, key);
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "number") {
    throw new InvalidInputError(`${key} must be a number`);
  }
  return value;
}

/**
 * Build encode input from the JSON view. Missing fields take the blank
 * spool defaults; range checks are left to encode.
 */
export function filamentFieldsFromJson(value: unknown): FilamentFields {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new InvalidInputError("Filament fields must be a JSON object");
  }
  const d = defaultFilamentFields();
  const colorText = stringField(value, "color_hex", "");
  const rgb = colorText ? parseColorHex(colorText) : d.color;
  const xcamText = stringField(value, "xcam_info", "");
  const secondaryText = stringField(value, "secondary_color", "");

  return {
    materialVariantId: stringField(value, "material_variant_id", d.materialVariantId),
    materialId: stringField(value, "material_id", d.materialId),
    filamentType: stringField(value, "filament_type", d.filamentType),
    detailedFilamentType: stringField(value, "detailed_filament_type", d.detailedFilamentType),
    color: {
      r: rgb.r,
      g: rgb.g,
      b: rgb.b,
      a: numberField(value, "color_alpha", d.color.a),
    },
    spoolWeightG: numberField(value, "spool_weight_g", d.spoolWeightG),
    filamentDiameterMm: numberField(value, "filament_diameter_mm", d.filamentDiameterMm),
    dryingTempC: numberField(value, "drying_temp_c", d.dryingTempC),
    dryingTimeH: numberField(value, "drying_time_h", d.dryingTimeH),
    bedTempType: numberField(value, "bed_temp_type", d.bedTempType),
    bedTempC: numberField(value, "bed_temp_c", d.bedTempC),
    maxHotendTempC: numberField(value, "max_hotend_temp_c", d.maxHotendTempC),
    minHotendTempC: numberField(value, "min_hotend_temp_c", d.minHotendTempC),
    xcamInfo: xcamText ? parseHexToBytes(xcamText, "xcam_info") : d.xcamInfo,
    nozzleDiameter: numberField(value, "nozzle_diameter", d.nozzleDiameter),
    trayUid: stringField(value, "tray_uid", d.trayUid),
    spoolWidthMm: numberField(value, "spool_width_mm", d.spoolWidthMm),
    productionDatetime: stringField(value, "production_datetime", d.productionDatetime),
    shortProductionDatetime: stringField(
      value,
      "short_production_datetime",
      d.shortProductionDatetime,
    ),
    filamentLengthM: numberField(value, "filament_length_m", d.filamentLengthM),
    colorFormat: numberField(value, "color_format", d.colorFormat),
    colorCount: numberField(value, "color_count", d.colorCount),
    secondaryColor: secondaryText ? parseHexToBytes(secondaryText, "secondary_color") : null,
  };
}
