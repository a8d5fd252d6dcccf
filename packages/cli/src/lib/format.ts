/**
 * Plain-text rendering of bridge and tag data for the terminal.
 * Colour is applied by the commands, not here.
 */

import { SECTOR_COUNT, type BridgeEvent, type FilamentJson } from "@spooltag/shared";

import type { BridgeStatus, TagWriteResponse } from "./bridge-client.js";

const LABEL_WIDTH = 15;

function row(label: string, value: string): string {
  return `${`${label}:`.padEnd(LABEL_WIDTH)}${value}`;
}

function orDash(value: string): string {
  return value === "" ? "-" : value;
}

export function formatFilament(f: FilamentJson): string[] {
  const lines = [
    row("UID", f.uid),
    row("Type", orDash(f.filament_type)),
    row("Detailed type", orDash(f.detailed_filament_type)),
    row("Material ID", `${orDash(f.material_id)} / ${orDash(f.material_variant_id)}`),
    row("Color", `${f.color_hex} (alpha ${f.color_alpha})`),
  ];
  if (f.secondary_color) {
    lines.push(row("Second color", f.secondary_color));
  }
  lines.push(
    row("Spool weight", `${f.spool_weight_g} g`),
    row("Diameter", `${f.filament_diameter_mm} mm`),
    row("Length", `${f.filament_length_m} m`),
    row("Hotend", `${f.min_hotend_temp_c}-${f.max_hotend_temp_c} °C`),
    row("Bed", `${f.bed_temp_c} °C (type ${f.bed_temp_type})`),
    row("Drying", `${f.drying_temp_c} °C for ${f.drying_time_h} h`),
    row("Nozzle", `${f.nozzle_diameter} mm`),
    row("Tray UID", orDash(f.tray_uid)),
    row("Produced", orDash(f.production_datetime)),
    row("Signed", f.has_rsa_signature ? "yes" : "no"),
  );
  return lines;
}

export function formatKeys(keys: readonly string[]): string[] {
  return keys.map((key, sector) => `Sector ${String(sector).padStart(2)}: ${key}`);
}

export function formatSectorSummary(readable: readonly number[], unreadable: readonly number[]): string {
  const summary = `${readable.length}/${SECTOR_COUNT} sectors readable`;
  return unreadable.length > 0 ? `${summary} (unreadable: ${unreadable.join(", ")})` : summary;
}

export function formatWriteResult(result: TagWriteResponse): string {
  let line = `Wrote ${result.blocksWritten}/${result.expectedBlocks} blocks`;
  if (result.uid) {
    line += ` to ${result.uid}`;
  }
  if (result.error) {
    line += `: ${result.error}`;
  }
  return line;
}

export function formatStatus(status: BridgeStatus): string[] {
  const agent = status.connected ? `connected (${status.device ?? "unknown"})` : "disconnected";
  const state = status.pendingRequestId ? `${status.state} (${status.pendingRequestId})` : status.state;
  return [
    row("Agent", agent),
    row("State", state),
    row("Last UID", status.lastUid ?? "-"),
    row("Completed", `${status.completed}, failed ${status.failed}`),
    row("Subscribers", String(status.subscribers)),
  ];
}

export function formatEvent(event: BridgeEvent): string {
  if (event.type === "tag_detected") {
    return `Tag detected: ${event.uid}`;
  }
  const agent = event.connected ? `Agent connected (${event.device ?? "unknown"})` : "Agent disconnected";
  const state = event.pending_request_id ? `${event.state} ${event.pending_request_id}` : event.state;
  return `${agent}, ${state}`;
}
