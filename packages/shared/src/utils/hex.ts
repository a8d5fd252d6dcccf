/**
 * Hex utilities
 *
 * Parsing accepts whitespace and colon separators in any case; formatting is
 * always uppercase without separators.
 */

import { InvalidInputError } from "../errors.js";

/**
 * Remove whitespace and colon separators.
 */
export function cleanHex(input: string): string {
  return input.replace(/[\s:]+/g, "");
}

/**
 * Validate that a string contains only hex characters and has even length.
 */
export function isValidEvenHex(hex: string): boolean {
  return /^[0-9a-fA-F]*$/.test(hex) && hex.length % 2 === 0;
}

/**
 * Parse a hex string (whitespace and colons allowed) into bytes.
 * Throws InvalidInputError on invalid format.
 */
export function parseHexToBytes(input: string, what = "hex"): Uint8Array {
  const hex = cleanHex(input);
  if (!isValidEvenHex(hex)) {
    throw new InvalidInputError(`Invalid ${what} (must be even-length hex)`);
  }
  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < hex.length; i += 2) {
    out[i / 2] = parseInt(hex.slice(i, i + 2), 16);
  }
  return out;
}

export function bytesToHex(bytes: Uint8Array, separator = ""): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0").toUpperCase()).join(separator);
}
