/**
 * Base64 helpers shared by the wire protocol and the HTTP API.
 */

import { InvalidInputError } from "../errors.js";

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64");
}

/**
 * Strict standard base64 decode. Buffer.from silently skips invalid
 * characters, so the text is checked first.
 */
export function fromBase64(base64: string): Uint8Array {
  if (!BASE64_PATTERN.test(base64)) {
    throw new InvalidInputError("Invalid base64 text");
  }
  return new Uint8Array(Buffer.from(base64, "base64"));
}

export function isBase64(text: string): boolean {
  return BASE64_PATTERN.test(text);
}
