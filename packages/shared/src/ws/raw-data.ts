/**
 * Normalize an incoming WebSocket payload (ws RawData, ArrayBuffer, view
 * or string) to UTF-8 text.
 */
export function rawDataToString(data: unknown): string {
  if (typeof data === "string") return data;
  if (Array.isArray(data)) {
    return Buffer.concat(data.filter((part): part is Buffer => Buffer.isBuffer(part))).toString(
      "utf8",
    );
  }
  if (data instanceof ArrayBuffer) {
    return new TextDecoder().decode(new Uint8Array(data));
  }
  if (ArrayBuffer.isView(data)) {
    return new TextDecoder().decode(
      new Uint8Array(data.buffer, data.byteOffset, data.byteLength),
    );
  }
  return String(data);
}

/**
 * Map an http(s) base URL to its ws(s) counterpart and append a path.
 */
export function toWebSocketUrl(baseUrl: string, path: string): string {
  const wsBase = baseUrl
    .replace(/^http:/, "ws:")
    .replace(/^https:/, "wss:")
    .replace(/\/$/, "");
  return `${wsBase}${path}`;
}
