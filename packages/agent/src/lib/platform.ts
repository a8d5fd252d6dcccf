/**
 * Tag platform abstraction
 * What the agent needs from an NFC stack: wait for a MIFARE Classic 1K tag,
 * authenticate a sector, read and write blocks.
 */

export type KeyType = "A" | "B";

export interface TagConnection {
  readonly uid: Uint8Array;
  /**
   * Authenticate `sector`. Resolves false when the tag refuses the key;
   * rejects only on transport faults (tag lost, reader error).
   */
  authenticate(sector: number, key: Uint8Array, keyType: KeyType): Promise<boolean>;
  /** Read a block of the sector authenticated last. */
  readBlock(block: number): Promise<Uint8Array>;
  writeBlock(block: number, data: Uint8Array): Promise<void>;
  /** Present only on tags whose identifier can be rewritten. */
  rewriteUid?(uid: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

export interface TagPlatform {
  readonly deviceName: string;
  /** Resolves with the next tag touched; rejects with an AbortError when `signal` aborts. */
  waitForTag(signal: AbortSignal): Promise<TagConnection>;
  close(): Promise<void>;
}

/** The tag left the field in the middle of an operation. */
export class TagLostError extends Error {
  constructor(message = "Tag was removed from the reader") {
    super(message);
    this.name = "TagLostError";
  }
}

export function abortError(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    return reason;
  }
  const error = new Error(typeof reason === "string" ? reason : "Aborted");
  error.name = "AbortError";
  return error;
}
