import { webcrypto } from "node:crypto";
import { InvalidInputError } from "../errors.js";
import { SECTOR_COUNT } from "../tag/layout.js";
import { bytesToHex, parseHexToBytes } from "../utils/hex.js";

const subtle = webcrypto.subtle;

export const SECTOR_KEY_LENGTH = 6;

const MASTER_KEY_LENGTH = 16;
const CONTEXT_LENGTH = 7;
const OUTPUT_LENGTH = SECTOR_COUNT * SECTOR_KEY_LENGTH;

/** Sixteen 6-byte sector keys, index = sector number. */
export type KeySet = readonly Uint8Array[];

/**
 * Process-wide key derivation constants. Built once at startup and passed
 * explicitly to {@link deriveKeys}.
 */
export interface KdfConfig {
  readonly masterKey: Uint8Array;
  readonly context: Uint8Array;
}

export function createKdfConfig(masterKey: Uint8Array, context: Uint8Array): KdfConfig {
  if (masterKey.length !== MASTER_KEY_LENGTH) {
    throw new InvalidInputError(
      `Master key must be ${MASTER_KEY_LENGTH} bytes, got ${masterKey.length}`,
    );
  }
  if (context.length !== CONTEXT_LENGTH) {
    throw new InvalidInputError(
      `Derivation context must be ${CONTEXT_LENGTH} bytes, got ${context.length}`,
    );
  }
  return Object.freeze({
    masterKey: new Uint8Array(masterKey),
    context: new Uint8Array(context),
  });
}

export const DEFAULT_KDF_CONFIG: KdfConfig = createKdfConfig(
  parseHexToBytes("9A759CF2C4F7CAFF222CB9769B41BC96"),
  new TextEncoder().encode("RFID-A\0"),
);

/**
 * Derive the 16 sector keys of a tag with HKDF-SHA256
 * (IKM = uid, salt = master key, info = context, L = 96).
 */
export async function deriveKeys(
  uid: Uint8Array,
  config: KdfConfig = DEFAULT_KDF_CONFIG,
): Promise<KeySet> {
  if (uid.length === 0) {
    throw new InvalidInputError("Tag uid must not be empty");
  }

  const ikm = await subtle.importKey("raw", new Uint8Array(uid), "HKDF", false, [
    "deriveBits",
  ]);
  const bits = await subtle.deriveBits(
    {
      name: "HKDF",
      hash: "SHA-256",
      salt: new Uint8Array(config.masterKey),
      info: new Uint8Array(config.context),
    },
    ikm,
    OUTPUT_LENGTH * 8,
  );

  const okm = new Uint8Array(bits);
  const keys: Uint8Array[] = [];
  for (let sector = 0; sector < SECTOR_COUNT; sector++) {
    const start = sector * SECTOR_KEY_LENGTH;
    keys.push(okm.slice(start, start + SECTOR_KEY_LENGTH));
  }
  return keys;
}

/**
 * Hex in, hex out. Accepts any case with optional whitespace or colons.
 */
export async function deriveKeysFromHex(
  uidHex: string,
  config: KdfConfig = DEFAULT_KDF_CONFIG,
): Promise<string[]> {
  const uid = parseHexToBytes(uidHex, "uid");
  return keySetToHex(await deriveKeys(uid, config));
}

export function keySetToHex(keys: KeySet): string[] {
  return keys.map((key) => bytesToHex(key));
}

export function keySetFromHex(keys: readonly string[]): KeySet {
  if (keys.length !== SECTOR_COUNT) {
    throw new InvalidInputError(`Expected ${SECTOR_COUNT} sector keys, got ${keys.length}`);
  }
  return keys.map((hex, sector) => parseSectorKey(hex, sector));
}

export function parseSectorKey(hex: string, sector?: number): Uint8Array {
  const where = sector === undefined ? "" : ` for sector ${sector}`;
  if (!/^[0-9a-fA-F]{12}$/.test(hex)) {
    throw new InvalidInputError(`Sector key${where} must be 12 hex characters`);
  }
  return parseHexToBytes(hex);
}
