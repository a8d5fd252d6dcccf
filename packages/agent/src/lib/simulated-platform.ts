/**
 * Simulated Tag Platform
 * In-memory MIFARE Classic 1K tags for tests and for running the agent
 * without NFC hardware. Sector trailers hold real keys, so authentication
 * behaves like a tag personalised with derived keys.
 */

import {
  AuthenticationFailedError,
  BLOCK_COUNT,
  SECTOR_COUNT,
  UID_LENGTH,
  cloneImage,
  emptyImage,
  isManufacturerBlock,
  isSectorTrailer,
  parseSectorTrailer,
  sectorOfBlock,
  trailerBlockOfSector,
  type KeySet,
  type TagImage,
} from "@spooltag/shared";

import {
  TagLostError,
  abortError,
  type KeyType,
  type TagConnection,
  type TagPlatform,
} from "./platform.js";

/** Transport configuration bits of a factory-fresh tag. */
const DEFAULT_ACCESS_BITS = new Uint8Array([0xff, 0x07, 0x80, 0x69]);
const FACTORY_KEY = new Uint8Array(6).fill(0xff);

export interface SimulatedTagOptions {
  /** Initial content; block 0 gets `uid` written over its first bytes. */
  image?: TagImage;
  /** Per-sector keys written into the trailers (key A and key B). Null keeps the image's trailer. */
  keys?: readonly (Uint8Array | null)[];
  /** Block 0 may be written (a "magic" tag). */
  uidRewritable?: boolean;
}

function bcc(uid: Uint8Array): number {
  return uid.reduce((acc, b) => acc ^ b, 0);
}

export class SimulatedTag {
  readonly blocks: Uint8Array[];
  readonly uidRewritable: boolean;
  private present = true;

  constructor(uid: Uint8Array, options: SimulatedTagOptions = {}) {
    if (uid.length !== UID_LENGTH) {
      throw new Error(`Simulated tags have ${UID_LENGTH}-byte uids`);
    }
    this.blocks = options.image ? cloneImage(options.image) : emptyImage();
    this.uidRewritable = options.uidRewritable ?? false;
    this.setUid(uid);

    for (let sector = 0; sector < SECTOR_COUNT; sector++) {
      const trailer = this.blocks[trailerBlockOfSector(sector)];
      const key = options.keys?.[sector];
      if (key) {
        trailer.set(key, 0);
        trailer.set(DEFAULT_ACCESS_BITS, 6);
        trailer.set(key, 10);
      } else if (!options.image) {
        trailer.set(FACTORY_KEY, 0);
        trailer.set(DEFAULT_ACCESS_BITS, 6);
        trailer.set(FACTORY_KEY, 10);
      }
    }
  }

  /** A tag personalised with `keys` in every sector. */
  static withKeys(uid: Uint8Array, keys: KeySet, options: Omit<SimulatedTagOptions, "keys"> = {}): SimulatedTag {
    return new SimulatedTag(uid, { ...options, keys });
  }

  get uid(): Uint8Array {
    return this.blocks[0].slice(0, UID_LENGTH);
  }

  get isPresent(): boolean {
    return this.present;
  }

  /** Take the tag away from the reader; pending and later I/O fails. */
  remove(): void {
    this.present = false;
  }

  setUid(uid: Uint8Array): void {
    this.blocks[0].set(uid, 0);
    this.blocks[0][UID_LENGTH] = bcc(uid);
  }

  acceptsKey(sector: number, key: Uint8Array, keyType: KeyType): boolean {
    const trailer = parseSectorTrailer(this.blocks[trailerBlockOfSector(sector)]);
    const expected = keyType === "A" ? trailer.keyA : trailer.keyB;
    return expected.length === key.length && expected.every((b, i) => b === key[i]);
  }

  connect(): TagConnection {
    let authenticated: number | null = null;

    const requirePresent = (): void => {
      if (!this.present) {
        throw new TagLostError();
      }
    };
    const requireAuthenticated = (block: number): void => {
      if (block < 0 || block >= BLOCK_COUNT) {
        throw new RangeError(`Block ${block} out of range`);
      }
      const sector = sectorOfBlock(block);
      if (authenticated !== sector) {
        throw new AuthenticationFailedError(sector);
      }
    };

    const connection: TagConnection = {
      uid: this.uid,
      authenticate: async (sector, key, keyType) => {
        requirePresent();
        authenticated = this.acceptsKey(sector, key, keyType) ? sector : null;
        return authenticated === sector;
      },
      readBlock: async (block) => {
        requirePresent();
        requireAuthenticated(block);
        const data = this.blocks[block].slice();
        if (isSectorTrailer(block)) {
          // key A never reads back
          data.fill(0, 0, 6);
        }
        return data;
      },
      writeBlock: async (block, data) => {
        requirePresent();
        requireAuthenticated(block);
        if (data.length !== 16) {
          throw new RangeError(`Block data must be 16 bytes, got ${data.length}`);
        }
        if (isManufacturerBlock(block) && !this.uidRewritable) {
          throw new Error("Block 0 is read-only on this tag");
        }
        this.blocks[block].set(data);
      },
      close: async () => {
        authenticated = null;
      },
    };

    if (this.uidRewritable) {
      connection.rewriteUid = async (uid) => {
        requirePresent();
        if (uid.length !== UID_LENGTH) {
          throw new RangeError(`uid must be ${UID_LENGTH} bytes`);
        }
        this.setUid(uid);
      };
    }
    return connection;
  }
}

interface Waiter {
  resolve: (connection: TagConnection) => void;
}

export interface SimulatedPlatformOptions {
  deviceName?: string;
  /** Touch this tag automatically whenever a job waits (standalone demo mode). */
  autoPresent?: SimulatedTag;
  autoPresentDelayMs?: number;
}

/**
 * Tags are handed to the reader with `present()`. A tag presented while
 * nobody waits stays on the reader until the next `waitForTag`.
 */
export class SimulatedTagPlatform implements TagPlatform {
  readonly deviceName: string;
  private readonly queue: SimulatedTag[] = [];
  private waiter: Waiter | null = null;

  constructor(private readonly options: SimulatedPlatformOptions = {}) {
    this.deviceName = options.deviceName ?? "Simulated NFC reader";
  }

  present(tag: SimulatedTag): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.resolve(tag.connect());
      return;
    }
    this.queue.push(tag);
  }

  isWaiting(): boolean {
    return this.waiter !== null;
  }

  waitForTag(signal: AbortSignal): Promise<TagConnection> {
    if (signal.aborted) {
      return Promise.reject(abortError(signal));
    }
    const queued = this.queue.shift();
    if (queued) {
      return Promise.resolve(queued.connect());
    }
    if (this.waiter) {
      return Promise.reject(new Error("Already waiting for a tag"));
    }

    return new Promise<TagConnection>((resolve, reject) => {
      const autoTag = this.options.autoPresent;
      const timer = autoTag
        ? setTimeout(() => this.present(autoTag), this.options.autoPresentDelayMs ?? 1000)
        : null;
      const waiter: Waiter = {
        resolve: (connection) => {
          if (timer) clearTimeout(timer);
          signal.removeEventListener("abort", onAbort);
          resolve(connection);
        },
      };
      const onAbort = (): void => {
        if (timer) clearTimeout(timer);
        if (this.waiter === waiter) {
          this.waiter = null;
        }
        reject(abortError(signal));
      };
      signal.addEventListener("abort", onAbort, { once: true });
      this.waiter = waiter;
    });
  }

  async close(): Promise<void> {
    this.queue.length = 0;
  }
}
