import { createHash } from "crypto";
import { InternalError, KeyNotFoundError, ShortServiceError, ValueTooLargeError } from "./errors.js";

export const DEFAULT_MAX_LEN = 2083;
export const DEFAULT_MIN_KEY_SIZE = 6;

/** base64url of a 128-bit digest, unpadded */
export const DIGEST_LENGTH = 22;

export interface CreateOutcome {
  key: string;
  /** false when the value was already stored under `key` */
  created: boolean;
  /** probe windows that were held by a different value */
  collisions: number;
}

export type KeyStoreEvent =
  | { op: "create"; ok: true; outcome: CreateOutcome }
  | { op: "create"; ok: false; error: ShortServiceError }
  | { op: "lookup"; ok: true; key: string }
  | { op: "lookup"; ok: false; error: ShortServiceError };

export type KeyStoreListener = (event: KeyStoreEvent) => void;

export interface KeyStoreOptions {
  maxLen?: number;
  minKeySize?: number;
  listener?: KeyStoreListener;
  /** Unpadded base64url content digest; defaults to `digestOf`. */
  digest?: (value: string) => string;
}

export function digestOf(value: string): string {
  try {
    return createHash("md5").update(value, "utf8").digest("base64url");
  } catch (err) {
    throw new InternalError("failed to hash value", { cause: err });
  }
}

/**
 * Memory-resident key <-> value mapping.
 *
 * Keys are windows over the value's digest. Create starts with a
 * `minKeySize` window at offset 0 and slides it right on every collision,
 * growing it by one character each time it runs off the end. The same value
 * always walks the same probe sequence, so replaying the creates in order
 * rebuilds the same keys.
 *
 * Every method runs to completion without yielding, which makes each call a
 * critical section on the event loop: no caller can observe or claim a slot
 * in the middle of another caller's probe.
 */
export class KeyStore {
  private readonly entries = new Map<string, string>();
  private readonly maxLen: number;
  private readonly minKeySize: number;
  private readonly listener?: KeyStoreListener;
  private readonly digest: (value: string) => string;

  constructor(opts: KeyStoreOptions = {}) {
    this.maxLen = opts.maxLen ?? DEFAULT_MAX_LEN;
    this.minKeySize = opts.minKeySize ?? DEFAULT_MIN_KEY_SIZE;
    this.listener = opts.listener;
    this.digest = opts.digest ?? digestOf;

    if (!Number.isInteger(this.maxLen) || this.maxLen < 0) {
      throw new RangeError(`maxLen must be a non-negative integer, got ${this.maxLen}`);
    }
    if (!Number.isInteger(this.minKeySize) || this.minKeySize < 1 || this.minKeySize > DIGEST_LENGTH) {
      throw new RangeError(`minKeySize must be between 1 and ${DIGEST_LENGTH}, got ${this.minKeySize}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  create(value: string): string {
    return this.createEntry(value).key;
  }

  createEntry(value: string): CreateOutcome {
    let outcome: CreateOutcome;
    try {
      this.checkLength(value);
      outcome = this.probe(value, this.digest(value));
    } catch (err) {
      if (err instanceof ShortServiceError) this.emit({ op: "create", ok: false, error: err });
      throw err;
    }
    this.emit({ op: "create", ok: true, outcome });
    return outcome;
  }

  lookup(key: string): string {
    let value: string;
    try {
      this.checkLength(key);
      value = this.find(key);
    } catch (err) {
      if (err instanceof ShortServiceError) this.emit({ op: "lookup", ok: false, error: err });
      throw err;
    }
    this.emit({ op: "lookup", ok: true, key });
    return value;
  }

  private find(key: string): string {
    const value = this.entries.get(key);
    if (value === undefined) throw new KeyNotFoundError();
    return value;
  }

  private probe(value: string, digest: string): CreateOutcome {
    let size = this.minKeySize;
    let offset = 0;
    let collisions = 0;

    for (;;) {
      if (offset + size > digest.length) {
        size++;
        offset = 0;
      }
      // The full digest is unique to its value unless the hash itself collides.
      if (size > digest.length) {
        throw new InternalError(`no free key left in digest ${digest}`);
      }

      const key = digest.slice(offset, offset + size);
      const existing = this.entries.get(key);

      if (existing === undefined) {
        this.entries.set(key, value);
        return { key, created: true, collisions };
      }
      if (existing === value) {
        return { key, created: false, collisions };
      }

      collisions++;
      offset++;
    }
  }

  private checkLength(s: string): void {
    if (Buffer.byteLength(s, "utf8") > this.maxLen) {
      throw new ValueTooLargeError(this.maxLen);
    }
  }

  private emit(event: KeyStoreEvent): void {
    this.listener?.(event);
  }
}
