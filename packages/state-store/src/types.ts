/**
 * @cashout/state-store: Core types.
 *
 * A flat key-value store with prefix scans. Values are opaque strings;
 * typed encoding lives with the consumer.
 *
 * Design principles:
 * - "Not found" is an ordinary outcome (`undefined`), never an error
 * - `put` overwrites; there is no history per key
 * - Prefix scans are lazy, finite and restartable
 * - No cross-key transactions or compare-and-swap
 */

// =============================================================================
// Entries
// =============================================================================

/**
 * A single key/value pair yielded by a prefix scan.
 */
export interface StoreEntry {
  readonly key: string;
  readonly value: string;
}

// =============================================================================
// Record Store Interface
// =============================================================================

/**
 * Key-value record store.
 *
 * Implementations must make `get` and `put` safe to interleave per key.
 * Nothing stronger is promised: two read-then-write sequences against the
 * same key can lose an update.
 */
export interface RecordStore {
  /**
   * Read the value stored under `key`.
   *
   * @returns The stored value, or undefined if the key was never written
   */
  get(key: string): Promise<string | undefined>;

  /**
   * Store `value` under `key`, replacing any previous value.
   */
  put(key: string, value: string): Promise<void>;

  /**
   * Scan every entry whose key starts with `prefix`, in the store's native
   * key order.
   *
   * Each call returns a fresh iterator. Breaking out of a `for await`
   * loop stops the scan without visiting the remaining entries.
   */
  entries(prefix: string): AsyncIterable<StoreEntry>;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes for RecordStore operations.
 */
export type StateStoreErrorCode = "INVALID_KEY";

/**
 * Error thrown by RecordStore operations.
 */
export class StateStoreError extends Error {
  constructor(
    public readonly code: StateStoreErrorCode,
    message: string,
    public readonly key?: string,
  ) {
    super(message);
    this.name = "StateStoreError";
  }
}

/**
 * Reject empty keys. Shared by every store implementation.
 */
export function validateKey(key: string): void {
  if (key.length === 0) {
    throw new StateStoreError("INVALID_KEY", "Key must be a non-empty string");
  }
}
