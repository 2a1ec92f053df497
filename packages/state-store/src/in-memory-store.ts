/**
 * @cashout/state-store: In-memory RecordStore implementation.
 *
 * Stores records in a plain Map. Suitable for unit tests and
 * short-lived processes; all state is lost on exit.
 */

import type { RecordStore, StoreEntry } from "./types.js";
import { validateKey } from "./types.js";

export class InMemoryRecordStore implements RecordStore {
  private readonly _records = new Map<string, string>();

  async get(key: string): Promise<string | undefined> {
    validateKey(key);
    return this._records.get(key);
  }

  async put(key: string, value: string): Promise<void> {
    validateKey(key);
    this._records.set(key, value);
  }

  entries(prefix: string): AsyncIterable<StoreEntry> {
    return scanPrefix(this._records, prefix);
  }

  /** Number of stored keys. */
  get size(): number {
    return this._records.size;
  }
}

/**
 * Lazily yield the entries of `records` under `prefix` in lexicographic
 * key order.
 *
 * Matching keys are snapshotted when iteration starts; a value is read at
 * the moment it is yielded, so writes made mid-scan are visible for keys
 * that have not been reached yet.
 */
export async function* scanPrefix(
  records: ReadonlyMap<string, string>,
  prefix: string,
): AsyncGenerator<StoreEntry, void, undefined> {
  const keys = [...records.keys()]
    .filter((key) => key.startsWith(prefix))
    .sort();

  for (const key of keys) {
    const value = records.get(key);
    if (value === undefined) {
      continue;
    }
    yield { key, value };
  }
}
