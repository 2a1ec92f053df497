/**
 * @cashout/state-store: Key-value record persistence.
 *
 * Provides:
 * - RecordStore interface (get / put / lazy prefix scan)
 * - InMemoryRecordStore for tests and development
 * - JsonlRecordStore for durable file-based persistence
 *
 * @packageDocumentation
 */

export type { RecordStore, StoreEntry, StateStoreErrorCode } from "./types.js";
export { StateStoreError, validateKey } from "./types.js";

export { InMemoryRecordStore, scanPrefix } from "./in-memory-store.js";
export { JsonlRecordStore } from "./jsonl-store.js";
export type { JsonlRecordStoreOptions } from "./jsonl-store.js";
