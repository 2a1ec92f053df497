/**
 * @cashout/state-store: File-based JSONL RecordStore implementation.
 *
 * Every `put` appends one JSON object per line to a `.jsonl` file.
 *
 * Crash safety:
 * - Each put flushes to disk via fsync before resolving
 * - Partial writes (torn lines) are detected and skipped on load
 * - The file is the source of truth; the in-memory map is derived by
 *   replaying it last-write-wins
 *
 * File format:
 * {"key":"cashout:action:0xabc...","value":"{...}","writtenAt":"2026-01-01T00:00:00.000Z"}
 */

import {
  openSync,
  closeSync,
  appendFileSync,
  readFileSync,
  existsSync,
  fsyncSync,
  mkdirSync,
} from "node:fs";
import { dirname } from "node:path";
import type { RecordStore, StoreEntry } from "./types.js";
import { validateKey } from "./types.js";
import { scanPrefix } from "./in-memory-store.js";

/**
 * Options for creating a JsonlRecordStore.
 */
export interface JsonlRecordStoreOptions {
  /** Path to the JSONL file */
  readonly filePath: string;
}

/**
 * One line of the JSONL file.
 */
interface JsonlRecord {
  readonly key: string;
  readonly value: string;
  readonly writtenAt: string;
}

export class JsonlRecordStore implements RecordStore {
  private readonly _filePath: string;

  /** Latest value per key (rebuilt from file on load) */
  private readonly _records = new Map<string, string>();

  /**
   * Create a new JsonlRecordStore.
   *
   * Existing records are replayed from the file. The file is created on
   * first put; the parent directory is created immediately.
   */
  constructor(options: JsonlRecordStoreOptions) {
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });
    this._loadFromFile();
  }

  async get(key: string): Promise<string | undefined> {
    validateKey(key);
    return this._records.get(key);
  }

  async put(key: string, value: string): Promise<void> {
    validateKey(key);

    const record: JsonlRecord = {
      key,
      value,
      writtenAt: new Date().toISOString(),
    };
    this._writeAndSync(JSON.stringify(record) + "\n");

    // Update in-memory state only after a successful write
    this._records.set(key, value);
  }

  entries(prefix: string): AsyncIterable<StoreEntry> {
    return scanPrefix(this._records, prefix);
  }

  get filePath(): string {
    return this._filePath;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /**
   * Replay the JSONL file into memory.
   *
   * Tolerates partial/corrupt lines (unclean shutdown).
   */
  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const content = readFileSync(this._filePath, "utf-8");

    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch {
        // Torn line: skip
        continue;
      }

      if (!isJsonlRecord(parsed)) {
        continue;
      }

      this._records.set(parsed.key, parsed.value);
    }
  }

  private _writeAndSync(data: string): void {
    const fd = openSync(this._filePath, "a");
    try {
      appendFileSync(fd, data, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }
}

function isJsonlRecord(value: unknown): value is JsonlRecord {
  if (value === null || typeof value !== "object") return false;
  if (!("key" in value && "value" in value && "writtenAt" in value)) return false;
  return (
    typeof value.key === "string" &&
    value.key.length > 0 &&
    typeof value.value === "string" &&
    typeof value.writtenAt === "string"
  );
}
