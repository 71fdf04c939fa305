/**
 * @quire/event-store — File-based JSONL EventStore implementation.
 *
 * Stores events as one JSON object per line in a `.jsonl` file; the
 * in-memory tier is rebuilt from the file on construction.
 *
 * Crash safety:
 * - Each append flushes to disk via fsync before returning
 * - Partial writes (torn pages) are detected and skipped on load
 * - The file is the source of truth; in-memory state is derived
 *
 * File format:
 * {"event":{...},"streamId":"...","version":1,"globalPosition":1,"appendedAt":"...","hash":"...","previousHash":"..."}
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
} from "node:fs";
import { dirname } from "node:path";
import { isDomainEvent } from "@quire/types";
import type { StoredEvent } from "./types.js";
import type { EventStoreOptions } from "./in-memory-store.js";
import { InMemoryEventStore } from "./in-memory-store.js";

export interface JsonlEventStoreOptions extends EventStoreOptions {
  readonly filePath: string;
}

export class JsonlEventStore extends InMemoryEventStore {
  private readonly _filePath: string;
  private _skippedLines = 0;

  /**
   * Load events from `filePath` if it exists. The parent directory is
   * created on demand.
   */
  constructor(options: JsonlEventStoreOptions) {
    super(options);
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });
    this._loadFromFile();
  }

  get filePath(): string {
    return this._filePath;
  }

  /** Lines dropped on load because they were torn or malformed. */
  get skippedLines(): number {
    return this._skippedLines;
  }

  protected override persist(events: readonly StoredEvent[]): void {
    const data = events.map((e) => JSON.stringify(e) + "\n").join("");
    const fd = openSync(this._filePath, "a");
    try {
      appendFileSync(fd, data, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }

  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    for (const line of readFileSync(this._filePath, "utf-8").split("\n")) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }

      let record: unknown;
      try {
        record = JSON.parse(trimmed);
      } catch {
        this._skippedLines++;
        continue;
      }

      if (!isStoredEvent(record)) {
        this._skippedLines++;
        continue;
      }
      this.restore(record);
    }
  }
}

function isStoredEvent(value: unknown): value is StoredEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isDomainEvent(v.event) &&
    typeof v.streamId === "string" &&
    typeof v.version === "number" &&
    typeof v.globalPosition === "number" &&
    typeof v.appendedAt === "string" &&
    typeof v.hash === "string" &&
    typeof v.previousHash === "string"
  );
}
