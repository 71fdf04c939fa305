/**
 * @quire/ledger — File-based JSONL LedgerStore.
 *
 * One committed transaction per line. The unique index is rebuilt from the
 * file on construction.
 *
 * Crash safety:
 * - Each ingest appends and fsyncs before the row becomes visible
 * - A torn final line (unclean shutdown) is skipped on load
 * - Lines repeating an already-loaded external reference are ignored
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
import pino from "pino";
import type { Logger } from "pino";
import type { PaymentTransaction } from "@quire/types";
import { isPaymentTransaction } from "@quire/types";
import { InMemoryLedgerStore } from "./in-memory-ledger.js";

export interface JsonlLedgerStoreOptions {
  readonly filePath: string;
  readonly logger?: Logger;
}

export class JsonlLedgerStore extends InMemoryLedgerStore {
  private readonly _filePath: string;
  private readonly _logger: Logger;

  constructor(options: JsonlLedgerStoreOptions) {
    super();
    this._filePath = options.filePath;
    this._logger = (options.logger ?? pino({ level: "silent" })).child({
      component: "ledger-jsonl",
    });

    mkdirSync(dirname(this._filePath), { recursive: true });
    this._loadFromFile();
  }

  get filePath(): string {
    return this._filePath;
  }

  protected override persist(row: PaymentTransaction): void {
    const fd = openSync(this._filePath, "a");
    try {
      appendFileSync(fd, JSON.stringify(row) + "\n", "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }

  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const lines = readFileSync(this._filePath, "utf-8").split("\n");
    let skipped = 0;

    for (const line of lines) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }

      let record: unknown;
      try {
        record = JSON.parse(trimmed);
      } catch {
        skipped++;
        continue;
      }

      if (!isPaymentTransaction(record)) {
        skipped++;
        continue;
      }
      this.index(record);
    }

    if (skipped > 0) {
      this._logger.warn({ filePath: this._filePath, skipped }, "Skipped unreadable ledger lines");
    }
  }
}
