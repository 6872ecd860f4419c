import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { PersistenceError } from '../errors';
import { decodeEntry, encodeEntry } from './codec';
import { SequenceConflictError } from './types';
import type { LedgerEntry, LedgerRecord, LedgerStore } from './types';

interface RecordRow {
  identity: string;
  record_json: string;
}

/**
 * Ledger in a single SQLite file. Rows keep the same JSON document the JSONL
 * store writes, so both stores round-trip identical records.
 */
export class SqliteLedgerStore implements LedgerStore {
  readonly kind = 'sqlite';
  private readonly db: Database.Database;

  constructor(file: string) {
    if (file !== ':memory:') {
      const dir = path.dirname(file);
      if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    }
    try {
      this.db = new Database(file);
      this.db.exec(`
        PRAGMA journal_mode = WAL;
        CREATE TABLE IF NOT EXISTS ledger_records (
          identity TEXT NOT NULL,
          seq_id INTEGER NOT NULL,
          date TEXT NOT NULL,
          record_json TEXT NOT NULL,
          created_ts INTEGER NOT NULL,
          PRIMARY KEY (identity, seq_id)
        );
        CREATE INDEX IF NOT EXISTS idx_ledger_identity_date ON ledger_records(identity, date);
      `);
    } catch (err) {
      throw new PersistenceError(`cannot open ledger database ${file}`, err);
    }
  }

  async records(identity: string): Promise<LedgerRecord[]> {
    return this.query(() =>
      this.db
        .prepare<[string], RecordRow>(
          `SELECT identity, record_json FROM ledger_records WHERE identity = ? ORDER BY seq_id ASC`,
        )
        .all(identity)
        .map(toRecord),
    );
  }

  async lastRecord(identity: string): Promise<LedgerRecord | undefined> {
    return this.query(() => {
      const row = this.db
        .prepare<[string], RecordRow>(
          `SELECT identity, record_json FROM ledger_records WHERE identity = ? ORDER BY seq_id DESC LIMIT 1`,
        )
        .get(identity);
      return row ? toRecord(row) : undefined;
    });
  }

  async append(identity: string, entry: LedgerEntry): Promise<LedgerRecord> {
    const insert = this.db.transaction((e: LedgerEntry) => {
      const row = this.db
        .prepare<[string], { last: number | null }>(
          `SELECT MAX(seq_id) AS last FROM ledger_records WHERE identity = ?`,
        )
        .get(identity);
      const last = row?.last ?? 0;
      if (e.sequenceId !== last + 1) throw new SequenceConflictError(identity, e.sequenceId - 1, last);
      this.db
        .prepare(
          `INSERT INTO ledger_records (identity, seq_id, date, record_json, created_ts)
           VALUES (?, ?, ?, ?, ?)`,
        )
        .run(identity, e.sequenceId, e.date, encodeEntry(e), Date.now());
    });
    try {
      // IMMEDIATE takes the write lock before reading MAX(seq_id)
      insert.immediate(entry);
    } catch (err) {
      if (err instanceof SequenceConflictError) throw err;
      throw new PersistenceError(`ledger insert for ${identity} failed`, err);
    }
    return { identity, ...entry };
  }

  async identities(): Promise<string[]> {
    const rows = this.query(() =>
      this.db
        .prepare<[], { identity: string }>(`SELECT DISTINCT identity FROM ledger_records ORDER BY identity`)
        .all(),
    );
    return rows.map((r) => r.identity);
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private query<T>(fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new PersistenceError('ledger query failed', err);
    }
  }
}

function toRecord(row: RecordRow): LedgerRecord {
  return { identity: row.identity, ...decodeEntry(row.record_json) };
}
