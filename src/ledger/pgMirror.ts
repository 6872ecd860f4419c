import { Pool } from 'pg';
import type { LedgerMirror, LedgerRecord } from './types';

/** The part of `pg.Pool` the mirror uses. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<unknown>;
}

/**
 * Copies committed ledger records into Postgres for reporting. The primary
 * store stays the source of truth; `(identity, seq_id)` makes re-mirroring a
 * record a no-op.
 */
export class PgLedgerMirror implements LedgerMirror {
  private schemaReady: Promise<void> | null = null;

  constructor(private readonly db: Queryable) {}

  static fromUrl(url: string): PgLedgerMirror {
    return new PgLedgerMirror(new Pool({ connectionString: url, ssl: { rejectUnauthorized: false } }));
  }

  ensureSchema(): Promise<void> {
    this.schemaReady ??= this.db
      .query(
        `CREATE TABLE IF NOT EXISTS ledger_records (
          identity TEXT NOT NULL,
          seq_id BIGINT NOT NULL,
          date DATE NOT NULL,
          action TEXT,
          symbol TEXT,
          amount BIGINT,
          price DOUBLE PRECISION,
          positions JSONB NOT NULL,
          PRIMARY KEY (identity, seq_id)
        );
        CREATE INDEX IF NOT EXISTS idx_ledger_identity_date ON ledger_records(identity, date);`,
      )
      .then(() => undefined)
      .catch((err: unknown) => {
        this.schemaReady = null;
        throw err;
      });
    return this.schemaReady;
  }

  async recordCommitted(record: LedgerRecord): Promise<void> {
    await this.ensureSchema();
    const { action } = record;
    await this.db.query(
      `INSERT INTO ledger_records (identity, seq_id, date, action, symbol, amount, price, positions)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8)
       ON CONFLICT (identity, seq_id) DO NOTHING`,
      [
        record.identity,
        record.sequenceId,
        record.date,
        action.kind === 'none' ? null : action.kind,
        action.kind === 'none' ? null : action.symbol,
        action.kind === 'none' ? null : action.amount,
        record.price,
        JSON.stringify(record.positions),
      ],
    );
  }

  async close(): Promise<void> {
    if (this.db instanceof Pool) await this.db.end();
  }
}
