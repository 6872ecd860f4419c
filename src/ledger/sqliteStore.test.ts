import Database from 'better-sqlite3';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PersistenceError } from '../errors';
import { SqliteLedgerStore } from './sqliteStore';
import { SequenceConflictError } from './types';
import type { LedgerEntry } from './types';

const BUY: LedgerEntry = {
  date: '2025-01-02',
  sequenceId: 1,
  action: { kind: 'buy', symbol: 'AAPL', amount: 10 },
  price: 180,
  positions: { AAPL: 10, CASH: 8200 },
};

const NONE: LedgerEntry = {
  date: '2025-01-03',
  sequenceId: 2,
  action: { kind: 'none' },
  price: null,
  positions: { AAPL: 10, CASH: 8200 },
};

describe('SqliteLedgerStore', () => {
  let store: SqliteLedgerStore;

  beforeEach(() => {
    store = new SqliteLedgerStore(':memory:');
  });

  afterEach(async () => {
    await store.close();
  });

  it('returns records in sequence order', async () => {
    await store.append('alpha', BUY);
    await store.append('alpha', NONE);
    expect(await store.records('alpha')).toEqual([
      { identity: 'alpha', ...BUY },
      { identity: 'alpha', ...NONE },
    ]);
    expect((await store.lastRecord('alpha'))?.sequenceId).toBe(2);
  });

  it('rejects an id that does not follow the tail', async () => {
    await store.append('alpha', BUY);
    await expect(store.append('alpha', BUY)).rejects.toBeInstanceOf(SequenceConflictError);
    await expect(store.append('alpha', { ...NONE, sequenceId: 3 })).rejects.toMatchObject({ expected: 2, actual: 1 });
    expect(await store.records('alpha')).toHaveLength(1);
  });

  it('partitions by identity', async () => {
    await store.append('beta', BUY);
    await store.append('alpha', BUY);
    expect(await store.identities()).toEqual(['alpha', 'beta']);
    expect(await store.records('gamma')).toEqual([]);
    expect(await store.lastRecord('gamma')).toBeUndefined();
  });

  it('reports a corrupt row as a persistence failure', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-sqlite-'));
    const file = path.join(dir, 'ledger.sqlite');
    const onDisk = new SqliteLedgerStore(file);
    try {
      await onDisk.append('alpha', BUY);
      const raw = new Database(file);
      raw
        .prepare(`INSERT INTO ledger_records (identity, seq_id, date, record_json, created_ts) VALUES (?, ?, ?, ?, ?)`)
        .run('alpha', 2, '2025-01-03', 'not json', 0);
      raw.close();
      await expect(onDisk.records('alpha')).rejects.toBeInstanceOf(PersistenceError);
      await expect(onDisk.lastRecord('alpha')).rejects.toBeInstanceOf(PersistenceError);
    } finally {
      await onDisk.close();
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
