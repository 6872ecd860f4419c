import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PersistenceError } from '../errors';
import { JsonlLedgerStore } from './jsonlStore';
import { PositionLedger } from './positionLedger';
import { SequenceConflictError } from './types';
import type { LedgerEntry } from './types';

const BUY: LedgerEntry = {
  date: '2025-01-02',
  sequenceId: 1,
  action: { kind: 'buy', symbol: 'AAPL', amount: 10 },
  price: 180,
  positions: { AAPL: 10, CASH: 8200 },
};

const BUY_LINE =
  '{"date":"2025-01-02","id":1,"this_action":{"action":"buy","symbol":"AAPL","amount":10,"price":180},"positions":{"AAPL":10,"CASH":8200}}';

describe('JsonlLedgerStore', () => {
  let dir: string;
  let store: JsonlLedgerStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ledger-'));
    store = new JsonlLedgerStore(dir, { lockTimeoutMs: 2000, lockPollMs: 5 });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes one line per record under <identity>/position/position.jsonl', async () => {
    await store.append('alpha', BUY);
    await store.append('alpha', {
      date: '2025-01-03',
      sequenceId: 2,
      action: { kind: 'none' },
      price: null,
      positions: { AAPL: 10, CASH: 8200 },
    });
    const text = await fs.readFile(path.join(dir, 'alpha', 'position', 'position.jsonl'), 'utf8');
    expect(text).toBe(
      `${BUY_LINE}\n{"date":"2025-01-03","id":2,"this_action":null,"positions":{"AAPL":10,"CASH":8200}}\n`,
    );
  });

  it('reads back what it wrote', async () => {
    await store.append('alpha', BUY);
    expect(await store.records('alpha')).toEqual([{ identity: 'alpha', ...BUY }]);
    expect(await store.lastRecord('alpha')).toEqual({ identity: 'alpha', ...BUY });
    expect(await store.lastRecord('beta')).toBeUndefined();
  });

  it('rejects an entry that does not follow the tail', async () => {
    await expect(store.append('alpha', { ...BUY, sequenceId: 2 })).rejects.toBeInstanceOf(SequenceConflictError);
    await store.append('alpha', BUY);
    await expect(store.append('alpha', BUY)).rejects.toMatchObject({ expected: 0, actual: 1 });
  });

  it('lets exactly one of two racing writers claim an id', async () => {
    const results = await Promise.allSettled([store.append('alpha', BUY), store.append('alpha', BUY)]);
    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
    const rejected = results.find((r) => r.status === 'rejected');
    expect(rejected?.status === 'rejected' && rejected.reason).toBeInstanceOf(SequenceConflictError);
    expect(await store.records('alpha')).toHaveLength(1);
  });

  it('gives concurrent ledger trades distinct, contiguous ids', async () => {
    const ledger = new PositionLedger({ store, universe: ['AAPL'], initialCash: 10_000 });
    const results = await Promise.all(
      Array.from({ length: 5 }, () =>
        ledger.appendTrade('alpha', '2025-01-02', { kind: 'buy', symbol: 'AAPL', amount: 1 }, 100),
      ),
    );
    expect(results.every((r) => r.ok)).toBe(true);
    const history = await store.records('alpha');
    expect(history.map((r) => r.sequenceId)).toEqual([1, 2, 3, 4, 5]);
    expect(history[4].positions).toEqual({ AAPL: 5, CASH: 9500 });
  });

  it('ignores an unterminated last line and overwrites it on the next append', async () => {
    const file = path.join(dir, 'alpha', 'position', 'position.jsonl');
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, `${BUY_LINE}\n{"date":"2025-01-0`);
    expect(await store.records('alpha')).toHaveLength(1);

    await store.append('alpha', { ...BUY, date: '2025-01-03', sequenceId: 2 });
    const text = await fs.readFile(file, 'utf8');
    expect(text.split('\n')).toEqual([BUY_LINE, BUY_LINE.replace('2025-01-02', '2025-01-03').replace('"id":1', '"id":2'), '']);
  });

  it('reads the legacy no_trade action as a no-trade record', async () => {
    const file = path.join(dir, 'alpha', 'position', 'position.jsonl');
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, '{"date":"2025-01-02","id":0,"this_action":{"action":"no_trade"},"positions":{"CASH":10000}}\n');
    expect(await store.records('alpha')).toEqual([
      { identity: 'alpha', date: '2025-01-02', sequenceId: 0, action: { kind: 'none' }, price: null, positions: { CASH: 10000 } },
    ]);
  });

  it('fails with PersistenceError on a corrupt committed line', async () => {
    const file = path.join(dir, 'alpha', 'position', 'position.jsonl');
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, 'not json\n');
    await expect(store.records('alpha')).rejects.toBeInstanceOf(PersistenceError);
  });

  it('gives up waiting for a lock held by a live writer', async () => {
    const slow = new JsonlLedgerStore(dir, { lockTimeoutMs: 30, lockPollMs: 5, staleLockMs: 60_000 });
    const file = slow.filePath('alpha');
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(`${file}.lock`, JSON.stringify({ pid: process.pid, acquiredAt: Date.now() }));
    await expect(slow.append('alpha', BUY)).rejects.toBeInstanceOf(PersistenceError);
    expect(await slow.records('alpha')).toEqual([]);
  });

  it('takes over a lock left behind by a writer that no longer runs', async () => {
    const patient = new JsonlLedgerStore(dir, { lockTimeoutMs: 200, lockPollMs: 5, staleLockMs: 60_000 });
    const file = patient.filePath('alpha');
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(`${file}.lock`, JSON.stringify({ pid: 2_147_483_646, acquiredAt: Date.now() }));
    await patient.append('alpha', BUY);
    expect(await patient.records('alpha')).toEqual([{ identity: 'alpha', ...BUY }]);
    await expect(fs.stat(`${file}.lock`)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('takes over an ownerless lock once it is older than staleLockMs', async () => {
    const ledger = new PositionLedger({
      store: new JsonlLedgerStore(dir, { lockTimeoutMs: 2000, lockPollMs: 5, staleLockMs: 100 }),
      universe: ['AAPL'],
      initialCash: 10_000,
    });
    expect((await ledger.appendTrade('alpha', '2025-01-02', { kind: 'buy', symbol: 'AAPL', amount: 1 }, 100)).ok).toBe(true);
    const file = store.filePath('alpha');
    await fs.writeFile(`${file}.lock`, '');
    for (const date of ['2025-01-03', '2025-01-06', '2025-01-07']) {
      const res = await ledger.appendTrade('alpha', date, { kind: 'buy', symbol: 'AAPL', amount: 1 }, 100);
      expect(res.ok).toBe(true);
    }
    expect((await ledger.history('alpha')).map((r) => r.sequenceId)).toEqual([1, 2, 3, 4]);
  });

  it('lists identities that have a ledger file', async () => {
    await store.append('beta', BUY);
    await store.append('alpha', BUY);
    await fs.mkdir(path.join(dir, 'gamma', 'log'), { recursive: true });
    expect(await store.identities()).toEqual(['alpha', 'beta']);
  });
});
