import fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import path from 'path';
import { PersistenceError } from '../errors';
import { isErrnoException, isRecord, sleep } from '../utils';
import { decodeEntry, encodeEntry } from './codec';
import { SequenceConflictError } from './types';
import type { LedgerEntry, LedgerRecord, LedgerStore } from './types';

export interface JsonlStoreOptions {
  lockTimeoutMs?: number;
  lockPollMs?: number;
  /** Age after which a lock is taken over even if its owner looks alive. Defaults to `lockTimeoutMs`. */
  staleLockMs?: number;
}

interface LockOwner {
  pid: number;
  acquiredAt: number;
}

/** Empty or half-written locks carry no owner. */
function parseOwner(text: string): LockOwner | undefined {
  try {
    const v: unknown = JSON.parse(text);
    if (isRecord(v) && typeof v.pid === 'number' && typeof v.acquiredAt === 'number') {
      return { pid: v.pid, acquiredAt: v.acquiredAt };
    }
  } catch {
    return undefined;
  }
  return undefined;
}

function processAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return !(isErrnoException(err) && err.code === 'ESRCH');
  }
}

interface FileState {
  records: LedgerRecord[];
  /** Bytes up to and including the last newline; anything after is an unacknowledged write. */
  committedBytes: number;
  torn: boolean;
}

/**
 * One `position.jsonl` per identity under `<rootDir>/<identity>/position/`.
 * Writers serialize through an exclusive `.lock` file next to it holding the
 * owner's pid. A lock whose owner is gone, or older than `staleLockMs`, is
 * taken over.
 */
export class JsonlLedgerStore implements LedgerStore {
  readonly kind = 'jsonl';
  private readonly lockTimeoutMs: number;
  private readonly lockPollMs: number;
  private readonly staleLockMs: number;

  constructor(
    private readonly rootDir: string,
    opts: JsonlStoreOptions = {},
  ) {
    this.lockTimeoutMs = opts.lockTimeoutMs ?? 10_000;
    this.lockPollMs = opts.lockPollMs ?? 20;
    this.staleLockMs = opts.staleLockMs ?? this.lockTimeoutMs;
  }

  filePath(identity: string): string {
    return path.join(this.rootDir, identity, 'position', 'position.jsonl');
  }

  async records(identity: string): Promise<LedgerRecord[]> {
    return (await this.readState(identity)).records;
  }

  async lastRecord(identity: string): Promise<LedgerRecord | undefined> {
    const { records } = await this.readState(identity);
    return records[records.length - 1];
  }

  async append(identity: string, entry: LedgerEntry): Promise<LedgerRecord> {
    const file = this.filePath(identity);
    try {
      await fs.mkdir(path.dirname(file), { recursive: true });
    } catch (err) {
      throw new PersistenceError(`cannot create ledger directory for ${identity}`, err);
    }
    const release = await this.acquireLock(file);
    try {
      const { records, committedBytes, torn } = await this.readState(identity);
      const lastId = records[records.length - 1]?.sequenceId ?? 0;
      if (entry.sequenceId !== lastId + 1) {
        throw new SequenceConflictError(identity, entry.sequenceId - 1, lastId);
      }
      const line = encodeEntry(entry) + '\n';
      let handle: FileHandle | undefined;
      try {
        if (torn) await fs.truncate(file, committedBytes);
        handle = await fs.open(file, 'a');
        await handle.write(line);
        await handle.sync();
      } catch (err) {
        throw new PersistenceError(`append to ${file} failed`, err);
      } finally {
        await handle?.close();
      }
      return { identity, ...entry };
    } finally {
      await release();
    }
  }

  async identities(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.rootDir);
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return [];
      throw new PersistenceError(`cannot list ${this.rootDir}`, err);
    }
    const found: string[] = [];
    for (const name of entries.sort()) {
      const exists = await fs
        .stat(this.filePath(name))
        .then((s) => s.isFile())
        .catch(() => false);
      if (exists) found.push(name);
    }
    return found;
  }

  private async readState(identity: string): Promise<FileState> {
    const file = this.filePath(identity);
    let text: string;
    try {
      text = await fs.readFile(file, 'utf8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return { records: [], committedBytes: 0, torn: false };
      throw new PersistenceError(`cannot read ${file}`, err);
    }
    const lines = text.split('\n');
    // after the final newline: '' for a clean file, otherwise an unfinished write
    const tail = lines.pop() ?? '';
    const records: LedgerRecord[] = [];
    lines.forEach((line, i) => {
      if (!line.trim()) return;
      try {
        records.push({ identity, ...decodeEntry(line) });
      } catch (err) {
        throw new PersistenceError(`${file}:${i + 1} is not a ledger record`, err);
      }
    });
    const committedBytes = Buffer.byteLength(text, 'utf8') - Buffer.byteLength(tail, 'utf8');
    return { records, committedBytes, torn: tail.length > 0 };
  }

  private async acquireLock(file: string): Promise<() => Promise<void>> {
    const lockPath = `${file}.lock`;
    const deadline = Date.now() + this.lockTimeoutMs;
    for (;;) {
      const owner = JSON.stringify({ pid: process.pid, acquiredAt: Date.now() } satisfies LockOwner);
      try {
        await fs.writeFile(lockPath, owner, { flag: 'wx' });
        return async () => {
          // only remove the lock if nobody took it over in the meantime
          const current = await fs.readFile(lockPath, 'utf8').catch(() => undefined);
          if (current === owner) await fs.rm(lockPath, { force: true });
        };
      } catch (err) {
        if (!isErrnoException(err) || err.code !== 'EEXIST') {
          throw new PersistenceError(`cannot create lock ${lockPath}`, err);
        }
        if (await this.isStale(lockPath)) {
          await fs.rm(lockPath, { force: true });
          continue;
        }
        if (Date.now() >= deadline) {
          throw new PersistenceError(`timed out after ${this.lockTimeoutMs}ms waiting for ${lockPath}`);
        }
        await sleep(this.lockPollMs);
      }
    }
  }

  private async isStale(lockPath: string): Promise<boolean> {
    let text: string;
    let mtimeMs: number;
    try {
      text = await fs.readFile(lockPath, 'utf8');
      mtimeMs = (await fs.stat(lockPath)).mtimeMs;
    } catch (err) {
      // released between our attempt and this check
      if (isErrnoException(err) && err.code === 'ENOENT') return false;
      throw new PersistenceError(`cannot inspect lock ${lockPath}`, err);
    }
    const owner = parseOwner(text);
    if (owner && owner.pid !== process.pid && !processAlive(owner.pid)) return true;
    return Date.now() - (owner?.acquiredAt ?? mtimeMs) >= this.staleLockMs;
  }
}
