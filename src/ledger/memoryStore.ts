import { SequenceConflictError } from './types';
import type { LedgerEntry, LedgerRecord, LedgerStore } from './types';

/** Process-local store for tests and dry runs. */
export class MemoryLedgerStore implements LedgerStore {
  readonly kind = 'memory';
  private readonly byIdentity = new Map<string, LedgerRecord[]>();

  async records(identity: string): Promise<LedgerRecord[]> {
    return (this.byIdentity.get(identity) ?? []).map((r) => ({ ...r, positions: { ...r.positions } }));
  }

  async lastRecord(identity: string): Promise<LedgerRecord | undefined> {
    const list = this.byIdentity.get(identity) ?? [];
    const last = list[list.length - 1];
    return last && { ...last, positions: { ...last.positions } };
  }

  async append(identity: string, entry: LedgerEntry): Promise<LedgerRecord> {
    const list = this.byIdentity.get(identity) ?? [];
    const lastId = list[list.length - 1]?.sequenceId ?? 0;
    if (entry.sequenceId !== lastId + 1) throw new SequenceConflictError(identity, entry.sequenceId - 1, lastId);
    const record: LedgerRecord = { identity, ...entry, positions: { ...entry.positions } };
    list.push(record);
    this.byIdentity.set(identity, list);
    return { ...record, positions: { ...record.positions } };
  }

  async identities(): Promise<string[]> {
    return [...this.byIdentity.keys()].sort();
  }
}
