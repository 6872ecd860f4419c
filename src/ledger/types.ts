export const CASH = 'CASH';

/** Symbol -> quantity; `CASH` holds the cash balance. Every value is >= 0. */
export type PortfolioState = Record<string, number>;

export type TradeAction =
  | { kind: 'none' }
  | { kind: 'buy'; symbol: string; amount: number }
  | { kind: 'sell'; symbol: string; amount: number };

export type TradeSide = 'buy' | 'sell';

export interface LedgerRecord {
  identity: string;
  date: string;
  sequenceId: number;
  action: TradeAction;
  /** Reference price the trade executed at; null for a no-trade record. */
  price: number | null;
  positions: PortfolioState;
}

/** A record before the store has accepted it; `sequenceId` is the id it claims. */
export type LedgerEntry = Omit<LedgerRecord, 'identity'>;

/**
 * Persistence for ledger records, partitioned by identity.
 *
 * `append` is a compare-and-append: it must commit `entry` only when the
 * identity's current last sequence id is `entry.sequenceId - 1` (0 for an empty
 * ledger), atomically with respect to every other writer, and throw
 * `SequenceConflictError` otherwise.
 */
export interface LedgerStore {
  readonly kind: string;
  records(identity: string): Promise<LedgerRecord[]>;
  lastRecord(identity: string): Promise<LedgerRecord | undefined>;
  append(identity: string, entry: LedgerEntry): Promise<LedgerRecord>;
  identities(): Promise<string[]>;
  close?(): Promise<void>;
}

/** Receives records after the primary store committed them. */
export interface LedgerMirror {
  recordCommitted(record: LedgerRecord): Promise<void>;
}

export class SequenceConflictError extends Error {
  constructor(
    public readonly identity: string,
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(`sequence conflict for ${identity}: expected last id ${expected}, found ${actual}`);
    this.name = 'SequenceConflictError';
  }
}
