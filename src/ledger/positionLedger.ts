import { ResourceError, ValidationError } from '../errors';
import { silentLogger } from '../logger';
import type { Logger } from '../logger';
import { CASH, SequenceConflictError } from './types';
import type { LedgerMirror, LedgerRecord, LedgerStore, PortfolioState, TradeAction } from './types';

export type LedgerRejection = ValidationError | ResourceError;

export type AppendResult = { ok: true; record: LedgerRecord } | { ok: false; error: LedgerRejection };

export interface PositionLedgerOptions {
  store: LedgerStore;
  universe: string[];
  initialCash: number;
  mirror?: LedgerMirror;
  logger?: Logger;
  /** Attempts at re-validating after another writer appended first. */
  maxConflictRetries?: number;
}

export interface LedgerDivergence {
  sequenceId: number;
  reason: string;
}

/**
 * Append-only record of every trade an identity made and the portfolio it
 * produced. All mutations go through `appendTrade` / `recordNoTrade`.
 */
export class PositionLedger {
  private readonly store: LedgerStore;
  private readonly universe: ReadonlySet<string>;
  private readonly symbols: string[];
  private readonly initialCash: number;
  private readonly mirror?: LedgerMirror;
  private readonly logger: Logger;
  private readonly maxConflictRetries: number;

  constructor(opts: PositionLedgerOptions) {
    this.store = opts.store;
    this.symbols = [...opts.universe];
    this.universe = new Set(opts.universe);
    this.initialCash = opts.initialCash;
    this.mirror = opts.mirror;
    this.logger = opts.logger ?? silentLogger;
    this.maxConflictRetries = opts.maxConflictRetries ?? 5;
  }

  get storeKind(): string {
    return this.store.kind;
  }

  isTradable(symbol: string): boolean {
    return this.universe.has(symbol);
  }

  /** Symbol and amount checks that need no price or ledger state. */
  checkAction(action: Exclude<TradeAction, { kind: 'none' }>): ValidationError | null {
    if (!this.isTradable(action.symbol)) {
      return new ValidationError('InvalidSymbol', `Symbol ${action.symbol} not found! This action will not be allowed.`, {
        symbol: action.symbol,
      });
    }
    if (!Number.isInteger(action.amount) || action.amount <= 0) {
      return new ValidationError('InvalidAmount', 'Amount must be a positive integer', { amount: action.amount });
    }
    return null;
  }

  initialSnapshot(): PortfolioState {
    const positions: PortfolioState = {};
    for (const s of this.symbols) positions[s] = 0;
    positions[CASH] = this.initialCash;
    return positions;
  }

  history(identity: string): Promise<LedgerRecord[]> {
    return this.store.records(identity);
  }

  lastRecord(identity: string): Promise<LedgerRecord | undefined> {
    return this.store.lastRecord(identity);
  }

  identities(): Promise<string[]> {
    return this.store.identities();
  }

  /** Snapshot after the last record dated on or before `asOfDate` (carry-forward). */
  async latestSnapshot(identity: string, asOfDate: string): Promise<PortfolioState> {
    const records = await this.store.records(identity);
    let found: LedgerRecord | undefined;
    for (const r of records) {
      if (r.date <= asOfDate && (!found || r.sequenceId > found.sequenceId)) found = r;
    }
    return found ? { ...found.positions } : this.initialSnapshot();
  }

  async appendTrade(
    identity: string,
    date: string,
    action: Exclude<TradeAction, { kind: 'none' }>,
    referencePrice: number,
  ): Promise<AppendResult> {
    const log = this.logger.child({ identity, date });
    const invalid = this.checkAction(action);
    if (invalid) return reject(log, invalid);
    if (!Number.isFinite(referencePrice) || referencePrice <= 0) {
      return reject(log, new ValidationError('InvalidPrice', `No valid reference price for ${action.symbol}`, { price: referencePrice }));
    }

    for (let attempt = 0; ; attempt++) {
      const tail = await this.store.lastRecord(identity);
      if (tail && date < tail.date) {
        return reject(
          log,
          new ValidationError('OutOfOrderDate', `Ledger already has records dated ${tail.date}`, { lastDate: tail.date }),
        );
      }
      const current = tail ? tail.positions : this.initialSnapshot();
      const next = applyTrade(current, action, referencePrice);
      if (!next.ok) return reject(log, next.error);
      try {
        const record = await this.store.append(identity, {
          date,
          sequenceId: (tail?.sequenceId ?? 0) + 1,
          action,
          price: referencePrice,
          positions: next.positions,
        });
        log.info({ seq: record.sequenceId, action, price: referencePrice }, 'trade committed');
        await this.mirrorRecord(record);
        return { ok: true, record };
      } catch (err) {
        if (err instanceof SequenceConflictError && attempt < this.maxConflictRetries) {
          log.warn({ expected: err.expected, actual: err.actual }, 'ledger tail moved; revalidating');
          continue;
        }
        throw err;
      }
    }
  }

  /** Carries the current tail snapshot onto `date` without trading. */
  async recordNoTrade(identity: string, date: string): Promise<LedgerRecord> {
    for (let attempt = 0; ; attempt++) {
      const tail = await this.store.lastRecord(identity);
      if (tail && date < tail.date) {
        throw new ValidationError('OutOfOrderDate', `Ledger already has records dated ${tail.date}`, { lastDate: tail.date });
      }
      try {
        const record = await this.store.append(identity, {
          date,
          sequenceId: (tail?.sequenceId ?? 0) + 1,
          action: { kind: 'none' },
          price: null,
          positions: tail ? { ...tail.positions } : this.initialSnapshot(),
        });
        this.logger.info({ identity, date, seq: record.sequenceId }, 'no-trade record committed');
        await this.mirrorRecord(record);
        return record;
      } catch (err) {
        if (err instanceof SequenceConflictError && attempt < this.maxConflictRetries) continue;
        throw err;
      }
    }
  }

  /**
   * Replays every record from the initial snapshot in sequence order and
   * reports the first record whose stored positions differ from the replay,
   * hold a negative value, or break id/date ordering.
   */
  async verify(identity: string): Promise<LedgerDivergence | null> {
    const records = await this.store.records(identity);
    let state = this.initialSnapshot();
    let prev: LedgerRecord | undefined;
    for (const r of records) {
      if (prev && r.sequenceId <= prev.sequenceId) {
        return { sequenceId: r.sequenceId, reason: `sequence id not increasing after ${prev.sequenceId}` };
      }
      if (prev && r.date < prev.date) {
        return { sequenceId: r.sequenceId, reason: `date ${r.date} precedes ${prev.date}` };
      }
      const negative = Object.entries(r.positions).find(([, v]) => v < 0);
      if (negative) return { sequenceId: r.sequenceId, reason: `negative ${negative[0]}: ${negative[1]}` };

      if (r.action.kind !== 'none') {
        if (r.price === null) return { sequenceId: r.sequenceId, reason: 'trade without a recorded price' };
        const next = applyTrade(state, r.action, r.price);
        if (!next.ok) return { sequenceId: r.sequenceId, reason: next.error.message };
        state = next.positions;
      }
      if (!samePositions(state, r.positions)) {
        return { sequenceId: r.sequenceId, reason: 'stored positions differ from replay' };
      }
      prev = r;
    }
    return null;
  }

  private async mirrorRecord(record: LedgerRecord): Promise<void> {
    if (!this.mirror) return;
    try {
      await this.mirror.recordCommitted(record);
    } catch (err) {
      this.logger.warn({ err, identity: record.identity, seq: record.sequenceId }, 'ledger mirror write failed');
    }
  }
}

type ApplyResult = { ok: true; positions: PortfolioState } | { ok: false; error: LedgerRejection };

/** Pure trade arithmetic; never returns a state with a negative value. */
export function applyTrade(
  current: PortfolioState,
  action: Exclude<TradeAction, { kind: 'none' }>,
  price: number,
): ApplyResult {
  const cash = current[CASH] ?? 0;
  const held = current[action.symbol] ?? 0;
  const value = price * action.amount;
  const positions = { ...current };
  if (action.kind === 'buy') {
    if (cash < value) {
      return {
        ok: false,
        error: new ResourceError('InsufficientCash', 'Insufficient cash! This action will not be allowed.', {
          required_cash: value,
          cash_available: cash,
          symbol: action.symbol,
        }),
      };
    }
    positions[CASH] = cash - value;
    positions[action.symbol] = held + action.amount;
  } else {
    if (held < action.amount) {
      return {
        ok: false,
        error: new ResourceError('InsufficientShares', 'Insufficient shares! This action will not be allowed.', {
          have: held,
          want_to_sell: action.amount,
          symbol: action.symbol,
        }),
      };
    }
    positions[CASH] = cash + value;
    positions[action.symbol] = held - action.amount;
  }
  return { ok: true, positions };
}

function samePositions(a: PortfolioState, b: PortfolioState): boolean {
  const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
  for (const k of keys) {
    if ((a[k] ?? 0) !== (b[k] ?? 0)) return false;
  }
  return true;
}

function reject(log: Logger, error: LedgerRejection): AppendResult {
  log.info({ code: error.code, details: error.details }, 'trade rejected');
  return { ok: false, error };
}
