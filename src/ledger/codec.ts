import { z } from 'zod';
import { isIsoDate } from '../dates';
import type { LedgerEntry, TradeAction } from './types';

const persistedAction = z.union([
  z.object({
    action: z.enum(['buy', 'sell']),
    symbol: z.string().min(1),
    amount: z.number().int().positive(),
    price: z.number().positive().optional(),
  }),
  // written by older runs for days without trades
  z.object({ action: z.literal('no_trade') }),
  z.null(),
]);

const persistedLine = z.object({
  date: z.string().refine(isIsoDate, { message: 'expected YYYY-MM-DD' }),
  id: z.number().int().nonnegative(),
  this_action: persistedAction.optional(),
  positions: z.record(z.number()),
});

export type PersistedLine = z.infer<typeof persistedLine>;

export function encodeEntry(entry: LedgerEntry): string {
  const { action } = entry;
  const thisAction =
    action.kind === 'none'
      ? null
      : { action: action.kind, symbol: action.symbol, amount: action.amount, price: entry.price };
  return JSON.stringify({
    date: entry.date,
    id: entry.sequenceId,
    this_action: thisAction,
    positions: entry.positions,
  });
}

/** Throws when `line` is not a ledger record. */
export function decodeEntry(line: string): LedgerEntry {
  const doc = persistedLine.parse(JSON.parse(line));
  const raw = doc.this_action;
  let action: TradeAction = { kind: 'none' };
  let price: number | null = null;
  if (raw && raw.action !== 'no_trade') {
    action = { kind: raw.action, symbol: raw.symbol, amount: raw.amount };
    price = raw.price ?? null;
  }
  return { date: doc.date, sequenceId: doc.id, action, price, positions: doc.positions };
}
