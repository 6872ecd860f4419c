import { CASH } from '../ledger/types';
import type { PortfolioState } from '../ledger/types';
import type { DateScopedPrices } from '../market/scopedPrices';
import type { RetryPolicy } from '../retry';
import { describeTools } from '../tools/registry';
import { mapInBatches } from '../utils';
import { STOP_TOKEN } from './stopSignal';

export interface ContextInput {
  identity: string;
  date: string;
  previousDate: string;
  /** Snapshot as of `previousDate`. */
  positions: PortfolioState;
  prices: DateScopedPrices;
  symbols: readonly string[];
  stopToken?: string;
  /** Wraps every price lookup; without it lookups run once. */
  retry?: Pick<RetryPolicy, 'execute'>;
  /** Price lookups in flight at once. */
  concurrency?: number;
}

export const DEFAULT_PRICE_CONCURRENCY = 8;

export interface ContextBuilder {
  build(input: ContextInput): Promise<string>;
}

function money(n: number): string {
  return n.toFixed(2);
}

/**
 * Plain-text briefing: cash, holdings at today's open, previous close against
 * today's open for every tradable symbol, the tool list and how to call it.
 */
export class DefaultContextBuilder implements ContextBuilder {
  async build(input: ContextInput): Promise<string> {
    const { date, previousDate, positions, prices, symbols, retry } = input;
    const stopToken = input.stopToken ?? STOP_TOKEN;
    const lookup = <T>(label: string, fn: () => Promise<T>): Promise<T> => (retry ? retry.execute(label, fn) : fn());

    const quotes = await mapInBatches(symbols, input.concurrency ?? DEFAULT_PRICE_CONCURRENCY, async (symbol) => ({
      symbol,
      prevClose: await lookup(`close price ${symbol} ${previousDate}`, () => prices.closePrice(symbol, previousDate)),
      open: await lookup(`open price ${symbol}`, () => prices.openPrice(symbol)),
    }));

    const cash = positions[CASH] ?? 0;
    const holdings: string[] = [];
    let equity = cash;
    for (const q of quotes) {
      const qty = positions[q.symbol] ?? 0;
      if (qty <= 0) continue;
      const value = q.open === null ? null : q.open * qty;
      if (value !== null) equity += value;
      holdings.push(`- ${q.symbol}: ${qty} shares${value === null ? '' : ` (${money(value)} at open)`}`);
    }
    const priceLines = quotes.map(
      (q) =>
        `- ${q.symbol}: ${q.prevClose === null ? 'n/a' : money(q.prevClose)} -> ${q.open === null ? 'n/a' : money(q.open)}`,
    );

    return [
      `You are a stock trading agent. Today is ${date}. Trades execute at today's opening price.`,
      '',
      `Cash: ${money(cash)}`,
      `Portfolio value at today's open: ${money(equity)}`,
      'Holdings:',
      ...(holdings.length ? holdings : ['- none']),
      '',
      `Prices (close on ${previousDate} -> open on ${date}):`,
      ...priceLines,
      '',
      'Tools:',
      describeTools(),
      '',
      'To use tools, reply with a ```json block such as:',
      '{"tool_calls":[{"name":"buy","arguments":{"symbol":"AAPL","amount":10}}]}',
      'Results come back in the next message.',
      `When you have finished trading for today, reply with ${stopToken}.`,
    ].join('\n');
  }
}
