import { addDays } from '../dates';
import type { PriceSource } from '../market/types';
import { CASH } from './types';
import type { PortfolioState } from './types';

export interface PortfolioValuation {
  cash: number;
  holdings: number;
  total: number;
  /** Held symbols without a close inside the lookback window; valued at 0. */
  unpriced: string[];
}

/** Most recent close on or before `date`, looking back at most `lookbackDays`. */
export async function closeOnOrBefore(
  prices: PriceSource,
  symbol: string,
  date: string,
  lookbackDays = 7,
): Promise<number | null> {
  let d = date;
  for (let i = 0; i <= lookbackDays; i++, d = addDays(d, -1)) {
    const close = (await prices.getBar(symbol, d))?.close;
    if (close !== null && close !== undefined) return close;
  }
  return null;
}

export async function valuePortfolio(
  positions: PortfolioState,
  prices: PriceSource,
  date: string,
  lookbackDays?: number,
): Promise<PortfolioValuation> {
  const cash = positions[CASH] ?? 0;
  let holdings = 0;
  const unpriced: string[] = [];
  for (const [symbol, qty] of Object.entries(positions)) {
    if (symbol === CASH || qty === 0) continue;
    const close = await closeOnOrBefore(prices, symbol, date, lookbackDays);
    if (close === null) unpriced.push(symbol);
    else holdings += close * qty;
  }
  return { cash, holdings, total: cash + holdings, unpriced };
}
