import { addDays } from '../dates';
import type { DateScopedPrices } from '../market/scopedPrices';

export type Trend = 'STRONG_UP' | 'UP' | 'FLAT' | 'DOWN' | 'STRONG_DOWN';
export type RiskLevel = 'LOW' | 'MODERATE' | 'HIGH' | 'VERY_HIGH';

const TRADING_DAYS_PER_YEAR = 252;

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/**
 * Up to `count` closes before `prices.today`, newest first. Today's close is
 * not known at the open, so the walk starts the day before. Days without a
 * bar (weekends, holidays) are skipped; the walk gives up after
 * `count * 2 + 10` calendar days.
 */
export async function recentCloses(prices: DateScopedPrices, symbol: string, count: number): Promise<number[]> {
  const closes: number[] = [];
  const maxScan = count * 2 + 10;
  let date = prices.today;
  for (let i = 0; i < maxScan && closes.length < count; i++) {
    date = addDays(date, -1);
    const close = await prices.closePrice(symbol, date);
    if (close !== null && close > 0) closes.push(close);
  }
  return closes;
}

/** Percent change from the `lookback`-th newest close to the newest one. */
export function priceMomentum(closes: readonly number[], lookback: number): number | null {
  if (closes.length < Math.max(2, lookback)) return null;
  const latest = closes[0];
  const base = closes[lookback - 1];
  return round2(((latest - base) / base) * 100);
}

/** Annualized sample standard deviation of daily returns over the newest `lookback` closes, in percent. */
export function annualizedVolatility(closes: readonly number[], lookback: number): number | null {
  if (closes.length < lookback) return null;
  const window = closes.slice(0, lookback);
  const returns: number[] = [];
  for (let i = 0; i < window.length - 1; i++) {
    returns.push((window[i] - window[i + 1]) / window[i + 1]);
  }
  if (returns.length < 2) return null;
  const mean = returns.reduce((a, b) => a + b, 0) / returns.length;
  const variance = returns.reduce((a, r) => a + (r - mean) ** 2, 0) / (returns.length - 1);
  return round2(Math.sqrt(variance) * Math.sqrt(TRADING_DAYS_PER_YEAR) * 100);
}

export function trendOf(momentumPct: number): Trend {
  if (momentumPct > 5) return 'STRONG_UP';
  if (momentumPct > 2) return 'UP';
  if (momentumPct > -2) return 'FLAT';
  if (momentumPct > -5) return 'DOWN';
  return 'STRONG_DOWN';
}

export function riskLevelOf(volatilityPct: number): RiskLevel {
  if (volatilityPct > 50) return 'VERY_HIGH';
  if (volatilityPct > 35) return 'HIGH';
  if (volatilityPct > 20) return 'MODERATE';
  return 'LOW';
}

export function describeMomentum(symbol: string, momentumPct: number, lookback: number): string {
  const sign = momentumPct >= 0 ? '+' : '';
  return `${symbol} has moved ${sign}${momentumPct.toFixed(1)}% over the past ${lookback} days (${trendOf(momentumPct)})`;
}

export function describeVolatility(symbol: string, volatilityPct: number): string {
  const level = riskLevelOf(volatilityPct);
  const head = `${symbol} has ${level} volatility at ${volatilityPct.toFixed(1)}% (annualized).`;
  if (level === 'HIGH' || level === 'VERY_HIGH') return `${head} Large price swings; size positions smaller.`;
  if (level === 'MODERATE') return `${head} Moderate price fluctuations.`;
  return `${head} Relatively stable price movements.`;
}
