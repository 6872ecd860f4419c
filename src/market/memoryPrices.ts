import type { DailyBar, PriceSource } from './types';

/** In-memory bars keyed by symbol and date; `getBar` calls are counted. */
export class MemoryPriceSource implements PriceSource {
  readonly name = 'memory';
  readonly lookups: Array<{ symbol: string; date: string }> = [];
  private readonly bars = new Map<string, DailyBar>();

  set(symbol: string, date: string, bar: Partial<DailyBar> & { open: number }): this {
    this.bars.set(`${symbol}@${date}`, { high: null, low: null, close: null, volume: null, ...bar });
    return this;
  }

  async getBar(symbol: string, date: string): Promise<DailyBar | null> {
    this.lookups.push({ symbol, date });
    const bar = this.bars.get(`${symbol}@${date}`);
    return bar ? { ...bar } : null;
  }
}
