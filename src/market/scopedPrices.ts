import { ValidationError } from '../errors';
import type { DailyBar, PriceSource } from './types';

/**
 * Price view bound to one trading date. Nothing after `today` is reachable,
 * and for `today` itself only the opening price is disclosed.
 */
export class DateScopedPrices {
  constructor(
    private readonly source: PriceSource,
    readonly today: string,
  ) {}

  async bar(symbol: string, date: string): Promise<DailyBar | null> {
    if (date > this.today) {
      throw new ValidationError(
        'TimeIsolation',
        `Cannot access data from ${date} when the current trading date is ${this.today}`,
        { symbol, date, today: this.today },
      );
    }
    const bar = await this.source.getBar(symbol, date);
    if (!bar || date < this.today) return bar;
    return { open: bar.open, high: null, low: null, close: null, volume: null };
  }

  /** Today's opening price, read from the source on every call. */
  async openPrice(symbol: string): Promise<number | null> {
    return (await this.bar(symbol, this.today))?.open ?? null;
  }

  async closePrice(symbol: string, date: string): Promise<number | null> {
    return (await this.bar(symbol, date))?.close ?? null;
  }
}
