import { addDays, isWeekday } from '../dates';
import type { TradingCalendar } from './types';

const LOOKBACK_DAYS = 14;

function previousWeekday(date: string): string {
  let d = addDays(date, -1);
  while (!isWeekday(d)) d = addDays(d, -1);
  return d;
}

/** Monday to Friday, no holidays. */
export class WeekdayCalendar implements TradingCalendar {
  async isTradingDay(date: string): Promise<boolean> {
    return isWeekday(date);
  }

  async previousTradingDay(date: string): Promise<string> {
    return previousWeekday(date);
  }
}

/** A day trades when the price data has a bar for it. */
export class PriceDataCalendar implements TradingCalendar {
  private days: Promise<Set<string>> | null = null;

  constructor(private readonly prices: { tradingDays(): Promise<string[]> }) {}

  async isTradingDay(date: string): Promise<boolean> {
    return (await this.tradingDays()).has(date);
  }

  async previousTradingDay(date: string): Promise<string> {
    const days = await this.tradingDays();
    let d = addDays(date, -1);
    for (let i = 0; i < LOOKBACK_DAYS; i++, d = addDays(d, -1)) {
      if (days.has(d)) return d;
    }
    // before the data starts
    return previousWeekday(date);
  }

  private tradingDays(): Promise<Set<string>> {
    this.days ??= this.prices.tradingDays().then((list) => new Set(list));
    return this.days;
  }
}
