export interface DailyBar {
  open: number;
  high: number | null;
  low: number | null;
  close: number | null;
  volume: number | null;
}

/** Read-only daily OHLCV lookup. Resolves null when there is no bar for that day. */
export interface PriceSource {
  readonly name: string;
  getBar(symbol: string, date: string): Promise<DailyBar | null>;
}

export interface TradingCalendar {
  isTradingDay(date: string): Promise<boolean>;
  /** Closest trading day strictly before `date`. */
  previousTradingDay(date: string): Promise<string>;
}
