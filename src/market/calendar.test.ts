import { describe, expect, it, vi } from 'vitest';
import { PriceDataCalendar, WeekdayCalendar } from './calendar';

describe('WeekdayCalendar', () => {
  const cal = new WeekdayCalendar();

  it('trades Monday to Friday', async () => {
    expect(await cal.isTradingDay('2025-01-03')).toBe(true);
    expect(await cal.isTradingDay('2025-01-04')).toBe(false);
    expect(await cal.isTradingDay('2025-01-05')).toBe(false);
  });

  it('steps back over weekends', async () => {
    expect(await cal.previousTradingDay('2025-01-06')).toBe('2025-01-03');
    expect(await cal.previousTradingDay('2025-01-07')).toBe('2025-01-06');
  });
});

describe('PriceDataCalendar', () => {
  function calendar() {
    const tradingDays = vi.fn().mockResolvedValue(['2025-01-02', '2025-01-03', '2025-01-06']);
    return { tradingDays, cal: new PriceDataCalendar({ tradingDays }) };
  }

  it('trades on dates present in the price data', async () => {
    const { cal, tradingDays } = calendar();
    expect(await cal.isTradingDay('2025-01-06')).toBe(true);
    expect(await cal.isTradingDay('2025-01-01')).toBe(false);
    expect(tradingDays).toHaveBeenCalledTimes(1);
  });

  it('finds the previous date with data', async () => {
    const { cal } = calendar();
    expect(await cal.previousTradingDay('2025-01-06')).toBe('2025-01-03');
  });

  it('falls back to the previous weekday before the data starts', async () => {
    const { cal } = calendar();
    expect(await cal.previousTradingDay('2025-01-02')).toBe('2025-01-01');
  });
});
