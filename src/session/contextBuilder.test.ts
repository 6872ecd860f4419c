import { describe, expect, it, vi } from 'vitest';
import { TransientInvocationError } from '../errors';
import { MemoryPriceSource } from '../market/memoryPrices';
import { DateScopedPrices } from '../market/scopedPrices';
import type { DailyBar } from '../market/types';
import { RetryPolicy } from '../retry';
import { DefaultContextBuilder } from './contextBuilder';

describe('DefaultContextBuilder', () => {
  const source = new MemoryPriceSource()
    .set('AAPL', '2025-01-02', { open: 178, close: 182 })
    .set('AAPL', '2025-01-03', { open: 180, close: 185 })
    .set('MSFT', '2025-01-03', { open: 400 });

  it('summarizes cash, holdings and prices without leaking today beyond the open', async () => {
    const text = await new DefaultContextBuilder().build({
      identity: 'alpha',
      date: '2025-01-03',
      previousDate: '2025-01-02',
      positions: { AAPL: 10, MSFT: 0, CASH: 8200 },
      prices: new DateScopedPrices(source, '2025-01-03'),
      symbols: ['AAPL', 'MSFT'],
    });
    const lines = text.split('\n');
    expect(lines[0]).toBe("You are a stock trading agent. Today is 2025-01-03. Trades execute at today's opening price.");
    expect(lines.slice(2, 6)).toEqual([
      'Cash: 8200.00',
      "Portfolio value at today's open: 10000.00",
      'Holdings:',
      '- AAPL: 10 shares (1800.00 at open)',
    ]);
    expect(lines.slice(7, 10)).toEqual(['Prices (close on 2025-01-02 -> open on 2025-01-03):', '- AAPL: 182.00 -> 180.00', '- MSFT: n/a -> 400.00']);
    expect(text).not.toContain('185');
    expect(lines[lines.length - 1]).toBe('When you have finished trading for today, reply with <FINISH_SIGNAL>.');
  });

  it('looks prices up in batches of at most `concurrency`', async () => {
    class SlowSource extends MemoryPriceSource {
      inFlight = 0;
      peak = 0;
      async getBar(symbol: string, date: string): Promise<DailyBar | null> {
        this.inFlight++;
        this.peak = Math.max(this.peak, this.inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        this.inFlight--;
        return super.getBar(symbol, date);
      }
    }
    const slow = new SlowSource();
    const symbols = ['S1', 'S2', 'S3', 'S4', 'S5'];
    const text = await new DefaultContextBuilder().build({
      identity: 'alpha',
      date: '2025-01-03',
      previousDate: '2025-01-02',
      positions: { CASH: 100 },
      prices: new DateScopedPrices(slow, '2025-01-03'),
      symbols,
      concurrency: 2,
    });
    expect(slow.peak).toBe(2);
    expect(slow.lookups).toHaveLength(10);
    expect(text).toContain('- S5: n/a -> n/a');
  });

  it('retries a transient lookup failure through the retry policy', async () => {
    class FlakySource extends MemoryPriceSource {
      failed = false;
      async getBar(symbol: string, date: string): Promise<DailyBar | null> {
        if (!this.failed) {
          this.failed = true;
          throw new TransientInvocationError('429 rate limit');
        }
        return super.getBar(symbol, date);
      }
    }
    const flaky = new FlakySource().set('AAPL', '2025-01-02', { open: 178, close: 182 }).set('AAPL', '2025-01-03', { open: 180 });
    const sleep = vi.fn().mockResolvedValue(undefined);
    const text = await new DefaultContextBuilder().build({
      identity: 'alpha',
      date: '2025-01-03',
      previousDate: '2025-01-02',
      positions: { AAPL: 0, CASH: 100 },
      prices: new DateScopedPrices(flaky, '2025-01-03'),
      symbols: ['AAPL'],
      retry: new RetryPolicy({ maxRetries: 3, baseDelayMs: 10, sleep }),
    });
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(10);
    expect(text.split('\n')).toContain('- AAPL: 182.00 -> 180.00');
  });
});
