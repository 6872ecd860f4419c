import { describe, expect, it, vi } from 'vitest';
import { AlpacaPriceSource } from './alpaca';

describe('AlpacaPriceSource', () => {
  it('maps the first daily bar', async () => {
    const get = vi.fn().mockResolvedValue({
      data: { bars: [{ t: '2025-01-03T05:00:00Z', o: 180, h: 186, l: 179, c: 185, v: 1200 }] },
    });
    const source = new AlpacaPriceSource({ get });
    expect(await source.getBar('AAPL', '2025-01-03')).toEqual({ open: 180, high: 186, low: 179, close: 185, volume: 1200 });
    expect(get).toHaveBeenCalledWith('/v2/stocks/AAPL/bars', {
      params: { timeframe: '1Day', start: '2025-01-03', end: '2025-01-03', adjustment: 'raw', limit: 1 },
    });
  });

  it('returns null when there is no bar', async () => {
    const source = new AlpacaPriceSource({ get: vi.fn().mockResolvedValue({ data: { bars: [] } }) });
    expect(await source.getBar('AAPL', '2025-01-04')).toBeNull();
  });
});
