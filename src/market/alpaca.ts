import axios from 'axios';
import type { AxiosInstance } from 'axios';
import type { DailyBar, PriceSource } from './types';

export interface AlpacaCredentials {
  keyId: string;
  secretKey: string;
  dataBaseUrl?: string;
}

export function createAlpacaDataClient(creds: AlpacaCredentials): AxiosInstance {
  return axios.create({
    baseURL: creds.dataBaseUrl ?? 'https://data.alpaca.markets',
    headers: {
      'APCA-API-KEY-ID': creds.keyId,
      'APCA-API-SECRET-KEY': creds.secretKey,
    },
    timeout: 8000,
  });
}

interface AlpacaBar {
  t: string;
  o: number;
  h: number;
  l: number;
  c: number;
  v: number;
}

function isAlpacaBar(x: unknown): x is AlpacaBar {
  if (typeof x !== 'object' || x === null) return false;
  const o = (x as { o?: unknown }).o;
  return typeof o === 'number' && Number.isFinite(o);
}

/** Daily bars from Alpaca's market data API (`/v2/stocks/{symbol}/bars`, 1Day timeframe). */
export class AlpacaPriceSource implements PriceSource {
  readonly name = 'alpaca';

  constructor(private readonly client: Pick<AxiosInstance, 'get'>) {}

  async getBar(symbol: string, date: string): Promise<DailyBar | null> {
    const res = await this.client.get(`/v2/stocks/${encodeURIComponent(symbol)}/bars`, {
      params: { timeframe: '1Day', start: date, end: date, adjustment: 'raw', limit: 1 },
    });
    const bars: unknown = res.data?.bars;
    const first: unknown = Array.isArray(bars) ? bars[0] : undefined;
    if (!isAlpacaBar(first)) return null;
    return {
      open: first.o,
      high: Number.isFinite(first.h) ? first.h : null,
      low: Number.isFinite(first.l) ? first.l : null,
      close: Number.isFinite(first.c) ? first.c : null,
      volume: Number.isFinite(first.v) ? first.v : null,
    };
  }
}
