import fs from 'fs/promises';
import { z } from 'zod';
import { PersistenceError } from '../errors';
import type { DailyBar, PriceSource } from './types';

const numeric = z.union([z.number(), z.string()]).transform((v) => Number(v));

const dayEntry = z.object({
  '1. buy price': numeric.optional(),
  '1. open': numeric.optional(),
  '2. high': numeric.optional(),
  '3. low': numeric.optional(),
  '4. sell price': numeric.optional(),
  '4. close': numeric.optional(),
  '5. volume': numeric.optional(),
});

const symbolDoc = z.object({
  'Meta Data': z.object({ '2. Symbol': z.string().min(1) }),
  'Time Series (Daily)': z.record(dayEntry),
});

function finiteOrNull(v: number | undefined): number | null {
  return v !== undefined && Number.isFinite(v) ? v : null;
}

/**
 * Daily bars from a JSONL file holding one document per symbol:
 * `{"Meta Data":{"2. Symbol":"AAPL"},"Time Series (Daily)":{"2025-01-02":{"1. buy price":"...",...}}}`.
 * The file is read once, on first use.
 */
export class LocalPriceStore implements PriceSource {
  readonly name = 'local';
  private loaded: Promise<Map<string, Map<string, DailyBar>>> | null = null;

  constructor(private readonly file: string) {}

  async getBar(symbol: string, date: string): Promise<DailyBar | null> {
    const bars = await this.load();
    return bars.get(symbol)?.get(date) ?? null;
  }

  /** Every date for which at least one symbol has a bar, ascending. */
  async tradingDays(): Promise<string[]> {
    const bars = await this.load();
    const days = new Set<string>();
    for (const series of bars.values()) for (const d of series.keys()) days.add(d);
    return [...days].sort();
  }

  private load(): Promise<Map<string, Map<string, DailyBar>>> {
    this.loaded ??= this.read().catch((err: unknown) => {
      this.loaded = null;
      throw err;
    });
    return this.loaded;
  }

  private async read(): Promise<Map<string, Map<string, DailyBar>>> {
    let text: string;
    try {
      text = await fs.readFile(this.file, 'utf8');
    } catch (err) {
      throw new PersistenceError(`price data file ${this.file} is not readable`, err);
    }
    const out = new Map<string, Map<string, DailyBar>>();
    text.split('\n').forEach((line, i) => {
      if (!line.trim()) return;
      let doc: z.infer<typeof symbolDoc>;
      try {
        doc = symbolDoc.parse(JSON.parse(line));
      } catch (err) {
        throw new PersistenceError(`${this.file}:${i + 1} is not a price document`, err);
      }
      const series = new Map<string, DailyBar>();
      for (const [date, day] of Object.entries(doc['Time Series (Daily)'])) {
        const open = finiteOrNull(day['1. buy price'] ?? day['1. open']);
        if (open === null) continue;
        series.set(date, {
          open,
          high: finiteOrNull(day['2. high']),
          low: finiteOrNull(day['3. low']),
          close: finiteOrNull(day['4. sell price'] ?? day['4. close']),
          volume: finiteOrNull(day['5. volume']),
        });
      }
      out.set(doc['Meta Data']['2. Symbol'], series);
    });
    return out;
  }
}
