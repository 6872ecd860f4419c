import { z } from 'zod';
import { isIsoDate } from '../dates';

const tradeArgs = z.object({
  symbol: z.string().min(1),
  amount: z.number().int().positive(),
});

const mathArgs = z.object({ a: z.number(), b: z.number() });

export const toolCallSchema = z.discriminatedUnion('name', [
  z.object({ name: z.literal('buy'), arguments: tradeArgs }),
  z.object({ name: z.literal('sell'), arguments: tradeArgs }),
  z.object({
    name: z.literal('get_price_local'),
    arguments: z.object({
      symbol: z.string().min(1),
      date: z.string().refine(isIsoDate, { message: 'date must be in YYYY-MM-DD format' }),
    }),
  }),
  z.object({
    name: z.literal('get_price_momentum'),
    arguments: z.object({
      symbol: z.string().min(1),
      lookback_days: z.number().int().min(2).max(60).default(5),
    }),
  }),
  z.object({
    name: z.literal('get_volatility'),
    arguments: z.object({
      symbol: z.string().min(1),
      lookback_days: z.number().int().min(3).max(60).default(20),
    }),
  }),
  z.object({ name: z.literal('get_information'), arguments: z.object({ query: z.string().min(1) }) }),
  z.object({ name: z.literal('add'), arguments: mathArgs }),
  z.object({ name: z.literal('multiply'), arguments: mathArgs }),
]);

export type ToolCall = z.infer<typeof toolCallSchema>;
export type ToolName = ToolCall['name'];

export interface ToolSpec {
  description: string;
  params: Record<string, string>;
}

export const TOOL_SPECS: Record<ToolName, ToolSpec> = {
  buy: {
    description: "Buy shares at today's opening price. Returns the new positions or an error.",
    params: { symbol: "string, e.g. 'AAPL'", amount: 'positive integer number of shares' },
  },
  sell: {
    description: "Sell shares you hold at today's opening price. Returns the new positions or an error.",
    params: { symbol: "string, e.g. 'AAPL'", amount: 'positive integer number of shares' },
  },
  get_price_local: {
    description: 'Daily OHLCV for a symbol on a past date; for today only the open is available.',
    params: { symbol: 'string', date: "string in 'YYYY-MM-DD' format, not after today" },
  },
  get_price_momentum: {
    description: 'Percent change between past closes, newest first, with a trend label (STRONG_UP to STRONG_DOWN).',
    params: { symbol: 'string', lookback_days: 'integer 2-60, closes to span (default 5)' },
  },
  get_volatility: {
    description: 'Annualized volatility of daily returns over past closes, with a risk level (LOW to VERY_HIGH).',
    params: { symbol: 'string', lookback_days: 'integer 3-60, closes to use (default 20)' },
  },
  get_information: {
    description: 'Search the web and return the main content of the best match published up to today.',
    params: { query: 'string, search terms' },
  },
  add: { description: 'a + b', params: { a: 'number', b: 'number' } },
  multiply: { description: 'a * b', params: { a: 'number', b: 'number' } },
};

export const TOOL_NAMES = Object.keys(TOOL_SPECS);

export function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(TOOL_SPECS, name);
}

/** Human-readable tool list for prompts. */
export function describeTools(): string {
  return Object.entries(TOOL_SPECS)
    .map(([name, spec]) => {
      const params = Object.entries(spec.params)
        .map(([p, d]) => `${p}: ${d}`)
        .join('; ');
      return `- ${name}(${Object.keys(spec.params).join(', ')}): ${spec.description} Params: ${params}`;
    })
    .join('\n');
}
