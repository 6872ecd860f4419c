import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { isIsoDate } from './dates';
import { ConfigurationError, errorMessage } from './errors';

const IDENTITY_RE = /^[A-Za-z0-9._-]+$/;
const UNIVERSE_FILE = path.join(__dirname, '..', 'config', 'nasdaq100.json');

const isoDate = z.string().refine(isIsoDate, { message: 'expected YYYY-MM-DD' });
const flag = z
  .string()
  .optional()
  .transform((v) => (v ?? 'false').toLowerCase() === 'true');

const configSchema = z.object({
  AGENTS: z.string().min(1),
  INIT_DATE: isoDate,
  END_DATE: isoDate,
  MAX_STEPS: z.coerce.number().int().positive().default(30),
  MAX_RETRIES: z.coerce.number().int().positive().default(3),
  BASE_DELAY: z.coerce.number().nonnegative().default(1.0),
  RETRY_JITTER: flag,
  CALL_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  PRICE_CONCURRENCY: z.coerce.number().int().positive().default(8),
  INITIAL_CASH: z.coerce.number().positive().default(10_000),
  SYMBOLS: z.string().optional(),
  DATA_DIR: z.string().min(1).default('./data/agent_data'),
  LEDGER_STORE: z.enum(['jsonl', 'sqlite']).default('jsonl'),
  PRICE_SOURCE: z.enum(['local', 'alpaca']).default('local'),
  PRICE_DATA_FILE: z.string().min(1).default('./data/merged.jsonl'),
  CALENDAR: z.enum(['prices', 'weekdays']).default('prices'),
  STOP_MATCH: z.enum(['anywhere', 'trailing']).default('anywhere'),
  JINA_API_KEY: z.string().optional(),
  ALPACA_API_KEY_ID: z.string().optional(),
  ALPACA_API_SECRET_KEY: z.string().optional(),
  ALPACA_DATA_BASE_URL: z.string().url().default('https://data.alpaca.markets'),
  DATABASE_URL: z.string().optional(),
  LOG_LEVEL: z.string().default('info'),
});

export type RawConfig = z.infer<typeof configSchema>;

export type AppConfig = RawConfig & {
  agentList: string[];
  symbolList: string[];
  baseDelayMs: number;
};

export function loadUniverse(file = UNIVERSE_FILE): string[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (err) {
    throw new ConfigurationError(`Cannot read symbol universe file ${file}: ${errorMessage(err)}`, { file });
  }
  const parsed = z.object({ symbols: z.array(z.string().min(1)) }).safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid symbol universe file ${file}: ${parsed.error.toString()}`);
  }
  return parsed.data.symbols;
}

function splitList(value: string, normalize: (s: string) => string = (s) => s): string[] {
  return Array.from(
    new Set(
      value
        .split(',')
        .map((s) => normalize(s.trim()))
        .filter(Boolean),
    ),
  );
}

export function assertIdentity(identity: string): void {
  if (!IDENTITY_RE.test(identity)) {
    throw new ConfigurationError(`Invalid agent identity "${identity}"`, { identity });
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${parsed.error.toString()}`);
  }
  const cfg = parsed.data;
  if (cfg.INIT_DATE > cfg.END_DATE) {
    throw new ConfigurationError(`INIT_DATE ${cfg.INIT_DATE} is after END_DATE ${cfg.END_DATE}`);
  }
  const agentList = splitList(cfg.AGENTS);
  if (!agentList.length) throw new ConfigurationError('AGENTS names no agent identity');
  agentList.forEach(assertIdentity);

  const symbolList = cfg.SYMBOLS
    ? splitList(cfg.SYMBOLS, (s) => s.toUpperCase())
    : loadUniverse();
  if (!symbolList.length) throw new ConfigurationError('Tradable universe is empty');
  if (symbolList.includes('CASH')) throw new ConfigurationError('CASH is reserved and cannot be a symbol');

  return {
    ...cfg,
    agentList,
    symbolList,
    baseDelayMs: Math.round(cfg.BASE_DELAY * 1000),
  };
}
