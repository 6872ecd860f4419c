import path from 'path';
import { loadAgentsFromEnv } from './agentLoader';
import type { AppConfig } from './config';
import { ConfigurationError } from './errors';
import { JsonlLedgerStore } from './ledger/jsonlStore';
import { PgLedgerMirror } from './ledger/pgMirror';
import { PositionLedger } from './ledger/positionLedger';
import { SqliteLedgerStore } from './ledger/sqliteStore';
import type { LedgerStore } from './ledger/types';
import type { DecisionProcess } from './llm/types';
import { logger as rootLogger } from './logger';
import type { Logger } from './logger';
import { AlpacaPriceSource, createAlpacaDataClient } from './market/alpaca';
import { PriceDataCalendar, WeekdayCalendar } from './market/calendar';
import { LocalPriceStore } from './market/localPrices';
import type { PriceSource, TradingCalendar } from './market/types';
import { RetryPolicy } from './retry';
import { SessionScheduler } from './scheduler';
import { AgentSession } from './session/agentSession';
import { DefaultContextBuilder } from './session/contextBuilder';
import { JsonlTranscriptSink } from './session/transcript';
import { ToolDispatcher } from './tools/dispatcher';
import { JinaSearch } from './tools/search';

export interface App {
  config: AppConfig;
  ledger: PositionLedger;
  scheduler: SessionScheduler;
  close(): Promise<void>;
}

export interface AppOverrides {
  agents?: ReadonlyMap<string, DecisionProcess>;
  logger?: Logger;
}

function createStore(cfg: AppConfig): LedgerStore {
  return cfg.LEDGER_STORE === 'sqlite'
    ? new SqliteLedgerStore(path.join(cfg.DATA_DIR, 'ledger.sqlite'))
    : new JsonlLedgerStore(cfg.DATA_DIR);
}

function createPriceSource(cfg: AppConfig, local: LocalPriceStore): PriceSource {
  if (cfg.PRICE_SOURCE === 'local') return local;
  if (!cfg.ALPACA_API_KEY_ID || !cfg.ALPACA_API_SECRET_KEY) {
    throw new ConfigurationError('PRICE_SOURCE=alpaca needs ALPACA_API_KEY_ID and ALPACA_API_SECRET_KEY');
  }
  return new AlpacaPriceSource(
    createAlpacaDataClient({
      keyId: cfg.ALPACA_API_KEY_ID,
      secretKey: cfg.ALPACA_API_SECRET_KEY,
      dataBaseUrl: cfg.ALPACA_DATA_BASE_URL,
    }),
  );
}

function createCalendar(cfg: AppConfig, local: LocalPriceStore): TradingCalendar {
  return cfg.CALENDAR === 'weekdays' ? new WeekdayCalendar() : new PriceDataCalendar(local);
}

/** Opens a ledger and wires collaborators according to `cfg`. */
export function openLedger(cfg: AppConfig, log: Logger = rootLogger): { ledger: PositionLedger; close(): Promise<void> } {
  const store = createStore(cfg);
  const mirror = cfg.DATABASE_URL ? PgLedgerMirror.fromUrl(cfg.DATABASE_URL) : undefined;
  const ledger = new PositionLedger({
    store,
    universe: cfg.symbolList,
    initialCash: cfg.INITIAL_CASH,
    mirror,
    logger: log.child({ component: 'ledger' }),
  });
  return {
    ledger,
    async close() {
      await store.close?.();
      await mirror?.close();
    },
  };
}

export function createApp(cfg: AppConfig, overrides: AppOverrides = {}): App {
  const log = overrides.logger ?? rootLogger;
  const { ledger, close } = openLedger(cfg, log);
  const local = new LocalPriceStore(cfg.PRICE_DATA_FILE);
  const calendar = createCalendar(cfg, local);
  const retry = new RetryPolicy({
    maxRetries: cfg.MAX_RETRIES,
    baseDelayMs: cfg.baseDelayMs,
    jitter: cfg.RETRY_JITTER,
    timeoutMs: cfg.CALL_TIMEOUT_MS,
    logger: log.child({ component: 'retry' }),
  });
  if (!cfg.JINA_API_KEY) log.info('JINA_API_KEY not set; get_information is disabled');
  const dispatcher = new ToolDispatcher({
    ledger,
    retry,
    search: cfg.JINA_API_KEY ? new JinaSearch(cfg.JINA_API_KEY) : undefined,
    logger: log.child({ component: 'dispatcher' }),
  });
  const session = new AgentSession({
    ledger,
    dispatcher,
    retry,
    contextBuilder: new DefaultContextBuilder(),
    prices: createPriceSource(cfg, local),
    calendar,
    transcript: new JsonlTranscriptSink(cfg.DATA_DIR),
    symbols: cfg.symbolList,
    maxSteps: cfg.MAX_STEPS,
    priceConcurrency: cfg.PRICE_CONCURRENCY,
    stopMatch: cfg.STOP_MATCH,
    logger: log,
  });
  const scheduler = new SessionScheduler({
    ledger,
    calendar,
    session,
    agents: overrides.agents ?? loadAgentsFromEnv(cfg.agentList, process.env, log),
    initDate: cfg.INIT_DATE,
    endDate: cfg.END_DATE,
    logger: log,
  });
  return { config: cfg, ledger, scheduler, close };
}
