#!/usr/bin/env node
import 'dotenv/config';
import { createApp } from './app';
import { loadConfig } from './config';
import { logger } from './logger';

async function main(): Promise<void> {
  const cfg = loadConfig();
  logger.info({ agents: cfg.agentList, from: cfg.INIT_DATE, to: cfg.END_DATE, store: cfg.LEDGER_STORE }, 'tradeday starting');
  const app = createApp(cfg);
  try {
    const summaries = await app.scheduler.runAll(cfg.agentList);
    for (const s of summaries) {
      logger.info(
        { identity: s.identity, sessions: s.results.length, completed: s.completed, failedDate: s.failedDate, error: s.error },
        'identity summary',
      );
    }
    if (summaries.some((s) => !s.completed)) process.exitCode = 1;
  } finally {
    await app.close();
  }
}

main().catch((err) => {
  logger.error({ err }, 'fatal error');
  process.exit(1);
});
