import 'dotenv/config';
import { createApp } from '../app';
import { loadConfig } from '../config';
import { isIsoDate } from '../dates';
import { ConfigurationError } from '../errors';
import { logger } from '../logger';
import { getArg } from '../utils';

async function main(): Promise<void> {
  const cfg = loadConfig();
  const agent = getArg('--agent', cfg.agentList[0]) ?? '';
  const date = getArg('--date') ?? '';
  if (!isIsoDate(date)) throw new ConfigurationError('--date=YYYY-MM-DD is required');

  const app = createApp(cfg);
  try {
    const result = await app.scheduler.runDate(agent, date);
    logger.info(result, 'session result');
    if (result.status === 'FAILED') process.exitCode = 1;
  } finally {
    await app.close();
  }
}

main().catch((err) => {
  logger.error({ err }, 'run-date failed');
  process.exit(1);
});
