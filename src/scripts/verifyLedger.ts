import 'dotenv/config';
import { openLedger } from '../app';
import { loadConfig } from '../config';
import { logger } from '../logger';
import { getArg } from '../utils';

async function main(): Promise<void> {
  const cfg = loadConfig();
  const { ledger, close } = openLedger(cfg, logger);
  try {
    const only = getArg('--agent');
    const identities = only ? [only] : await ledger.identities();
    let broken = 0;
    for (const identity of identities) {
      const divergence = await ledger.verify(identity);
      if (divergence) {
        broken++;
        logger.error({ identity, ...divergence }, 'ledger diverges from replay');
      } else {
        logger.info({ identity, records: (await ledger.history(identity)).length }, 'ledger ok');
      }
    }
    if (broken) process.exitCode = 1;
  } finally {
    await close();
  }
}

main().catch((err) => {
  logger.error({ err }, 'verify-ledger failed');
  process.exit(1);
});
