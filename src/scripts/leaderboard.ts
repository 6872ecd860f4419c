import 'dotenv/config';
import { openLedger } from '../app';
import { loadConfig } from '../config';
import { isIsoDate } from '../dates';
import { ConfigurationError } from '../errors';
import { valuePortfolio } from '../ledger/valuation';
import type { PortfolioValuation } from '../ledger/valuation';
import { logger } from '../logger';
import { LocalPriceStore } from '../market/localPrices';
import { getArg } from '../utils';

async function main(): Promise<void> {
  const cfg = loadConfig();
  const date = getArg('--date', cfg.END_DATE) ?? cfg.END_DATE;
  if (!isIsoDate(date)) throw new ConfigurationError(`invalid --date ${date}`);

  const { ledger, close } = openLedger(cfg, logger);
  const prices = new LocalPriceStore(cfg.PRICE_DATA_FILE);
  try {
    const identities = await ledger.identities();
    if (!identities.length) {
      console.log('No ledgers yet. Run a session first.');
      return;
    }
    const rows: Array<{ identity: string } & PortfolioValuation> = [];
    for (const identity of identities) {
      const v = await valuePortfolio(await ledger.latestSnapshot(identity, date), prices, date);
      rows.push({ identity, ...v });
    }
    rows.sort((a, b) => b.total - a.total);
    console.table(
      rows.map((r) => ({
        Agent: r.identity,
        ValueUSD: r.total.toFixed(2),
        CashUSD: r.cash.toFixed(2),
        ReturnPct: (((r.total - cfg.INITIAL_CASH) / cfg.INITIAL_CASH) * 100).toFixed(2),
        Unpriced: r.unpriced.join(',') || '-',
      })),
    );
  } finally {
    await close();
  }
}

main().catch((err) => {
  logger.error({ err }, 'leaderboard failed');
  process.exit(1);
});
