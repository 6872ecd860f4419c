import { assertIdentity } from './config';
import { addDays, eachDate } from './dates';
import { ConfigurationError, errorMessage } from './errors';
import type { PositionLedger } from './ledger/positionLedger';
import type { DecisionProcess } from './llm/types';
import { silentLogger } from './logger';
import type { Logger } from './logger';
import type { TradingCalendar } from './market/types';
import type { AgentSession, SessionResult } from './session/agentSession';

export interface SchedulerOptions {
  ledger: PositionLedger;
  calendar: TradingCalendar;
  session: Pick<AgentSession, 'run'>;
  agents: ReadonlyMap<string, DecisionProcess>;
  initDate: string;
  endDate: string;
  logger?: Logger;
}

export interface IdentityRunSummary {
  identity: string;
  results: SessionResult[];
  /** Every scheduled date ran to FINISHED or MAX_STEPS_EXCEEDED. */
  completed: boolean;
  failedDate?: string;
  error?: string;
}

/**
 * Drives one AgentSession per trading date. Dates of one identity run strictly
 * in order; identities run side by side.
 */
export class SessionScheduler {
  private readonly opts: SchedulerOptions;
  private readonly logger: Logger;

  constructor(opts: SchedulerOptions) {
    if (opts.initDate > opts.endDate) {
      throw new ConfigurationError(`init date ${opts.initDate} is after end date ${opts.endDate}`);
    }
    this.opts = opts;
    this.logger = (opts.logger ?? silentLogger).child({ component: 'scheduler' });
  }

  /** Resumes the day after the last ledger record, or at the init date for an empty ledger. */
  async tradingDates(identity: string): Promise<string[]> {
    const tail = await this.opts.ledger.lastRecord(identity);
    const start = tail ? addDays(tail.date, 1) : this.opts.initDate;
    const dates: string[] = [];
    for (const d of eachDate(start, this.opts.endDate)) {
      if (await this.opts.calendar.isTradingDay(d)) dates.push(d);
    }
    return dates;
  }

  async runDate(identity: string, date: string): Promise<SessionResult> {
    return this.opts.session.run(this.agentFor(identity), identity, date);
  }

  async runIdentity(identity: string): Promise<IdentityRunSummary> {
    const agent = this.agentFor(identity);
    const log = this.logger.child({ identity });
    const results: SessionResult[] = [];
    let dates: string[];
    try {
      dates = await this.tradingDates(identity);
    } catch (err) {
      log.error({ err }, 'cannot compute trading dates');
      return { identity, results, completed: false, error: errorMessage(err) };
    }
    log.info({ count: dates.length, first: dates[0], last: dates[dates.length - 1] }, 'identity run start');

    for (const date of dates) {
      const result = await this.opts.session.run(agent, identity, date);
      results.push(result);
      if (result.status === 'FAILED') {
        // later dates build on this one
        log.error({ date, error: result.error }, 'session failed; stopping identity run');
        return { identity, results, completed: false, failedDate: date, error: result.error };
      }
    }
    log.info({ sessions: results.length }, 'identity run complete');
    return { identity, results, completed: true };
  }

  async runAll(identities: string[]): Promise<IdentityRunSummary[]> {
    if (!identities.length) throw new ConfigurationError('no agent identities to run');
    // every identity is checked before any session starts
    identities.forEach((id) => this.agentFor(id));
    return Promise.all(identities.map((id) => this.runIdentity(id)));
  }

  private agentFor(identity: string): DecisionProcess {
    assertIdentity(identity);
    const agent = this.opts.agents.get(identity);
    if (!agent) throw new ConfigurationError(`no decision process configured for ${identity}`, { identity });
    return agent;
  }
}
