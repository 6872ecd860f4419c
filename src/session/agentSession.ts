import { ValidationError, errorMessage } from '../errors';
import type { PositionLedger } from '../ledger/positionLedger';
import type { DecisionProcess } from '../llm/types';
import { silentLogger } from '../logger';
import type { Logger } from '../logger';
import { DateScopedPrices } from '../market/scopedPrices';
import type { PriceSource, TradingCalendar } from '../market/types';
import type { RetryPolicy } from '../retry';
import type { ToolDispatcher } from '../tools/dispatcher';
import { extractToolCalls } from '../tools/extract';
import type { ContextBuilder } from './contextBuilder';
import { STOP_TOKEN, isStopSignal } from './stopSignal';
import type { StopMatch } from './stopSignal';
import type { TranscriptSink, TranscriptTurn } from './transcript';

export type SessionStatus = 'RUNNING' | 'FINISHED' | 'MAX_STEPS_EXCEEDED' | 'FAILED';

export interface AgentSessionState {
  date: string;
  stepCount: number;
  transcript: TranscriptTurn[];
  status: SessionStatus;
}

export interface SessionResult {
  identity: string;
  date: string;
  status: Exclude<SessionStatus, 'RUNNING'>;
  steps: number;
  tradesExecuted: number;
  error?: string;
}

export interface AgentSessionOptions {
  ledger: PositionLedger;
  dispatcher: ToolDispatcher;
  retry: RetryPolicy;
  contextBuilder: ContextBuilder;
  prices: PriceSource;
  calendar: TradingCalendar;
  transcript: TranscriptSink;
  symbols: readonly string[];
  maxSteps: number;
  /** Price lookups in flight at once while building the context. */
  priceConcurrency?: number;
  stopToken?: string;
  stopMatch?: StopMatch;
  logger?: Logger;
}

export const KICKOFF_INSTRUCTION =
  "Please analyze and update today's positions. Request the tools you need, then reply with the stop signal when done.";

export function nudgeMessage(stopToken: string): string {
  return `No tool calls found in your reply. Request tools in a \`\`\`json block, or reply with ${stopToken} when you are done for today.`;
}

/**
 * Runs the bounded decision loop for one identity on one trading date.
 *
 * Trades committed during a session stay committed whatever the outcome.
 * A session that ends FINISHED or MAX_STEPS_EXCEEDED without trading leaves a
 * no-trade record for the date; a FAILED one leaves nothing extra.
 */
export class AgentSession {
  private readonly opts: AgentSessionOptions;
  private readonly stopToken: string;
  private readonly stopMatch: StopMatch;
  private readonly logger: Logger;

  constructor(opts: AgentSessionOptions) {
    this.opts = opts;
    this.stopToken = opts.stopToken ?? STOP_TOKEN;
    this.stopMatch = opts.stopMatch ?? 'anywhere';
    this.logger = opts.logger ?? silentLogger;
  }

  async run(agent: DecisionProcess, identity: string, date: string): Promise<SessionResult> {
    const log = this.logger.child({ component: 'session', identity, date });
    const state: AgentSessionState = { date, stepCount: 0, transcript: [], status: 'RUNNING' };
    let tradesExecuted = 0;
    const result = (error?: unknown): SessionResult => {
      const status = state.status === 'RUNNING' ? 'FAILED' : state.status;
      return {
        identity,
        date,
        status,
        steps: state.stepCount,
        tradesExecuted,
        ...(error === undefined ? {} : { error: errorMessage(error) }),
      };
    };

    log.info({ agent: agent.id, maxSteps: this.opts.maxSteps }, 'session start');
    const prices = new DateScopedPrices(this.opts.prices, date);
    const record = async (turn: TranscriptTurn): Promise<void> => {
      state.transcript.push(turn);
      await this.opts.transcript.append(identity, date, turn);
    };

    try {
      const previousDate = await this.opts.calendar.previousTradingDay(date);
      const context = await this.opts.contextBuilder.build({
        identity,
        date,
        previousDate,
        positions: await this.opts.ledger.latestSnapshot(identity, previousDate),
        prices,
        symbols: this.opts.symbols,
        stopToken: this.stopToken,
        retry: this.opts.retry,
        concurrency: this.opts.priceConcurrency,
      });
      await record({ role: 'user', content: `${context}\n\n${KICKOFF_INSTRUCTION}` });

      while (state.status === 'RUNNING' && state.stepCount < this.opts.maxSteps) {
        const reply = await this.opts.retry.execute(`${agent.id} ${identity} ${date}`, () =>
          agent.invoke([...state.transcript]),
        );
        await record({ role: 'assistant', content: reply });
        if (isStopSignal(reply, this.stopToken, this.stopMatch)) {
          state.status = 'FINISHED';
          break;
        }

        const calls = extractToolCalls(reply);
        if (!calls.length) {
          await record({ role: 'user', content: nudgeMessage(this.stopToken) });
        } else {
          const contents: string[] = [];
          for (const call of calls) {
            const res = await this.opts.dispatcher.dispatch({ identity, date, prices }, call);
            if (res.committed) tradesExecuted++;
            contents.push(res.content);
          }
          await record({ role: 'tool', content: contents.join('\n\n') });
        }
        state.stepCount++;
        log.debug({ step: state.stepCount, calls: calls.length, tradesExecuted }, 'step complete');
      }
      if (state.status === 'RUNNING') {
        state.status = 'MAX_STEPS_EXCEEDED';
        log.warn({ steps: state.stepCount }, 'step limit reached');
      }
    } catch (err) {
      state.status = 'FAILED';
      log.error({ err, steps: state.stepCount, tradesExecuted }, 'session failed');
      return result(err);
    }

    if (tradesExecuted === 0) {
      try {
        await this.opts.ledger.recordNoTrade(identity, date);
      } catch (err) {
        if (!(err instanceof ValidationError)) {
          state.status = 'FAILED';
          log.error({ err }, 'no-trade record failed');
          return result(err);
        }
        log.warn({ err }, 'no-trade record skipped');
      }
    }
    log.info({ status: state.status, steps: state.stepCount, tradesExecuted }, 'session end');
    return result();
  }
}
