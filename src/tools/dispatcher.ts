import { AppError, ValidationError, errorMessage, isRecoverable } from '../errors';
import type { PositionLedger } from '../ledger/positionLedger';
import type { LedgerRecord } from '../ledger/types';
import { silentLogger } from '../logger';
import type { Logger } from '../logger';
import type { DateScopedPrices } from '../market/scopedPrices';
import type { RetryPolicy } from '../retry';
import {
  annualizedVolatility,
  describeMomentum,
  describeVolatility,
  priceMomentum,
  recentCloses,
  riskLevelOf,
  trendOf,
} from './analysis';
import type { RequestedAction } from './extract';
import { isToolName, toolCallSchema } from './registry';
import type { ToolCall } from './registry';
import type { SearchProvider } from './search';

export interface ToolResult {
  name: string;
  ok: boolean;
  /** Text handed back to the decision process. */
  content: string;
  /** Set when the call committed a ledger record. */
  committed?: LedgerRecord;
}

/** Everything a dispatch needs to know about the session it serves. */
export interface DispatchContext {
  identity: string;
  date: string;
  prices: DateScopedPrices;
}

export interface ToolDispatcherOptions {
  ledger: PositionLedger;
  retry: RetryPolicy;
  search?: SearchProvider;
  logger?: Logger;
}

function render(payload: unknown): string {
  return typeof payload === 'string' ? payload : JSON.stringify(payload, null, 2);
}

function failure(name: string, err: AppError | Error, extra: Record<string, unknown> = {}): ToolResult {
  const details = err instanceof AppError ? err.details : undefined;
  const code = err instanceof AppError ? err.code : undefined;
  return { name, ok: false, content: render({ error: err.message, code, ...details, ...extra }) };
}

/**
 * Validates requested actions and routes them: trades to the ledger,
 * everything else to read-only collaborators. Recoverable failures come back
 * as `ok: false` results; only persistence failures propagate.
 */
export class ToolDispatcher {
  private readonly ledger: PositionLedger;
  private readonly retry: RetryPolicy;
  private readonly search?: SearchProvider;
  private readonly logger: Logger;

  constructor(opts: ToolDispatcherOptions) {
    this.ledger = opts.ledger;
    this.retry = opts.retry;
    this.search = opts.search;
    this.logger = opts.logger ?? silentLogger;
  }

  /** Validates without side effects. */
  parse(request: RequestedAction): { ok: true; call: ToolCall } | { ok: false; error: ValidationError } {
    if (!isToolName(request.name)) {
      return {
        ok: false,
        error: new ValidationError('UnknownAction', `Unknown tool: ${request.name || '(missing name)'}`, { name: request.name }),
      };
    }
    const parsed = toolCallSchema.safeParse({ name: request.name, arguments: request.arguments });
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.slice(1).join('.') || 'arguments'}: ${i.message}`);
      return {
        ok: false,
        error: new ValidationError('InvalidArguments', `Invalid arguments for ${request.name}: ${issues.join('; ')}`, {
          issues,
        }),
      };
    }
    return { ok: true, call: parsed.data };
  }

  async dispatch(ctx: DispatchContext, request: RequestedAction): Promise<ToolResult> {
    const log = this.logger.child({ identity: ctx.identity, date: ctx.date, tool: request.name });
    const parsed = this.parse(request);
    if (!parsed.ok) {
      log.info({ code: parsed.error.code }, 'tool request rejected');
      return failure(request.name, parsed.error);
    }
    const { call } = parsed;
    log.debug({ args: call.arguments }, 'dispatching tool');
    switch (call.name) {
      case 'buy':
      case 'sell':
        return this.trade(ctx, call.name, call.arguments.symbol, call.arguments.amount);
      case 'get_price_local':
        return this.readOnly(call.name, ctx, async () => {
          const { symbol, date } = call.arguments;
          const bar = await ctx.prices.bar(symbol, date);
          if (!bar) {
            return { ok: false, payload: { error: `Data not found for ${symbol} on ${date}`, symbol, date } };
          }
          return { ok: true, payload: { symbol, date, ohlcv: bar } };
        });
      case 'get_price_momentum':
        return this.readOnly(call.name, ctx, async () => {
          const { symbol, lookback_days } = call.arguments;
          const momentum = priceMomentum(await recentCloses(ctx.prices, symbol, lookback_days), lookback_days);
          if (momentum === null) {
            return { ok: false, payload: { error: `Insufficient data to calculate momentum for ${symbol}`, symbol, lookback_days } };
          }
          return {
            ok: true,
            payload: {
              symbol,
              lookback_days,
              momentum_pct: momentum,
              trend: trendOf(momentum),
              interpretation: describeMomentum(symbol, momentum, lookback_days),
            },
          };
        });
      case 'get_volatility':
        return this.readOnly(call.name, ctx, async () => {
          const { symbol, lookback_days } = call.arguments;
          const volatility = annualizedVolatility(await recentCloses(ctx.prices, symbol, lookback_days), lookback_days);
          if (volatility === null) {
            return { ok: false, payload: { error: `Insufficient data to calculate volatility for ${symbol}`, symbol, lookback_days } };
          }
          return {
            ok: true,
            payload: {
              symbol,
              lookback_days,
              volatility_pct: volatility,
              risk_level: riskLevelOf(volatility),
              interpretation: describeVolatility(symbol, volatility),
            },
          };
        });
      case 'get_information': {
        const search = this.search;
        if (!search) return failure(call.name, new Error('Search is not configured'));
        return this.readOnly(call.name, ctx, async () => ({
          ok: true,
          payload: await search.search(call.arguments.query, ctx.date),
        }));
      }
      case 'add':
        return { name: call.name, ok: true, content: String(call.arguments.a + call.arguments.b) };
      case 'multiply':
        return { name: call.name, ok: true, content: String(call.arguments.a * call.arguments.b) };
    }
  }

  private async trade(ctx: DispatchContext, side: 'buy' | 'sell', symbol: string, amount: number): Promise<ToolResult> {
    const action = { kind: side, symbol, amount };
    const invalid = this.ledger.checkAction(action);
    if (invalid) return failure(side, invalid, { date: ctx.date });

    let price: number | null;
    try {
      // resolved on every call; a session never reuses a looked-up price
      price = await this.retry.execute(`open price ${symbol}`, () => ctx.prices.openPrice(symbol));
    } catch (err) {
      return failure(side, err instanceof Error ? err : new Error(errorMessage(err)), { symbol, date: ctx.date });
    }
    if (price === null) {
      return failure(side, new ValidationError('PriceUnavailable', `No opening price for ${symbol} on ${ctx.date}`), {
        symbol,
        date: ctx.date,
      });
    }

    const result = await this.ledger.appendTrade(ctx.identity, ctx.date, action, price);
    if (!result.ok) return failure(side, result.error, { date: ctx.date });
    return { name: side, ok: true, content: render(result.record.positions), committed: result.record };
  }

  private async readOnly(
    name: string,
    ctx: DispatchContext,
    fn: () => Promise<{ ok: boolean; payload: unknown }>,
  ): Promise<ToolResult> {
    try {
      const { ok, payload } = await this.retry.execute(`${name} ${ctx.identity}`, fn);
      return { name, ok, content: render(payload) };
    } catch (err) {
      if (!isRecoverable(err)) {
        this.logger.warn({ err, tool: name, identity: ctx.identity, date: ctx.date }, 'read-only tool failed');
      }
      return failure(name, err instanceof Error ? err : new Error(errorMessage(err)));
    }
  }
}
