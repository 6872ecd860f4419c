import { AppError, RetryExhaustedError, TransientInvocationError, errorMessage } from './errors';
import { silentLogger } from './logger';
import type { Logger } from './logger';
import { isRecord, sleep } from './utils';

export type FailureClass = 'transient' | 'fatal';

const TRANSIENT_CODES = new Set(['ETIMEDOUT', 'ECONNABORTED', 'ECONNRESET', 'ECONNREFUSED', 'EAI_AGAIN', 'EPIPE', 'ENOTFOUND', 'ERR_NETWORK']);

function httpStatusOf(record: Record<string, unknown>): number | undefined {
  if (typeof record.status === 'number') return record.status;
  const response = isRecord(record.response) ? record.response : undefined;
  return typeof response?.status === 'number' ? response.status : undefined;
}

/**
 * Transient: timeouts, dropped connections, rate limits and 5xx responses.
 * Everything else (auth, malformed requests, validation) is fatal.
 */
export function classifyError(err: unknown): FailureClass {
  if (err instanceof AppError) return err.retryable ? 'transient' : 'fatal';
  if (!isRecord(err)) return 'fatal';
  const record = err;
  if (typeof record.code === 'string' && TRANSIENT_CODES.has(record.code)) return 'transient';
  const status = httpStatusOf(record);
  if (status !== undefined) {
    return status === 408 || status === 429 || status >= 500 ? 'transient' : 'fatal';
  }
  const message = typeof record.message === 'string' ? record.message : '';
  return /rate limit|timed? ?out|socket hang up/i.test(message) ? 'transient' : 'fatal';
}

export interface RetryOptions {
  /** Total attempts, the first one included. */
  maxRetries: number;
  baseDelayMs: number;
  jitter?: boolean;
  /** Upper bound for a single attempt. */
  timeoutMs?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  classify?: (err: unknown) => FailureClass;
}

export class RetryPolicy {
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  private readonly jitter: boolean;
  private readonly timeoutMs?: number;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly classify: (err: unknown) => FailureClass;

  constructor(opts: RetryOptions) {
    this.maxRetries = Math.max(1, Math.floor(opts.maxRetries));
    this.baseDelayMs = Math.max(0, opts.baseDelayMs);
    this.jitter = opts.jitter ?? false;
    this.timeoutMs = opts.timeoutMs;
    this.logger = opts.logger ?? silentLogger;
    this.sleep = opts.sleep ?? sleep;
    this.random = opts.random ?? Math.random;
    this.classify = opts.classify ?? classifyError;
  }

  /** Delay after failed attempt `attempt` (1-based): base * 2^(attempt-1), plus up to 25% jitter. */
  delayFor(attempt: number): number {
    const base = this.baseDelayMs * 2 ** (attempt - 1);
    return this.jitter ? base + Math.floor(base * 0.25 * this.random()) : base;
  }

  /**
   * Runs `fn` until it succeeds, fails fatally (rethrown as is) or runs out of
   * attempts (`RetryExhaustedError` carrying the last failure).
   */
  async execute<T>(label: string, fn: (attempt: number) => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.withTimeout(label, fn(attempt));
      } catch (err) {
        if (this.classify(err) === 'fatal') {
          this.logger.error({ err, label, attempt }, 'call failed (not retryable)');
          throw err;
        }
        if (attempt >= this.maxRetries) {
          this.logger.error({ err, label, attempt }, 'retries exhausted');
          throw new RetryExhaustedError(label, attempt, err);
        }
        const delayMs = this.delayFor(attempt);
        this.logger.warn({ label, attempt, delayMs, error: errorMessage(err) }, 'transient failure; retrying');
        await this.sleep(delayMs);
      }
    }
  }

  private async withTimeout<T>(label: string, p: Promise<T>): Promise<T> {
    if (!this.timeoutMs) return p;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, rejectTimeout) => {
      timer = setTimeout(
        () => rejectTimeout(new TransientInvocationError(`${label} timed out after ${this.timeoutMs}ms`)),
        this.timeoutMs,
      );
    });
    try {
      return await Promise.race([p, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
