/**
 * Error taxonomy.
 *
 * Validation and resource errors are recoverable: they are reported back to the
 * decision process as tool results and the session keeps going. Invocation,
 * configuration and persistence errors end the unit of work they occur in.
 */

export type ValidationCode =
  | 'InvalidSymbol'
  | 'InvalidAmount'
  | 'InvalidPrice'
  | 'PriceUnavailable'
  | 'UnknownAction'
  | 'InvalidArguments'
  | 'OutOfOrderDate'
  | 'TimeIsolation';

export type ResourceCode = 'InsufficientCash' | 'InsufficientShares';

export type ErrorCode =
  | ValidationCode
  | ResourceCode
  | 'TransientInvocation'
  | 'FatalInvocation'
  | 'RetryExhausted'
  | 'Configuration'
  | 'Persistence';

export interface AppErrorDetail {
  readonly code: ErrorCode;
  readonly message: string;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;
}

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, opts: { retryable?: boolean; details?: Record<string, unknown>; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'AppError';
    this.code = code;
    this.retryable = opts.retryable ?? false;
    this.details = opts.details;
  }

  toJSON(): AppErrorDetail {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

export class ValidationError extends AppError {
  declare readonly code: ValidationCode;

  constructor(code: ValidationCode, message: string, details?: Record<string, unknown>) {
    super(code, message, { details });
    this.name = 'ValidationError';
  }
}

export class ResourceError extends AppError {
  declare readonly code: ResourceCode;

  constructor(code: ResourceCode, message: string, details?: Record<string, unknown>) {
    super(code, message, { details });
    this.name = 'ResourceError';
  }
}

export class TransientInvocationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('TransientInvocation', message, { retryable: true, cause });
    this.name = 'TransientInvocationError';
  }
}

export class FatalInvocationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('FatalInvocation', message, { cause });
    this.name = 'FatalInvocationError';
  }
}

export class RetryExhaustedError extends AppError {
  readonly attempts: number;

  constructor(label: string, attempts: number, cause: unknown) {
    super('RetryExhausted', `${label} failed after ${attempts} attempts: ${errorMessage(cause)}`, {
      details: { label, attempts },
      cause,
    });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('Configuration', message, { details });
    this.name = 'ConfigurationError';
  }
}

export class PersistenceError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('Persistence', message, { cause });
    this.name = 'PersistenceError';
  }
}

/** Recoverable errors are turned into tool results instead of ending the session. */
export function isRecoverable(err: unknown): err is ValidationError | ResourceError {
  return err instanceof ValidationError || err instanceof ResourceError;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
