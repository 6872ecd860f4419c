import pino from 'pino';

export type Logger = pino.Logger;

export const logger: Logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

/** Silent logger for tests and library callers that bring no logger. */
export const silentLogger: Logger = pino({ level: 'silent' });
