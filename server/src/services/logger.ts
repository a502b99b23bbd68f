import pino, { type Logger } from 'pino';
import { env } from './env';

export type { Logger };

export const logger: Logger = pino({
  name: 'duel-ledger',
  level: env.LOG_LEVEL,
});

/** For callers that do not want diagnostics, tests mostly. */
export const nullLogger: Logger = pino({ level: 'silent' });
