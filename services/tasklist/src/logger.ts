import pino from 'pino';
import type { LogLevel } from './config';

/** The slice of a pino logger the data layer writes to; Fastify's `app.log` fits too. */
export type Logger = Pick<pino.BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

export function createLogger(level: LogLevel = 'info') {
  return pino({ name: 'tasklist', level });
}
