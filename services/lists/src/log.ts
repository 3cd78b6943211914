import pino from 'pino';
import { config } from './config';

/**
 * The subset of a pino logger the storage layer writes to.
 * Fastify's `app.log` and `req.log` satisfy it as well.
 */
export interface Logger {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}

export const log: Logger = pino({ name: 'lists', level: config.logLevel });
