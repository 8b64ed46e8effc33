import { pino, type Logger } from 'pino';
import type { Config } from './config.js';

/** The slice of a pino logger the codec writes to. */
export type DnsLogger = {
  debug: (obj: unknown, msg?: string) => void;
  warn: (obj: unknown, msg?: string) => void;
};

export function createLogger(config: Pick<Config, 'LOG_LEVEL'>): Logger {
  return pino({ name: 'dns-wire', level: config.LOG_LEVEL });
}
