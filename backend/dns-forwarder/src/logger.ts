import { pino, type Logger } from 'pino';
import type { LogLevel } from './config.js';

export type { Logger };

export function createLogger(level: LogLevel, name = 'dns-forwarder'): Logger {
  return pino({ name, level });
}
