import pino, { type Logger } from 'pino';
import type { AppConfig } from './config.js';

export function createLogger(config: Pick<AppConfig, 'logLevel' | 'logPretty'>): Logger {
  if (config.logPretty) {
    return pino({ level: config.logLevel, transport: { target: 'pino-pretty' } });
  }
  return pino({ level: config.logLevel });
}
