import pino, { type Logger } from 'pino';

import type { AppConfig } from './config.js';

export type { Logger };

export function createLogger(config: Pick<AppConfig, 'logLevel'>): Logger {
  return pino({
    level: config.logLevel,
    base: { service: 'dns-utility' },
    formatters: {
      level: (label) => ({ level: label })
    },
    timestamp: pino.stdTimeFunctions.isoTime
  });
}

/** No-op logger for tests and library use. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
