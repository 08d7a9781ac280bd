import pino from 'pino';
import type { Logger } from 'pino';
import type { AppConfig } from './config.js';

export type { Logger };

export function createLogger(config: Pick<AppConfig, 'LOG_LEVEL' | 'LOG_PRETTY'>): Logger {
  const options = {
    name: 'gateway-adblock',
    level: config.LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime
  };

  if (!config.LOG_PRETTY) return pino(options);

  const transport = pino.transport({
    target: 'pino-pretty',
    options: {
      colorize: true,
      crlf: false,
      levelFirst: true,
      ignore: 'hostname,pid'
    }
  });
  return pino(options, transport);
}

/** Logger that drops everything; handy default for library-style callers. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
