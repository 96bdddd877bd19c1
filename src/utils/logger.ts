import { pino, type Logger } from 'pino';
import type { Context } from 'hono';
import type { AppConfig, AppEnv } from '../types/index.js';
import { SERVICE_NAME } from '../config/proxy.js';

/**
 * Create the process logger. Logs ship to Better Stack through the Logtail
 * transport when a source token is configured, otherwise they go to stdout.
 */
export function createLogger(config: Pick<AppConfig, 'logLevel' | 'logtail'>): Logger {
  if (!config.logtail) {
    return pino({ name: SERVICE_NAME, level: config.logLevel });
  }

  return pino({
    name: SERVICE_NAME,
    level: config.logLevel,
    transport: {
      target: '@logtail/pino',
      options: {
        sourceToken: config.logtail.sourceToken,
        options: config.logtail.endpoint ? { endpoint: config.logtail.endpoint } : {},
      },
    },
  });
}

export function getLogger(c: Context<AppEnv>): Logger {
  const logger = c.get('logger');
  if (!logger) {
    throw new Error('Logger not initialized in context');
  }
  return logger;
}
