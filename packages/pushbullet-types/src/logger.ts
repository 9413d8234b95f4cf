/**
 * Root logger factory.
 */

import { pino } from 'pino';
import type { Logger } from 'pino';
import type { Config } from './config.js';

/**
 * Create the root logger. Development output goes through pino-pretty;
 * everything else is structured JSON.
 */
export function createLogger(config: Pick<Config, 'logLevel' | 'nodeEnv'>): Logger {
  return pino({
    level: config.logLevel,
    transport:
      config.nodeEnv === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
  });
}
