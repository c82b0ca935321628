import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { config } from './config';

/**
 * Root pino options. Shared with Fastify so request logs and storage logs
 * land in the same stream with the same level.
 */
export const loggerOptions: LoggerOptions = {
  level: config.log.level,
  base: { service: 'haiku-store' },
  ...(config.log.pretty
    ? {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'HH:MM:ss.l', ignore: 'pid,hostname' },
        },
      }
    : {}),
};

export const log: Logger = pino(loggerOptions);

export function moduleLogger(module: string): Logger {
  return log.child({ module });
}
