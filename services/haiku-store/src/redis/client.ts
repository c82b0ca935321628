import Redis from 'ioredis';
import type { Logger } from 'pino';
import { config } from '../config';

export interface RedisClientOptions {
  connectTimeoutMs?: number;
  maxRetriesPerRequest?: number;
  logger?: Logger;
}

const ALLOWED_PROTOCOLS = new Set(['redis:', 'rediss:']);

/**
 * Builds an ioredis client for the given endpoint and key. No connection is
 * opened here (`lazyConnect`); the first command connects. Throws when the
 * endpoint is not a usable Redis URL.
 */
export function createRedisClient(url: string, key: string, options: RedisClientOptions = {}): Redis {
  const parsed = new URL(url);
  if (!ALLOWED_PROTOCOLS.has(parsed.protocol)) {
    throw new Error(`unsupported store protocol "${parsed.protocol}" (expected redis: or rediss:)`);
  }

  const client = new Redis(url, {
    password: key,
    lazyConnect: true,
    enableReadyCheck: true,
    connectTimeout: options.connectTimeoutMs ?? config.store.connectTimeoutMs,
    maxRetriesPerRequest: options.maxRetriesPerRequest ?? config.store.maxRetriesPerRequest,
  });

  // An unhandled 'error' event would take the process down with the store.
  let lastMessage: string | null = null;
  client.on('error', (err: Error) => {
    if (err.message === lastMessage) return;
    lastMessage = err.message;
    options.logger?.warn({ err }, 'Redis client error');
  });
  client.on('ready', () => {
    lastMessage = null;
  });

  return client;
}
