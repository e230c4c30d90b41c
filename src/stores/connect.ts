import Redis from 'ioredis';
import type { CacheStore } from '../types';
import { BackendUnavailableError } from '../lib/errors';
import { errorMessage, silentLogger, type Logger } from '../lib/logger';
import { MemoryStore } from './memoryStore';
import { RedisStore, type RedisClientPort } from './redisStore';

export interface ConnectableRedisClient extends RedisClientPort {
  connect(): Promise<void>;
  disconnect(): void;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export interface RedisConnectionOptions {
  url: string;
  connectTimeoutMs: number;
  keyPrefix?: string;
}

export type RedisClientFactory = (options: RedisConnectionOptions) => ConnectableRedisClient;

export const createIoRedisClient: RedisClientFactory = ({ url, connectTimeoutMs }) =>
  new Redis(url, {
    lazyConnect: true,
    connectTimeout: connectTimeoutMs,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
    retryStrategy: (times) => Math.min(times * 200, 2000),
  });

/**
 * Probes Redis once and returns the store every consumer shares. When the probe
 * fails the process keeps running on a `MemoryStore`; the choice is final.
 */
export async function connectCacheStore(
  options: RedisConnectionOptions,
  deps: { logger?: Logger; createClient?: RedisClientFactory } = {},
): Promise<CacheStore> {
  const logger = deps.logger ?? silentLogger;
  const createClient = deps.createClient ?? createIoRedisClient;
  const client = createClient(options);

  let lastError = '';
  client.on('error', (error) => {
    if (error.message === lastError) return;
    lastError = error.message;
    logger.error('Redis client error', { error: error.message });
  });

  try {
    await client.connect();
    await client.ping();
  } catch (cause) {
    const unavailable = new BackendUnavailableError(options.url, cause);
    logger.warn('Failed to connect to Redis, using in-memory fallback', {
      code: unavailable.code,
      error: errorMessage(cause),
    });
    client.disconnect();
    return new MemoryStore({ logger });
  }

  logger.info('Redis connection established', { url: redactUrl(options.url) });
  return new RedisStore(client, { logger, keyPrefix: options.keyPrefix });
}

function redactUrl(url: string): string {
  return url.replace(/\/\/([^@/]*)@/, '//***@');
}
