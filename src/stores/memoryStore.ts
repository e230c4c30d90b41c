import type { CacheStore, CacheValue, IncrementOptions } from '../types';
import { decodeValue, encodeValue } from '../lib/codec';
import { globToRegExp } from '../lib/glob';
import { errorMessage, silentLogger, type Logger } from '../lib/logger';

type Entry = {
  raw: string;
  expiresAt?: number; // timestamp ms
};

export interface MemoryStoreOptions {
  logger?: Logger;
}

const INTEGER = /^-?\d+$/;

/**
 * In-process store used when Redis is unreachable at startup. Values go through
 * the same codec as `RedisStore`; expiry is checked lazily on access.
 */
export class MemoryStore implements CacheStore {
  readonly kind = 'memory' as const;
  private readonly entries = new Map<string, Entry>();
  private readonly logger: Logger;

  constructor(options: MemoryStoreOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  async get<T extends CacheValue = CacheValue>(key: string): Promise<T | undefined> {
    const entry = this.read(key);
    if (!entry) return undefined;
    return this.attempt<T | undefined>('get', key, undefined, () => decodeValue<T>(entry.raw));
  }

  async set(key: string, value: CacheValue, ttlSeconds?: number): Promise<boolean> {
    return this.attempt<boolean>('set', key, false, () => {
      this.entries.set(key, {
        raw: encodeValue(value),
        expiresAt: ttlSeconds && ttlSeconds > 0 ? Date.now() + ttlSeconds * 1000 : undefined,
      });
      return true;
    });
  }

  async delete(key: string): Promise<boolean> {
    return this.read(key) !== undefined && this.entries.delete(key);
  }

  async exists(key: string): Promise<boolean> {
    return this.read(key) !== undefined;
  }

  async increment(key: string, amount = 1, options: IncrementOptions = {}): Promise<number> {
    const now = Date.now();
    const entry = this.read(key);
    if (entry && !INTEGER.test(entry.raw)) {
      this.logger.error('Cache increment error', { key, error: 'value is not an integer' });
      return 0;
    }

    const next = (entry ? Number(entry.raw) : 0) + amount;
    let expiresAt = entry?.expiresAt;
    if (expiresAt === undefined && options.ttlIfNew && options.ttlIfNew > 0) {
      expiresAt = now + options.ttlIfNew * 1000;
    }
    this.entries.set(key, { raw: String(next), expiresAt });
    return next;
  }

  async decrement(key: string, amount = 1): Promise<number> {
    return this.increment(key, -amount);
  }

  async deletePattern(pattern: string): Promise<number> {
    const matcher = globToRegExp(pattern);
    let deleted = 0;
    for (const key of Array.from(this.entries.keys())) {
      if (!matcher.test(key)) continue;
      if (this.read(key) === undefined) continue;
      this.entries.delete(key);
      deleted += 1;
    }
    return deleted;
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    const entry = this.read(key);
    if (!entry) return false;
    if (ttlSeconds <= 0) {
      this.entries.delete(key);
      return true;
    }
    entry.expiresAt = Date.now() + ttlSeconds * 1000;
    return true;
  }

  async ttl(key: string): Promise<number> {
    const entry = this.read(key);
    if (!entry) return -2;
    if (entry.expiresAt === undefined) return -1;
    return Math.ceil((entry.expiresAt - Date.now()) / 1000);
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  /** Codec failures are logged and answered with the same defaults `RedisStore` uses. */
  private attempt<T>(operation: string, key: string, fallback: T, action: () => T): T {
    try {
      return action();
    } catch (error) {
      this.logger.error(`Cache ${operation} error`, { key, error: errorMessage(error) });
      return fallback;
    }
  }

  private read(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt !== undefined && entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}
