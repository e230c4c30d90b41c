import type { CacheStore, CacheValue, IncrementOptions } from '../types';
import { decodeValue, encodeValue } from '../lib/codec';
import { errorMessage, silentLogger, type Logger } from '../lib/logger';

/** The subset of the ioredis client the store relies on; `Redis` satisfies it. */
export interface RedisClientPort {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  exists(key: string): Promise<number>;
  incrby(key: string, increment: number): Promise<number>;
  decrby(key: string, decrement: number): Promise<number>;
  expire(key: string, seconds: number): Promise<number>;
  ttl(key: string): Promise<number>;
  scan(cursor: string, matchToken: 'MATCH', pattern: string, countToken: 'COUNT', count: number): Promise<[string, string[]]>;
  eval(script: string, numKeys: number, ...args: Array<string | number>): Promise<unknown>;
  ping(): Promise<string>;
  quit(): Promise<unknown>;
}

export interface RedisStoreOptions {
  logger?: Logger;
  keyPrefix?: string;
  scanCount?: number;
}

// INCRBY and attach the TTL only while the key has none, in one round trip.
export const INCREMENT_WITH_TTL_SCRIPT = `
local value = redis.call('INCRBY', KEYS[1], ARGV[1])
local ttl = tonumber(ARGV[2])
if ttl > 0 and redis.call('TTL', KEYS[1]) == -1 then
  redis.call('EXPIRE', KEYS[1], ttl)
end
return value
`;

export class RedisStore implements CacheStore {
  readonly kind = 'redis' as const;
  private readonly logger: Logger;
  private readonly keyPrefix: string;
  private readonly scanCount: number;

  constructor(private readonly client: RedisClientPort, options: RedisStoreOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.keyPrefix = options.keyPrefix ?? '';
    this.scanCount = options.scanCount ?? 100;
  }

  async get<T extends CacheValue = CacheValue>(key: string): Promise<T | undefined> {
    return this.run('get', key, undefined, async () => {
      const raw = await this.client.get(this.k(key));
      if (raw === null) return undefined;
      return decodeValue<T>(raw);
    });
  }

  async set(key: string, value: CacheValue, ttlSeconds?: number): Promise<boolean> {
    return this.run('set', key, false, async () => {
      const raw = encodeValue(value);
      if (ttlSeconds && ttlSeconds > 0) {
        await this.client.setex(this.k(key), Math.ceil(ttlSeconds), raw);
      } else {
        await this.client.set(this.k(key), raw);
      }
      return true;
    });
  }

  async delete(key: string): Promise<boolean> {
    return this.run('delete', key, false, async () => (await this.client.del(this.k(key))) > 0);
  }

  async exists(key: string): Promise<boolean> {
    return this.run('exists', key, false, async () => (await this.client.exists(this.k(key))) > 0);
  }

  async increment(key: string, amount = 1, options: IncrementOptions = {}): Promise<number> {
    return this.run('increment', key, 0, async () => {
      if (options.ttlIfNew && options.ttlIfNew > 0) {
        const result = await this.client.eval(
          INCREMENT_WITH_TTL_SCRIPT,
          1,
          this.k(key),
          amount,
          Math.ceil(options.ttlIfNew),
        );
        return Number(result);
      }
      return this.client.incrby(this.k(key), amount);
    });
  }

  async decrement(key: string, amount = 1): Promise<number> {
    return this.run('decrement', key, 0, () => this.client.decrby(this.k(key), amount));
  }

  async deletePattern(pattern: string): Promise<number> {
    return this.run('delete pattern', pattern, 0, async () => {
      let cursor = '0';
      let deleted = 0;
      do {
        const [next, keys] = await this.client.scan(cursor, 'MATCH', this.k(pattern), 'COUNT', this.scanCount);
        cursor = next;
        if (keys.length > 0) {
          deleted += await this.client.del(...keys);
        }
      } while (cursor !== '0');
      return deleted;
    });
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    return this.run('expire', key, false, async () => (await this.client.expire(this.k(key), Math.ceil(ttlSeconds))) === 1);
  }

  async ttl(key: string): Promise<number> {
    return this.run('ttl', key, -2, () => this.client.ttl(this.k(key)));
  }

  async close(): Promise<void> {
    await this.run('close', '', undefined, async () => {
      await this.client.quit();
    });
  }

  private k(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  private async run<T>(operation: string, key: string, fallback: T, command: () => Promise<T>): Promise<T> {
    try {
      return await command();
    } catch (error) {
      this.logger.error(`Cache ${operation} error`, { key, error: errorMessage(error) });
      return fallback;
    }
  }
}
