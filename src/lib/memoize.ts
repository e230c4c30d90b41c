import safeStringify from 'fast-safe-stringify';
import type { ZodType } from 'zod';
import type { CacheStore, CacheValue } from '../types';
import { silentLogger, type Logger } from './logger';

export type KeyFn<A extends unknown[]> = (...args: A) => string;

export type CachedOptions<A extends unknown[], R extends CacheValue> = {
  prefix: string;
  ttl?: number; // seconds
  key?: KeyFn<A>;
  // validates cache hits; a hit that fails is recomputed
  schema?: ZodType<R>;
};

export type PatternSource<A extends unknown[]> = string | string[] | ((...args: A) => string | string[]);

export type MemoizerOptions = {
  defaultTtl?: number; // seconds
  logger?: Logger;
  hooks?: {
    onHit?: (info: { key: string }) => void;
    onMiss?: (info: { key: string }) => void;
    onInvalidated?: (info: { patterns: string[]; deleted: number }) => void;
  };
};

/**
 * Encodes call arguments into a cache key segment. Objects are serialized with
 * sorted keys so `{ a, b }` and `{ b, a }` produce the same key.
 */
export function deterministicEncode(args: readonly unknown[]): string {
  return args.map(encodeArg).join(':');
}

function encodeArg(arg: unknown): string {
  if (arg instanceof Date) return arg.toISOString();
  if (arg !== null && typeof arg === 'object') return safeStringify.stable(arg);
  return String(arg);
}

export class Memoizer {
  private readonly defaultTtl: number;
  private readonly logger: Logger;

  constructor(
    private readonly store: CacheStore,
    private readonly options: MemoizerOptions = {},
  ) {
    this.defaultTtl = options.defaultTtl ?? 3600;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Cache-aside wrapper. Any stored value, `null` included, is a hit; only an
   * absent key runs `fn`. Concurrent misses on the same key each run `fn`; the
   * last write wins.
   */
  cached<A extends unknown[], R extends CacheValue>(
    fn: (...args: A) => Promise<R>,
    options: CachedOptions<A, R>,
  ): (...args: A) => Promise<R> {
    const { prefix, ttl = this.defaultTtl, key, schema } = options;
    const hooks = this.options.hooks;

    return async (...args: A): Promise<R> => {
      const cacheKey = `${prefix}:${key ? key(...args) : deterministicEncode(args)}`;

      const hit = await this.store.get<R>(cacheKey);
      if (hit !== undefined) {
        if (!schema) {
          hooks?.onHit?.({ key: cacheKey });
          return hit;
        }
        const parsed = schema.safeParse(hit);
        if (parsed.success) {
          hooks?.onHit?.({ key: cacheKey });
          return parsed.data;
        }
        this.logger.warn('Discarding cached value that failed validation', { key: cacheKey });
      }

      hooks?.onMiss?.({ key: cacheKey });
      const result = await fn(...args);
      await this.store.set(cacheKey, result, ttl);
      return result;
    };
  }

  /** Runs `fn`, then deletes every key matching the patterns. Nothing is deleted if `fn` rejects. */
  invalidate<A extends unknown[], R>(
    fn: (...args: A) => Promise<R>,
    patterns: PatternSource<A>,
  ): (...args: A) => Promise<R> {
    return async (...args: A): Promise<R> => {
      const result = await fn(...args);
      const resolved = typeof patterns === 'function' ? patterns(...args) : patterns;
      const list = Array.isArray(resolved) ? resolved : [resolved];
      const deleted = await this.invalidatePatterns(list);
      this.options.hooks?.onInvalidated?.({ patterns: list, deleted });
      return result;
    };
  }

  async invalidatePatterns(patterns: string[]): Promise<number> {
    let deleted = 0;
    for (const pattern of patterns) {
      deleted += await this.store.deletePattern(pattern);
    }
    this.logger.debug('Cache invalidated', { patterns, deleted });
    return deleted;
  }
}
