import type { Request, Response, NextFunction } from 'express';
import type { CacheStore, RateLimitResult, RateLimitRule } from '../types';
import { RateLimitExceededError } from './errors';
import { resolveClientIp, type IdentifierResolver } from './keys';
import { silentLogger, type Logger } from './logger';

export type RateLimiterOptions = {
  // 'global' limits an identifier across every path
  scope?: string;
  // exact path, or a prefix ending in '*'
  limits?: Record<string, RateLimitRule>;
  defaultLimit: RateLimitRule;
  logger?: Logger;
};

/**
 * Fixed-window counter per (scope, identifier, path). The window TTL is attached
 * by the first increment only, so a burst straddling a boundary may see up to
 * twice the limit.
 */
export class RateLimiter {
  readonly scope: string;
  private readonly exact = new Map<string, RateLimitRule>();
  private readonly prefixes: Array<{ prefix: string; rule: RateLimitRule }> = [];
  private readonly defaultLimit: RateLimitRule;
  private readonly logger: Logger;

  constructor(private readonly store: CacheStore, options: RateLimiterOptions) {
    this.scope = options.scope ?? 'api';
    this.defaultLimit = options.defaultLimit;
    this.logger = options.logger ?? silentLogger;

    for (const [path, rule] of Object.entries(options.limits ?? {})) {
      if (path.endsWith('*')) {
        this.prefixes.push({ prefix: path.slice(0, -1), rule });
      } else {
        this.exact.set(path, rule);
      }
    }
    // longest prefix wins
    this.prefixes.sort((a, b) => b.prefix.length - a.prefix.length);
  }

  ruleFor(path: string): RateLimitRule {
    const exact = this.exact.get(path);
    if (exact) return exact;
    return this.prefixes.find(({ prefix }) => path.startsWith(prefix))?.rule ?? this.defaultLimit;
  }

  keyFor(identifier: string, path: string): string {
    if (this.scope === 'global') return `rate_limit:global:${identifier}`;
    return `rate_limit:${this.scope}:${identifier}:${path}`;
  }

  async check(identifier: string, path: string): Promise<RateLimitResult> {
    const { requests, window } = this.ruleFor(path);
    const key = this.keyFor(identifier, path);

    const totalHits = await this.store.increment(key, 1, { ttlIfNew: window });
    const ttl = await this.store.ttl(key);
    const resetSeconds = ttl > 0 ? Math.min(ttl, window) : window;

    if (totalHits > requests) {
      this.logger.debug('Rate limit exceeded', { key, totalHits, limit: requests });
      return { key, allowed: false, limit: requests, remaining: 0, resetSeconds, totalHits };
    }
    return { key, allowed: true, limit: requests, remaining: requests - totalHits, resetSeconds, totalHits };
  }

  async consume(identifier: string, path: string): Promise<RateLimitResult> {
    const result = await this.check(identifier, path);
    if (!result.allowed) {
      throw new RateLimitExceededError(result.resetSeconds);
    }
    return result;
  }

  async reset(identifier: string, path: string): Promise<boolean> {
    return this.store.delete(this.keyFor(identifier, path));
  }
}

export type RateLimitMiddlewareOptions = {
  limiter: RateLimiter;
  enabled?: boolean;
  keyGenerator?: IdentifierResolver;
  hooks?: {
    onAllowed?: (info: { key: string; totalHits: number; remaining: number; req: Request }) => void;
    onBlocked?: (info: { key: string; totalHits: number; retryAfterSeconds: number; req: Request }) => void;
    onError?: (info: { error: unknown; req: Request }) => void;
  };
};

export function rateLimit(options: RateLimitMiddlewareOptions) {
  const { limiter, enabled = true, keyGenerator = resolveClientIp, hooks } = options;

  return async function rateLimitMiddleware(req: Request, res: Response, next: NextFunction) {
    if (!enabled) return next();
    try {
      const result = await limiter.check(keyGenerator(req), req.path);
      const { key, totalHits, remaining, resetSeconds } = result;

      res.setHeader('X-RateLimit-Limit', String(result.limit));
      res.setHeader('X-RateLimit-Remaining', String(remaining));
      res.setHeader('X-RateLimit-Reset', String(resetSeconds));

      if (!result.allowed) {
        hooks?.onBlocked?.({ key, totalHits, retryAfterSeconds: resetSeconds, req });
        res.setHeader('Retry-After', String(resetSeconds));
        res.status(429).json({ error: 'Too Many Requests', retryAfterSeconds: resetSeconds });
        return;
      }
      hooks?.onAllowed?.({ key, totalHits, remaining, req });
      next();
    } catch (error) {
      hooks?.onError?.({ error, req });
      next(error);
    }
  };
}
