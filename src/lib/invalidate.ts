import type { Request, Response, NextFunction } from 'express';
import type { Memoizer } from './memoize';

export type InvalidateOptions = {
  memoizer: Memoizer;
  patterns?: string[];
  resolvePatterns?: (req: Request) => string[];
  hooks?: {
    onInvalidated?: (info: { patterns: string[]; deleted: number; req: Request }) => void;
    onError?: (info: { error: unknown; req: Request }) => void;
  };
};

/**
 * Deletes memoized entries matching the patterns once the handler has answered
 * with a non-error status. Failed mutations leave the cache alone.
 */
export function invalidateCache(options: InvalidateOptions) {
  const { memoizer, patterns, resolvePatterns, hooks } = options;

  return function invalidateMiddleware(req: Request, res: Response, next: NextFunction) {
    res.on('finish', () => {
      if (res.statusCode >= 400) return;
      const resolved = [...(patterns ?? []), ...(resolvePatterns?.(req) ?? [])].filter(Boolean);
      if (resolved.length === 0) return;

      memoizer
        .invalidatePatterns(resolved)
        .then((deleted) => hooks?.onInvalidated?.({ patterns: resolved, deleted, req }))
        .catch((error: unknown) => hooks?.onError?.({ error, req }));
    });
    next();
  };
}
