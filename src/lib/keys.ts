import type { Request } from 'express';

export type IdentifierResolver = (req: Request) => string;

/** First `X-Forwarded-For` entry, else the connection address. */
export function resolveClientIp(req: Request): string {
  const forwarded = req.headers['x-forwarded-for'];
  const header = Array.isArray(forwarded) ? forwarded[0] : forwarded;
  if (typeof header === 'string') {
    const first = header.split(',')[0].trim();
    if (first.length > 0) return first;
  }
  return req.ip ?? req.socket?.remoteAddress ?? 'unknown';
}

export function keyByIp(): IdentifierResolver {
  return (req) => `ip:${resolveClientIp(req)}`;
}

/** Authenticated callers are limited per user, anonymous ones per client IP. */
export function keyByUser(extractor: (req: Request) => string | number | undefined): IdentifierResolver {
  return (req) => {
    const id = extractor(req);
    if (id !== undefined && `${id}`.length > 0) return `user:${id}`;
    return `ip:${resolveClientIp(req)}`;
  };
}

export function keyByHeader(headerName: string = 'x-api-key', options?: { prefix?: string }): IdentifierResolver {
  const normalized = headerName.toLowerCase();
  const prefix = options?.prefix ?? 'token';
  return (req) => {
    const headerValue = req.header(normalized);
    if (typeof headerValue === 'string' && headerValue.length > 0) {
      return `${prefix}:${headerValue}`;
    }
    return `ip:${resolveClientIp(req)}`;
  };
}
