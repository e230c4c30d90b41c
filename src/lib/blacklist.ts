import type { Request, Response, NextFunction } from 'express';
import type { BlacklistEntry, CacheStore } from '../types';
import { resolveClientIp, type IdentifierResolver } from './keys';
import { silentLogger, type Logger } from './logger';

export class IpBlacklist {
  private readonly logger: Logger;

  constructor(private readonly store: CacheStore, options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  static keyFor(ip: string): string {
    return `blacklist:ip:${ip}`;
  }

  /** Without `durationSeconds` the entry never expires. */
  async add(ip: string, reason: string, durationSeconds?: number): Promise<BlacklistEntry> {
    const permanent = durationSeconds === undefined;
    const entry: BlacklistEntry = {
      ip,
      reason,
      createdAt: new Date().toISOString(),
      permanent,
    };
    await this.store.set(IpBlacklist.keyFor(ip), { ...entry }, durationSeconds);
    this.logger.info('IP blacklisted', { ip, reason, durationSeconds });
    return entry;
  }

  async remove(ip: string): Promise<boolean> {
    const removed = await this.store.delete(IpBlacklist.keyFor(ip));
    if (removed) this.logger.info('IP removed from blacklist', { ip });
    return removed;
  }

  async isBlocked(ip: string): Promise<boolean> {
    return this.store.exists(IpBlacklist.keyFor(ip));
  }

  async get(ip: string): Promise<BlacklistEntry | undefined> {
    const value = await this.store.get(IpBlacklist.keyFor(ip));
    if (!isBlacklistEntry(value)) return undefined;
    return value;
  }
}

function isBlacklistEntry(value: unknown): value is BlacklistEntry {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'ip' in value &&
    typeof value.ip === 'string' &&
    'reason' in value &&
    typeof value.reason === 'string' &&
    'createdAt' in value &&
    typeof value.createdAt === 'string' &&
    'permanent' in value &&
    typeof value.permanent === 'boolean'
  );
}

export const SECURITY_HEADERS: Readonly<Record<string, string>> = {
  'X-Content-Type-Options': 'nosniff',
  'X-Frame-Options': 'DENY',
  'X-XSS-Protection': '1; mode=block',
  'Strict-Transport-Security': 'max-age=31536000; includeSubDomains',
};

export type BlockBlacklistedOptions = {
  blacklist: IpBlacklist;
  resolveIp?: IdentifierResolver;
  /** Adds `SECURITY_HEADERS` to every request that gets through. */
  securityHeaders?: boolean;
  hooks?: {
    onBlocked?: (info: { ip: string; req: Request }) => void;
  };
};

export function blockBlacklisted(options: BlockBlacklistedOptions) {
  const { blacklist, resolveIp = resolveClientIp, securityHeaders = false, hooks } = options;

  return async function blacklistMiddleware(req: Request, res: Response, next: NextFunction) {
    try {
      const ip = resolveIp(req);
      if (await blacklist.isBlocked(ip)) {
        hooks?.onBlocked?.({ ip, req });
        res.status(403).json({ error: 'Access denied' });
        return;
      }
      if (securityHeaders) {
        for (const [name, value] of Object.entries(SECURITY_HEADERS)) {
          res.setHeader(name, value);
        }
      }
      next();
    } catch (error) {
      next(error);
    }
  };
}
