import type { CacheStore } from '../types';
import { connectCacheStore, type RedisClientFactory } from '../stores/connect';
import { IpBlacklist } from './blacklist';
import type { GuardConfig } from './config';
import { createLogger, type Logger } from './logger';
import { Memoizer, type MemoizerOptions } from './memoize';
import { OtpFlow } from './otp';
import { RateLimiter } from './rateLimit';

export interface Guard {
  store: CacheStore;
  memoizer: Memoizer;
  rateLimiter: RateLimiter;
  blacklist: IpBlacklist;
  otp: OtpFlow;
  config: GuardConfig;
  logger: Logger;
  close(): Promise<void>;
}

export type CreateGuardOptions = {
  logger?: Logger;
  createClient?: RedisClientFactory;
  memoizerHooks?: MemoizerOptions['hooks'];
};

/** Connects the store once and hands the same instance to every component. */
export async function createGuard(config: GuardConfig, options: CreateGuardOptions = {}): Promise<Guard> {
  const logger = options.logger ?? createLogger({ level: config.logLevel });
  const store = await connectCacheStore(config.redis, {
    logger: logger.child('cache'),
    createClient: options.createClient,
  });

  return {
    store,
    memoizer: new Memoizer(store, {
      defaultTtl: config.cache.defaultTtl,
      logger: logger.child('memoize'),
      hooks: options.memoizerHooks,
    }),
    rateLimiter: new RateLimiter(store, {
      defaultLimit: config.rateLimit.defaultLimit,
      limits: config.rateLimit.limits,
      logger: logger.child('rate-limit'),
    }),
    blacklist: new IpBlacklist(store, { logger: logger.child('blacklist') }),
    otp: new OtpFlow(store, {
      expiryMinutes: config.otp.expiryMinutes,
      logger: logger.child('otp'),
    }),
    config,
    logger,
    close: () => store.close(),
  };
}
