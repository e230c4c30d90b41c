export * from './lib/rateLimit';
export * from './lib/blacklist';
export * from './lib/otp';
export * from './lib/memoize';
export * from './lib/invalidate';
export * from './lib/keys';
export * from './lib/errors';
export * from './lib/config';
export * from './lib/logger';
export * from './lib/guard';
export { encodeValue, decodeValue } from './lib/codec';
export * from './stores/memoryStore';
export * from './stores/redisStore';
export * from './stores/connect';
export type {
  CacheStore,
  CacheValue,
  CacheScalar,
  CacheDocument,
  IncrementOptions,
  RateLimitRule,
  RateLimitResult,
  BlacklistEntry,
  OtpFailureReason,
  OtpVerifyResult,
  OtpIssueResult,
} from './types';
