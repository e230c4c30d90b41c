export type CacheScalar = string | number | boolean | bigint | null | Date | Uint8Array;
export type CacheDocument = { [key: string]: unknown } | unknown[];
export type CacheValue = CacheScalar | CacheDocument;

export interface IncrementOptions {
  // seconds; attached only when the counter has no TTL yet
  ttlIfNew?: number;
}

/**
 * Key-value store with TTL semantics. Implementations never throw on backend
 * failure: they log and answer with the negative result for the operation.
 */
export interface CacheStore {
  readonly kind: 'memory' | 'redis';
  get<T extends CacheValue = CacheValue>(key: string): Promise<T | undefined>;
  set(key: string, value: CacheValue, ttlSeconds?: number): Promise<boolean>;
  delete(key: string): Promise<boolean>;
  exists(key: string): Promise<boolean>;
  increment(key: string, amount?: number, options?: IncrementOptions): Promise<number>;
  decrement(key: string, amount?: number): Promise<number>;
  deletePattern(pattern: string): Promise<number>;
  expire(key: string, ttlSeconds: number): Promise<boolean>;
  /** Remaining seconds, `-1` without expiry, `-2` when the key is absent. */
  ttl(key: string): Promise<number>;
  close(): Promise<void>;
}

export interface RateLimitRule {
  requests: number;
  window: number; // seconds
}

export interface RateLimitResult {
  key: string;
  allowed: boolean;
  limit: number;
  remaining: number;
  resetSeconds: number;
  totalHits: number;
}

export interface BlacklistEntry {
  ip: string;
  reason: string;
  createdAt: string;
  permanent: boolean;
}

export type OtpFailureReason = 'expired_or_not_found' | 'invalid_code' | 'too_many_attempts';

export type OtpVerifyResult = { ok: true } | { ok: false; reason: OtpFailureReason };

export interface OtpIssueResult {
  code: string;
  expiresInSeconds: number;
}
