import dotenv from 'dotenv';
import { z } from 'zod';
import type { RateLimitRule } from '../types';
import { ConfigError } from './errors';

const UNIT_SECONDS: Record<string, number> = {
  second: 1,
  minute: 60,
  hour: 3600,
  day: 86400,
};

/**
 * Parses `5/minute`, `100/hour` or `10/30s` (an explicit window in seconds).
 */
export function parseRate(input: string): RateLimitRule {
  const match = /^\s*(\d+)\s*\/\s*(?:(\d+)s|(second|minute|hour|day)s?)\s*$/i.exec(input);
  if (!match) {
    throw new Error(`Invalid rate "${input}", expected N/second|minute|hour|day or N/Ms`);
  }
  const requests = Number(match[1]);
  const window = match[2] ? Number(match[2]) : UNIT_SECONDS[match[3].toLowerCase()];
  if (requests < 1 || window < 1) {
    throw new Error(`Invalid rate "${input}", limit and window must be positive`);
  }
  return { requests, window };
}

/** `"/api/v1/auth/*=5/minute;/api/v1/search=30/minute"` */
export function parseRateRules(input: string): Record<string, RateLimitRule> {
  const rules: Record<string, RateLimitRule> = {};
  for (const part of input.split(';')) {
    const trimmed = part.trim();
    if (!trimmed) continue;
    const eq = trimmed.lastIndexOf('=');
    if (eq <= 0) {
      throw new Error(`Invalid rate rule "${trimmed}", expected path=rate`);
    }
    rules[trimmed.slice(0, eq).trim()] = parseRate(trimmed.slice(eq + 1));
  }
  return rules;
}

const rateSchema = z.string().transform((value, ctx) => {
  try {
    return parseRate(value);
  } catch (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: error instanceof Error ? error.message : String(error) });
    return z.NEVER;
  }
});

const rulesSchema = z.string().transform((value, ctx) => {
  try {
    return parseRateRules(value);
  } catch (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: error instanceof Error ? error.message : String(error) });
    return z.NEVER;
  }
});

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
  REDIS_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(1000),
  REDIS_KEY_PREFIX: z.string().default(''),
  CACHE_DEFAULT_TTL: z.coerce.number().int().positive().default(3600),
  OTP_EXPIRY_MINUTES: z.coerce.number().int().positive().default(5),
  RATE_LIMIT_ENABLED: booleanFlag.default('true'),
  RATE_LIMIT_DEFAULT: rateSchema.default('100/hour'),
  RATE_LIMIT_RULES: rulesSchema.default(''),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type GuardConfig = {
  redis: {
    url: string;
    connectTimeoutMs: number;
    keyPrefix: string;
  };
  cache: {
    defaultTtl: number;
  };
  otp: {
    expiryMinutes: number;
  };
  rateLimit: {
    enabled: boolean;
    defaultLimit: RateLimitRule;
    limits: Record<string, RateLimitRule>;
  };
  logLevel: 'debug' | 'info' | 'warn' | 'error';
};

export function loadConfig(env: Record<string, string | undefined> = process.env): GuardConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const values = parsed.data;
  return {
    redis: {
      url: values.REDIS_URL,
      connectTimeoutMs: values.REDIS_CONNECT_TIMEOUT_MS,
      keyPrefix: values.REDIS_KEY_PREFIX,
    },
    cache: { defaultTtl: values.CACHE_DEFAULT_TTL },
    otp: { expiryMinutes: values.OTP_EXPIRY_MINUTES },
    rateLimit: {
      enabled: values.RATE_LIMIT_ENABLED,
      defaultLimit: values.RATE_LIMIT_DEFAULT,
      limits: values.RATE_LIMIT_RULES,
    },
    logLevel: values.LOG_LEVEL,
  };
}

/** Reads `.env` into `process.env`, then validates it. */
export function loadEnvConfig(path?: string): GuardConfig {
  dotenv.config(path ? { path } : undefined);
  return loadConfig(process.env);
}
