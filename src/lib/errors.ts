import type { Request, Response, NextFunction } from 'express';
import type { OtpFailureReason } from '../types';

export class GuardError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly status: number,
  ) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): Record<string, unknown> {
    return { error: this.message, code: this.code };
  }
}

/** Raised while probing Redis at startup; recovered by falling back to memory. */
export class BackendUnavailableError extends GuardError {
  constructor(readonly url: string, readonly originalError?: unknown) {
    super(`Cache backend unavailable at ${url}`, 'BACKEND_UNAVAILABLE', 503);
  }
}

const OTP_MESSAGES: Record<OtpFailureReason, string> = {
  expired_or_not_found: 'OTP expired or not found',
  invalid_code: 'Invalid OTP',
  too_many_attempts: 'Too many failed attempts. Please try again later.',
};

export class InvalidOtpError extends GuardError {
  constructor(readonly reason: OtpFailureReason) {
    super(OTP_MESSAGES[reason], 'INVALID_OTP', 400);
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), reason: this.reason };
  }
}

export class RateLimitExceededError extends GuardError {
  constructor(readonly retryAfterSeconds: number) {
    super('Rate limit exceeded', 'RATE_LIMIT_EXCEEDED', 429);
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), retryAfterSeconds: this.retryAfterSeconds };
  }
}

export class ConfigError extends GuardError {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'INVALID_CONFIG', 500);
  }
}

export function errorHandler() {
  return function guardErrorHandler(error: unknown, _req: Request, res: Response, next: NextFunction) {
    if (!(error instanceof GuardError)) {
      next(error);
      return;
    }
    if (error instanceof RateLimitExceededError) {
      res.setHeader('Retry-After', String(error.retryAfterSeconds));
    }
    res.status(error.status).json(error.toJSON());
  };
}
