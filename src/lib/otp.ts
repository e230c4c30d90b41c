import { randomInt } from 'node:crypto';
import type { CacheStore, OtpIssueResult, OtpVerifyResult } from '../types';
import { InvalidOtpError } from './errors';
import { silentLogger, type Logger } from './logger';

export const OTP_MAX_ATTEMPTS = 3;
export const OTP_LOCKOUT_SECONDS = 3600;

export type OtpFlowOptions = {
  expiryMinutes: number;
  maxAttempts?: number;
  lockoutSeconds?: number;
  codeLength?: number;
  generateCode?: (length: number) => string;
  logger?: Logger;
};

export function generateNumericCode(length: number): string {
  let code = '';
  for (let i = 0; i < length; i += 1) {
    code += String(randomInt(10));
  }
  return code;
}

/**
 * Phone verification: NoCode -> Issued -> Consumed | Blocked.
 *
 * `verify` does not consult the lockout flag. Callers check `isBlocked` before
 * issuing or verifying.
 */
export class OtpFlow {
  private readonly expirySeconds: number;
  private readonly maxAttempts: number;
  private readonly lockoutSeconds: number;
  private readonly codeLength: number;
  private readonly generateCode: (length: number) => string;
  private readonly logger: Logger;

  constructor(private readonly store: CacheStore, options: OtpFlowOptions) {
    this.expirySeconds = options.expiryMinutes * 60;
    this.maxAttempts = options.maxAttempts ?? OTP_MAX_ATTEMPTS;
    this.lockoutSeconds = options.lockoutSeconds ?? OTP_LOCKOUT_SECONDS;
    this.codeLength = options.codeLength ?? 6;
    this.generateCode = options.generateCode ?? generateNumericCode;
    this.logger = options.logger ?? silentLogger;
  }

  static codeKey(phone: string): string {
    return `otp:${phone}`;
  }

  static attemptsKey(phone: string): string {
    return `otp_attempts:${phone}`;
  }

  static blockedKey(phone: string): string {
    return `otp_blocked:${phone}`;
  }

  /** Replaces any active code for the phone and clears its failed attempts. */
  async issue(phone: string): Promise<OtpIssueResult> {
    const code = this.generateCode(this.codeLength);
    await this.store.set(OtpFlow.codeKey(phone), code, this.expirySeconds);
    await this.store.delete(OtpFlow.attemptsKey(phone));
    this.logger.info('OTP issued', { phone: maskPhone(phone), expiresInSeconds: this.expirySeconds });
    return { code, expiresInSeconds: this.expirySeconds };
  }

  async verify(phone: string, code: string): Promise<OtpVerifyResult> {
    const stored = await this.store.get(OtpFlow.codeKey(phone));
    if (stored === undefined || stored === null) {
      return { ok: false, reason: 'expired_or_not_found' };
    }

    if (String(stored) !== code) {
      const attempts = await this.store.increment(OtpFlow.attemptsKey(phone), 1, { ttlIfNew: this.expirySeconds });
      if (attempts >= this.maxAttempts) {
        await this.store.delete(OtpFlow.codeKey(phone));
        await this.store.delete(OtpFlow.attemptsKey(phone));
        await this.store.set(OtpFlow.blockedKey(phone), '1', this.lockoutSeconds);
        this.logger.warn('OTP locked after failed attempts', { phone: maskPhone(phone), attempts });
        return { ok: false, reason: 'too_many_attempts' };
      }
      return { ok: false, reason: 'invalid_code' };
    }

    await this.store.delete(OtpFlow.codeKey(phone));
    await this.store.delete(OtpFlow.attemptsKey(phone));
    return { ok: true };
  }

  async verifyOrThrow(phone: string, code: string): Promise<void> {
    const result = await this.verify(phone, code);
    if (!result.ok) {
      throw new InvalidOtpError(result.reason);
    }
  }

  async isBlocked(phone: string): Promise<boolean> {
    return this.store.exists(OtpFlow.blockedKey(phone));
  }

  async unblock(phone: string): Promise<boolean> {
    return this.store.delete(OtpFlow.blockedKey(phone));
  }

  /** Seconds until the active code expires, or 0 when there is none. */
  async codeTtl(phone: string): Promise<number> {
    const ttl = await this.store.ttl(OtpFlow.codeKey(phone));
    return ttl > 0 ? ttl : 0;
  }
}

function maskPhone(phone: string): string {
  return phone.length <= 4 ? '****' : `${'*'.repeat(phone.length - 4)}${phone.slice(-4)}`;
}
