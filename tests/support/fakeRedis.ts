import type { ConnectableRedisClient } from '../../src/stores/connect';
import { INCREMENT_WITH_TTL_SCRIPT } from '../../src/stores/redisStore';
import { globToRegExp } from '../../src/lib/glob';

type Entry = { value: string; expiresAt?: number };

/**
 * In-process stand-in for the ioredis commands the store issues. Set
 * `failing` to make every command reject like a dropped connection.
 */
export class FakeRedis implements ConnectableRedisClient {
  readonly data = new Map<string, Entry>();
  readonly commands: string[] = [];
  failing = false;
  connectError?: Error;
  private errorListeners: Array<(error: Error) => void> = [];

  async connect(): Promise<void> {
    if (this.connectError) throw this.connectError;
  }

  disconnect(): void {
    this.commands.push('disconnect');
  }

  on(_event: 'error', listener: (error: Error) => void): this {
    this.errorListeners.push(listener);
    return this;
  }

  emitError(error: Error): void {
    for (const listener of this.errorListeners) listener(error);
  }

  async ping(): Promise<string> {
    this.guard('ping');
    return 'PONG';
  }

  async quit(): Promise<string> {
    this.guard('quit');
    return 'OK';
  }

  async get(key: string): Promise<string | null> {
    this.guard('get');
    return this.read(key)?.value ?? null;
  }

  async set(key: string, value: string): Promise<string> {
    this.guard('set');
    this.data.set(key, { value });
    return 'OK';
  }

  async setex(key: string, seconds: number, value: string): Promise<string> {
    this.guard('setex');
    this.data.set(key, { value, expiresAt: Date.now() + seconds * 1000 });
    return 'OK';
  }

  async del(...keys: string[]): Promise<number> {
    this.guard('del');
    let removed = 0;
    for (const key of keys) {
      if (this.read(key)) {
        this.data.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  async exists(key: string): Promise<number> {
    this.guard('exists');
    return this.read(key) ? 1 : 0;
  }

  async incrby(key: string, increment: number): Promise<number> {
    this.guard('incrby');
    return this.incr(key, increment);
  }

  async decrby(key: string, decrement: number): Promise<number> {
    this.guard('decrby');
    return this.incr(key, -decrement);
  }

  async expire(key: string, seconds: number): Promise<number> {
    this.guard('expire');
    const entry = this.read(key);
    if (!entry) return 0;
    entry.expiresAt = Date.now() + seconds * 1000;
    return 1;
  }

  async ttl(key: string): Promise<number> {
    this.guard('ttl');
    const entry = this.read(key);
    if (!entry) return -2;
    if (entry.expiresAt === undefined) return -1;
    return Math.round((entry.expiresAt - Date.now()) / 1000);
  }

  async scan(
    cursor: string,
    _matchToken: 'MATCH',
    pattern: string,
    _countToken: 'COUNT',
    count: number,
  ): Promise<[string, string[]]> {
    this.guard('scan');
    // the cursor carries the last key returned, so deletions between pages skip nothing
    const after = cursor === '0' ? undefined : cursor.slice(2);
    const matcher = globToRegExp(pattern);
    const keys = Array.from(this.data.keys())
      .filter((key) => this.read(key) && matcher.test(key) && (after === undefined || key > after))
      .sort();
    const page = keys.slice(0, count);
    const next = keys.length > count ? `k:${page[page.length - 1]}` : '0';
    return [next, page];
  }

  // Only the script the store ships is understood.
  async eval(script: string, _numKeys: number, ...args: Array<string | number>): Promise<unknown> {
    this.guard('eval');
    if (script !== INCREMENT_WITH_TTL_SCRIPT) {
      throw new Error('NOSCRIPT unsupported script');
    }
    const [key, amount, ttl] = args;
    const value = this.incr(String(key), Number(amount));
    const entry = this.read(String(key));
    if (entry && entry.expiresAt === undefined && Number(ttl) > 0) {
      entry.expiresAt = Date.now() + Number(ttl) * 1000;
    }
    return value;
  }

  private incr(key: string, amount: number): number {
    const entry = this.read(key);
    if (entry && !/^-?\d+$/.test(entry.value)) {
      throw new Error('ERR value is not an integer or out of range');
    }
    const next = (entry ? Number(entry.value) : 0) + amount;
    this.data.set(key, { value: String(next), expiresAt: entry?.expiresAt });
    return next;
  }

  private read(key: string): Entry | undefined {
    const entry = this.data.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt !== undefined && entry.expiresAt <= Date.now()) {
      this.data.delete(key);
      return undefined;
    }
    return entry;
  }

  private guard(command: string): void {
    this.commands.push(command);
    if (this.failing) {
      throw new Error(`Connection is closed (${command})`);
    }
  }
}
