import type { CacheDocument, CacheScalar, CacheValue } from '../types';

// Scalars are wrapped so the exact type survives a round trip; documents are plain JSON.
export const OPAQUE_PREFIX = '~cv1:';

type Envelope =
  | { t: 'string'; v: string }
  | { t: 'number'; v: string }
  | { t: 'boolean'; v: boolean }
  | { t: 'null' }
  | { t: 'bigint'; v: string }
  | { t: 'date'; v: string }
  | { t: 'bytes'; v: string };

export function isDocument(value: CacheValue): value is CacheDocument {
  if (Array.isArray(value)) return true;
  if (value === null || typeof value !== 'object') return false;
  if (value instanceof Date || value instanceof Uint8Array) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function encodeValue(value: CacheValue): string {
  if (isDocument(value)) {
    return JSON.stringify(value);
  }
  // plain numerals, so INCRBY works on a value written by set()
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return OPAQUE_PREFIX + JSON.stringify(toEnvelope(value));
}

/**
 * Reverses `encodeValue`. Raw strings that were never encoded (for example a
 * counter written by INCRBY) are read as JSON when they parse, verbatim otherwise.
 */
export function decodeValue<T extends CacheValue = CacheValue>(raw: string): T {
  if (raw.startsWith(OPAQUE_PREFIX)) {
    // Deserialized payloads are trusted to be what the caller stored under the key.
    return fromEnvelope(JSON.parse(raw.slice(OPAQUE_PREFIX.length))) as T;
  }
  try {
    return JSON.parse(raw);
  } catch {
    return raw as T;
  }
}

function toEnvelope(value: CacheScalar): Envelope {
  if (value === null) return { t: 'null' };
  if (value instanceof Date) return { t: 'date', v: value.toISOString() };
  if (value instanceof Uint8Array) return { t: 'bytes', v: Buffer.from(value).toString('base64') };
  if (typeof value === 'string') return { t: 'string', v: value };
  if (typeof value === 'number') return { t: 'number', v: String(value) };
  if (typeof value === 'boolean') return { t: 'boolean', v: value };
  return { t: 'bigint', v: value.toString() };
}

function fromEnvelope(input: unknown): CacheScalar {
  if (typeof input !== 'object' || input === null || !('t' in input)) {
    throw new TypeError('Malformed cache envelope');
  }
  const v = 'v' in input ? input.v : undefined;
  switch (input.t) {
    case 'null':
      return null;
    case 'boolean':
      return v === true;
    case 'string':
      return String(v);
    case 'number':
      return Number(v);
    case 'bigint':
      return BigInt(String(v));
    case 'date':
      return new Date(String(v));
    case 'bytes':
      return Buffer.from(String(v), 'base64');
    default:
      throw new TypeError(`Unknown cache envelope type: ${String(input.t)}`);
  }
}
