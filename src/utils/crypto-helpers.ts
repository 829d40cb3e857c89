import * as crypto from 'crypto';
import { SESSION } from '../constants';

// Base64 encoding helper
export const b64 = (buf: Buffer): string => buf.toString('base64');

/**
 * Generate a session ID: prefix + 32 hex chars from the CSPRNG
 */
export function generateSessionId(): string {
  return `${SESSION.ID_PREFIX}-${crypto.randomBytes(SESSION.ID_LENGTH).toString('hex')}`;
}

/**
 * Generate a request ID for upstream call correlation
 */
export function generateRequestId(): string {
  return crypto.randomUUID();
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}

/**
 * JSON with object keys sorted at every depth and no whitespace.
 * Non-ASCII characters are written as-is.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value)) ?? 'null';
}

/**
 * SHA-1 hex digest of the canonical JSON form of a value
 */
export function contentHash(value: unknown): string {
  return crypto.createHash('sha1').update(canonicalJson(value), 'utf8').digest('hex');
}
