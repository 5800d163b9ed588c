/**
 * Hashing and ID Utilities for Toolgate
 *
 * Security considerations:
 * - Uses Node.js built-in crypto module
 * - Tool arguments are only ever recorded as hashes, never raw
 * - Secure random generation for IDs
 */

import { createHash, randomBytes } from 'node:crypto';

/**
 * Generate a SHA-256 hash of the input
 */
export function sha256(data: string | Uint8Array): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * Deterministic JSON serialization (object keys sorted at every depth).
 * Two argument objects with the same content always serialize identically.
 */
export function stableStringify(value: unknown): string {
  if (value === undefined) return 'null';
  if (typeof value === 'bigint') return JSON.stringify(value.toString());
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(',')}]`;
  }
  if (value instanceof Uint8Array) {
    return JSON.stringify(Buffer.from(value).toString('base64'));
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
  return `{${entries.join(',')}}`;
}

/**
 * Short content hash of tool arguments, for audit records
 */
export function hashArgs(args: Record<string, unknown>): string {
  return sha256(stableStringify(args)).slice(0, 16);
}

/**
 * Generate a UUID v7 (time-sortable)
 * Based on RFC 9562
 */
export function uuidv7(): string {
  const timestamp = Date.now();
  const random = randomBytes(10);

  // Timestamp in 48 bits (6 bytes)
  const timestampBytes = Buffer.alloc(6);
  timestampBytes.writeUIntBE(timestamp, 0, 6);

  const uuid = Buffer.alloc(16);
  timestampBytes.copy(uuid, 0, 0, 6);

  // version (4 bits) + rand_a (12 bits)
  uuid[6] = 0x70 | (random[0] & 0x0f);
  uuid[7] = random[1];

  // variant (2 bits) + rand_b (62 bits)
  uuid[8] = 0x80 | (random[2] & 0x3f);
  random.copy(uuid, 9, 3, 10);

  const hex = uuid.toString('hex');
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

const SECRET_PATTERNS: { regex: RegExp; replacement: string }[] = [
  { regex: /sk-[a-zA-Z0-9_-]{20,}/g, replacement: '[REDACTED_API_KEY]' },
  { regex: /bearer\s+[a-zA-Z0-9_.-]+/gi, replacement: 'Bearer [REDACTED_TOKEN]' },
  { regex: /password["\s:=]+["']?[^"'\s]{1,}["']?/gi, replacement: '[REDACTED_PASSWORD]' },
];

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'apikey', 'api_key', 'authorization'];

/**
 * Sanitize a value for safe logging (remove potential secrets)
 */
export function sanitizeForLogging(input: unknown): unknown {
  if (input === null || input === undefined) {
    return input;
  }

  if (typeof input === 'string') {
    let sanitized = input;
    for (const { regex, replacement } of SECRET_PATTERNS) {
      sanitized = sanitized.replace(regex, replacement);
    }
    return sanitized;
  }

  if (Array.isArray(input)) {
    return input.map(sanitizeForLogging);
  }

  if (input instanceof Uint8Array) {
    return `[${input.byteLength} bytes]`;
  }

  if (typeof input === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      const lowerKey = key.toLowerCase();
      if (SENSITIVE_KEYS.some((s) => lowerKey.includes(s))) {
        sanitized[key] = '[REDACTED]';
      } else {
        sanitized[key] = sanitizeForLogging(value);
      }
    }
    return sanitized;
  }

  return input;
}
