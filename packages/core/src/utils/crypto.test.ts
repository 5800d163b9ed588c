import { describe, it, expect } from 'vitest';
import { sha256, stableStringify, hashArgs, uuidv7, sanitizeForLogging } from './crypto.js';

describe('sha256', () => {
  it('should hash a string correctly', () => {
    expect(sha256('hello world')).toBe(
      'b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9'
    );
  });

  it('should hash bytes the same as the equivalent string', () => {
    expect(sha256(new TextEncoder().encode('hello world'))).toBe(sha256('hello world'));
  });
});

describe('stableStringify', () => {
  it('sorts object keys at every depth', () => {
    expect(stableStringify({ b: 1, a: { d: 2, c: [3, { f: 4, e: 5 }] } })).toBe(
      '{"a":{"c":[3,{"e":5,"f":4}],"d":2},"b":1}'
    );
  });

  it('drops undefined properties and encodes bytes as base64', () => {
    expect(stableStringify({ x: undefined, y: new Uint8Array([104, 105]) })).toBe('{"y":"aGk="}');
  });

  it('serializes bigint values as strings', () => {
    expect(stableStringify({ n: 10n })).toBe('{"n":"10"}');
  });
});

describe('hashArgs', () => {
  it('is insensitive to key order', () => {
    expect(hashArgs({ amount: 5, currency: 'usd' })).toBe(hashArgs({ currency: 'usd', amount: 5 }));
  });

  it('returns a 16-character hex prefix', () => {
    expect(hashArgs({})).toMatch(/^[a-f0-9]{16}$/);
  });
});

describe('uuidv7', () => {
  it('should produce a version 7 UUID', () => {
    expect(uuidv7()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it('should produce unique values', () => {
    const ids = new Set(Array.from({ length: 100 }, () => uuidv7()));
    expect(ids.size).toBe(100);
  });
});

describe('sanitizeForLogging', () => {
  it('redacts sensitive keys', () => {
    expect(sanitizeForLogging({ apiKey: 'abc', user: 'u1' })).toEqual({
      apiKey: '[REDACTED]',
      user: 'u1',
    });
  });

  it('redacts bearer tokens inside strings', () => {
    expect(sanitizeForLogging('Authorization: Bearer abc.def')).toBe(
      'Authorization: Bearer [REDACTED_TOKEN]'
    );
  });

  it('summarizes byte arrays instead of logging contents', () => {
    expect(sanitizeForLogging({ data: new Uint8Array(3) })).toEqual({ data: '[3 bytes]' });
  });

  it('passes through numbers and null', () => {
    expect(sanitizeForLogging(42)).toBe(42);
    expect(sanitizeForLogging(null)).toBeNull();
  });
});
