import { describe, it, expect } from 'vitest';
import { CapabilitySpecSchema, PredicateSchema } from './capability.js';

describe('PredicateSchema', () => {
  it('accepts operands that match their operator', () => {
    expect(PredicateSchema.safeParse({ param: 'amount', op: '<=', value: 1000 }).success).toBe(true);
    expect(PredicateSchema.safeParse({ param: 'currency', op: 'in', value: ['usd', 'eur'] }).success).toBe(true);
    expect(PredicateSchema.safeParse({ param: 'path', op: 'starts_with', value: '/api/' }).success).toBe(true);
    expect(PredicateSchema.safeParse({ param: 'dry_run', op: '==', value: true }).success).toBe(true);
  });

  it('rejects mismatched operands with a message on value', () => {
    const result = PredicateSchema.safeParse({ param: 'amount', op: '>=', value: '10' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.errors).toEqual([
        expect.objectContaining({ path: ['value'], message: 'Operator >= requires a finite numeric operand' }),
      ]);
    }
  });

  it('rejects non-list operands for in and lists for ==', () => {
    expect(PredicateSchema.safeParse({ param: 'c', op: 'in', value: 'usd' }).success).toBe(false);
    expect(PredicateSchema.safeParse({ param: 'c', op: '==', value: ['usd'] }).success).toBe(false);
    expect(PredicateSchema.safeParse({ param: 'p', op: 'starts_with', value: 3 }).success).toBe(false);
  });

  it('rejects unknown operators', () => {
    expect(PredicateSchema.safeParse({ param: 'a', op: '!=', value: 1 }).success).toBe(false);
  });
});

describe('CapabilitySpecSchema', () => {
  it('defaults constraints to an empty list', () => {
    expect(CapabilitySpecSchema.parse({ pattern: 'logs/**' })).toEqual({ pattern: 'logs/**', constraints: [] });
  });

  it('requires a non-negative integer quota', () => {
    expect(CapabilitySpecSchema.safeParse({ pattern: 'a', maxCalls: -1 }).success).toBe(false);
    expect(CapabilitySpecSchema.safeParse({ pattern: 'a', maxCalls: 2.5 }).success).toBe(false);
    expect(CapabilitySpecSchema.safeParse({ pattern: 'a', maxCalls: 0 }).success).toBe(true);
  });
});
