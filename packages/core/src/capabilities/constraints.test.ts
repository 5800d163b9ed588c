import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import {
  ConstraintSet,
  classifyArg,
  evaluatePredicate,
  ownArg,
  param,
  predicateFromSpec,
  predicateToSpec,
} from './constraints.js';

describe('classifyArg', () => {
  it('tags each kind of argument', () => {
    const args = { n: 1, s: 'x', b: true, z: null, l: [1], o: { a: 1 }, u: undefined };
    expect(classifyArg(args, 'n')).toEqual({ kind: 'number', value: 1 });
    expect(classifyArg(args, 's')).toEqual({ kind: 'string', value: 'x' });
    expect(classifyArg(args, 'b')).toEqual({ kind: 'bool', value: true });
    expect(classifyArg(args, 'z')).toEqual({ kind: 'null' });
    expect(classifyArg(args, 'l')).toEqual({ kind: 'list', items: [1] });
    expect(classifyArg(args, 'o')).toEqual({ kind: 'object' });
    expect(classifyArg(args, 'u')).toEqual({ kind: 'missing' });
    expect(classifyArg(args, 'absent')).toEqual({ kind: 'missing' });
  });

  it('does not read inherited properties', () => {
    expect(classifyArg({}, 'toString')).toEqual({ kind: 'missing' });
  });
});

describe('ownArg', () => {
  it('reads own properties only', () => {
    expect(ownArg({ amount: 5 }, 'amount')).toBe(5);
    expect(ownArg({}, 'constructor')).toBeUndefined();
  });

  it('reads nothing from arguments that are not an object', () => {
    expect(ownArg(null, 'amount')).toBeUndefined();
    expect(ownArg(undefined, 'amount')).toBeUndefined();
    expect(ownArg('amount', 'length')).toBeUndefined();
    expect(ownArg([5], '0')).toBeUndefined();
  });
});

describe('evaluatePredicate', () => {
  it('numeric comparisons', () => {
    expect(evaluatePredicate(param('amount').lte(1000), { amount: 1000 })).toBe(true);
    expect(evaluatePredicate(param('amount').lte(1000), { amount: 1001 })).toBe(false);
    expect(evaluatePredicate(param('amount').gte(50), { amount: 50 })).toBe(true);
    expect(evaluatePredicate(param('amount').gt(50), { amount: 50 })).toBe(false);
    expect(evaluatePredicate(param('amount').lt(50), { amount: 49.5 })).toBe(true);
  });

  it('numeric comparisons fail for non-numeric arguments', () => {
    expect(evaluatePredicate(param('amount').lte(1000), { amount: '500' })).toBe(false);
    expect(evaluatePredicate(param('amount').lte(1000), { amount: null })).toBe(false);
    expect(evaluatePredicate(param('amount').lte(1000), { amount: [1] })).toBe(false);
  });

  it('NaN never satisfies a comparison', () => {
    expect(evaluatePredicate(param('amount').lte(1000), { amount: Number.NaN })).toBe(false);
    expect(evaluatePredicate(param('amount').gte(0), { amount: Number.NaN })).toBe(false);
  });

  it('missing parameters fail every operator', () => {
    const predicates = [
      param('x').gte(0),
      param('x').lte(0),
      param('x').gt(0),
      param('x').lt(0),
      param('x').eq(null),
      param('x').oneOf([null]),
      param('x').startsWith(''),
    ];
    for (const predicate of predicates) {
      expect(evaluatePredicate(predicate, {})).toBe(false);
    }
  });

  it('equality compares kind and value without coercion', () => {
    expect(evaluatePredicate(param('status').eq('active'), { status: 'active' })).toBe(true);
    expect(evaluatePredicate(param('count').eq(1), { count: '1' })).toBe(false);
    expect(evaluatePredicate(param('flag').eq(true), { flag: 1 })).toBe(false);
    expect(evaluatePredicate(param('v').eq(null), { v: null })).toBe(true);
  });

  it('membership requires a scalar member of the list', () => {
    const predicate = param('currency').oneOf(['usd', 'eur']);
    expect(evaluatePredicate(predicate, { currency: 'usd' })).toBe(true);
    expect(evaluatePredicate(predicate, { currency: 'gbp' })).toBe(false);
    expect(evaluatePredicate(predicate, { currency: ['usd'] })).toBe(false);
  });

  it('prefix test requires a string argument', () => {
    const predicate = param('path').startsWith('/api/v2/');
    expect(evaluatePredicate(predicate, { path: '/api/v2/users' })).toBe(true);
    expect(evaluatePredicate(predicate, { path: '/api/v1/users' })).toBe(false);
    expect(evaluatePredicate(predicate, { path: 42 })).toBe(false);
  });
});

describe('ParamBuilder', () => {
  it('produces frozen predicates', () => {
    const predicate = param('currency').oneOf(['usd']);
    expect(Object.isFrozen(predicate)).toBe(true);
    expect(Object.isFrozen(predicate.value)).toBe(true);
    expect(predicate).toEqual({ param: 'currency', op: 'in', value: ['usd'] });
  });
});

describe('predicateFromSpec', () => {
  it('round-trips through the declarative form', () => {
    const spec = { param: 'amount', op: '<=' as const, value: 1000 };
    expect(predicateToSpec(predicateFromSpec(spec))).toEqual(spec);
  });

  it('rejects a numeric operator with a string operand', () => {
    expect(() => predicateFromSpec({ param: 'amount', op: '<=', value: 'lots' })).toThrow(ZodError);
  });

  it('rejects membership without a list', () => {
    expect(() => predicateFromSpec({ param: 'currency', op: 'in', value: 'usd' })).toThrow(ZodError);
  });

  it('rejects a non-string prefix', () => {
    expect(() => predicateFromSpec({ param: 'path', op: 'starts_with', value: 1 })).toThrow(ZodError);
  });
});

describe('ConstraintSet', () => {
  it('empty set is vacuously true', () => {
    const set = new ConstraintSet();
    expect(set.isEmpty()).toBe(true);
    expect(set.evaluate({})).toBe(true);
  });

  it('requires every predicate to hold', () => {
    const set = new ConstraintSet([param('amount').gte(100), param('amount').lte(10000)]);
    expect(set.evaluate({ amount: 500 })).toBe(true);
    expect(set.evaluate({ amount: 50 })).toBe(false);
    expect(set.evaluate({ amount: 50000 })).toBe(false);
  });

  it('reports the first failing predicate in declaration order', () => {
    const first = param('amount').lte(1000);
    const second = param('currency').oneOf(['usd']);
    const set = new ConstraintSet([first, second]);
    expect(set.firstViolation({ amount: 5000, currency: 'gbp' })).toBe(first);
    expect(set.firstViolation({ amount: 5, currency: 'gbp' })).toBe(second);
    expect(set.firstViolation({ amount: 5, currency: 'usd' })).toBeNull();
  });
});
