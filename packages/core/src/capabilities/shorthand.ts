/**
 * Shorthand constraint syntax for per-tool configuration:
 *
 *   { amount: '<=1000', currency: ['usd', 'eur'], path: 'startswith:/api/', retries: 3 }
 *
 * - `"<=N"`, `">=N"`, `"<N"`, `">N"`, `"==N"` become numeric comparisons
 * - a list becomes an `in` membership test
 * - `"startswith:PREFIX"` becomes a prefix test
 * - a bare number or boolean becomes an equality test
 *
 * Unrecognised entries throw ConstraintConfigError.
 */

import type { Scalar } from '@toolgate/shared';
import { ConstraintSet, param, type Predicate } from './constraints.js';
import { ConstraintConfigError } from './errors.js';

export type ShorthandValue = string | number | boolean | readonly Scalar[];
export type ConstraintShorthand = Readonly<Record<string, ShorthandValue>>;

const STARTS_WITH_PREFIX = 'startswith:';

// Longest operators first so "<=" is not read as "<"
const COMPARISON_PREFIXES = ['<=', '>=', '==', '<', '>'] as const;

function parseNumber(name: string, text: string): number {
  const trimmed = text.trim();
  const value = trimmed.length > 0 ? Number(trimmed) : Number.NaN;
  if (!Number.isFinite(value)) {
    throw new ConstraintConfigError(name, `"${text}" is not a number`);
  }
  return value;
}

function parseString(name: string, spec: string): Predicate {
  if (spec.startsWith(STARTS_WITH_PREFIX)) {
    return param(name).startsWith(spec.slice(STARTS_WITH_PREFIX.length));
  }

  for (const prefix of COMPARISON_PREFIXES) {
    if (!spec.startsWith(prefix)) continue;
    const bound = parseNumber(name, spec.slice(prefix.length));
    const builder = param(name);
    switch (prefix) {
      case '<=':
        return builder.lte(bound);
      case '>=':
        return builder.gte(bound);
      case '==':
        return builder.eq(bound);
      case '<':
        return builder.lt(bound);
      case '>':
        return builder.gt(bound);
    }
  }

  throw new ConstraintConfigError(name, `unrecognised constraint "${spec}"`);
}

export function parseConstraintShorthand(spec: ConstraintShorthand): ConstraintSet {
  const predicates: Predicate[] = [];

  for (const [name, value] of Object.entries(spec)) {
    if (typeof value === 'string') {
      predicates.push(parseString(name, value));
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      predicates.push(param(name).eq(value));
    } else {
      predicates.push(param(name).oneOf(value));
    }
  }

  return new ConstraintSet(predicates);
}
