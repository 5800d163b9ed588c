/**
 * Constraint evaluation for capability rules.
 *
 * Arguments are first classified into a tagged value so every operator is a
 * total function: a missing parameter or a value of the wrong kind fails the
 * predicate, it is never treated as permissive.
 */

import {
  PredicateSchema,
  type PredicateOperator,
  type PredicateSpec,
  type Scalar,
} from '@toolgate/shared';

export interface Predicate {
  readonly param: string;
  readonly op: PredicateOperator;
  readonly value: Scalar | readonly Scalar[];
}

export type CallArgs = Readonly<Record<string, unknown>>;

export type ArgValue =
  | { kind: 'number'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'bool'; value: boolean }
  | { kind: 'null' }
  | { kind: 'list'; items: readonly unknown[] }
  | { kind: 'object' }
  | { kind: 'missing' };

/**
 * Own-property read of one argument. Inherited properties and arguments that
 * are not an object read as undefined.
 */
export function ownArg(args: unknown, param: string): unknown {
  if (typeof args !== 'object' || args === null || Array.isArray(args)) {
    return undefined;
  }
  if (!Object.prototype.hasOwnProperty.call(args, param)) {
    return undefined;
  }
  return Reflect.get(args, param);
}

export function classifyArg(args: CallArgs, param: string): ArgValue {
  const value = ownArg(args, param);
  if (value === undefined) return { kind: 'missing' };
  if (value === null) return { kind: 'null' };
  if (typeof value === 'number') return { kind: 'number', value };
  if (typeof value === 'string') return { kind: 'string', value };
  if (typeof value === 'boolean') return { kind: 'bool', value };
  if (Array.isArray(value)) return { kind: 'list', items: value };
  return { kind: 'object' };
}

function scalarEquals(arg: ArgValue, operand: Scalar): boolean {
  switch (arg.kind) {
    case 'number':
      return typeof operand === 'number' && arg.value === operand;
    case 'string':
      return typeof operand === 'string' && arg.value === operand;
    case 'bool':
      return typeof operand === 'boolean' && arg.value === operand;
    case 'null':
      return operand === null;
    default:
      return false;
  }
}

function compareNumbers(op: PredicateOperator, actual: number, bound: number): boolean {
  if (Number.isNaN(actual) || Number.isNaN(bound)) return false;
  switch (op) {
    case '>=':
      return actual >= bound;
    case '<=':
      return actual <= bound;
    case '>':
      return actual > bound;
    case '<':
      return actual < bound;
    default:
      return false;
  }
}

/**
 * Evaluate one predicate against call arguments. Never throws.
 */
export function evaluatePredicate(predicate: Predicate, args: CallArgs): boolean {
  const arg = classifyArg(args, predicate.param);
  const operand = predicate.value;

  switch (predicate.op) {
    case '>=':
    case '<=':
    case '>':
    case '<':
      return arg.kind === 'number' && typeof operand === 'number'
        ? compareNumbers(predicate.op, arg.value, operand)
        : false;
    case '==':
      return !isScalarList(operand) && scalarEquals(arg, operand);
    case 'in':
      return isScalarList(operand) && operand.some((member) => scalarEquals(arg, member));
    case 'starts_with':
      return arg.kind === 'string' && typeof operand === 'string' && arg.value.startsWith(operand);
    default:
      return false;
  }
}

function isScalarList(value: Scalar | readonly Scalar[]): value is readonly Scalar[] {
  return Array.isArray(value);
}

function freezePredicate(param: string, op: PredicateOperator, value: Scalar | readonly Scalar[]): Predicate {
  const frozenValue = isScalarList(value) ? Object.freeze([...value]) : value;
  return Object.freeze({ param, op, value: frozenValue });
}

/**
 * Fluent predicate builder: `param('amount').lte(1000)`.
 */
export class ParamBuilder {
  constructor(private readonly name: string) {}

  gte(bound: number): Predicate {
    return freezePredicate(this.name, '>=', bound);
  }

  lte(bound: number): Predicate {
    return freezePredicate(this.name, '<=', bound);
  }

  gt(bound: number): Predicate {
    return freezePredicate(this.name, '>', bound);
  }

  lt(bound: number): Predicate {
    return freezePredicate(this.name, '<', bound);
  }

  eq(value: Scalar): Predicate {
    return freezePredicate(this.name, '==', value);
  }

  oneOf(values: readonly Scalar[]): Predicate {
    return freezePredicate(this.name, 'in', values);
  }

  startsWith(prefix: string): Predicate {
    return freezePredicate(this.name, 'starts_with', prefix);
  }
}

export function param(name: string): ParamBuilder {
  return new ParamBuilder(name);
}

/**
 * Validate a declarative predicate and turn it into an immutable Predicate.
 * Throws a ZodError for malformed input.
 */
export function predicateFromSpec(spec: PredicateSpec): Predicate {
  const parsed = PredicateSchema.parse(spec);
  return freezePredicate(parsed.param, parsed.op, parsed.value);
}

export function predicateToSpec(predicate: Predicate): PredicateSpec {
  const value = isScalarList(predicate.value) ? [...predicate.value] : predicate.value;
  return { param: predicate.param, op: predicate.op, value };
}

/**
 * Ordered predicates combined with logical AND. An empty set always holds.
 */
export class ConstraintSet {
  readonly predicates: readonly Predicate[];

  constructor(predicates: readonly Predicate[] = []) {
    this.predicates = Object.freeze([...predicates]);
  }

  get size(): number {
    return this.predicates.length;
  }

  isEmpty(): boolean {
    return this.predicates.length === 0;
  }

  /** First predicate (in declaration order) that does not hold, or null. */
  firstViolation(args: CallArgs): Predicate | null {
    for (const predicate of this.predicates) {
      if (!evaluatePredicate(predicate, args)) {
        return predicate;
      }
    }
    return null;
  }

  evaluate(args: CallArgs): boolean {
    return this.firstViolation(args) === null;
  }
}
