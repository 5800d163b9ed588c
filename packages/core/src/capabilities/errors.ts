/**
 * Capability errors.
 *
 * Denials (`CapabilityError` subclasses) are delivered to the guest as failed
 * call outcomes. `PatternConfigError` is raised while building a table and is
 * fatal to startup.
 */

import type { ErrorPayload } from '../protocol/types.js';
import type { Predicate } from './constraints.js';

export type CapabilityErrorCode = 'NO_MATCHING_RULE' | 'CONSTRAINT_VIOLATION' | 'QUOTA_EXCEEDED';

export abstract class CapabilityError extends Error {
  abstract readonly code: CapabilityErrorCode;
  public readonly method: string;

  protected constructor(message: string, method: string) {
    super(message);
    this.method = method;
  }

  protected abstract details(): Record<string, unknown>;

  toPayload(): ErrorPayload {
    return { code: this.code, message: this.message, details: this.details() };
  }
}

export class NoMatchingRuleError extends CapabilityError {
  readonly code = 'NO_MATCHING_RULE';

  constructor(method: string) {
    super(`No capability allows calling ${method}`, method);
    this.name = 'NoMatchingRuleError';
  }

  protected details(): Record<string, unknown> {
    return { method: this.method };
  }
}

export class ConstraintViolationError extends CapabilityError {
  readonly code = 'CONSTRAINT_VIOLATION';
  public readonly pattern: string;
  public readonly predicate: Predicate;
  public readonly attemptedValue: unknown;

  constructor(method: string, pattern: string, predicate: Predicate, attemptedValue: unknown) {
    super(
      `Constraint violated for ${method}: ${predicate.param} ${predicate.op} ${JSON.stringify(predicate.value)}`,
      method
    );
    this.name = 'ConstraintViolationError';
    this.pattern = pattern;
    this.predicate = predicate;
    this.attemptedValue = attemptedValue;
  }

  get parameter(): string {
    return this.predicate.param;
  }

  protected details(): Record<string, unknown> {
    return {
      method: this.method,
      pattern: this.pattern,
      param: this.predicate.param,
      operator: this.predicate.op,
      expected: this.predicate.value,
      attemptedValue: this.attemptedValue,
    };
  }
}

export class QuotaExceededError extends CapabilityError {
  readonly code = 'QUOTA_EXCEEDED';
  public readonly pattern: string;
  public readonly maxCalls: number;

  constructor(method: string, pattern: string, maxCalls: number) {
    super(`Call quota exhausted for ${pattern} (max ${maxCalls})`, method);
    this.name = 'QuotaExceededError';
    this.pattern = pattern;
    this.maxCalls = maxCalls;
  }

  protected details(): Record<string, unknown> {
    return { method: this.method, pattern: this.pattern, maxCalls: this.maxCalls };
  }
}

/**
 * Malformed capability pattern (e.g. `**` before the last segment).
 */
export class PatternConfigError extends Error {
  readonly code = 'PATTERN_CONFIG';
  public readonly pattern: string;
  public readonly reason: string;

  constructor(pattern: string, reason: string) {
    super(`Invalid capability pattern "${pattern}": ${reason}`);
    this.name = 'PatternConfigError';
    this.pattern = pattern;
    this.reason = reason;
  }
}

/**
 * Constraint shorthand that cannot be turned into a predicate.
 */
export class ConstraintConfigError extends Error {
  readonly code = 'CONSTRAINT_CONFIG';
  public readonly param: string;

  constructor(param: string, reason: string) {
    super(`Invalid constraint for "${param}": ${reason}`);
    this.name = 'ConstraintConfigError';
    this.param = param;
  }
}
