/**
 * Capability Table for Toolgate
 *
 * Security considerations:
 * - Deny by default - a method no capability matches is rejected
 * - First match wins: capabilities are tried in declaration order and the
 *   first one whose pattern matches is the only one evaluated. Put narrow,
 *   constrained rules before broad ones.
 * - Constraint failures never consume quota
 * - Quota check and increment happen in one synchronous section, so
 *   concurrent async callers can never be granted more than maxCalls
 * - One table per session; no process-wide counters
 * - Each pattern may be declared once, so capability keys are unique
 */

import {
  CapabilitySpecSchema,
  type CapabilitySpec,
  type CapabilitySpecInput,
} from '@toolgate/shared';
import { resolveLogger, type SecureLogger } from '../logging/logger.js';
import {
  ConstraintSet,
  ownArg,
  predicateFromSpec,
  predicateToSpec,
  type CallArgs,
  type Predicate,
} from './constraints.js';
import {
  ConstraintViolationError,
  NoMatchingRuleError,
  PatternConfigError,
  QuotaExceededError,
  type CapabilityError,
} from './errors.js';
import { matchesPattern, validatePattern } from './pattern.js';

export interface MethodCapabilityOptions {
  constraints?: ConstraintSet | readonly Predicate[];
  maxCalls?: number;
}

/**
 * One authorization rule. Immutable; call counters live in the table.
 */
export class MethodCapability {
  readonly pattern: string;
  readonly constraints: ConstraintSet;
  readonly maxCalls: number | undefined;

  constructor(pattern: string, options: MethodCapabilityOptions = {}) {
    validatePattern(pattern);
    if (
      options.maxCalls !== undefined &&
      (!Number.isInteger(options.maxCalls) || options.maxCalls < 0)
    ) {
      throw new RangeError(`maxCalls for "${pattern}" must be a non-negative integer`);
    }
    this.pattern = pattern;
    this.constraints =
      options.constraints instanceof ConstraintSet
        ? options.constraints
        : new ConstraintSet(options.constraints);
    this.maxCalls = options.maxCalls;
  }

  static fromSpec(input: CapabilitySpecInput): MethodCapability {
    const spec = CapabilitySpecSchema.parse(input);
    return new MethodCapability(spec.pattern, {
      constraints: spec.constraints.map(predicateFromSpec),
      maxCalls: spec.maxCalls,
    });
  }

  /** Stable identifier used for quota introspection. */
  key(): string {
    return `cap:method:${this.pattern}`;
  }

  matches(method: string): boolean {
    return matchesPattern(this.pattern, method);
  }

  toSpec(): CapabilitySpec {
    const spec: CapabilitySpec = {
      pattern: this.pattern,
      constraints: this.constraints.predicates.map(predicateToSpec),
    };
    if (this.maxCalls !== undefined) {
      spec.maxCalls = this.maxCalls;
    }
    return spec;
  }
}

export interface AuthorizationGrant {
  capabilityKey: string;
  pattern: string;
  method: string;
  callsUsed: number;
  /** Calls left after this grant; null when the capability is unbounded. */
  remaining: number | null;
  grantedAt: number;
}

export type AuthorizationResult =
  | { granted: true; grant: AuthorizationGrant }
  | { granted: false; error: CapabilityError };

export interface CapabilityUsage {
  key: string;
  pattern: string;
  callsUsed: number;
  maxCalls: number | null;
}

export interface CapabilityTableDeps {
  logger?: SecureLogger;
}

interface CapabilityEntry {
  readonly capability: MethodCapability;
  callsUsed: number;
}

type Evaluation = { entry: CapabilityEntry } | { error: CapabilityError };

function remainingFor(entry: CapabilityEntry): number | null {
  const { maxCalls } = entry.capability;
  return maxCalls === undefined ? null : Math.max(0, maxCalls - entry.callsUsed);
}

export class CapabilityTable {
  private readonly entries: readonly CapabilityEntry[];
  private readonly logger: SecureLogger;

  constructor(
    capabilities: readonly (MethodCapability | CapabilitySpecInput)[],
    deps: CapabilityTableDeps = {}
  ) {
    const seen = new Set<string>();
    this.entries = capabilities.map((cap) => {
      const capability = cap instanceof MethodCapability ? cap : MethodCapability.fromSpec(cap);
      if (seen.has(capability.pattern)) {
        throw new PatternConfigError(capability.pattern, 'pattern is declared more than once');
      }
      seen.add(capability.pattern);
      return { capability, callsUsed: 0 };
    });
    this.logger = resolveLogger('CapabilityTable', deps.logger);
  }

  /**
   * Authorize a call and consume one unit of quota on success.
   * Never performs the call itself.
   */
  authorize(method: string, args: CallArgs = {}): AuthorizationResult {
    const evaluation = this.evaluate(method, args);
    if ('error' in evaluation) {
      this.logDecision(method, false, evaluation.error);
      return { granted: false, error: evaluation.error };
    }

    const { entry } = evaluation;
    entry.callsUsed += 1;

    const grant: AuthorizationGrant = {
      capabilityKey: entry.capability.key(),
      pattern: entry.capability.pattern,
      method,
      callsUsed: entry.callsUsed,
      remaining: remainingFor(entry),
      grantedAt: Date.now(),
    };
    this.logDecision(method, true);
    return { granted: true, grant };
  }

  /**
   * Authorize or throw the CapabilityError describing the denial.
   */
  requireAuthorization(method: string, args: CallArgs = {}): AuthorizationGrant {
    const result = this.authorize(method, args);
    if (!result.granted) {
      throw result.error;
    }
    return result.grant;
  }

  /**
   * Dry run: would `authorize` grant this call right now? Consumes nothing.
   */
  check(method: string, args: CallArgs = {}): CapabilityError | null {
    const evaluation = this.evaluate(method, args);
    return 'error' in evaluation ? evaluation.error : null;
  }

  canCall(method: string, args: CallArgs = {}): boolean {
    return this.check(method, args) === null;
  }

  /**
   * Remaining calls for a capability key; null when unbounded.
   */
  getRemainingCalls(key: string): number | null {
    const entry = this.entries.find((e) => e.capability.key() === key);
    if (!entry) {
      throw new RangeError(`Unknown capability key: ${key}`);
    }
    return remainingFor(entry);
  }

  /**
   * Remaining calls for every capped capability, keyed by capability key.
   */
  getCallCounts(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const entry of this.entries) {
      const remaining = remainingFor(entry);
      if (remaining !== null) {
        counts[entry.capability.key()] = remaining;
      }
    }
    return counts;
  }

  getUsage(): CapabilityUsage[] {
    return this.entries.map((entry) => ({
      key: entry.capability.key(),
      pattern: entry.capability.pattern,
      callsUsed: entry.callsUsed,
      maxCalls: entry.capability.maxCalls ?? null,
    }));
  }

  getCapabilities(): readonly MethodCapability[] {
    return this.entries.map((entry) => entry.capability);
  }

  toSpecs(): CapabilitySpec[] {
    return this.entries.map((entry) => entry.capability.toSpec());
  }

  private evaluate(method: string, args: CallArgs): Evaluation {
    const entry = this.entries.find((e) => e.capability.matches(method));
    if (!entry) {
      return { error: new NoMatchingRuleError(method) };
    }

    const { capability } = entry;
    const violated = capability.constraints.firstViolation(args);
    if (violated) {
      return {
        error: new ConstraintViolationError(
          method,
          capability.pattern,
          violated,
          ownArg(args, violated.param)
        ),
      };
    }

    if (capability.maxCalls !== undefined && entry.callsUsed >= capability.maxCalls) {
      return { error: new QuotaExceededError(method, capability.pattern, capability.maxCalls) };
    }

    return { entry };
  }

  private logDecision(method: string, granted: boolean, error?: CapabilityError): void {
    if (granted) {
      this.logger.debug('Capability granted', { method, granted });
      return;
    }
    this.logger.info('Capability denied', {
      method,
      granted,
      code: error?.code,
      reason: error?.message,
    });
  }
}
