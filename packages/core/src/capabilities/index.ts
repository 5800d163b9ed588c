export {
  matchesPattern,
  validatePattern,
  patternIsSubset,
  splitSegments,
  SINGLE_WILDCARD,
  MULTI_WILDCARD,
} from './pattern.js';
export {
  ConstraintSet,
  ParamBuilder,
  param,
  classifyArg,
  ownArg,
  evaluatePredicate,
  predicateFromSpec,
  predicateToSpec,
  type Predicate,
  type CallArgs,
  type ArgValue,
} from './constraints.js';
export {
  parseConstraintShorthand,
  type ConstraintShorthand,
  type ShorthandValue,
} from './shorthand.js';
export {
  CapabilityTable,
  MethodCapability,
  type MethodCapabilityOptions,
  type AuthorizationGrant,
  type AuthorizationResult,
  type CapabilityUsage,
  type CapabilityTableDeps,
} from './table.js';
export {
  CapabilityError,
  NoMatchingRuleError,
  ConstraintViolationError,
  QuotaExceededError,
  PatternConfigError,
  ConstraintConfigError,
  type CapabilityErrorCode,
} from './errors.js';
