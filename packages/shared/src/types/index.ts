/**
 * Shared Types - Main Export
 *
 * Re-exports all shared types for convenient importing
 */

// Capability types
export {
  PredicateOperator,
  PredicateOperatorSchema,
  NUMERIC_OPERATORS,
  ScalarSchema,
  PredicateSchema,
  CapabilitySpecSchema,
  CapabilitySpecListSchema,
  type Scalar,
  type PredicateSpec,
  type CapabilitySpec,
  type CapabilitySpecInput,
} from './capability.js';

// Audit types
export {
  AuditEventType,
  AuditEventTypeSchema,
  AuditEntrySchema,
  type AuditEntry,
} from './audit.js';

// Config types
export {
  LoggingConfigSchema,
  SandboxConfigSchema,
  AuditConfigSchema,
  ConfigSchema,
  PartialConfigSchema,
  type LoggingConfig,
  type SandboxConfig,
  type SandboxConfigInput,
  type AuditConfig,
  type AuditConfigInput,
  type Config,
  type PartialConfig,
} from './config.js';
