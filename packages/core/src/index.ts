/**
 * @toolgate/core
 *
 * Capability enforcement and host/guest execution protocol for running
 * guest scripts whose every side effect is mediated by the host.
 */

// Sandbox facade
export * from './sandbox/index.js';

// Capabilities
export * from './capabilities/index.js';

// Protocol
export * from './protocol/index.js';

// Session state
export * from './session/index.js';

// Configuration
export {
  loadConfig,
  loadConfigFile,
  loadEnvConfig,
  mergeConfigs,
  DEFAULT_CONFIG_PATHS,
  type LoadConfigOptions,
} from './config/loader.js';

// Logging
export {
  createLogger,
  createNoopLogger,
  initializeLogger,
  getLogger,
  isLoggerInitialized,
  resolveLogger,
  type SecureLogger,
  type LogContext,
  type LogLevel,
} from './logging/logger.js';

export { AuditCollector, type AuditCollectorOptions, type AuditFilter } from './logging/audit.js';

// Utilities
export { toErrorMessage, errorName } from './utils/errors.js';
export { hashArgs, sha256, stableStringify, uuidv7, sanitizeForLogging } from './utils/crypto.js';

// Shared schemas
export * from '@toolgate/shared';
