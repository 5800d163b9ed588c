/**
 * Secure Logger for Toolgate
 *
 * Security considerations:
 * - Automatic secret redaction in log output
 * - Structured JSON format for machine parsing
 * - Session and task IDs propagated through child loggers
 * - No console.log - all host output goes through pino
 */

import pino, { type Logger as PinoLogger, type LoggerOptions, type DestinationStream } from 'pino';
import { sanitizeForLogging } from '../utils/crypto.js';
import type { LoggingConfig } from '@toolgate/shared';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

export interface LogContext {
  sessionId?: string;
  taskId?: number;
  requestId?: number;
  component?: string;
  [key: string]: unknown;
}

export interface SecureLogger {
  trace(msg: string, context?: LogContext): void;
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(context: LogContext): SecureLogger;
  level: LogLevel;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Create pino logger options from config
 */
function createPinoOptions(config: LoggingConfig): LoggerOptions {
  return {
    level: config.level,
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        pid: bindings.pid,
        hostname: bindings.hostname,
        name: 'toolgate',
      }),
    },
    redact: {
      paths: [
        'password',
        'secret',
        'token',
        'apiKey',
        'api_key',
        'authorization',
        '*.password',
        '*.secret',
        '*.token',
        '*.apiKey',
        '*.api_key',
      ],
      censor: '[REDACTED]',
    },
  };
}

/**
 * Create transport configuration based on output settings.
 *
 * JSON stdout is written by pino(options) directly; only pretty stdout and
 * file outputs need a worker transport.
 */
function createTransport(
  config: LoggingConfig
): pino.TransportMultiOptions | pino.TransportSingleOptions | undefined {
  const targets: pino.TransportTargetOptions[] = [];

  for (const output of config.output) {
    if (output.type === 'stdout') {
      if (output.format === 'pretty') {
        targets.push({
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
          level: config.level,
        });
      }
    } else {
      targets.push({
        target: 'pino/file',
        options: {
          destination: output.path,
          mkdir: true,
        },
        level: config.level,
      });
    }
  }

  if (targets.length === 0) {
    return undefined;
  }

  if (targets.length === 1) {
    return targets[0];
  }

  return { targets };
}

/**
 * Wrapper around pino that adds security features
 */
class SecureLoggerImpl implements SecureLogger {
  private readonly pino: PinoLogger;
  private readonly defaultContext: LogContext;

  constructor(pinoLogger: PinoLogger, defaultContext: LogContext = {}) {
    this.pino = pinoLogger;
    this.defaultContext = defaultContext;
  }

  get level(): LogLevel {
    const level = this.pino.level;
    return isLogLevel(level) ? level : 'info';
  }

  private sanitizeContext(context?: LogContext): Record<string, unknown> {
    const merged = { ...this.defaultContext, ...context };
    const sanitized = sanitizeForLogging(merged);
    return typeof sanitized === 'object' && sanitized !== null ? { ...sanitized } : {};
  }

  trace(msg: string, context?: LogContext): void {
    this.pino.trace(this.sanitizeContext(context), msg);
  }

  debug(msg: string, context?: LogContext): void {
    this.pino.debug(this.sanitizeContext(context), msg);
  }

  info(msg: string, context?: LogContext): void {
    this.pino.info(this.sanitizeContext(context), msg);
  }

  warn(msg: string, context?: LogContext): void {
    this.pino.warn(this.sanitizeContext(context), msg);
  }

  error(msg: string, context?: LogContext): void {
    this.pino.error(this.sanitizeContext(context), msg);
  }

  fatal(msg: string, context?: LogContext): void {
    this.pino.fatal(this.sanitizeContext(context), msg);
  }

  child(context: LogContext): SecureLogger {
    const mergedContext = { ...this.defaultContext, ...context };
    return new SecureLoggerImpl(this.pino.child({}), mergedContext);
  }
}

/**
 * Create a secure logger instance.
 *
 * An explicit `destination` bypasses the configured outputs; tests use it to
 * capture log lines in memory.
 */
export function createLogger(config: LoggingConfig, destination?: DestinationStream): SecureLogger {
  const options = createPinoOptions(config);

  if (destination) {
    return new SecureLoggerImpl(pino(options, destination));
  }

  const transport = createTransport(config);
  const pinoLogger = transport ? pino(options, pino.transport(transport)) : pino(options);

  return new SecureLoggerImpl(pinoLogger);
}

/**
 * Global logger instance (set during initialization)
 */
let globalLogger: SecureLogger | null = null;

/**
 * Initialize the global logger
 */
export function initializeLogger(config: LoggingConfig): SecureLogger {
  globalLogger = createLogger(config);
  return globalLogger;
}

/**
 * Get the global logger instance
 * Throws if not initialized
 */
export function getLogger(): SecureLogger {
  if (!globalLogger) {
    throw new Error('Logger not initialized. Call initializeLogger() first.');
  }
  return globalLogger;
}

/**
 * Check if logger is initialized
 */
export function isLoggerInitialized(): boolean {
  return globalLogger !== null;
}

/**
 * Resolve a component logger: the injected one, else a child of the global
 * logger, else a no-op logger when logging was never initialized.
 */
export function resolveLogger(component: string, injected?: SecureLogger): SecureLogger {
  if (injected) return injected.child({ component });
  if (globalLogger) return globalLogger.child({ component });
  return createNoopLogger();
}

/**
 * Create a no-op logger that silently discards all messages.
 */
export function createNoopLogger(): SecureLogger {
  const noop: SecureLogger = {
    trace: () => {},
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    fatal: () => {},
    child: () => noop,
    level: 'info',
  };
  return noop;
}
