/**
 * Configuration Loader for Toolgate
 *
 * Security considerations:
 * - Config files are validated against strict schemas
 * - Limits have maximum bounds; defaults are restrictive
 * - VFS roots must be absolute and may not contain ".." segments
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { ConfigSchema, PartialConfigSchema, type Config, type PartialConfig } from '@toolgate/shared';
import { toErrorMessage } from '../utils/errors.js';

// Default config file locations (checked in order)
export const DEFAULT_CONFIG_PATHS = [
  './toolgate.yaml',
  './toolgate.yml',
  './config/toolgate.yaml',
  '~/.toolgate/config.yaml',
  '/etc/toolgate/config.yaml',
];

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Expand ~ to home directory
 */
function expandPath(path: string): string {
  if (path.startsWith('~/')) {
    return resolve(homedir(), path.slice(2));
  }
  return resolve(path);
}

/**
 * Load configuration from a YAML file
 */
export function loadConfigFile(path: string): PartialConfig | null {
  const expandedPath = expandPath(path);

  if (!existsSync(expandedPath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(expandedPath, 'utf-8'));
  } catch (error) {
    throw new Error(`Failed to load config from ${expandedPath}: ${toErrorMessage(error)}`);
  }

  // An empty file parses to null
  const result = PartialConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new Error(`Invalid configuration in ${expandedPath}: ${result.error.message}`);
  }
  return result.data;
}

function readInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

function readBool(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  if (['1', 'true', 'yes'].includes(value.toLowerCase())) return true;
  if (['0', 'false', 'no'].includes(value.toLowerCase())) return false;
  return undefined;
}

function compact(section: ConfigRecord): ConfigRecord | undefined {
  const entries = Object.entries(section).filter(([, value]) => value !== undefined);
  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
}

/**
 * Load configuration from TOOLGATE_* environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigRecord {
  const config: ConfigRecord = {};

  const logging = compact({ level: env.TOOLGATE_LOG_LEVEL });
  if (logging) config.logging = logging;

  const vfs = compact({ maxFileBytes: readInt(env.TOOLGATE_MAX_FILE_BYTES) });
  const sandbox = compact({
    executionTimeoutMs: readInt(env.TOOLGATE_EXECUTION_TIMEOUT_MS),
    maxSleepMs: readInt(env.TOOLGATE_MAX_SLEEP_MS),
    vfs,
  });
  if (sandbox) config.sandbox = sandbox;

  const audit = compact({
    enabled: readBool(env.TOOLGATE_AUDIT_ENABLED),
    outputPath: env.TOOLGATE_AUDIT_PATH,
    agentId: env.TOOLGATE_AGENT_ID,
  });
  if (audit) config.audit = audit;

  return config;
}

/**
 * Deep merge two config objects
 * Later values override earlier ones; arrays are replaced, not merged
 */
export function mergeConfigs(base: ConfigRecord, override: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const baseValue = result[key];
    result[key] = isRecord(value) && isRecord(baseValue) ? mergeConfigs(baseValue, value) : value;
  }

  return result;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Override config values */
  overrides?: PartialConfig;
  /** Skip environment variable loading */
  skipEnv?: boolean;
  /** Skip auto-discovery of config files */
  skipDiscovery?: boolean;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load and validate configuration
 *
 * Loading order (later overrides earlier):
 * 1. Default values from schema
 * 2. Config file (explicit path or auto-discovered)
 * 3. Environment variables
 * 4. Programmatic overrides
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  let fileConfig: PartialConfig = {};

  if (options.configPath) {
    const loaded = loadConfigFile(options.configPath);
    if (!loaded) {
      throw new Error(`Config file not found: ${options.configPath}`);
    }
    fileConfig = loaded;
  } else if (!options.skipDiscovery) {
    for (const path of DEFAULT_CONFIG_PATHS) {
      const loaded = loadConfigFile(path);
      if (loaded) {
        fileConfig = loaded;
        break;
      }
    }
  }

  const envConfig = options.skipEnv ? {} : loadEnvConfig(options.env);

  let mergedConfig = mergeConfigs(fileConfig, envConfig);
  if (options.overrides) {
    mergedConfig = mergeConfigs(mergedConfig, options.overrides);
  }

  // Validate and apply defaults
  const result = ConfigSchema.safeParse(mergedConfig);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `  ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Invalid configuration:\n${errors}`);
  }

  return result.data;
}
