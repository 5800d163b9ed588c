import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { stringify as stringifyYaml } from 'yaml';
import { initializeLogger } from '../logging/logger.js';
import { loadConfig, loadEnvConfig, mergeConfigs } from './loader.js';

describe('loadConfig', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'toolgate-config-'));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should load default configuration when no file or env vars are set', () => {
    const config = loadConfig({ skipEnv: true, skipDiscovery: true });

    expect(config.logging.level).toBe('info');
    expect(config.sandbox).toEqual({
      executionTimeoutMs: 30_000,
      maxSleepMs: 10_000,
      vfs: { writableRoots: ['/workspace', '/tmp'], maxFileBytes: 10_485_760 },
    });
    expect(config.audit.enabled).toBe(true);
    expect(config.logging.output).toEqual([{ type: 'stdout', format: 'json' }]);
  });

  it('should read a YAML file and keep defaults for missing fields', () => {
    const configPath = join(tmpDir, 'toolgate.yaml');
    writeFileSync(
      configPath,
      stringifyYaml({ sandbox: { maxSleepMs: 500, vfs: { writableRoots: ['/data'] } } })
    );

    const config = loadConfig({ configPath, skipEnv: true });

    expect(config.sandbox.maxSleepMs).toBe(500);
    expect(config.sandbox.executionTimeoutMs).toBe(30_000);
    expect(config.sandbox.vfs.writableRoots).toEqual(['/data']);
  });

  it('should treat an empty file as no settings', () => {
    const configPath = join(tmpDir, 'empty.yaml');
    writeFileSync(configPath, '');
    expect(loadConfig({ configPath, skipEnv: true })).toEqual(
      loadConfig({ skipEnv: true, skipDiscovery: true })
    );
  });

  it('should throw when an explicit config file is missing', () => {
    expect(() => loadConfig({ configPath: join(tmpDir, 'missing.yaml'), skipEnv: true })).toThrow(
      'Config file not found'
    );
  });

  it('should reject invalid values in the file', () => {
    const configPath = join(tmpDir, 'bad.yaml');
    writeFileSync(configPath, stringifyYaml({ sandbox: { vfs: { writableRoots: ['relative/dir'] } } }));
    expect(() => loadConfig({ configPath, skipEnv: true })).toThrow('Invalid configuration in');
  });

  it('should layer env vars over the file and overrides over both', () => {
    const configPath = join(tmpDir, 'toolgate.yaml');
    writeFileSync(configPath, stringifyYaml({ sandbox: { maxSleepMs: 500, executionTimeoutMs: 1000 } }));

    const config = loadConfig({
      configPath,
      env: { TOOLGATE_MAX_SLEEP_MS: '750', TOOLGATE_EXECUTION_TIMEOUT_MS: '2000' },
      overrides: { sandbox: { executionTimeoutMs: 5000 } },
    });

    expect(config.sandbox.maxSleepMs).toBe(750);
    expect(config.sandbox.executionTimeoutMs).toBe(5000);
  });

  it('should configure the logger from the logging section', () => {
    const config = loadConfig({ skipDiscovery: true, env: { TOOLGATE_LOG_LEVEL: 'warn' } });
    expect(initializeLogger(config.logging).level).toBe('warn');
  });

  it('should report schema violations with their paths', () => {
    expect(() =>
      loadConfig({ skipEnv: true, skipDiscovery: true, overrides: { sandbox: { maxSleepMs: -1 } } })
    ).toThrow(/Invalid configuration:\n {2}sandbox\.maxSleepMs: /);
  });
});

describe('loadEnvConfig', () => {
  it('should map TOOLGATE_* variables to config sections', () => {
    expect(
      loadEnvConfig({
        TOOLGATE_LOG_LEVEL: 'warn',
        TOOLGATE_MAX_FILE_BYTES: '1024',
        TOOLGATE_AUDIT_ENABLED: 'false',
        TOOLGATE_AGENT_ID: 'agent-7',
      })
    ).toEqual({
      logging: { level: 'warn' },
      sandbox: { vfs: { maxFileBytes: 1024 } },
      audit: { enabled: false, agentId: 'agent-7' },
    });
  });

  it('should ignore unparseable numbers and booleans', () => {
    expect(
      loadEnvConfig({ TOOLGATE_MAX_SLEEP_MS: 'soon', TOOLGATE_AUDIT_ENABLED: 'maybe' })
    ).toEqual({});
  });
});

describe('mergeConfigs', () => {
  it('should merge nested objects and replace arrays', () => {
    expect(
      mergeConfigs(
        { sandbox: { maxSleepMs: 1, vfs: { writableRoots: ['/a'], maxFileBytes: 10 } } },
        { sandbox: { vfs: { writableRoots: ['/b'] } }, audit: { enabled: false } }
      )
    ).toEqual({
      sandbox: { maxSleepMs: 1, vfs: { writableRoots: ['/b'], maxFileBytes: 10 } },
      audit: { enabled: false },
    });
  });
});
