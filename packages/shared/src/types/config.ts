/**
 * Configuration Types for Toolgate
 *
 * Security considerations:
 * - All paths are validated to prevent path traversal
 * - Timeouts and limits have maximum bounds
 * - Defaults are restrictive (writes only under /workspace and /tmp)
 */

import { z } from 'zod';

// Safe path validation (no path traversal)
const SafePathSchema = z.string()
  .min(1)
  .max(4096)
  .refine(
    (path) => !path.includes('..') && !path.includes('\0'),
    { message: 'Path contains forbidden characters' }
  );

// Absolute VFS path (guest-visible, not a host path)
const VfsRootSchema = z.string()
  .min(1)
  .max(1024)
  .refine((path) => path.startsWith('/') && !path.split('/').includes('..'), {
    message: 'VFS root must be an absolute path without ".." segments',
  });

// Logging configuration
export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
  format: z.enum(['json', 'pretty']).default('json'),

  output: z.array(z.discriminatedUnion('type', [
    z.object({
      type: z.literal('file'),
      path: SafePathSchema,
    }),
    z.object({
      type: z.literal('stdout'),
      format: z.enum(['json', 'pretty']).default('json'),
    }),
  ])).default([{ type: 'stdout', format: 'json' }]),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// Virtual filesystem policy
const VfsConfigSchema = z.object({
  writableRoots: z.array(VfsRootSchema).min(1).default(['/workspace', '/tmp']),
  maxFileBytes: z.number().int().positive().max(1_073_741_824).default(10_485_760), // 10MB
}).default({});

// Sandbox host policy
export const SandboxConfigSchema = z.object({
  executionTimeoutMs: z.number().int().positive().max(3_600_000).default(30_000),
  maxSleepMs: z.number().int().nonnegative().max(600_000).default(10_000),
  vfs: VfsConfigSchema,
});

export type SandboxConfig = z.infer<typeof SandboxConfigSchema>;
export type SandboxConfigInput = z.input<typeof SandboxConfigSchema>;

// Audit trail
export const AuditConfigSchema = z.object({
  enabled: z.boolean().default(true),
  agentId: z.string().max(256).optional(),
  traceId: z.string().max(256).optional(),
  outputPath: SafePathSchema.optional(),
});

export type AuditConfig = z.infer<typeof AuditConfigSchema>;
export type AuditConfigInput = z.input<typeof AuditConfigSchema>;

// Complete configuration schema
export const ConfigSchema = z.object({
  logging: LoggingConfigSchema.default({}),
  sandbox: SandboxConfigSchema.default({}),
  audit: AuditConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

type DeepPartial<T> = T extends readonly unknown[]
  ? T
  : T extends object
    ? { [K in keyof T]?: DeepPartial<T[K]> }
    : T;

// Partial config for merging (all fields optional)
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = DeepPartial<Config>;
