/**
 * Audit Types for Toolgate
 *
 * Entries describe what a guest attempted and how the host answered.
 * They never carry raw tool arguments, only a hash of them.
 */

import { z } from 'zod';

export const AuditEventType = {
  EXECUTION_START: 'execution_start',
  EXECUTION_END: 'execution_end',
  TOOL_CALL: 'tool_call',
  TOOL_DENIED: 'tool_denied',
  TOOL_ERROR: 'tool_error',
  VFS_WRITE: 'vfs_write',
  VFS_DELETE: 'vfs_delete',
  SESSION_CLOSED: 'session_closed',
} as const;

export type AuditEventType = (typeof AuditEventType)[keyof typeof AuditEventType];

export const AuditEventTypeSchema = z.enum([
  'execution_start',
  'execution_end',
  'tool_call',
  'tool_denied',
  'tool_error',
  'vfs_write',
  'vfs_delete',
  'session_closed',
]);

export const AuditEntrySchema = z.object({
  id: z.string().uuid(),
  type: AuditEventTypeSchema,
  sessionId: z.string().min(1),
  timestamp: z.number().int().positive(),
  turnId: z.number().int().nonnegative(),

  // Agent context
  agentId: z.string().optional(),
  traceId: z.string().optional(),

  data: z.record(z.string(), z.unknown()).default({}),
});

export type AuditEntry = z.infer<typeof AuditEntrySchema>;
