/**
 * Host/guest protocol types.
 *
 * The guest never performs side effects. Every attempted action becomes a
 * GuestRequest that the host services and answers with an Outcome.
 */

export interface ErrorPayload {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export type Outcome<T = unknown> = { ok: true; value: T } | { ok: false; error: ErrorPayload };

export type RequestKind =
  | { type: 'tool_call'; method: string; args: Record<string, unknown> }
  | { type: 'sleep'; durationMs: number }
  | { type: 'vfs_read'; path: string }
  | { type: 'vfs_write'; path: string; data: Uint8Array }
  | { type: 'vfs_list'; path: string }
  | { type: 'vfs_delete'; path: string }
  | { type: 'vfs_mkdir'; path: string };

export type RequestType = RequestKind['type'];

export interface GuestRequest {
  /** Unique within a session */
  id: number;
  /** Task that issued the request */
  taskId: number;
  kind: RequestKind;
}

export type TaskState =
  | { status: 'runnable' }
  | { status: 'suspended'; requestId: number }
  | { status: 'completed'; value: unknown }
  | { status: 'failed'; error: ErrorPayload };

export type TaskStatus = TaskState['status'];

export type CompletionStatus = 'completed' | 'failed' | 'cancelled';

export interface ExecutionCompletion {
  status: CompletionStatus;
  /** Return value of the top-level script */
  value?: unknown;
  error?: ErrorPayload;
  stdout: string;
  stderr: string;
}

/**
 * Contract an execution environment must satisfy to interoperate with the
 * host. Only one task executes guest code at a time; concurrency is several
 * tasks each suspended on its own outstanding request.
 */
export interface GuestRuntime {
  /** True while any task is runnable or suspended. */
  hasWork(): boolean;
  /**
   * Advance guest code until a new request exists or no task can progress
   * without a resume. Returns the next unserviced request, or null.
   */
  step(): Promise<GuestRequest | null>;
  /** Deliver the outcome for exactly one outstanding request. */
  resume(requestId: number, outcome: Outcome): void;
  /** Discard every pending task without delivering results. */
  cancel(error: ErrorPayload): void;
  /** Final result once no work remains, else null. */
  completion(): ExecutionCompletion | null;
  /** Snapshot of task states, for diagnostics and tests. */
  tasks(): ReadonlyMap<number, TaskState>;
}

export function success<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function failure(code: string, message: string, details?: Record<string, unknown>): Outcome<never> {
  const error: ErrorPayload = details ? { code, message, details } : { code, message };
  return { ok: false, error };
}
