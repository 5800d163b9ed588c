/**
 * Execution: host side of the request/response protocol.
 *
 * Wraps a GuestRuntime and the Session it runs in. The host either drives it
 * by hand (`hasWork` / `step` / `service` / `resume`) or calls `run()`, which
 * services requests concurrently and resumes each one as its outcome arrives.
 *
 * Security considerations:
 * - Every tool_call is authorized against the session's capability table
 *   before the tool handler runs; a denial never reaches the handler
 * - Sleep and VFS requests are host policy (sleep limit, writable roots,
 *   file size limit), not capability-gated
 * - After cancellation no outcome is delivered to the guest
 * - Nothing is audited after the session closes
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { AuditEventType } from '@toolgate/shared';
import type { AuditCollector } from '../logging/audit.js';
import { resolveLogger, type SecureLogger } from '../logging/logger.js';
import type { Session } from '../session/session.js';
import { VfsError } from '../session/vfs.js';
import { hashArgs } from '../utils/crypto.js';
import { toErrorMessage } from '../utils/errors.js';
import { ProtocolError } from './errors.js';
import {
  failure,
  success,
  type ErrorPayload,
  type ExecutionCompletion,
  type GuestRequest,
  type GuestRuntime,
  type Outcome,
} from './types.js';

export interface ToolCallContext {
  sessionId: string;
  requestId: number;
  taskId: number;
  /** Aborted when the execution is cancelled or times out */
  signal: AbortSignal;
}

export type ToolHandler = (
  method: string,
  args: Record<string, unknown>,
  context: ToolCallContext
) => unknown;

export interface ExecutionOptions {
  session: Session;
  runtime: GuestRuntime;
  toolHandler: ToolHandler;
  /** Deadline for `run()`; 0 disables it */
  executionTimeoutMs?: number;
  maxSleepMs?: number;
  audit?: AuditCollector;
  logger?: SecureLogger;
}

export interface ExecutionResult extends ExecutionCompletion {
  sessionId: string;
  durationMs: number;
  requestCount: number;
}

export const DEFAULT_EXECUTION_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_SLEEP_MS = 10_000;

export class Execution {
  private readonly session: Session;
  private readonly runtime: GuestRuntime;
  private readonly toolHandler: ToolHandler;
  private readonly executionTimeoutMs: number;
  private readonly maxSleepMs: number;
  private readonly audit: AuditCollector | undefined;
  private readonly logger: SecureLogger;
  private readonly abortController = new AbortController();
  private onCancel: (() => void) | null = null;
  private cancelled = false;
  private requestCount = 0;

  constructor(options: ExecutionOptions) {
    this.session = options.session;
    this.runtime = options.runtime;
    this.toolHandler = options.toolHandler;
    this.executionTimeoutMs = options.executionTimeoutMs ?? DEFAULT_EXECUTION_TIMEOUT_MS;
    this.maxSleepMs = options.maxSleepMs ?? DEFAULT_MAX_SLEEP_MS;
    this.audit = options.audit;
    this.logger = resolveLogger('Execution', options.logger).child({ sessionId: options.session.id });
  }

  hasWork(): boolean {
    return this.runtime.hasWork();
  }

  isCancelled(): boolean {
    return this.cancelled;
  }

  /**
   * Advance the guest. Returns the next request, registered as pending on
   * the session, or null when no task can progress without a resume.
   */
  async step(): Promise<GuestRequest | null> {
    this.session.assertOpen();
    const request = await this.runtime.step();
    if (request) {
      this.session.registerPending(request);
      this.requestCount += 1;
      this.logger.debug('Guest request', {
        requestId: request.id,
        taskId: request.taskId,
        type: request.kind.type,
      });
    }
    return request;
  }

  /**
   * Deliver the outcome of an outstanding request to the task that issued it.
   */
  resume(requestId: number, outcome: Outcome): void {
    this.session.assertOpen();
    this.session.settlePending(requestId);
    this.runtime.resume(requestId, outcome);
  }

  /**
   * Perform the host side of a request. Never throws; failures become
   * failed outcomes.
   */
  async service(request: GuestRequest): Promise<Outcome> {
    const { kind } = request;
    switch (kind.type) {
      case 'tool_call':
        return this.serviceToolCall(request, kind.method, kind.args);
      case 'sleep':
        return this.serviceSleep(kind.durationMs);
      case 'vfs_read':
        return this.vfsOutcome(() => this.session.vfs.readFile(kind.path));
      case 'vfs_write':
        return this.vfsOutcome(() => {
          this.session.vfs.writeFile(kind.path, kind.data);
          this.record('vfs_write', { path: kind.path, bytes: kind.data.byteLength });
          return null;
        });
      case 'vfs_list':
        return this.vfsOutcome(() => this.session.vfs.list(kind.path));
      case 'vfs_delete':
        return this.vfsOutcome(() => {
          this.session.vfs.delete(kind.path);
          this.record('vfs_delete', { path: kind.path });
          return null;
        });
      case 'vfs_mkdir':
        return this.vfsOutcome(() => {
          this.session.vfs.mkdir(kind.path);
          return null;
        });
    }
  }

  /**
   * Discard every pending task without delivering results.
   */
  cancel(reason = 'Execution cancelled'): void {
    this.cancelWith({ code: 'EXECUTION_CANCELLED', message: reason });
  }

  completion(): ExecutionCompletion | null {
    return this.runtime.completion();
  }

  /**
   * Drive the guest to completion. Requests are serviced concurrently; each
   * outcome is delivered as soon as it is ready. Cancels the guest when the
   * execution deadline passes.
   */
  async run(): Promise<ExecutionResult> {
    const startedAt = Date.now();
    const inFlight = new Set<Promise<void>>();
    const hostErrors: unknown[] = [];

    const cancellation = new Promise<void>((resolve) => {
      this.onCancel = resolve;
    });
    const timer =
      this.executionTimeoutMs > 0
        ? setTimeout(() => {
            this.cancelWith({
              code: 'EXECUTION_TIMEOUT',
              message: `Execution exceeded ${this.executionTimeoutMs}ms`,
            });
          }, this.executionTimeoutMs)
        : null;

    this.record('execution_start', {});

    try {
      while (this.runtime.hasWork()) {
        const request = await this.step();
        if (request) {
          const task = this.serviceAndResume(request).catch((err: unknown) => {
            hostErrors.push(err);
            this.logger.error('Failed to deliver outcome', {
              requestId: request.id,
              error: toErrorMessage(err),
            });
            this.cancelWith({ code: 'HOST_ERROR', message: toErrorMessage(err) });
          });
          inFlight.add(task);
          void task.then(() => inFlight.delete(task));
          continue;
        }

        if (this.cancelled) break;

        if (inFlight.size === 0) {
          // Guest is waiting on something the host will never resolve
          this.cancelWith({
            code: 'EXECUTION_STALLED',
            message: 'Guest is waiting on work that no request will complete',
          });
          break;
        }

        await Promise.race([...inFlight, cancellation]);
      }
    } finally {
      if (timer) clearTimeout(timer);
      this.onCancel = null;
    }

    if (hostErrors.length > 0) {
      throw hostErrors[0];
    }

    const completion = this.runtime.completion();
    if (!completion) {
      throw new ProtocolError('INCOMPLETE_EXECUTION', 'Guest stopped with work remaining');
    }

    const result: ExecutionResult = {
      ...completion,
      sessionId: this.session.id,
      durationMs: Date.now() - startedAt,
      requestCount: this.requestCount,
    };

    this.record('execution_end', {
      status: result.status,
      errorCode: result.error?.code,
      requestCount: result.requestCount,
      durationMs: result.durationMs,
    });
    this.logger.info('Execution finished', {
      status: result.status,
      requestCount: result.requestCount,
      durationMs: result.durationMs,
    });

    return result;
  }

  private async serviceAndResume(request: GuestRequest): Promise<void> {
    const outcome = await this.service(request);
    if (this.cancelled) return;
    this.resume(request.id, outcome);
  }

  private record(type: AuditEventType, data: Record<string, unknown>): void {
    if (this.session.isClosed()) return;
    this.audit?.record(type, data);
  }

  private cancelWith(error: ErrorPayload): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.runtime.cancel(error);
    const discarded = this.session.discardPending();
    this.abortController.abort();
    this.logger.warn('Execution cancelled', { code: error.code, discardedRequests: discarded });
    this.onCancel?.();
  }

  private async serviceToolCall(
    request: GuestRequest,
    method: string,
    args: Record<string, unknown>
  ): Promise<Outcome> {
    const argsHash = hashArgs(args);
    const result = this.session.capabilities.authorize(method, args);

    if (!result.granted) {
      this.record('tool_denied', { method, argsHash, code: result.error.code });
      return { ok: false, error: result.error.toPayload() };
    }

    this.record('tool_call', {
      method,
      argsHash,
      capabilityKey: result.grant.capabilityKey,
      remaining: result.grant.remaining,
    });

    try {
      const value: unknown = await this.toolHandler(method, args, {
        sessionId: this.session.id,
        requestId: request.id,
        taskId: request.taskId,
        signal: this.abortController.signal,
      });
      return success(structuredClone(value));
    } catch (err) {
      const message = toErrorMessage(err);
      this.record('tool_error', { method, argsHash, error: message });
      this.logger.warn('Tool handler failed', { method, requestId: request.id, error: message });
      return failure('TOOL_ERROR', `Tool ${method} failed: ${message}`, { method });
    }
  }

  private async serviceSleep(durationMs: number): Promise<Outcome> {
    if (durationMs > this.maxSleepMs) {
      return failure(
        'SLEEP_LIMIT_EXCEEDED',
        `sleep(${durationMs}) exceeds the ${this.maxSleepMs}ms limit`,
        { durationMs, maxSleepMs: this.maxSleepMs }
      );
    }
    try {
      await delay(durationMs, undefined, { signal: this.abortController.signal });
      return success(null);
    } catch (err) {
      return failure('EXECUTION_CANCELLED', `Sleep interrupted: ${toErrorMessage(err)}`);
    }
  }

  private vfsOutcome(operation: () => unknown): Outcome {
    try {
      return success(operation());
    } catch (err) {
      if (err instanceof VfsError) {
        return { ok: false, error: err.toPayload() };
      }
      return failure('VFS_ERROR', toErrorMessage(err));
    }
  }
}
