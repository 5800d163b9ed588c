/**
 * Session State
 *
 * Everything that outlives a single execution: the virtual filesystem, the
 * capability table (so quotas span executions), the outstanding request per
 * task, and the id counters. Sessions share nothing with each other.
 */

import { CapabilityTable } from '../capabilities/table.js';
import { resolveLogger, type SecureLogger } from '../logging/logger.js';
import {
  SessionClosedError,
  TaskAlreadyPendingError,
  UnknownRequestIdError,
} from '../protocol/errors.js';
import type { GuestRequest } from '../protocol/types.js';
import { uuidv7 } from '../utils/crypto.js';
import { VirtualFilesystem, type VfsOptions } from './vfs.js';

export interface SessionOptions {
  capabilities: CapabilityTable;
  vfs?: VirtualFilesystem | VfsOptions;
  id?: string;
  logger?: SecureLogger;
}

export class Session {
  readonly id: string;
  readonly vfs: VirtualFilesystem;
  readonly capabilities: CapabilityTable;
  private readonly pending = new Map<number, GuestRequest>();
  private readonly logger: SecureLogger;
  private requestCounter = 0;
  private taskCounter = 0;
  private closed = false;

  constructor(options: SessionOptions) {
    this.id = options.id ?? uuidv7();
    this.capabilities = options.capabilities;
    this.vfs =
      options.vfs instanceof VirtualFilesystem ? options.vfs : new VirtualFilesystem(options.vfs);
    this.logger = resolveLogger('Session', options.logger).child({ sessionId: this.id });
  }

  nextRequestId(): number {
    return ++this.requestCounter;
  }

  nextTaskId(): number {
    return ++this.taskCounter;
  }

  isClosed(): boolean {
    return this.closed;
  }

  assertOpen(): void {
    if (this.closed) {
      throw new SessionClosedError(this.id);
    }
  }

  /**
   * Record a request as outstanding for its task. A task may have at most one.
   */
  registerPending(request: GuestRequest): void {
    this.assertOpen();
    const existing = this.pending.get(request.taskId);
    if (existing) {
      this.logger.error('Task issued a second request', {
        taskId: request.taskId,
        requestId: request.id,
        pendingRequestId: existing.id,
      });
      throw new TaskAlreadyPendingError(request.taskId, existing.id);
    }
    this.pending.set(request.taskId, request);
  }

  /**
   * Remove and return the outstanding request with this id.
   */
  settlePending(requestId: number): GuestRequest {
    for (const [taskId, request] of this.pending) {
      if (request.id === requestId) {
        this.pending.delete(taskId);
        return request;
      }
    }
    throw new UnknownRequestIdError(requestId);
  }

  pendingRequests(): GuestRequest[] {
    return [...this.pending.values()];
  }

  hasPending(): boolean {
    return this.pending.size > 0;
  }

  /** Drop every outstanding request without resolving it. */
  discardPending(): number {
    const count = this.pending.size;
    this.pending.clear();
    return count;
  }

  /**
   * Tear down the session: clears the VFS and pending requests. Idempotent.
   */
  close(): void {
    if (this.closed) return;
    const discarded = this.discardPending();
    this.vfs.clear();
    this.closed = true;
    this.logger.info('Session closed', { discardedRequests: discarded });
  }
}
