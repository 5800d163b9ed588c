/**
 * Protocol errors.
 *
 * ProtocolError subclasses are host programming errors and are thrown to the
 * host. GuestOperationError is what guest code sees when an operation is
 * denied or fails; it never escapes to the host except as a failed task.
 */

import type { ErrorPayload } from './types.js';

export class ProtocolError extends Error {
  public readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'ProtocolError';
    this.code = code;
  }
}

export class UnknownRequestIdError extends ProtocolError {
  public readonly requestId: number;

  constructor(requestId: number) {
    super('UNKNOWN_REQUEST_ID', `No outstanding request with id ${requestId}`);
    this.name = 'UnknownRequestIdError';
    this.requestId = requestId;
  }
}

export class TaskAlreadyPendingError extends ProtocolError {
  public readonly taskId: number;
  public readonly pendingRequestId: number;

  constructor(taskId: number, pendingRequestId: number) {
    super(
      'TASK_ALREADY_PENDING',
      `Task ${taskId} already has outstanding request ${pendingRequestId}`
    );
    this.name = 'TaskAlreadyPendingError';
    this.taskId = taskId;
    this.pendingRequestId = pendingRequestId;
  }
}

export class SessionClosedError extends ProtocolError {
  constructor(sessionId: string) {
    super('SESSION_CLOSED', `Session ${sessionId} is closed`);
    this.name = 'SessionClosedError';
  }
}

/**
 * Rejection value for a guest operation. Scripts branch on `code`.
 */
export class GuestOperationError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(payload: ErrorPayload) {
    super(payload.message);
    this.name = 'GuestOperationError';
    this.code = payload.code;
    this.details = payload.details;
  }

  toPayload(): ErrorPayload {
    return this.details
      ? { code: this.code, message: this.message, details: this.details }
      : { code: this.code, message: this.message };
  }
}
