/**
 * ScriptRuntime: in-process cooperative scheduler for guest scripts.
 *
 * Guest scripts are async functions that receive a mediated environment.
 * Every operation they issue suspends the issuing task and queues a
 * GuestRequest; the task continues only when the host resumes that request.
 * Guest code between suspension points runs to completion on the microtask
 * queue, so `step()` drains it by yielding to the event loop once.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { formatWithOptions } from 'node:util';
import { resolveLogger, type SecureLogger } from '../logging/logger.js';
import { errorName, toErrorMessage } from '../utils/errors.js';
import { GuestOperationError, UnknownRequestIdError } from './errors.js';
import type {
  ErrorPayload,
  ExecutionCompletion,
  GuestRequest,
  GuestRuntime,
  Outcome,
  RequestKind,
  TaskState,
} from './types.js';

export type GuestToolFn = (args?: Record<string, unknown>) => Promise<unknown>;

export interface GuestFs {
  readFile(path: string): Promise<Uint8Array>;
  readText(path: string): Promise<string>;
  writeFile(path: string, data: string | Uint8Array): Promise<void>;
  readdir(path: string): Promise<string[]>;
  rm(path: string): Promise<void>;
  mkdir(path: string): Promise<void>;
}

export interface GuestConsole {
  log(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export interface GuestEnvironment {
  readonly taskId: number;
  /** Call a host tool by its method name (e.g. `stripe/charges/create`). */
  call(method: string, args?: Record<string, unknown>): Promise<unknown>;
  /** Host tools by guest identifier (e.g. `tools.stripe_charges_create`). */
  readonly tools: Readonly<Record<string, GuestToolFn>>;
  readonly fs: GuestFs;
  sleep(ms: number): Promise<void>;
  /** Run `script` as a separate task that can be suspended independently. */
  spawn<T>(script: GuestScript<T>): Promise<Awaited<T>>;
  readonly console: GuestConsole;
}

export type GuestScript<T = unknown> = (env: GuestEnvironment) => T | Promise<T>;

export interface ScriptRuntimeOptions {
  /** Session-wide request id allocator */
  nextRequestId: () => number;
  /** Session-wide task id allocator */
  nextTaskId: () => number;
  /** Guest identifier -> host method name */
  toolIdentifiers?: ReadonlyMap<string, string>;
  logger?: SecureLogger;
}

interface PendingOperation {
  requestId: number;
  resolve: (value: unknown) => void;
  reject: (error: GuestOperationError) => void;
}

interface TaskRecord {
  readonly id: number;
  state: TaskState;
  pending: PendingOperation | null;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function isActive(state: TaskState): boolean {
  return state.status === 'runnable' || state.status === 'suspended';
}

export function toGuestErrorPayload(err: unknown): ErrorPayload {
  if (err instanceof GuestOperationError) {
    return err.toPayload();
  }
  const name = errorName(err);
  if (name !== undefined) {
    return { code: 'GUEST_ERROR', message: toErrorMessage(err), details: { name } };
  }
  return { code: 'GUEST_ERROR', message: toErrorMessage(err) };
}

function invalidResponse(kind: RequestKind['type']): GuestOperationError {
  return new GuestOperationError({
    code: 'INVALID_RESPONSE',
    message: `Host returned an unexpected value for ${kind}`,
  });
}

function isArgumentObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  return Array.isArray(value) ? 'array' : typeof value;
}

function formatConsoleArgs(args: unknown[]): string {
  return formatWithOptions({ colors: false, depth: 4 }, ...args);
}

export class ScriptRuntime implements GuestRuntime {
  private readonly options: ScriptRuntimeOptions;
  private readonly script: GuestScript;
  private readonly logger: SecureLogger;
  private readonly taskRecords = new Map<number, TaskRecord>();
  private readonly outbox: GuestRequest[] = [];
  private readonly stdoutLines: string[] = [];
  private readonly stderrLines: string[] = [];
  private rootTaskId: number | null = null;
  private started = false;
  private cancelledWith: ErrorPayload | null = null;

  constructor(script: GuestScript, options: ScriptRuntimeOptions) {
    this.script = script;
    this.options = options;
    this.logger = resolveLogger('ScriptRuntime', options.logger);
  }

  hasWork(): boolean {
    if (this.cancelledWith) return false;
    if (!this.started) return true;
    for (const task of this.taskRecords.values()) {
      if (isActive(task.state) || task.pending) return true;
    }
    return false;
  }

  async step(): Promise<GuestRequest | null> {
    if (this.cancelledWith) return null;

    if (!this.started) {
      this.started = true;
      this.rootTaskId = this.startTask(this.script).id;
    }

    if (this.outbox.length === 0) {
      await yieldToEventLoop();
    }

    if (this.cancelledWith) return null;
    return this.outbox.shift() ?? null;
  }

  resume(requestId: number, outcome: Outcome): void {
    const record = this.findPending(requestId);
    if (!record?.pending) {
      throw new UnknownRequestIdError(requestId);
    }

    const pending = record.pending;
    record.pending = null;
    if (record.state.status === 'suspended') {
      record.state = { status: 'runnable' };
    }

    if (outcome.ok) {
      pending.resolve(outcome.value);
    } else {
      pending.reject(new GuestOperationError(outcome.error));
    }
  }

  cancel(error: ErrorPayload): void {
    if (this.cancelledWith) return;
    this.cancelledWith = error;
    this.outbox.length = 0;
    for (const record of this.taskRecords.values()) {
      // Resolvers are dropped: suspended guest code never continues
      record.pending = null;
      if (isActive(record.state)) {
        record.state = { status: 'failed', error };
      }
    }
    this.logger.info('Guest execution cancelled', { code: error.code });
  }

  completion(): ExecutionCompletion | null {
    const output = {
      stdout: this.stdoutLines.join(''),
      stderr: this.stderrLines.join(''),
    };

    if (this.cancelledWith) {
      return { status: 'cancelled', error: this.cancelledWith, ...output };
    }
    if (this.hasWork() || this.rootTaskId === null) {
      return null;
    }

    const state = this.taskRecords.get(this.rootTaskId)?.state;
    if (state?.status === 'completed') {
      return { status: 'completed', value: state.value, ...output };
    }
    if (state?.status === 'failed') {
      return { status: 'failed', error: state.error, ...output };
    }
    return null;
  }

  tasks(): ReadonlyMap<number, TaskState> {
    const snapshot = new Map<number, TaskState>();
    for (const [id, record] of this.taskRecords) {
      snapshot.set(id, record.state);
    }
    return snapshot;
  }

  private findPending(requestId: number): TaskRecord | undefined {
    for (const record of this.taskRecords.values()) {
      if (record.pending?.requestId === requestId) return record;
    }
    return undefined;
  }

  private startTask<T>(script: GuestScript<T>): { id: number; settled: Promise<Awaited<T>> } {
    const record: TaskRecord = {
      id: this.options.nextTaskId(),
      state: { status: 'runnable' },
      pending: null,
    };
    this.taskRecords.set(record.id, record);

    const env = this.createEnvironment(record);
    const settled: Promise<Awaited<T>> = (async () => script(env))();

    void settled.then(
      (value) => this.finishTask(record, { status: 'completed', value }),
      (err: unknown) => this.finishTask(record, { status: 'failed', error: toGuestErrorPayload(err) })
    );

    return { id: record.id, settled };
  }

  private finishTask(record: TaskRecord, state: TaskState): void {
    if (this.cancelledWith) return;
    record.state = state;
    if (state.status === 'failed') {
      this.logger.debug('Guest task failed', { taskId: record.id, code: state.error.code });
    }
  }

  private issue(record: TaskRecord, kind: RequestKind): Promise<unknown> {
    if (record.pending) {
      return Promise.reject(
        new GuestOperationError({
          code: 'TASK_BUSY',
          message: `Task ${record.id} already has an outstanding operation; use spawn() for concurrency`,
          details: { taskId: record.id, pendingRequestId: record.pending.requestId },
        })
      );
    }
    if (!isActive(record.state)) {
      return Promise.reject(
        new GuestOperationError({
          code: 'TASK_FINISHED',
          message: `Task ${record.id} has already finished`,
          details: { taskId: record.id },
        })
      );
    }

    const request: GuestRequest = {
      id: this.options.nextRequestId(),
      taskId: record.id,
      kind,
    };

    const promise = new Promise<unknown>((resolve, reject) => {
      record.pending = { requestId: request.id, resolve, reject };
    });
    record.state = { status: 'suspended', requestId: request.id };
    this.outbox.push(request);

    // Observed here so a guest that never awaits cannot raise an unhandled rejection in the host
    promise.catch((err: unknown) => {
      this.logger.trace('Guest operation rejected', {
        taskId: record.id,
        requestId: request.id,
        code: toGuestErrorPayload(err).code,
      });
    });

    return promise;
  }

  private createEnvironment(record: TaskRecord): GuestEnvironment {
    const call = (method: string, args: Record<string, unknown> = {}): Promise<unknown> => {
      if (!isArgumentObject(args)) {
        return Promise.reject(
          new GuestOperationError({
            code: 'INVALID_ARGUMENT',
            message: `Arguments for ${method} must be an object, got ${describeValue(args)}`,
          })
        );
      }
      let cloned: Record<string, unknown>;
      try {
        cloned = structuredClone(args);
      } catch (err) {
        return Promise.reject(
          new GuestOperationError({
            code: 'INVALID_ARGUMENT',
            message: `Arguments for ${method} are not serializable: ${toErrorMessage(err)}`,
          })
        );
      }
      return this.issue(record, { type: 'tool_call', method, args: cloned });
    };

    const tools: Record<string, GuestToolFn> = {};
    for (const [identifier, method] of this.options.toolIdentifiers ?? []) {
      tools[identifier] = (args) => call(method, args);
    }

    const readFile = async (path: string): Promise<Uint8Array> => {
      const value = await this.issue(record, { type: 'vfs_read', path });
      if (!(value instanceof Uint8Array)) throw invalidResponse('vfs_read');
      return value;
    };

    const fs: GuestFs = {
      readFile,
      readText: async (path) => decoder.decode(await readFile(path)),
      writeFile: async (path, data) => {
        const bytes = typeof data === 'string' ? encoder.encode(data) : Uint8Array.from(data);
        await this.issue(record, { type: 'vfs_write', path, data: bytes });
      },
      readdir: async (path) => {
        const value = await this.issue(record, { type: 'vfs_list', path });
        if (!Array.isArray(value) || !value.every((entry) => typeof entry === 'string')) {
          throw invalidResponse('vfs_list');
        }
        return value;
      },
      rm: async (path) => {
        await this.issue(record, { type: 'vfs_delete', path });
      },
      mkdir: async (path) => {
        await this.issue(record, { type: 'vfs_mkdir', path });
      },
    };

    const sleep = async (ms: number): Promise<void> => {
      if (!Number.isFinite(ms) || ms < 0) {
        throw new GuestOperationError({
          code: 'INVALID_ARGUMENT',
          message: `sleep() needs a non-negative duration, got ${String(ms)}`,
        });
      }
      await this.issue(record, { type: 'sleep', durationMs: ms });
    };

    const guestConsole: GuestConsole = {
      log: (...args) => this.stdoutLines.push(`${formatConsoleArgs(args)}\n`),
      info: (...args) => this.stdoutLines.push(`${formatConsoleArgs(args)}\n`),
      warn: (...args) => this.stderrLines.push(`${formatConsoleArgs(args)}\n`),
      error: (...args) => this.stderrLines.push(`${formatConsoleArgs(args)}\n`),
    };

    return {
      taskId: record.id,
      call,
      tools: Object.freeze(tools),
      fs: Object.freeze(fs),
      sleep,
      spawn: <T>(script: GuestScript<T>) => this.startTask(script).settled,
      console: Object.freeze(guestConsole),
    };
  }
}
