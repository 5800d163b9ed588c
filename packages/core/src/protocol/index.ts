export {
  success,
  failure,
  type ErrorPayload,
  type Outcome,
  type RequestKind,
  type RequestType,
  type GuestRequest,
  type TaskState,
  type TaskStatus,
  type CompletionStatus,
  type ExecutionCompletion,
  type GuestRuntime,
} from './types.js';
export {
  ProtocolError,
  UnknownRequestIdError,
  TaskAlreadyPendingError,
  SessionClosedError,
  GuestOperationError,
} from './errors.js';
export {
  ScriptRuntime,
  toGuestErrorPayload,
  type ScriptRuntimeOptions,
  type GuestScript,
  type GuestEnvironment,
  type GuestFs,
  type GuestConsole,
  type GuestToolFn,
} from './scheduler.js';
export {
  Execution,
  DEFAULT_EXECUTION_TIMEOUT_MS,
  DEFAULT_MAX_SLEEP_MS,
  type ExecutionOptions,
  type ExecutionResult,
  type ToolHandler,
  type ToolCallContext,
} from './execution.js';
