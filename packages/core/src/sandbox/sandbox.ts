/**
 * Sandbox: host-facing facade.
 *
 * Owns one Session (VFS, quotas, id counters), the tool registry and the
 * audit collector. Each `execute()` runs a guest script in a fresh
 * ScriptRuntime against that session, so files and quota usage carry over
 * between executions while guest tasks do not.
 *
 * Sandboxes share no mutable state with each other.
 */

import {
  AuditConfigSchema,
  SandboxConfigSchema,
  type AuditConfigInput,
  type CapabilitySpec,
  type CapabilitySpecInput,
  type Config,
  type SandboxConfig,
  type SandboxConfigInput,
} from '@toolgate/shared';
import type { CallArgs } from '../capabilities/constraints.js';
import { CapabilityTable, type MethodCapability } from '../capabilities/table.js';
import { AuditCollector } from '../logging/audit.js';
import { resolveLogger, type SecureLogger } from '../logging/logger.js';
import { Execution, type ExecutionResult, type ToolHandler } from '../protocol/execution.js';
import { ScriptRuntime, type GuestScript } from '../protocol/scheduler.js';
import { Session } from '../session/session.js';
import type { VirtualFilesystem } from '../session/vfs.js';
import { ToolRegistry, type ToolDefinition } from './tools.js';

export interface SandboxOptions {
  capabilities: readonly (MethodCapability | CapabilitySpecInput)[];
  toolHandler: ToolHandler;
  /** When given, only these methods reach the tool handler */
  tools?: readonly ToolDefinition[];
  config?: SandboxConfigInput;
  audit?: AuditConfigInput;
  sessionId?: string;
  logger?: SecureLogger;
}

export class Sandbox {
  readonly config: SandboxConfig;
  private readonly session: Session;
  private readonly registry: ToolRegistry;
  private readonly toolHandler: ToolHandler;
  private readonly auditCollector: AuditCollector;
  private readonly logger: SecureLogger;
  private readonly injectedLogger: SecureLogger | undefined;
  private readonly liveExecutions = new Set<Execution>();

  constructor(options: SandboxOptions) {
    this.config = SandboxConfigSchema.parse(options.config ?? {});
    this.injectedLogger = options.logger;
    this.registry = new ToolRegistry(options.tools);

    const capabilities = new CapabilityTable(options.capabilities, { logger: options.logger });
    this.session = new Session({
      capabilities,
      vfs: this.config.vfs,
      id: options.sessionId,
      logger: options.logger,
    });

    const auditConfig = AuditConfigSchema.parse(options.audit ?? {});
    this.auditCollector = new AuditCollector({
      sessionId: this.session.id,
      ...auditConfig,
      logger: options.logger,
    });

    this.toolHandler = this.guardToolHandler(options.toolHandler);
    this.logger = resolveLogger('Sandbox', options.logger).child({ sessionId: this.session.id });
    this.logger.debug('Sandbox created', {
      tools: this.registry.size,
      capabilities: capabilities.getCapabilities().length,
    });
  }

  /**
   * Build a sandbox from a loaded configuration.
   */
  static fromConfig(
    config: Config,
    options: Omit<SandboxOptions, 'config' | 'audit'>
  ): Sandbox {
    return new Sandbox({ ...options, config: config.sandbox, audit: config.audit });
  }

  get sessionId(): string {
    return this.session.id;
  }

  get vfs(): VirtualFilesystem {
    return this.session.vfs;
  }

  get audit(): AuditCollector {
    return this.auditCollector;
  }

  /**
   * Run a guest script to completion, servicing its requests.
   */
  async execute<T>(script: GuestScript<T>): Promise<ExecutionResult> {
    this.auditCollector.nextTurn();
    const execution = this.start(script);
    try {
      return await execution.run();
    } finally {
      this.liveExecutions.delete(execution);
    }
  }

  /**
   * Prepare an execution the host drives itself with step/service/resume.
   */
  start<T>(script: GuestScript<T>): Execution {
    this.session.assertOpen();
    const runtime = new ScriptRuntime(script, {
      nextRequestId: () => this.session.nextRequestId(),
      nextTaskId: () => this.session.nextTaskId(),
      toolIdentifiers: this.registry.identifiers(),
      logger: this.injectedLogger,
    });
    const execution = new Execution({
      session: this.session,
      runtime,
      toolHandler: this.toolHandler,
      executionTimeoutMs: this.config.executionTimeoutMs,
      maxSleepMs: this.config.maxSleepMs,
      audit: this.auditCollector,
      logger: this.injectedLogger,
    });
    for (const live of this.liveExecutions) {
      if (!live.hasWork()) this.liveExecutions.delete(live);
    }
    this.liveExecutions.add(execution);
    return execution;
  }

  canCall(method: string, args: CallArgs = {}): boolean {
    return this.session.capabilities.canCall(method, args);
  }

  getRemainingCalls(key: string): number | null {
    return this.session.capabilities.getRemainingCalls(key);
  }

  getCallCounts(): Record<string, number> {
    return this.session.capabilities.getCallCounts();
  }

  getCapabilities(): CapabilitySpec[] {
    return this.session.capabilities.toSpecs();
  }

  getTools(): ToolDefinition[] {
    return this.registry.list();
  }

  isClosed(): boolean {
    return this.session.isClosed();
  }

  /**
   * Tear down the session. Executions still running are cancelled first, so
   * their handlers see an aborted signal and no result reaches the guest.
   */
  close(): void {
    if (this.session.isClosed()) return;
    for (const execution of this.liveExecutions) {
      if (execution.hasWork()) execution.cancel('Session closed');
    }
    this.liveExecutions.clear();
    this.session.close();
    this.auditCollector.record('session_closed');
    this.auditCollector.close();
  }

  private guardToolHandler(handler: ToolHandler): ToolHandler {
    if (this.registry.size === 0) return handler;
    return (method, args, context) => {
      if (!this.registry.hasMethod(method)) {
        throw new Error(`Unknown tool: ${method}`);
      }
      return handler(method, args, context);
    };
  }
}
