/**
 * Audit Collector
 *
 * Records what guests attempted and how the host answered. Entries carry a
 * hash of tool arguments, never the arguments themselves.
 *
 * With an output path, every entry is also appended as one JSON line to a
 * file opened with O_APPEND.
 */

import { closeSync, constants, mkdirSync, openSync, writeSync } from 'node:fs';
import { dirname } from 'node:path';
import { AuditEntrySchema, type AuditEntry, type AuditEventType } from '@toolgate/shared';
import { uuidv7 } from '../utils/crypto.js';
import { resolveLogger, type SecureLogger } from './logger.js';

export interface AuditCollectorOptions {
  sessionId: string;
  enabled?: boolean;
  agentId?: string;
  traceId?: string;
  /** Append entries as JSONL to this file */
  outputPath?: string;
  logger?: SecureLogger;
}

export interface AuditFilter {
  type?: AuditEventType | readonly AuditEventType[];
  /** Only entries at or after this epoch-ms timestamp */
  since?: number;
  turnId?: number;
}

class JsonlAppender {
  private fd: number | null;

  constructor(readonly filePath: string) {
    mkdirSync(dirname(filePath), { recursive: true });
    this.fd = openSync(filePath, constants.O_WRONLY | constants.O_CREAT | constants.O_APPEND);
  }

  append(entry: AuditEntry): void {
    if (this.fd === null) {
      throw new Error(`Audit file ${this.filePath} is closed`);
    }
    writeSync(this.fd, JSON.stringify(entry) + '\n');
  }

  close(): void {
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
  }
}

export class AuditCollector {
  readonly sessionId: string;
  readonly enabled: boolean;
  private readonly agentId: string | undefined;
  private readonly traceId: string | undefined;
  private readonly entries: AuditEntry[] = [];
  private readonly appender: JsonlAppender | null;
  private readonly logger: SecureLogger;
  private turnId = 0;

  constructor(options: AuditCollectorOptions) {
    this.sessionId = options.sessionId;
    this.enabled = options.enabled ?? true;
    this.agentId = options.agentId;
    this.traceId = options.traceId;
    this.logger = resolveLogger('AuditCollector', options.logger);
    this.appender =
      this.enabled && options.outputPath ? new JsonlAppender(options.outputPath) : null;
  }

  get currentTurn(): number {
    return this.turnId;
  }

  /** Start a new turn; entries recorded afterwards carry the new id. */
  nextTurn(): number {
    this.turnId += 1;
    return this.turnId;
  }

  record(type: AuditEventType, data: Record<string, unknown> = {}): AuditEntry | null {
    if (!this.enabled) return null;

    const entry = AuditEntrySchema.parse({
      id: uuidv7(),
      type,
      sessionId: this.sessionId,
      timestamp: Date.now(),
      turnId: this.turnId,
      agentId: this.agentId,
      traceId: this.traceId,
      data,
    });

    this.entries.push(entry);
    this.appender?.append(entry);
    this.logger.trace('Audit entry recorded', { type, turnId: this.turnId });
    return entry;
  }

  getEntries(filter: AuditFilter = {}): AuditEntry[] {
    const types =
      filter.type === undefined
        ? null
        : new Set<AuditEventType>(typeof filter.type === 'string' ? [filter.type] : filter.type);

    return this.entries.filter(
      (entry) =>
        (types === null || types.has(entry.type)) &&
        (filter.since === undefined || entry.timestamp >= filter.since) &&
        (filter.turnId === undefined || entry.turnId === filter.turnId)
    );
  }

  size(): number {
    return this.entries.length;
  }

  toJsonl(filter?: AuditFilter): string {
    return this.getEntries(filter)
      .map((entry) => JSON.stringify(entry) + '\n')
      .join('');
  }

  clear(): void {
    this.entries.length = 0;
  }

  close(): void {
    this.appender?.close();
  }
}
