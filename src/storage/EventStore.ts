import Joi from 'joi';
import { v4 as uuidv4 } from 'uuid';
import type {
  AppendResult,
  Correlation,
  TaskEvent,
  TaskEventInput,
} from '../types/index.js';
import { isTerminalKind } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { metrics, RelayMetrics } from '../utils/metrics.js';

/**
 * Append-only, per-task event log shared by the executor and the webhook
 * receiver. Every implementation enforces, atomically per task id:
 * at most one `accepted` event, at most one terminal event, and no
 * `progress` after the terminal one.
 */
export interface EventStore {
  initialize(): Promise<void>;
  close(): Promise<void>;

  append(event: TaskEventInput): Promise<AppendResult>;
  listEvents(taskId: string): Promise<TaskEvent[]>;
  getTerminalEvent(taskId: string): Promise<TaskEvent | null>;

  healthCheck(): Promise<{ healthy: boolean; message?: string }>;
}

/**
 * JSON form of a TaskEvent as the file and Redis stores keep it
 */
export interface StoredEvent {
  id: string;
  taskId: string;
  contextId?: string;
  kind: TaskEvent['kind'];
  sequenceHint?: TaskEvent['sequenceHint'];
  payload?: unknown;
  timestamp: string;
  source: TaskEvent['source'];
}

const storedEventSchema = Joi.object<StoredEvent>({
  id: Joi.string().required(),
  taskId: Joi.string().required(),
  contextId: Joi.string(),
  kind: Joi.string().valid('accepted', 'progress', 'completed', 'failed').required(),
  sequenceHint: Joi.alternatives().try(
    Joi.object({ current: Joi.number().required(), total: Joi.number().required() }),
    Joi.object({ stage: Joi.string().required() })
  ),
  payload: Joi.any(),
  timestamp: Joi.string().isoDate().required(),
  source: Joi.string().valid('executor', 'receiver').required(),
});

export function serializeEvent(event: TaskEvent): StoredEvent {
  return { ...event, timestamp: event.timestamp.toISOString() };
}

export function deserializeEvent(raw: unknown): TaskEvent {
  const { error, value } = storedEventSchema.validate(raw);
  if (error) {
    throw new Error(`Corrupt event record: ${error.message}`);
  }
  return { ...value, timestamp: new Date(value.timestamp) };
}

export type GuardDecision =
  | { action: 'append'; correlation: Correlation }
  | Exclude<AppendResult, { status: 'appended' }>;

/**
 * Decide an append against the task's current guard slots. Stores that
 * can hold a per-task lock call this inside it.
 */
export function evaluateGuard(
  event: TaskEvent,
  current: { accepted?: TaskEvent; terminal?: TaskEvent }
): GuardDecision {
  if (event.kind === 'accepted') {
    return current.accepted
      ? { status: 'duplicate', existing: current.accepted }
      : { action: 'append', correlation: 'matched' };
  }

  if (isTerminalKind(event.kind)) {
    if (current.terminal) {
      return { status: 'duplicate', existing: current.terminal };
    }
    // A terminal event with no accepted record is kept; the record may be gone or never written
    return { action: 'append', correlation: current.accepted ? 'matched' : 'unknown' };
  }

  return current.terminal
    ? { status: 'closed', terminal: current.terminal }
    : { action: 'append', correlation: 'matched' };
}

/**
 * Base class for event stores with lifecycle handling and event stamping
 */
export abstract class BaseEventStore implements EventStore {
  protected initialized = false;

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await this.doInitialize();
    this.initialized = true;
  }

  async close(): Promise<void> {
    if (!this.initialized) {
      return;
    }
    await this.doClose();
    this.initialized = false;
  }

  protected ensureInitialized(): void {
    if (!this.initialized) {
      throw new Error('Event store not initialized. Call initialize() first.');
    }
  }

  async append(input: TaskEventInput): Promise<AppendResult> {
    this.ensureInitialized();

    const event = stampEvent(input);
    const result = await this.doAppend(event);

    metrics.incrementCounter(RelayMetrics.storeAppends, { kind: event.kind, result: result.status });
    if (result.status === 'duplicate') {
      logger.info('Duplicate event dropped', {
        taskId: event.taskId,
        kind: event.kind,
        existingEventId: result.existing.id,
      });
    } else if (result.status === 'closed') {
      logger.debug('Event after terminal dropped', {
        taskId: event.taskId,
        kind: event.kind,
        terminalEventId: result.terminal.id,
      });
    }

    return result;
  }

  async listEvents(taskId: string): Promise<TaskEvent[]> {
    this.ensureInitialized();
    return this.doListEvents(taskId);
  }

  async getTerminalEvent(taskId: string): Promise<TaskEvent | null> {
    this.ensureInitialized();
    return this.doGetTerminalEvent(taskId);
  }

  protected abstract doInitialize(): Promise<void>;
  protected abstract doClose(): Promise<void>;
  protected abstract doAppend(event: TaskEvent): Promise<AppendResult>;
  protected abstract doListEvents(taskId: string): Promise<TaskEvent[]>;
  protected abstract doGetTerminalEvent(taskId: string): Promise<TaskEvent | null>;

  abstract healthCheck(): Promise<{ healthy: boolean; message?: string }>;
}

export function stampEvent(input: TaskEventInput): TaskEvent {
  return {
    ...input,
    id: input.id ?? uuidv4(),
    timestamp: input.timestamp ?? new Date(),
  };
}
