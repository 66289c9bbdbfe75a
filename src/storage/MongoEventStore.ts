import { MongoClient, MongoServerError } from 'mongodb';
import type { Collection, Db, MongoClientOptions } from 'mongodb';
import type { AppendResult, EventGuard, TaskEvent } from '../types/index.js';
import { guardFor } from '../types/index.js';
import { BaseEventStore } from './EventStore.js';
import { logger } from '../utils/logger.js';

interface EventDocument {
  _id: string;
  taskId: string;
  contextId?: string;
  kind: TaskEvent['kind'];
  // Present only on accepted and terminal events; backs the unique guard index
  guard?: EventGuard;
  sequenceHint?: TaskEvent['sequenceHint'];
  payload?: unknown;
  timestamp: Date;
  source: TaskEvent['source'];
}

const DUPLICATE_KEY = 11000;

function toDocument(event: TaskEvent): EventDocument {
  const guard = guardFor(event.kind);
  return {
    _id: event.id,
    taskId: event.taskId,
    kind: event.kind,
    timestamp: event.timestamp,
    source: event.source,
    ...(event.contextId !== undefined ? { contextId: event.contextId } : {}),
    ...(guard ? { guard } : {}),
    ...(event.sequenceHint ? { sequenceHint: event.sequenceHint } : {}),
    ...(event.payload !== undefined ? { payload: event.payload } : {}),
  };
}

function fromDocument(doc: EventDocument): TaskEvent {
  const event: TaskEvent = {
    id: doc._id,
    taskId: doc.taskId,
    kind: doc.kind,
    timestamp: doc.timestamp,
    source: doc.source,
  };
  if (doc.contextId != null) event.contextId = doc.contextId;
  if (doc.sequenceHint != null) event.sequenceHint = doc.sequenceHint;
  if (doc.payload !== undefined) event.payload = doc.payload;
  return event;
}

/**
 * MongoDB event store. A partial unique index on { taskId, guard } makes
 * the second accepted or terminal insert for a task fail atomically.
 *
 * Progress has no guard. It is inserted and then withdrawn if a terminal
 * event is found, so a progress event racing a terminal one is dropped
 * rather than left after it. Until the withdrawal a reader may briefly
 * see it.
 */
export class MongoEventStore extends BaseEventStore {
  private client: MongoClient | null = null;
  private db: Db | null = null;

  constructor(
    private readonly uri: string,
    private readonly dbName: string
  ) {
    super();
  }

  protected async doInitialize(): Promise<void> {
    const options: MongoClientOptions = {
      maxPoolSize: 10,
      serverSelectionTimeoutMS: 5000,
      socketTimeoutMS: 45000,
    };

    try {
      this.client = new MongoClient(this.uri, options);
      await this.client.connect();
      this.db = this.client.db(this.dbName);
      await this.createIndexes();
      logger.info('MongoDB event store initialized', { dbName: this.dbName });
    } catch (error) {
      logger.error(
        'Failed to initialize MongoDB event store',
        { dbName: this.dbName },
        error instanceof Error ? error : undefined
      );
      throw error;
    }
  }

  protected async doClose(): Promise<void> {
    if (this.client) {
      await this.client.close();
      this.client = null;
      this.db = null;
    }
  }

  private events(): Collection<EventDocument> {
    if (!this.db) {
      throw new Error('Event store not initialized. Call initialize() first.');
    }
    return this.db.collection<EventDocument>('events');
  }

  private async createIndexes(): Promise<void> {
    const events = this.events();
    await events.createIndex(
      { taskId: 1, guard: 1 },
      { unique: true, partialFilterExpression: { guard: { $exists: true } } }
    );
    await events.createIndex({ taskId: 1, timestamp: 1 });
  }

  protected async doAppend(event: TaskEvent): Promise<AppendResult> {
    const events = this.events();
    const doc = toDocument(event);

    if (!doc.guard) {
      // Insert first, then look: a terminal seen afterwards may have landed first, so the progress is withdrawn
      await events.insertOne(doc);
      const terminal = await events.findOne({ taskId: event.taskId, guard: 'terminal' });
      if (terminal) {
        await events.deleteOne({ _id: doc._id });
        return { status: 'closed', terminal: fromDocument(terminal) };
      }
      return { status: 'appended', event, correlation: 'matched' };
    }

    try {
      await events.insertOne(doc);
    } catch (error) {
      if (error instanceof MongoServerError && error.code === DUPLICATE_KEY) {
        const existing = await events.findOne({ taskId: event.taskId, guard: doc.guard });
        if (existing) {
          return { status: 'duplicate', existing: fromDocument(existing) };
        }
      }
      throw error;
    }

    if (doc.guard === 'terminal') {
      const accepted = await events.countDocuments({ taskId: event.taskId, guard: 'accepted' }, { limit: 1 });
      return { status: 'appended', event, correlation: accepted > 0 ? 'matched' : 'unknown' };
    }
    return { status: 'appended', event, correlation: 'matched' };
  }

  protected async doListEvents(taskId: string): Promise<TaskEvent[]> {
    const docs = await this.events().find({ taskId }).sort({ timestamp: 1 }).toArray();
    return docs.map(fromDocument);
  }

  protected async doGetTerminalEvent(taskId: string): Promise<TaskEvent | null> {
    const doc = await this.events().findOne({ taskId, guard: 'terminal' });
    return doc ? fromDocument(doc) : null;
  }

  async healthCheck(): Promise<{ healthy: boolean; message?: string }> {
    try {
      if (!this.db) {
        return { healthy: false, message: 'MongoDB event store not initialized' };
      }
      await this.db.admin().ping();
      return { healthy: true, message: 'MongoDB storage is operational' };
    } catch (error) {
      return {
        healthy: false,
        message: `MongoDB storage error: ${error instanceof Error ? error.message : String(error)}`,
      };
    }
  }
}
