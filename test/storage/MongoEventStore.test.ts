import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MongoEventStore } from '../../src/storage/MongoEventStore.js';
import { createEventInput } from '../fixtures/index.js';

/**
 * In-process stand-in for the MongoDB driver: one collection held in
 * memory, with the partial unique { taskId, guard } index enforced on insert
 */
const mongoFake = vi.hoisted(() => {
  type Doc = Record<string, unknown>;

  class MongoServerError extends Error {
    constructor(
      message: string,
      readonly code: number
    ) {
      super(message);
    }
  }

  const matches = (doc: Doc, filter: Doc): boolean => Object.entries(filter).every(([key, value]) => doc[key] === value);

  class FakeCollection {
    docs: Doc[] = [];
    indexes: Array<{ keys: Doc; options?: Doc }> = [];

    async createIndex(keys: Doc, options?: Doc): Promise<string> {
      this.indexes.push({ keys, options });
      return Object.keys(keys).join('_');
    }

    async insertOne(doc: Doc): Promise<{ insertedId: unknown }> {
      const clash = this.docs.some(
        existing =>
          existing._id === doc._id ||
          (doc.guard !== undefined && existing.taskId === doc.taskId && existing.guard === doc.guard)
      );
      if (clash) {
        throw new MongoServerError('E11000 duplicate key error', 11000);
      }
      this.docs.push(doc);
      state.afterInsert?.(doc);
      return { insertedId: doc._id };
    }

    async deleteOne(filter: Doc): Promise<{ deletedCount: number }> {
      const index = this.docs.findIndex(doc => matches(doc, filter));
      if (index === -1) return { deletedCount: 0 };
      this.docs.splice(index, 1);
      return { deletedCount: 1 };
    }

    async findOne(filter: Doc): Promise<Doc | null> {
      return this.docs.find(doc => matches(doc, filter)) ?? null;
    }

    async countDocuments(filter: Doc): Promise<number> {
      return this.docs.filter(doc => matches(doc, filter)).length;
    }

    find(filter: Doc): { sort: () => { toArray: () => Promise<Doc[]> } } {
      const found = this.docs.filter(doc => matches(doc, filter));
      return { sort: () => ({ toArray: async () => found }) };
    }
  }

  interface ClientRecord {
    uri: string;
    options: unknown;
    dbName?: string;
    closed: boolean;
  }

  const state: {
    collection: FakeCollection;
    pingError?: Error;
    clients: ClientRecord[];
    // Runs after each successful insert, to interleave a concurrent writer
    afterInsert?: (doc: Doc) => void;
  } = {
    collection: new FakeCollection(),
    clients: [],
  };

  class MongoClient {
    private readonly record: ClientRecord;

    constructor(uri: string, options: unknown) {
      this.record = { uri, options, closed: false };
      state.clients.push(this.record);
    }

    async connect(): Promise<this> {
      return this;
    }

    db(name: string): { collection: () => FakeCollection; admin: () => { ping: () => Promise<Doc> } } {
      this.record.dbName = name;
      return {
        collection: () => state.collection,
        admin: () => ({
          ping: async () => {
            if (state.pingError) throw state.pingError;
            return { ok: 1 };
          },
        }),
      };
    }

    async close(): Promise<void> {
      this.record.closed = true;
    }
  }

  return { FakeCollection, MongoClient, MongoServerError, state };
});

vi.mock('mongodb', () => ({ MongoClient: mongoFake.MongoClient, MongoServerError: mongoFake.MongoServerError }));

describe('MongoEventStore', () => {
  let store: MongoEventStore;

  beforeEach(async () => {
    mongoFake.state.collection = new mongoFake.FakeCollection();
    mongoFake.state.pingError = undefined;
    mongoFake.state.afterInsert = undefined;
    mongoFake.state.clients = [];

    store = new MongoEventStore('mongodb://localhost:27017', 'relay_test');
    await store.initialize();
  });

  afterEach(async () => {
    await store.close();
  });

  it('should connect to the configured database and create the guard index', () => {
    expect(mongoFake.state.clients).toHaveLength(1);
    expect(mongoFake.state.clients[0]).toMatchObject({ uri: 'mongodb://localhost:27017', dbName: 'relay_test' });
    expect(mongoFake.state.collection.indexes[0]).toEqual({
      keys: { taskId: 1, guard: 1 },
      options: { unique: true, partialFilterExpression: { guard: { $exists: true } } },
    });
  });

  it('should store guarded events with their guard and progress without one', async () => {
    await store.append(createEventInput({ taskId: 'task-1', kind: 'accepted', id: 'accepted-1' }));
    await store.append(createEventInput({ taskId: 'task-1', kind: 'progress', id: 'progress-1' }));

    const [accepted, progress] = mongoFake.state.collection.docs;
    expect(accepted).toMatchObject({ _id: 'accepted-1', taskId: 'task-1', kind: 'accepted', guard: 'accepted' });
    expect(progress._id).toBe('progress-1');
    expect('guard' in progress).toBe(false);
  });

  it('should report a second terminal event as a duplicate of the first', async () => {
    await store.append(createEventInput({ taskId: 'task-2', kind: 'completed', id: 'terminal-1' }));
    const second = await store.append(createEventInput({ taskId: 'task-2', kind: 'failed', id: 'terminal-2' }));

    expect(second.status).toBe('duplicate');
    if (second.status !== 'duplicate') return;
    expect(second.existing.id).toBe('terminal-1');
    expect(second.existing.kind).toBe('completed');
  });

  it('should decide correlation from the accepted record', async () => {
    const unknown = await store.append(createEventInput({ taskId: 'task-3', kind: 'completed' }));
    expect(unknown).toMatchObject({ status: 'appended', correlation: 'unknown' });

    await store.append(createEventInput({ taskId: 'task-4', kind: 'accepted' }));
    const matched = await store.append(createEventInput({ taskId: 'task-4', kind: 'completed' }));
    expect(matched).toMatchObject({ status: 'appended', correlation: 'matched' });
  });

  it('should close the log to progress after a terminal event', async () => {
    await store.append(createEventInput({ taskId: 'task-5', kind: 'failed', id: 'terminal-5' }));
    const late = await store.append(createEventInput({ taskId: 'task-5' }));

    expect(late.status).toBe('closed');
    if (late.status !== 'closed') return;
    expect(late.terminal.id).toBe('terminal-5');
    expect(mongoFake.state.collection.docs.map(doc => doc._id)).toEqual(['terminal-5']);
  });

  it('should withdraw progress when a terminal event lands during its insert', async () => {
    mongoFake.state.afterInsert = doc => {
      if (doc.kind !== 'progress') return;
      mongoFake.state.afterInsert = undefined;
      mongoFake.state.collection.docs.push({ _id: 'terminal-r', taskId: 'task-r', kind: 'completed', guard: 'terminal' });
    };

    const late = await store.append(createEventInput({ taskId: 'task-r', id: 'progress-r' }));

    expect(late.status).toBe('closed');
    if (late.status !== 'closed') return;
    expect(late.terminal.id).toBe('terminal-r');
    expect(mongoFake.state.collection.docs.map(doc => doc._id)).toEqual(['terminal-r']);
  });

  it('should list events and read the terminal event back', async () => {
    await store.append(createEventInput({ taskId: 'task-6', kind: 'accepted', contextId: 'ctx-6' }));
    await store.append(createEventInput({ taskId: 'task-6', kind: 'completed', payload: { text: 'done' } }));

    const events = await store.listEvents('task-6');
    expect(events.map(event => event.kind)).toEqual(['accepted', 'completed']);
    expect(events[0].contextId).toBe('ctx-6');

    expect((await store.getTerminalEvent('task-6'))?.payload).toEqual({ text: 'done' });
    expect(await store.getTerminalEvent('task-unknown')).toBeNull();
  });

  it('should close the client', async () => {
    await store.close();
    expect(mongoFake.state.clients[0].closed).toBe(true);
  });

  describe('healthCheck', () => {
    it('should report healthy when ping succeeds', async () => {
      await expect(store.healthCheck()).resolves.toEqual({ healthy: true, message: 'MongoDB storage is operational' });
    });

    it('should report unhealthy when ping fails', async () => {
      mongoFake.state.pingError = new Error('server selection timed out');
      await expect(store.healthCheck()).resolves.toEqual({
        healthy: false,
        message: 'MongoDB storage error: server selection timed out',
      });
    });
  });
});
