import path from 'path';
import lockfile from 'proper-lockfile';
import type { AppendResult, TaskEvent } from '../types/index.js';
import { isRecord, isTerminalKind } from '../types/index.js';
import { BaseEventStore, deserializeEvent, evaluateGuard, serializeEvent } from './EventStore.js';
import type { StoredEvent } from './EventStore.js';
import { ensureDirectory, fileExists, readFileSafe, writeFileAtomic } from '../utils/fileUtils.js';
import { logger } from '../utils/logger.js';

interface TaskLogFile {
  taskId: string;
  events: StoredEvent[];
}

/**
 * File-based event store: one JSON document per task, guarded by an
 * in-process lock plus a proper-lockfile lock so that separate executor
 * and receiver processes sharing a data directory serialise their writes.
 * Suitable for single-machine deployments and development.
 */
export class FileEventStore extends BaseEventStore {
  private memoryLocks: Map<string, Promise<void>> = new Map();

  constructor(
    private readonly dataDir: string = './data',
    private readonly lockTimeout: number = 30000
  ) {
    super();
  }

  protected async doInitialize(): Promise<void> {
    await ensureDirectory(this.eventsDir());
  }

  protected async doClose(): Promise<void> {
    // No persistent connections to close for file storage
  }

  private eventsDir(): string {
    return path.join(this.dataDir, 'events');
  }

  private getTaskFilePath(taskId: string): string {
    return path.join(this.eventsDir(), `${encodeURIComponent(taskId)}.json`);
  }

  private async readTaskLog(taskId: string): Promise<TaskEvent[]> {
    const content = await readFileSafe(this.getTaskFilePath(taskId));
    if (!content) {
      return [];
    }
    const data: unknown = JSON.parse(content);
    if (!isRecord(data) || !Array.isArray(data.events)) {
      throw new Error(`Corrupt event log for task ${taskId}`);
    }
    return data.events.map(deserializeEvent);
  }

  private async withTaskLock<T>(taskId: string, operation: () => Promise<T>): Promise<T> {
    const memoryLockKey = `task:${taskId}`;
    while (this.memoryLocks.has(memoryLockKey)) {
      logger.trace('Waiting for in-memory lock', { operation: 'withTaskLock', taskId });
      await this.memoryLocks.get(memoryLockKey);
    }

    let releaseMemoryLock = (): void => {};
    this.memoryLocks.set(
      memoryLockKey,
      new Promise<void>(resolve => {
        releaseMemoryLock = resolve;
      })
    );

    try {
      // The task file may not exist yet, so lock by path without resolving it
      const release = await lockfile.lock(this.getTaskFilePath(taskId), {
        realpath: false,
        retries: {
          retries: 50,
          minTimeout: 5,
          maxTimeout: 200,
          factor: 1.1,
        },
        stale: this.lockTimeout,
      });

      try {
        return await operation();
      } finally {
        await release();
      }
    } finally {
      this.memoryLocks.delete(memoryLockKey);
      releaseMemoryLock();
    }
  }

  protected async doAppend(event: TaskEvent): Promise<AppendResult> {
    return this.withTaskLock(event.taskId, async (): Promise<AppendResult> => {
      const events = await this.readTaskLog(event.taskId);
      const decision = evaluateGuard(event, {
        accepted: events.find(existing => existing.kind === 'accepted'),
        terminal: events.find(existing => isTerminalKind(existing.kind)),
      });

      if ('status' in decision) {
        return decision;
      }

      events.push(event);
      const data: TaskLogFile = { taskId: event.taskId, events: events.map(serializeEvent) };
      await writeFileAtomic(this.getTaskFilePath(event.taskId), JSON.stringify(data, null, 2));

      return { status: 'appended', event, correlation: decision.correlation };
    });
  }

  protected async doListEvents(taskId: string): Promise<TaskEvent[]> {
    return this.readTaskLog(taskId);
  }

  protected async doGetTerminalEvent(taskId: string): Promise<TaskEvent | null> {
    const events = await this.readTaskLog(taskId);
    return events.find(event => isTerminalKind(event.kind)) ?? null;
  }

  async healthCheck(): Promise<{ healthy: boolean; message?: string }> {
    try {
      if (!(await fileExists(this.eventsDir()))) {
        return { healthy: false, message: `Data directory ${this.eventsDir()} is missing` };
      }
      return { healthy: true, message: 'File storage is operational' };
    } catch (error) {
      return {
        healthy: false,
        message: `File storage error: ${error instanceof Error ? error.message : String(error)}`,
      };
    }
  }
}
