import type { TaskEvent } from '../types/index.js';

/**
 * Caller-side sink the executor publishes task events to
 */
export interface EventQueue {
  enqueue(event: TaskEvent): void | Promise<void>;
}

/**
 * Event queue that buffers everything it receives and can be consumed
 * as an async iterable, live, by any number of readers
 */
export class BufferedEventQueue implements EventQueue, AsyncIterable<TaskEvent> {
  private events: TaskEvent[] = [];
  private waiters: Array<() => void> = [];
  private closed = false;

  enqueue(event: TaskEvent): void {
    if (this.closed) {
      throw new Error(`Event queue is closed; dropped ${event.kind} event for task ${event.taskId}`);
    }
    this.events.push(event);
    this.notify();
  }

  close(): void {
    this.closed = true;
    this.notify();
  }

  isClosed(): boolean {
    return this.closed;
  }

  snapshot(): TaskEvent[] {
    return [...this.events];
  }

  async *[Symbol.asyncIterator](): AsyncIterator<TaskEvent> {
    let index = 0;
    while (true) {
      const event = this.events[index];
      if (event) {
        index++;
        yield event;
        continue;
      }
      if (this.closed) {
        return;
      }
      await new Promise<void>(resolve => this.waiters.push(resolve));
    }
  }

  private notify(): void {
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach(resolve => resolve());
  }
}
