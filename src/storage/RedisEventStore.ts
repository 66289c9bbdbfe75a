import { createClient } from 'redis';
import type { AppendResult, Correlation, TaskEvent } from '../types/index.js';
import { BaseEventStore, deserializeEvent, serializeEvent } from './EventStore.js';
import { logger } from '../utils/logger.js';

/**
 * Appends one event under the task's guard slots in a single script run.
 * KEYS: events list, accepted slot, terminal slot. ARGV: event JSON, kind.
 * Replies { 'appended', correlation } or { 'duplicate' | 'closed', existing JSON }.
 */
export const APPEND_EVENT_SCRIPT = `
  local eventsKey = KEYS[1]
  local acceptedKey = KEYS[2]
  local terminalKey = KEYS[3]
  local event = ARGV[1]
  local kind = ARGV[2]
  local terminal = kind == 'completed' or kind == 'failed'

  if kind == 'accepted' then
    local existing = redis.call('GET', acceptedKey)
    if existing then
      return { 'duplicate', existing }
    end
    redis.call('SET', acceptedKey, event)
  elseif terminal then
    local existing = redis.call('GET', terminalKey)
    if existing then
      return { 'duplicate', existing }
    end
    redis.call('SET', terminalKey, event)
  else
    local existing = redis.call('GET', terminalKey)
    if existing then
      return { 'closed', existing }
    end
  end

  redis.call('RPUSH', eventsKey, event)

  if terminal and redis.call('EXISTS', acceptedKey) == 0 then
    return { 'appended', 'unknown' }
  end
  return { 'appended', 'matched' }
`;

/**
 * Redis event store for deployments where executor and receiver run on
 * separate hosts
 */
export class RedisEventStore extends BaseEventStore {
  private client: ReturnType<typeof createClient>;

  constructor(
    connectionString: string,
    database: number = 0,
    private readonly keyPrefix: string = 'relay:'
  ) {
    super();
    this.client = createClient({
      url: connectionString,
      database,
    });
    this.client.on('error', (error: Error) => {
      logger.error('Redis client error', { operation: 'redis' }, error);
    });
  }

  protected async doInitialize(): Promise<void> {
    await this.client.connect();
    await this.client.ping();
  }

  protected async doClose(): Promise<void> {
    await this.client.quit();
  }

  private eventsKey(taskId: string): string {
    return `${this.keyPrefix}task:${taskId}:events`;
  }

  private acceptedKey(taskId: string): string {
    return `${this.keyPrefix}task:${taskId}:accepted`;
  }

  private terminalKey(taskId: string): string {
    return `${this.keyPrefix}task:${taskId}:terminal`;
  }

  protected async doAppend(event: TaskEvent): Promise<AppendResult> {
    const reply: unknown = await this.client.eval(APPEND_EVENT_SCRIPT, {
      keys: [this.eventsKey(event.taskId), this.acceptedKey(event.taskId), this.terminalKey(event.taskId)],
      arguments: [JSON.stringify(serializeEvent(event)), event.kind],
    });

    if (!Array.isArray(reply) || reply.length !== 2) {
      throw new Error(`Unexpected reply from append script: ${JSON.stringify(reply)}`);
    }
    const [status, value] = reply;
    if (typeof status !== 'string' || typeof value !== 'string') {
      throw new Error(`Unexpected reply from append script: ${JSON.stringify(reply)}`);
    }

    switch (status) {
      case 'appended':
        return { status: 'appended', event, correlation: toCorrelation(value) };
      case 'duplicate':
        return { status: 'duplicate', existing: deserializeEvent(JSON.parse(value)) };
      case 'closed':
        return { status: 'closed', terminal: deserializeEvent(JSON.parse(value)) };
      default:
        throw new Error(`Unexpected status from append script: ${status}`);
    }
  }

  protected async doListEvents(taskId: string): Promise<TaskEvent[]> {
    const entries = await this.client.lRange(this.eventsKey(taskId), 0, -1);
    return entries.map(entry => deserializeEvent(JSON.parse(entry)));
  }

  protected async doGetTerminalEvent(taskId: string): Promise<TaskEvent | null> {
    const raw = await this.client.get(this.terminalKey(taskId));
    return raw ? deserializeEvent(JSON.parse(raw)) : null;
  }

  async healthCheck(): Promise<{ healthy: boolean; message?: string }> {
    try {
      await this.client.ping();
      return { healthy: true, message: 'Redis storage is operational' };
    } catch (error) {
      return {
        healthy: false,
        message: `Redis storage error: ${error instanceof Error ? error.message : String(error)}`,
      };
    }
  }
}

function toCorrelation(value: string): Correlation {
  return value === 'unknown' ? 'unknown' : 'matched';
}
