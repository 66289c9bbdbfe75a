/**
 * Output formatters for CLI commands
 * Supports both human-readable and JSON formats
 */

import type { ChalkInstance } from 'chalk';
import chalk from '../utils/chalk.js';
import type { EventKind, ProxyTask, SequenceHint, TaskEvent, TaskStatus } from '../types/index.js';
import { isRecord } from '../types/index.js';

export type OutputFormat = 'human' | 'json';

const KIND_WIDTH = 'COMPLETED'.length;

function kindColor(kind: EventKind): ChalkInstance {
  const colors: Record<EventKind, ChalkInstance> = {
    accepted: chalk.yellow,
    progress: chalk.blue,
    completed: chalk.green,
    failed: chalk.red,
  };
  return colors[kind];
}

function statusColor(status: TaskStatus): ChalkInstance {
  switch (status) {
    case 'completed':
      return chalk.green;
    case 'failed':
    case 'cancelled':
      return chalk.red;
    case 'awaiting_callback':
      return chalk.yellow;
    default:
      return chalk.blue;
  }
}

function formatHint(hint: SequenceHint | undefined): string {
  if (!hint) return '';
  return 'stage' in hint ? `[${hint.stage}]` : `[${hint.current}/${hint.total}]`;
}

function readString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * One-line summary of what an event's payload carries
 */
function describePayload(event: TaskEvent): string {
  const payload = event.payload;
  if (!isRecord(payload)) return '';

  switch (event.kind) {
    case 'progress': {
      const state = readString(payload, 'state');
      const text = readString(payload, 'text');
      return [state, text].filter(part => part !== undefined).join(': ');
    }
    case 'accepted': {
      const remoteTaskId = readString(payload, 'remoteTaskId');
      return remoteTaskId ? `remote task ${remoteTaskId}` : '';
    }
    case 'completed':
      return readString(payload, 'text') ?? '';
    case 'failed': {
      const type = readString(payload, 'type') ?? 'unknown';
      const code = readString(payload, 'code');
      const message = readString(payload, 'message') ?? '';
      return `${code ? `${type}/${code}` : type}: ${message}`;
    }
  }
}

/**
 * Format a single event as one line: time, kind, hint and payload summary
 */
export function formatEvent(event: TaskEvent): string {
  const time = chalk.gray(event.timestamp.toISOString());
  const kind = kindColor(event.kind)(event.kind.toUpperCase().padEnd(KIND_WIDTH));
  const parts = [time, kind, formatHint(event.sequenceHint), describePayload(event)].filter(part => part !== '');
  return parts.join(' ');
}

/**
 * Format a stored event log
 */
export function formatEventLog(taskId: string, events: TaskEvent[]): string {
  if (events.length === 0) {
    return chalk.gray(`No events recorded for task ${taskId}`);
  }
  let output = `${chalk.bold('Events for')} ${taskId} (${events.length})\n`;
  output += events.map(formatEvent).join('\n');
  return output;
}

/**
 * Format the task as it stands once the executor returns
 */
export function formatTask(task: ProxyTask): string {
  let output = `\n${chalk.bold('Task:')} ${task.taskId}\n`;
  output += `${chalk.gray('Status:')} ${statusColor(task.status)(task.status.toUpperCase())}\n`;
  output += `${chalk.gray('Context:')} ${task.contextId}\n`;

  if (task.mode) {
    output += `${chalk.gray('Mode:')} ${task.mode}\n`;
  }
  if (task.endpoint) {
    output += `${chalk.gray('Endpoint:')} ${task.endpoint.displayName} (${task.endpoint.url})\n`;
  }
  if (task.remoteTaskId) {
    output += `${chalk.gray('Remote task:')} ${task.remoteTaskId}\n`;
  }
  if (task.status === 'awaiting_callback') {
    output += chalk.yellow('Result will be recorded when the target agent calls back') + '\n';
  }

  return output;
}

export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
