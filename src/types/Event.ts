export type EventKind = 'accepted' | 'progress' | 'completed' | 'failed';

export type TerminalEventKind = 'completed' | 'failed';

export type EventSource = 'executor' | 'receiver';

export type SequenceHint = { current: number; total: number } | { stage: string };

export type FailureType =
  | 'resolution'
  | 'transport'
  | 'protocol_rejection'
  | 'timeout'
  | 'cancelled'
  | 'classification'
  | 'internal';

/**
 * Payload of every `failed` event
 */
export interface FailureDetail {
  type: FailureType;
  message: string;
  code?: string;
  targetDetail?: unknown;
}

/**
 * Payload of a `completed` event
 */
export interface CompletedResult {
  text: string;
  remoteTaskId?: string;
  contextId?: string;
}

export interface TaskEvent {
  id: string;
  taskId: string;
  contextId?: string;
  kind: EventKind;
  sequenceHint?: SequenceHint;
  payload?: unknown;
  timestamp: Date;
  source: EventSource;
}

export type TaskEventInput = Omit<TaskEvent, 'id' | 'timestamp'> & {
  id?: string;
  timestamp?: Date;
};

export type EventGuard = 'accepted' | 'terminal';

export type Correlation = 'matched' | 'unknown';

export type AppendResult =
  | { status: 'appended'; event: TaskEvent; correlation: Correlation }
  | { status: 'duplicate'; existing: TaskEvent }
  | { status: 'closed'; terminal: TaskEvent };

export function isTerminalKind(kind: EventKind): kind is TerminalEventKind {
  return kind === 'completed' || kind === 'failed';
}

/**
 * Which at-most-once slot an event occupies, if any
 */
export function guardFor(kind: EventKind): EventGuard | undefined {
  if (kind === 'accepted') return 'accepted';
  if (isTerminalKind(kind)) return 'terminal';
  return undefined;
}
