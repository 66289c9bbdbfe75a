import type {
  CompletedResult,
  Correlation,
  FailureDetail,
  TaskEventInput,
} from '../types/index.js';
import type { EventStore } from '../storage/EventStore.js';
import { CallbackClassificationError, ProtocolRejection } from '../utils/errors.js';
import { classifyState, readNotification, type NotificationFields } from '../utils/protocol.js';
import { isValidTodolistId } from '../utils/validation.js';
import { logger } from '../utils/logger.js';
import { metrics, RelayMetrics } from '../utils/metrics.js';

export type ReceiptKind = 'completed' | 'failed' | 'ignored';

export interface Ack {
  status: 'ack';
  todolistId: string;
  kind: ReceiptKind;
  // Absent when the payload carried no readable state
  state?: string;
  recorded: boolean;
  correlation?: Correlation;
  remoteTaskId?: string;
}

export interface Rejected {
  status: 'rejected';
  reason: string;
}

export type ReceiveOutcome = Ack | Rejected;

type Outcome =
  | { kind: 'completed'; payload: CompletedResult }
  | { kind: 'failed'; payload: FailureDetail }
  | { kind: 'ignored' };

function classify(notification: NotificationFields): Outcome {
  const { state, text } = notification;
  if (state === undefined) {
    return {
      kind: 'failed',
      payload: new CallbackClassificationError('Payload carries no A2A task state', 'UNREADABLE_PAYLOAD', text).toDetail(),
    };
  }
  switch (classifyState(state)) {
    case 'progress':
      return { kind: 'ignored' };
    case 'completed':
      return {
        kind: 'completed',
        payload: { text: text ?? 'Task completed', remoteTaskId: notification.remoteTaskId, contextId: notification.contextId },
      };
    case 'rejected':
      return { kind: 'failed', payload: new ProtocolRejection(`Target agent reported task ${state}`, state, text).toDetail() };
    case 'input_required':
      return { kind: 'failed', payload: new ProtocolRejection('Input not supported in webhook mode', state, text).toDetail() };
    case 'unknown':
      return {
        kind: 'failed',
        payload: new CallbackClassificationError(`Unrecognised task state "${state}"`, 'UNKNOWN_STATE', text).toDetail(),
      };
  }
}

/**
 * Classifies push notifications from target agents and records their
 * outcome in the event store. Holds no state of its own; the todolist id
 * in the callback URL is the only link to the originating task.
 */
export class WebhookReceiver {
  constructor(private readonly store: EventStore) {}

  async receive(todolistId: string | undefined, payload: unknown): Promise<ReceiveOutcome> {
    if (!isValidTodolistId(todolistId)) {
      return this.reject(`Malformed todolist id: ${JSON.stringify(todolistId ?? null)}`, { todolistId });
    }

    const log = logger.child({ todolistId, operation: 'webhook' });
    const notification = readNotification(payload);
    const { state, remoteTaskId } = notification;
    const outcome = classify(notification);

    if (outcome.kind === 'ignored') {
      log.info('Ignoring non-terminal notification', { state, remoteTaskId });
      metrics.incrementCounter(RelayMetrics.webhookDeliveries, { outcome: 'ignored' });
      return { status: 'ack', todolistId, kind: 'ignored', state, recorded: false, remoteTaskId };
    }

    const { kind } = outcome;
    const event: TaskEventInput = {
      taskId: todolistId,
      kind,
      payload: outcome.payload,
      source: 'receiver',
    };

    const result = await this.store.append(event);

    if (result.status !== 'appended') {
      log.info('Duplicate terminal delivery dropped', { state, remoteTaskId });
      metrics.incrementCounter(RelayMetrics.webhookDeliveries, { outcome: 'duplicate' });
      return { status: 'ack', todolistId, kind, state, recorded: false, remoteTaskId };
    }

    if (result.correlation === 'unknown') {
      log.warn('Recorded terminal event for a task with no accepted record', { state, remoteTaskId });
    } else {
      log.info('Recorded terminal event', { kind, state, remoteTaskId });
    }
    metrics.incrementCounter(RelayMetrics.webhookDeliveries, { outcome: 'recorded', kind });

    return {
      status: 'ack',
      todolistId,
      kind,
      state,
      recorded: true,
      correlation: result.correlation,
      remoteTaskId,
    };
  }

  private reject(reason: string, context: Record<string, unknown>): Rejected {
    logger.warn('Rejected webhook delivery', { ...context, reason });
    metrics.incrementCounter(RelayMetrics.webhookDeliveries, { outcome: 'rejected' });
    return { status: 'rejected', reason };
  }
}
