import { v4 as uuidv4 } from 'uuid';
import type {
  DeliveryMode,
  Endpoint,
  EventKind,
  FailureDetail,
  ProxyTask,
  Resolution,
  SequenceHint,
  TaskContext,
  TaskEvent,
  TaskReference,
  TaskStatus,
} from '../types/index.js';
import { getErrorMessage, isTerminalStatus } from '../types/index.js';
import type { EventStore } from '../storage/EventStore.js';
import type { EventQueue } from './EventQueue.js';
import type { EndpointResolver } from './EndpointResolver.js';
import type { ForwardingClient } from './ForwardingClient.js';
import { buildCallbackUrl } from '../config/index.js';
import { RelayError, ResolutionError, toFailureDetail } from '../utils/errors.js';
import { logger, type Logger } from '../utils/logger.js';
import { metrics, RelayMetrics } from '../utils/metrics.js';

export interface ProxyExecutorOptions {
  // Externally reachable base of the webhook receiver; non-blocking delivery needs it
  publicBaseUrl?: string;
  protocol: string;
}

/**
 * The caller's message with its most recent feedback entry appended
 */
export function composeMessage(context: TaskContext): string {
  const feedback = [...(context.feedback ?? [])].sort((a, b) => (a.time ?? '').localeCompare(b.time ?? ''));
  const latest = feedback[feedback.length - 1];
  // A blank latest entry means no feedback, not a fallback to an older one
  return latest && latest.content.trim() !== ''
    ? `${context.message}\n\n[Feedback]\n${latest.content}`
    : context.message;
}

/**
 * Runs one task against its target agent and republishes what happens to
 * the caller's event queue, in blocking or non-blocking mode.
 *
 * The only per-task state kept in memory is the abort handle of a live
 * blocking stream. Non-blocking tasks live entirely in the event store
 * until the webhook receiver records their outcome.
 */
export class ProxyExecutor {
  private liveStreams = new Map<string, AbortController>();

  constructor(
    private readonly store: EventStore,
    private readonly client: ForwardingClient,
    private readonly resolver: EndpointResolver,
    private readonly options: ProxyExecutorOptions
  ) {}

  /**
   * Never rejects: every failure ends up as a terminal failed event on the
   * queue. Resolves with the task in its final (or awaiting_callback) state.
   */
  async execute(context: TaskContext, eventQueue: EventQueue, signal?: AbortSignal): Promise<ProxyTask> {
    const now = new Date();
    const taskId = context.taskId ?? uuidv4();
    const task: ProxyTask = {
      taskId,
      contextId: context.contextId ?? uuidv4(),
      todolistId: taskId,
      message: composeMessage(context),
      status: 'created',
      createdAt: now,
      updatedAt: now,
    };
    const log = logger.child({ taskId: task.taskId, contextId: task.contextId });
    const timer = metrics.startTimer(RelayMetrics.dispatchDuration);

    try {
      this.transition(task, 'resolving', log);
      let resolution: Resolution;
      try {
        resolution = this.resolver.resolve(context);
      } catch (error) {
        if (error instanceof ResolutionError) {
          log.warn('Could not resolve a target agent', { reason: error.message });
          await this.publishFailure(task, eventQueue, error.toDetail(), 'failed', log);
          return task;
        }
        throw error;
      }

      const { mode, endpoint } = await this.chooseMode(resolution, log);
      task.mode = mode;
      task.endpoint = endpoint;
      this.transition(task, 'dispatching', log, { mode, endpoint: endpoint.url, source: resolution.source });

      if (mode === 'non_blocking') {
        await this.dispatchNonBlocking(task, endpoint, eventQueue, log);
      } else {
        await this.dispatchBlocking(task, endpoint, eventQueue, log, signal);
      }
    } catch (error) {
      log.error(
        'Unexpected error while executing task',
        { status: task.status },
        error instanceof Error ? error : new Error(getErrorMessage(error))
      );
      if (!isTerminalStatus(task.status)) {
        // The store may be what failed, and a callback may still arrive: report to the caller only
        await this.publishFailure(task, eventQueue, toFailureDetail(error), 'failed', log);
      }
    } finally {
      timer.stop({ mode: task.mode ?? 'none', status: task.status });
      metrics.incrementCounter(RelayMetrics.dispatchTotal, { mode: task.mode ?? 'none', outcome: task.status });
    }

    return task;
  }

  /**
   * Abort the live blocking stream of a task, if this process holds one.
   * Non-blocking tasks are unaffected; their callback may still arrive.
   */
  async cancel(reference: TaskReference, eventQueue: EventQueue): Promise<boolean> {
    const { taskId } = reference;
    const controller = this.liveStreams.get(taskId);
    const stage = controller ? 'cancel_requested' : 'cancel_not_applicable';

    logger.info('Cancel requested', { taskId, stage });
    controller?.abort();

    await eventQueue.enqueue({
      id: uuidv4(),
      taskId,
      ...(reference.contextId ? { contextId: reference.contextId } : {}),
      kind: 'progress',
      sequenceHint: { stage },
      timestamp: new Date(),
      source: 'executor',
    });

    return controller !== undefined;
  }

  hasLiveStream(taskId: string): boolean {
    return this.liveStreams.has(taskId);
  }

  private async chooseMode(resolution: Resolution, log: Logger): Promise<{ mode: DeliveryMode; endpoint: Endpoint }> {
    const { endpoint, delivery } = resolution;

    if (delivery === 'blocking') {
      return { mode: 'blocking', endpoint };
    }

    if (!this.options.publicBaseUrl) {
      if (delivery === 'non_blocking') {
        log.warn('Non-blocking delivery requested but no public base URL is configured; using blocking mode', {
          endpoint: endpoint.url,
        });
      }
      return { mode: 'blocking', endpoint };
    }

    if (delivery === 'non_blocking') {
      return { mode: 'non_blocking', endpoint };
    }

    try {
      const card = await this.client.getAgentCard(endpoint.url);
      const probed: Endpoint = {
        ...endpoint,
        capabilities: {
          pushNotifications: card.capabilities.pushNotifications,
          streaming: card.capabilities.streaming,
          ...endpoint.capabilities,
        },
      };
      return { mode: this.client.supportsPushNotifications(card) ? 'non_blocking' : 'blocking', endpoint: probed };
    } catch (error) {
      log.warn('Agent card probe failed; using blocking mode', {
        endpoint: endpoint.url,
        errorMessage: getErrorMessage(error),
      });
      return { mode: 'blocking', endpoint };
    }
  }

  private async dispatchBlocking(
    task: ProxyTask,
    endpoint: Endpoint,
    eventQueue: EventQueue,
    log: Logger,
    signal?: AbortSignal
  ): Promise<void> {
    const controller = new AbortController();
    const abortStream = (): void => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', abortStream, { once: true });
    }

    this.liveStreams.set(task.taskId, controller);
    metrics.incrementGauge(RelayMetrics.streamsActive);
    this.transition(task, 'streaming', log);

    try {
      await this.announceStart(task, endpoint, eventQueue);
      for await (const forwarded of this.client.send(task, endpoint, { signal: controller.signal })) {
        switch (forwarded.kind) {
          case 'progress': {
            task.remoteTaskId = forwarded.update.remoteTaskId ?? task.remoteTaskId;
            const event = this.createEvent(task, 'progress', forwarded.update, forwarded.sequenceHint);
            await eventQueue.enqueue(event);
            await this.recordProgress(event, log);
            break;
          }
          case 'completed':
            await this.finish(task, eventQueue, this.createEvent(task, 'completed', forwarded.result), 'completed', log);
            return;
          case 'failed':
            await this.finish(task, eventQueue, this.createEvent(task, 'failed', forwarded.detail), 'failed', log);
            return;
          case 'cancelled':
            await this.finish(task, eventQueue, this.createEvent(task, 'failed', forwarded.detail), 'cancelled', log);
            return;
        }
      }
    } catch (error) {
      if (!(error instanceof RelayError)) {
        throw error;
      }
      log.warn('Blocking exchange failed', { failureType: error.type, code: error.code, reason: error.message });
      await this.finish(task, eventQueue, this.createEvent(task, 'failed', error.toDetail()), 'failed', log);
    } finally {
      // A later execution may have reused the task id
      if (this.liveStreams.get(task.taskId) === controller) {
        this.liveStreams.delete(task.taskId);
      }
      metrics.decrementGauge(RelayMetrics.streamsActive);
      signal?.removeEventListener('abort', abortStream);
    }
  }

  private async dispatchNonBlocking(task: ProxyTask, endpoint: Endpoint, eventQueue: EventQueue, log: Logger): Promise<void> {
    const publicBaseUrl = this.options.publicBaseUrl;
    if (!publicBaseUrl) {
      throw new Error('Non-blocking dispatch requires a public base URL');
    }
    const callbackUrl = buildCallbackUrl(publicBaseUrl, this.options.protocol, task.todolistId);

    await this.announceStart(task, endpoint, eventQueue);
    const outcome = await this.client.sendAsync(task, endpoint, callbackUrl);
    if (outcome.status !== 'submitted') {
      log.warn('Target did not accept the task', {
        outcome: outcome.status,
        failureType: outcome.error.type,
        reason: outcome.error.message,
      });
      await this.finish(task, eventQueue, this.createEvent(task, 'failed', outcome.error.toDetail()), 'failed', log);
      return;
    }

    task.remoteTaskId = outcome.remoteTaskId;
    const accepted = this.createEvent(
      task,
      'accepted',
      { remoteTaskId: outcome.remoteTaskId, callbackUrl, firstMessage: outcome.firstMessage },
      { stage: 'submitted' }
    );

    // The accepted record must exist before dispatch returns
    const result = await this.store.append(accepted);
    if (result.status === 'duplicate') {
      log.warn('Task already had an accepted event', { existingEventId: result.existing.id });
    }

    await eventQueue.enqueue(accepted);
    this.transition(task, 'awaiting_callback', log, { remoteTaskId: outcome.remoteTaskId, callbackUrl });
    await eventQueue.enqueue(this.createEvent(task, 'progress', undefined, { stage: 'awaiting_callback' }));
  }

  /**
   * Tell the caller which agent the task is going to. Published to the
   * queue only; the store log starts with the target's own events.
   */
  private async announceStart(task: ProxyTask, endpoint: Endpoint, eventQueue: EventQueue): Promise<void> {
    const agent: Record<string, string> = { displayName: endpoint.displayName };
    if (endpoint.role) agent.role = endpoint.role;
    if (endpoint.profile) agent.profile = endpoint.profile;
    await eventQueue.enqueue(this.createEvent(task, 'progress', agent, { stage: 'started' }));
  }

  private createEvent(task: ProxyTask, kind: EventKind, payload?: unknown, sequenceHint?: SequenceHint): TaskEvent {
    const event: TaskEvent = {
      id: uuidv4(),
      taskId: task.taskId,
      contextId: task.contextId,
      kind,
      timestamp: new Date(),
      source: 'executor',
    };
    if (sequenceHint) event.sequenceHint = sequenceHint;
    if (payload !== undefined) event.payload = payload;
    return event;
  }

  private async recordProgress(event: TaskEvent, log: Logger): Promise<void> {
    try {
      await this.store.append(event);
    } catch (error) {
      log.error(
        'Failed to record progress event',
        { eventId: event.id },
        error instanceof Error ? error : new Error(getErrorMessage(error))
      );
    }
  }

  /**
   * Publish the terminal event, then record it under the store's guard.
   * The caller already holds the outcome, so a store failure is logged.
   */
  private async finish(task: ProxyTask, eventQueue: EventQueue, event: TaskEvent, status: TaskStatus, log: Logger): Promise<void> {
    await eventQueue.enqueue(event);
    this.transition(task, status, log);

    try {
      const result = await this.store.append(event);
      if (result.status === 'duplicate') {
        log.warn('Terminal event already recorded for task', { existingEventId: result.existing.id });
      }
    } catch (error) {
      log.error(
        'Failed to record terminal event',
        { eventId: event.id, kind: event.kind },
        error instanceof Error ? error : new Error(getErrorMessage(error))
      );
    }
  }

  /**
   * Terminal failure reported to the caller only
   */
  private async publishFailure(
    task: ProxyTask,
    eventQueue: EventQueue,
    detail: FailureDetail,
    status: TaskStatus,
    log: Logger
  ): Promise<void> {
    this.transition(task, status, log);
    try {
      await eventQueue.enqueue(this.createEvent(task, 'failed', detail));
    } catch (error) {
      log.error(
        'Failed to publish failure to caller',
        { failureType: detail.type },
        error instanceof Error ? error : new Error(getErrorMessage(error))
      );
    }
  }

  private transition(task: ProxyTask, status: TaskStatus, log: Logger, context: Record<string, unknown> = {}): void {
    log.debug('Task status changed', { from: task.status, to: status, ...context });
    task.status = status;
    task.updatedAt = new Date();
  }
}
