import { fetch } from 'undici';
import type { Response } from 'undici';
import type {
  A2AArtifact,
  A2AMessage,
  A2AResult,
  A2ATaskStatus,
  AgentCard,
  CompletedResult,
  Endpoint,
  FailureDetail,
  ProxyTask,
  SequenceHint,
} from '../types/index.js';
import { getErrorMessage, isRecord } from '../types/index.js';
import {
  CancelledError,
  ProtocolRejection,
  RelayError,
  TimeoutError,
  TransportError,
} from '../utils/errors.js';
import {
  buildCancelRequest,
  buildMessageRequest,
  classifyState,
  extractResultText,
  firstAgentText,
  messageText,
  parseAgentCard,
  parseJsonRpcResponse,
  parseResult,
  partsText,
  readSequenceHint,
} from '../utils/protocol.js';
import { logger } from '../utils/logger.js';

export interface ForwardingClientOptions {
  // Bound on each wait for the next event of a blocking exchange
  eventTimeoutMs: number;
  // Bound on a whole non-blocking submission
  submitTimeoutMs: number;
  agentCardTimeoutMs: number;
}

export interface ProgressUpdate {
  state: string;
  text?: string;
  remoteTaskId?: string;
}

export type ForwardedEvent =
  | { kind: 'progress'; sequenceHint: SequenceHint; update: ProgressUpdate }
  | { kind: 'completed'; result: CompletedResult }
  | { kind: 'failed'; detail: FailureDetail }
  | { kind: 'cancelled'; detail: FailureDetail };

export type SubmissionOutcome =
  | { status: 'submitted'; remoteTaskId?: string; firstMessage?: string }
  | { status: 'rejected'; error: ProtocolRejection }
  | { status: 'transport_error'; error: TransportError };

export interface SendOptions {
  signal?: AbortSignal;
}

const AGENT_CARD_PATHS = ['/.well-known/agent-card.json', '/.well-known/agent.json'];

const EVENT_BOUNDARY = /\r?\n\r?\n/;

const DEFAULT_RESULT_TEXT = 'Task completed';

// What one blocking exchange has learned about the remote task so far
interface ExchangeState {
  remoteTaskId?: string;
  contextId?: string;
  artifacts: A2AArtifact[];
}

function errnoCode(value: unknown): string | undefined {
  return isRecord(value) && typeof value.code === 'string' ? value.code : undefined;
}

/**
 * Map a fetch failure (refused, reset, DNS, aborted) to a TransportError
 */
export function toTransportError(error: unknown, url: string): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  const cause = error instanceof Error ? error.cause : undefined;
  const code = errnoCode(cause) ?? errnoCode(error) ?? 'TRANSPORT_ERROR';
  const reason = cause instanceof Error ? cause.message : getErrorMessage(error);
  return new TransportError(`Could not reach target agent at ${url}: ${reason}`, code);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new ProtocolRejection('Target sent a body that is not valid JSON', 'INVALID_PAYLOAD', text.slice(0, 500));
  }
}

/**
 * Joined `data:` lines of one server-sent event, or undefined for
 * comments and keep-alives
 */
function sseData(rawEvent: string): string | undefined {
  const lines = rawEvent
    .split(/\r?\n/)
    .filter(line => line.startsWith('data:'))
    .map(line => line.slice(5).replace(/^ /, ''));
  return lines.length > 0 ? lines.join('\n') : undefined;
}

function isEventStream(response: Response): boolean {
  return (response.headers.get('content-type') ?? '').includes('text/event-stream');
}

function failed(error: RelayError): ForwardedEvent {
  return { kind: 'failed', detail: error.toDetail() };
}

/**
 * Talks A2A JSON-RPC to one target agent on behalf of the executor
 */
export class ForwardingClient {
  private agentCards = new Map<string, AgentCard>();

  constructor(private readonly options: ForwardingClientOptions) {}

  /**
   * Blocking exchange: a lazy sequence of progress events ending in exactly
   * one completed, failed or cancelled event. Transport problems and
   * per-event timeouts are thrown as TransportError / TimeoutError.
   */
  async *send(task: ProxyTask, endpoint: Endpoint, options: SendOptions = {}): AsyncGenerator<ForwardedEvent, void, undefined> {
    const { signal } = options;
    const controller = new AbortController();
    const abortTransport = (): void => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', abortTransport, { once: true });
    }

    const streaming = endpoint.capabilities.streaming === true;
    const request = buildMessageRequest(
      streaming ? 'message/stream' : 'message/send',
      task.message,
      { acceptedOutputModes: ['text'], blocking: true },
      { relayTaskId: task.taskId }
    );
    const exchange: ExchangeState = { artifacts: [] };
    const log = logger.child({ taskId: task.taskId, endpoint: endpoint.url, operation: 'forward' });

    try {
      log.debug('Forwarding task', { method: request.method });
      const response = await this.withEventTimeout(
        this.post(endpoint.url, request, controller.signal, streaming),
        controller
      );

      if (streaming && isEventStream(response)) {
        for await (const message of this.readEventStream(response, controller)) {
          const forwarded = this.interpret(message, exchange, false);
          yield forwarded;
          if (forwarded.kind !== 'progress') {
            return;
          }
        }
        throw new TransportError('Target closed the stream before a terminal event', 'STREAM_CLOSED');
      }

      const body = parseJson(await this.withEventTimeout(response.text(), controller));
      yield this.interpret(body, exchange, true);
    } catch (error) {
      if (signal?.aborted) {
        log.info('Blocking exchange cancelled by caller', { remoteTaskId: exchange.remoteTaskId });
        await this.cancelRemote(endpoint, exchange.remoteTaskId);
        yield { kind: 'cancelled', detail: new CancelledError('Task cancelled by caller', 'CANCELLED').toDetail() };
        return;
      }
      if (error instanceof RelayError) {
        throw error;
      }
      throw toTransportError(error, endpoint.url);
    } finally {
      signal?.removeEventListener('abort', abortTransport);
      // Closes the connection if the exchange ended early
      controller.abort();
    }
  }

  /**
   * Non-blocking submission with a push-notification callback. Never waits
   * for the task's result.
   */
  async sendAsync(task: ProxyTask, endpoint: Endpoint, callbackUrl: string): Promise<SubmissionOutcome> {
    const request = buildMessageRequest(
      'message/send',
      task.message,
      { acceptedOutputModes: ['text'], blocking: false, pushNotificationConfig: { url: callbackUrl } },
      { relayTaskId: task.taskId }
    );
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.submitTimeoutMs);

    try {
      const response = await this.post(endpoint.url, request, controller.signal);
      return this.interpretSubmission(parseJson(await response.text()));
    } catch (error) {
      if (error instanceof ProtocolRejection) {
        return { status: 'rejected', error };
      }
      if (controller.signal.aborted) {
        return {
          status: 'transport_error',
          error: new TransportError(
            `Submission to ${endpoint.url} timed out after ${this.options.submitTimeoutMs}ms`,
            'ETIMEDOUT'
          ),
        };
      }
      return { status: 'transport_error', error: toTransportError(error, endpoint.url) };
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Fetch the target's agent card, trying the current well-known path
   * first and the legacy one second. Cached per endpoint URL.
   */
  async getAgentCard(endpointUrl: string): Promise<AgentCard> {
    const cached = this.agentCards.get(endpointUrl);
    if (cached) {
      return cached;
    }

    const base = endpointUrl.replace(/\/+$/, '');
    let lastError: unknown;
    for (const cardPath of AGENT_CARD_PATHS) {
      const url = `${base}${cardPath}`;
      try {
        const response = await fetch(url, {
          headers: { accept: 'application/json' },
          signal: AbortSignal.timeout(this.options.agentCardTimeoutMs),
        });
        const text = await response.text();
        if (!response.ok) {
          lastError = new TransportError(`Agent card request to ${url} returned HTTP ${response.status}`, `HTTP_${response.status}`);
          continue;
        }
        const card = parseAgentCard(parseJson(text));
        this.agentCards.set(endpointUrl, card);
        logger.debug('Fetched agent card', { endpoint: endpointUrl, agentName: card.name, capabilities: card.capabilities });
        return card;
      } catch (error) {
        lastError = error;
        logger.debug('Agent card lookup failed', { endpoint: endpointUrl, url, errorMessage: getErrorMessage(error) });
      }
    }

    throw lastError instanceof RelayError ? lastError : toTransportError(lastError, base);
  }

  supportsPushNotifications(card: AgentCard): boolean {
    return card.capabilities.pushNotifications === true;
  }

  private async post(url: string, body: unknown, signal: AbortSignal, stream: boolean = false): Promise<Response> {
    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        accept: stream ? 'text/event-stream' : 'application/json',
      },
      body: JSON.stringify(body),
      signal,
    });

    if (!response.ok) {
      const detail = await response.text();
      throw new TransportError(
        `Target agent at ${url} responded with HTTP ${response.status}`,
        `HTTP_${response.status}`,
        detail ? detail.slice(0, 500) : undefined
      );
    }
    return response;
  }

  private withEventTimeout<T>(promise: Promise<T>, controller: AbortController): Promise<T> {
    const timeoutMs = this.options.eventTimeoutMs;
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new TimeoutError(`No event from target agent within ${timeoutMs}ms`, 'EVENT_TIMEOUT'));
        controller.abort();
      }, timeoutMs);

      promise.then(
        value => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        }
      );
    });
  }

  private async *readEventStream(response: Response, controller: AbortController): AsyncGenerator<unknown, void, undefined> {
    if (!response.body) {
      throw new TransportError('Target returned a stream without a body', 'EMPTY_STREAM');
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffer = '';

    while (true) {
      const { done, value } = await this.withEventTimeout(reader.read(), controller);
      if (done) {
        buffer += decoder.decode();
        break;
      }
      buffer += decoder.decode(value, { stream: true });

      let boundary = EVENT_BOUNDARY.exec(buffer);
      while (boundary) {
        const data = sseData(buffer.slice(0, boundary.index));
        buffer = buffer.slice(boundary.index + boundary[0].length);
        if (data !== undefined) {
          yield parseJson(data);
        }
        boundary = EVENT_BOUNDARY.exec(buffer);
      }
    }

    const tail = sseData(buffer);
    if (tail !== undefined) {
      yield parseJson(tail);
    }
  }

  /**
   * Turn one JSON-RPC response into the next forwarded event. `final` marks
   * the single answer of a non-streaming exchange, where a working state
   * cannot be followed by anything.
   */
  private interpret(body: unknown, exchange: ExchangeState, final: boolean): ForwardedEvent {
    const rpc = parseJsonRpcResponse(body);
    if (rpc.error) {
      return failed(
        new ProtocolRejection(rpc.error.message || 'Target returned a JSON-RPC error', String(rpc.error.code), rpc.error)
      );
    }

    const result = parseResult(rpc.result);
    if (!result) {
      throw new ProtocolRejection('Target returned a result this relay cannot read', 'INVALID_RESULT', rpc.result);
    }
    return this.fromResult(result, exchange, final);
  }

  private fromResult(result: A2AResult, exchange: ExchangeState, final: boolean): ForwardedEvent {
    switch (result.kind) {
      case 'message':
        return this.fromMessage(result, exchange);

      case 'artifact-update':
        exchange.remoteTaskId = result.taskId;
        exchange.contextId = result.contextId ?? exchange.contextId;
        exchange.artifacts.push(result.artifact);
        return {
          kind: 'progress',
          sequenceHint: { stage: 'artifact' },
          update: { state: 'artifact', text: partsText(result.artifact.parts), remoteTaskId: exchange.remoteTaskId },
        };

      case 'task':
        exchange.remoteTaskId = result.id;
        exchange.contextId = result.contextId ?? exchange.contextId;
        if (result.artifacts && result.artifacts.length > 0) {
          exchange.artifacts = [...result.artifacts];
        }
        return this.fromStatus(result.status, result.metadata, exchange, final, result.history);

      case 'status-update':
        exchange.remoteTaskId = result.taskId;
        exchange.contextId = result.contextId ?? exchange.contextId;
        return this.fromStatus(result.status, result.metadata, exchange, final || result.final === true);
    }
  }

  private fromMessage(message: A2AMessage, exchange: ExchangeState): ForwardedEvent {
    return {
      kind: 'completed',
      result: {
        text: messageText(message) ?? DEFAULT_RESULT_TEXT,
        remoteTaskId: message.taskId ?? exchange.remoteTaskId,
        contextId: message.contextId ?? exchange.contextId,
      },
    };
  }

  private fromStatus(
    status: A2ATaskStatus,
    metadata: Record<string, unknown> | undefined,
    exchange: ExchangeState,
    final: boolean,
    history?: A2AMessage[]
  ): ForwardedEvent {
    const statusText = messageText(status.message);

    switch (classifyState(status.state)) {
      case 'progress':
        if (final) {
          return failed(
            new ProtocolRejection(
              `Target agent ended the exchange in non-terminal state "${status.state}"`,
              'NON_TERMINAL_STATE',
              statusText
            )
          );
        }
        return {
          kind: 'progress',
          sequenceHint: readSequenceHint(metadata, status.state),
          update: { state: status.state, text: statusText, remoteTaskId: exchange.remoteTaskId },
        };

      case 'completed':
        return {
          kind: 'completed',
          result: {
            text: extractResultText({ status, history, artifacts: exchange.artifacts }) ?? DEFAULT_RESULT_TEXT,
            remoteTaskId: exchange.remoteTaskId,
            contextId: exchange.contextId,
          },
        };

      case 'rejected':
        return failed(new ProtocolRejection(`Target agent reported task ${status.state}`, status.state, statusText));

      case 'input_required':
        return failed(
          new ProtocolRejection('Target agent requires input, which the relay does not support', status.state, statusText)
        );

      case 'unknown':
        return failed(
          new ProtocolRejection(`Target agent reported unknown state "${status.state}"`, 'UNKNOWN_STATE', statusText)
        );
    }
  }

  private interpretSubmission(body: unknown): SubmissionOutcome {
    const rpc = parseJsonRpcResponse(body);
    if (rpc.error) {
      return {
        status: 'rejected',
        error: new ProtocolRejection(
          rpc.error.message || 'Target returned a JSON-RPC error',
          String(rpc.error.code),
          rpc.error
        ),
      };
    }

    const result = parseResult(rpc.result);
    if (!result) {
      return {
        status: 'rejected',
        error: new ProtocolRejection('Target returned a result this relay cannot read', 'INVALID_RESULT', rpc.result),
      };
    }

    switch (result.kind) {
      case 'task':
        if (classifyState(result.status.state) === 'rejected') {
          return {
            status: 'rejected',
            error: new ProtocolRejection(
              `Target agent reported task ${result.status.state}`,
              result.status.state,
              firstAgentText(result)
            ),
          };
        }
        return { status: 'submitted', remoteTaskId: result.id, firstMessage: firstAgentText(result) };
      case 'message':
        return { status: 'submitted', remoteTaskId: result.taskId, firstMessage: messageText(result) };
      case 'status-update':
        return { status: 'submitted', remoteTaskId: result.taskId, firstMessage: messageText(result.status.message) };
      case 'artifact-update':
        return { status: 'submitted', remoteTaskId: result.taskId };
    }
  }

  private async cancelRemote(endpoint: Endpoint, remoteTaskId: string | undefined): Promise<void> {
    if (!remoteTaskId) {
      return;
    }
    try {
      const response = await this.post(
        endpoint.url,
        buildCancelRequest(remoteTaskId),
        AbortSignal.timeout(this.options.submitTimeoutMs)
      );
      await response.text();
      logger.info('Sent cancel to target agent', { endpoint: endpoint.url, remoteTaskId });
    } catch (error) {
      logger.warn('Cancel request to target agent failed', {
        endpoint: endpoint.url,
        remoteTaskId,
        errorMessage: getErrorMessage(error),
      });
    }
  }
}
