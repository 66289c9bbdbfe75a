import Joi from 'joi';
import { v4 as uuidv4 } from 'uuid';
import type {
  A2AArtifact,
  A2AMessage,
  A2APart,
  A2AResult,
  A2ATask,
  A2ATaskArtifactUpdateEvent,
  A2ATaskStatus,
  A2ATaskStatusUpdateEvent,
  AgentCard,
  JsonRpcRequest,
  JsonRpcResponse,
  MessageSendConfiguration,
  MessageSendParams,
  SequenceHint,
} from '../types/index.js';
import { isRecord } from '../types/index.js';
import { ProtocolRejection } from './errors.js';

/**
 * How a remote task state bears on the relay's own event log
 */
export type StateClass = 'progress' | 'completed' | 'rejected' | 'input_required' | 'unknown';

export function classifyState(state: string | undefined): StateClass {
  switch (state) {
    case 'submitted':
    case 'working':
      return 'progress';
    case 'completed':
      return 'completed';
    case 'failed':
    case 'canceled':
    case 'rejected':
      return 'rejected';
    case 'input-required':
    case 'auth-required':
      return 'input_required';
    default:
      return 'unknown';
  }
}

// Wire schemas. Every object admits unknown keys; nulls read as absent.

const partSchema = Joi.object<A2APart>({
  kind: Joi.string(),
  text: Joi.string().allow(''),
}).unknown(true);

const messageSchema = Joi.object<A2AMessage>({
  kind: Joi.string().valid('message').default('message'),
  messageId: Joi.string().allow('').default(''),
  role: Joi.string().required(),
  parts: Joi.array().items(partSchema).empty(null).default([]),
  taskId: Joi.string().empty(null),
  contextId: Joi.string().empty(null),
  metadata: Joi.object().unknown(true).empty(null),
}).unknown(true);

const statusSchema = Joi.object<A2ATaskStatus>({
  state: Joi.string().required(),
  message: messageSchema.empty(null),
  timestamp: Joi.string().empty(null),
}).unknown(true);

const artifactSchema = Joi.object<A2AArtifact>({
  artifactId: Joi.string().empty(null),
  name: Joi.string().empty(null),
  parts: Joi.array().items(partSchema).empty(null).default([]),
}).unknown(true);

const taskSchema = Joi.object<A2ATask>({
  kind: Joi.string().valid('task').default('task'),
  id: Joi.string().required(),
  contextId: Joi.string().empty(null),
  status: statusSchema.required(),
  history: Joi.array().items(messageSchema).empty(null),
  artifacts: Joi.array().items(artifactSchema).empty(null),
  metadata: Joi.object().unknown(true).empty(null),
}).unknown(true);

const statusUpdateSchema = Joi.object<A2ATaskStatusUpdateEvent>({
  kind: Joi.string().valid('status-update').default('status-update'),
  taskId: Joi.string().required(),
  contextId: Joi.string().empty(null),
  status: statusSchema.required(),
  final: Joi.boolean().empty(null),
  metadata: Joi.object().unknown(true).empty(null),
}).unknown(true);

const artifactUpdateSchema = Joi.object<A2ATaskArtifactUpdateEvent>({
  kind: Joi.string().valid('artifact-update').required(),
  taskId: Joi.string().required(),
  contextId: Joi.string().empty(null),
  artifact: artifactSchema.required(),
  append: Joi.boolean().empty(null),
  lastChunk: Joi.boolean().empty(null),
}).unknown(true);

const agentCardSchema = Joi.object<AgentCard>({
  name: Joi.string().required(),
  description: Joi.string().allow('').empty(null),
  url: Joi.string().empty(null),
  version: Joi.string().empty(null),
  capabilities: Joi.object({
    streaming: Joi.boolean().empty(null),
    pushNotifications: Joi.boolean().empty(null),
  })
    .unknown(true)
    .empty(null)
    .default({}),
}).unknown(true);

const jsonRpcResponseSchema = Joi.object<JsonRpcResponse>({
  result: Joi.any(),
  error: Joi.object({
    code: Joi.number().required(),
    message: Joi.string().allow('').required(),
    data: Joi.any(),
  }).unknown(true),
})
  .or('result', 'error')
  .unknown(true);

function tryValidate<T>(schema: Joi.ObjectSchema<T>, value: unknown): T | undefined {
  const { error, value: parsed } = schema.validate(value);
  return error ? undefined : parsed;
}

/**
 * Read a JSON-RPC result or A2A notification body into one of the known
 * result shapes. Payloads without a `kind` are recognised by their keys.
 */
export function parseResult(value: unknown): A2AResult | undefined {
  if (!isRecord(value)) {
    return undefined;
  }

  switch (value.kind) {
    case 'task':
      return tryValidate(taskSchema, value);
    case 'message':
      return tryValidate(messageSchema, value);
    case 'status-update':
      return tryValidate(statusUpdateSchema, value);
    case 'artifact-update':
      return tryValidate(artifactUpdateSchema, value);
    case undefined:
      if ('taskId' in value && 'status' in value) return tryValidate(statusUpdateSchema, value);
      if ('id' in value && 'status' in value) return tryValidate(taskSchema, value);
      if ('role' in value && 'parts' in value) return tryValidate(messageSchema, value);
      return undefined;
    default:
      return undefined;
  }
}

/**
 * The parts of a push notification body the webhook receiver acts on.
 * `state` is absent when the body carries no readable `status.state`.
 */
export interface NotificationFields {
  state?: string;
  remoteTaskId?: string;
  contextId?: string;
  text?: string;
}

const stringField = (value: unknown): string | undefined =>
  typeof value === 'string' && value !== '' ? value : undefined;

function validItems<T>(schema: Joi.ObjectSchema<T>, value: unknown): T[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const items: T[] = [];
  for (const item of value) {
    const parsed = tryValidate(schema, item);
    if (parsed) items.push(parsed);
  }
  return items;
}

/**
 * Lenient read of a Task or status-update notification. Unlike
 * `parseResult` no field is required; parts that fail validation are
 * left out rather than failing the whole body.
 */
export function readNotification(value: unknown): NotificationFields {
  if (!isRecord(value)) {
    return {};
  }

  const isStatusUpdate = value.kind === 'status-update' || (value.kind === undefined && 'taskId' in value);
  const status = isRecord(value.status) ? value.status : undefined;
  const state = stringField(status?.state);
  const message = status ? tryValidate(messageSchema, status.message) : undefined;

  const text = isStatusUpdate
    ? messageText(message)
    : extractResultText({
        status: { state: state ?? '', message },
        history: validItems(messageSchema, value.history),
        artifacts: validItems(artifactSchema, value.artifacts),
      });

  return {
    state,
    remoteTaskId: stringField(isStatusUpdate ? value.taskId : value.id),
    contextId: stringField(value.contextId),
    text,
  };
}

export function parseJsonRpcResponse(value: unknown): JsonRpcResponse {
  const { error, value: parsed } = jsonRpcResponseSchema.validate(value);
  if (error) {
    throw new ProtocolRejection(`Malformed JSON-RPC response: ${error.message}`, 'INVALID_RESPONSE', value);
  }
  return parsed;
}

export function parseAgentCard(value: unknown): AgentCard {
  const { error, value: parsed } = agentCardSchema.validate(value);
  if (error) {
    throw new ProtocolRejection(`Malformed agent card: ${error.message}`, 'INVALID_AGENT_CARD');
  }
  return parsed;
}

export function partsText(parts: A2APart[] | undefined): string | undefined {
  const texts: string[] = [];
  for (const part of parts ?? []) {
    if (typeof part.text === 'string') {
      texts.push(part.text);
    } else if (isRecord(part.root) && typeof part.root.text === 'string') {
      texts.push(part.root.text);
    }
  }
  const joined = texts.join('\n').trim();
  return joined ? joined : undefined;
}

export function messageText(message: A2AMessage | undefined): string | undefined {
  return message ? partsText(message.parts) : undefined;
}

function isUserMessage(message: A2AMessage): boolean {
  return message.role.toLowerCase() === 'user';
}

/**
 * Result text of a finished task: last artifact text, else the last
 * non-user history message, else the status message
 */
export function extractResultText(source: {
  status: A2ATaskStatus;
  history?: A2AMessage[];
  artifacts?: A2AArtifact[];
}): string | undefined {
  for (const artifact of [...(source.artifacts ?? [])].reverse()) {
    const text = partsText(artifact.parts);
    if (text) return text;
  }

  for (const message of [...(source.history ?? [])].reverse()) {
    if (isUserMessage(message)) continue;
    const text = messageText(message);
    if (text) return text;
  }

  return messageText(source.status.message);
}

/**
 * First agent message of a freshly submitted task: the status message,
 * else the earliest non-user history entry
 */
export function firstAgentText(task: A2ATask): string | undefined {
  const statusText = messageText(task.status.message);
  if (statusText) return statusText;

  for (const message of task.history ?? []) {
    if (isUserMessage(message)) continue;
    const text = messageText(message);
    if (text) return text;
  }
  return undefined;
}

/**
 * Progress hint from update metadata (`{ progress: { current, total } }`),
 * else the remote state as a stage
 */
export function readSequenceHint(metadata: Record<string, unknown> | undefined, stage: string): SequenceHint {
  const progress = metadata?.progress;
  if (isRecord(progress) && typeof progress.current === 'number' && typeof progress.total === 'number') {
    return { current: progress.current, total: progress.total };
  }
  return { stage };
}

export function buildMessageRequest(
  method: 'message/send' | 'message/stream',
  text: string,
  configuration: MessageSendConfiguration,
  metadata?: Record<string, unknown>
): JsonRpcRequest<MessageSendParams> {
  return {
    jsonrpc: '2.0',
    id: uuidv4(),
    method,
    params: {
      message: {
        kind: 'message',
        messageId: uuidv4(),
        role: 'user',
        parts: [{ kind: 'text', text }],
      },
      configuration,
      ...(metadata ? { metadata } : {}),
    },
  };
}

export function buildCancelRequest(remoteTaskId: string): JsonRpcRequest<{ id: string }> {
  return {
    jsonrpc: '2.0',
    id: uuidv4(),
    method: 'tasks/cancel',
    params: { id: remoteTaskId },
  };
}
