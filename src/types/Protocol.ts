/**
 * The subset of the agent-to-agent (A2A) JSON-RPC wire format the relay reads
 * and writes. Unknown fields are carried through untouched.
 */

export type A2ATaskState =
  | 'submitted'
  | 'working'
  | 'input-required'
  | 'completed'
  | 'canceled'
  | 'failed'
  | 'rejected'
  | 'auth-required'
  | 'unknown';

export interface A2APart {
  kind?: string;
  text?: string;
  [key: string]: unknown;
}

export interface A2AMessage {
  kind: 'message';
  messageId: string;
  role: string;
  parts: A2APart[];
  taskId?: string;
  contextId?: string;
  metadata?: Record<string, unknown>;
}

export interface A2ATaskStatus {
  // Kept as a plain string: targets may send states this relay does not know
  state: string;
  message?: A2AMessage;
  timestamp?: string;
}

export interface A2AArtifact {
  artifactId?: string;
  name?: string;
  parts: A2APart[];
}

export interface A2ATask {
  kind: 'task';
  id: string;
  contextId?: string;
  status: A2ATaskStatus;
  history?: A2AMessage[];
  artifacts?: A2AArtifact[];
  metadata?: Record<string, unknown>;
}

export interface A2ATaskStatusUpdateEvent {
  kind: 'status-update';
  taskId: string;
  contextId?: string;
  status: A2ATaskStatus;
  final?: boolean;
  metadata?: Record<string, unknown>;
}

export interface A2ATaskArtifactUpdateEvent {
  kind: 'artifact-update';
  taskId: string;
  contextId?: string;
  artifact: A2AArtifact;
  append?: boolean;
  lastChunk?: boolean;
}

export type A2AResult = A2ATask | A2AMessage | A2ATaskStatusUpdateEvent | A2ATaskArtifactUpdateEvent;

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcRequest<P> {
  jsonrpc: '2.0';
  id: string;
  method: string;
  params: P;
}

export interface JsonRpcResponse {
  result?: unknown;
  error?: JsonRpcError;
}

export interface PushNotificationConfig {
  url: string;
  token?: string;
}

export interface MessageSendConfiguration {
  acceptedOutputModes: string[];
  blocking: boolean;
  pushNotificationConfig?: PushNotificationConfig;
}

export interface MessageSendParams {
  message: A2AMessage;
  configuration: MessageSendConfiguration;
  metadata?: Record<string, unknown>;
}

export interface AgentCard {
  name: string;
  description?: string;
  url?: string;
  version?: string;
  capabilities: {
    streaming?: boolean;
    pushNotifications?: boolean;
  };
}
