import type { Endpoint, EndpointCapabilities } from './Endpoint.js';

export type DeliveryMode = 'blocking' | 'non_blocking';

export type TaskStatus =
  | 'created'
  | 'resolving'
  | 'dispatching'
  | 'streaming'
  | 'awaiting_callback'
  | 'completed'
  | 'failed'
  | 'cancelled';

export const TERMINAL_TASK_STATUSES: readonly TaskStatus[] = ['completed', 'failed', 'cancelled'];

export function isTerminalStatus(status: TaskStatus): boolean {
  return TERMINAL_TASK_STATUSES.includes(status);
}

/**
 * A candidate target agent as the caller describes it
 */
export interface AgentCandidate {
  endpoint?: string;
  name?: string;
  username?: string;
  role?: string;
  profile?: string;
  capabilities?: EndpointCapabilities;
}

export interface FeedbackEntry {
  content: string;
  time?: string;
}

/**
 * Everything the caller supplies when submitting a task
 */
export interface TaskContext {
  taskId?: string;
  contextId?: string;
  message: string;
  agents?: AgentCandidate[];
  role?: string;
  delivery?: DeliveryMode;
  feedback?: FeedbackEntry[];
  metadata?: Record<string, unknown>;
}

export interface TaskReference {
  taskId: string;
  contextId?: string;
}

export interface ProxyTask {
  taskId: string;
  contextId: string;
  // Correlation key carried in the callback URL; equal to taskId
  todolistId: string;
  message: string;
  mode?: DeliveryMode;
  endpoint?: Endpoint;
  status: TaskStatus;
  remoteTaskId?: string;
  createdAt: Date;
  updatedAt: Date;
}
