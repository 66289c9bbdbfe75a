import type { DeliveryMode } from './Task.js';

export interface EndpointCapabilities {
  pushNotifications?: boolean;
  streaming?: boolean;
}

/**
 * A resolved target agent. Immutable once attached to a task.
 */
export interface Endpoint {
  url: string;
  displayName: string;
  role?: string;
  profile?: string;
  capabilities: EndpointCapabilities;
}

// 'auto' defers the choice to an agent card probe at dispatch time
export type RequestedDelivery = DeliveryMode | 'auto';

export interface Resolution {
  endpoint: Endpoint;
  delivery: RequestedDelivery;
  source: 'context' | 'default';
}
