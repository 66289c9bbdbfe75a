import type { AgentCandidate, Endpoint, EndpointCapabilities, RequestedDelivery, Resolution, TaskContext } from '../types/index.js';
import { ResolutionError } from '../utils/errors.js';

// A candidate is usable when it names a non-empty endpoint
function usableCandidates(agents: AgentCandidate[]): Array<{ candidate: AgentCandidate; url: string }> {
  return agents.flatMap(candidate => {
    const url = candidate.endpoint?.trim();
    return url ? [{ candidate, url }] : [];
  });
}

function hostOf(url: string): string {
  try {
    return new URL(url).host || url;
  } catch {
    return url;
  }
}

function deliveryFor(context: TaskContext, capabilities: EndpointCapabilities | undefined): RequestedDelivery {
  if (context.delivery) {
    return context.delivery;
  }
  if (capabilities?.pushNotifications === true) {
    return 'non_blocking';
  }
  if (capabilities?.pushNotifications === false) {
    return 'blocking';
  }
  return 'auto';
}

/**
 * Picks the target agent for a task from the caller's context, falling
 * back to a configured default endpoint. Pure; performs no I/O.
 */
export class EndpointResolver {
  constructor(private readonly defaultEndpoint?: string) {}

  resolve(context: TaskContext): Resolution {
    const candidates = usableCandidates(context.agents ?? []);
    const match = context.role
      ? candidates.find(({ candidate }) => candidate.role === context.role)
      : candidates[0];

    if (match) {
      const { candidate, url } = match;
      const endpoint: Endpoint = {
        url,
        displayName: candidate.name || candidate.username || hostOf(url),
        capabilities: { ...candidate.capabilities },
      };
      if (candidate.role) endpoint.role = candidate.role;
      if (candidate.profile) endpoint.profile = candidate.profile;

      return { endpoint, delivery: deliveryFor(context, candidate.capabilities), source: 'context' };
    }

    if (this.defaultEndpoint) {
      return {
        endpoint: { url: this.defaultEndpoint, displayName: hostOf(this.defaultEndpoint), capabilities: {} },
        delivery: context.delivery ?? 'auto',
        source: 'default',
      };
    }

    throw new ResolutionError(
      context.role
        ? `No agent with role "${context.role}" has an endpoint and no default endpoint is configured`
        : 'No agent endpoint in context and no default endpoint is configured',
      'NO_ENDPOINT'
    );
  }
}
