import type { ProviderCapabilities, QueuedRequest } from '../types/broker.types.js';
import type { RequestStore } from './requestStore.js';
import type { ProviderRegistry } from './providerRegistry.js';
import { silentLogger, type Logger } from '../logging/logger.js';

function isEligible(request: QueuedRequest, capabilities: ProviderCapabilities): boolean {
  return (
    request.status === 'pending' &&
    capabilities.models.has(request.model) &&
    capabilities.kinds.has(request.kind)
  );
}

/** Oldest first; identical timestamps fall back to id order. */
export function compareForDispatch(a: QueuedRequest, b: QueuedRequest): number {
  if (a.createdAt !== b.createdAt) return a.createdAt - b.createdAt;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export class DispatchMatcher {
  constructor(
    private readonly requests: RequestStore,
    private readonly registry: ProviderRegistry,
    private readonly logger: Logger = silentLogger,
  ) {}

  /**
   * Records the provider's poll and claims the oldest pending request it can
   * serve. Returns null when there is nothing for it, including when its
   * record is already past the registry TTL.
   */
  match(capabilities: ProviderCapabilities, now: number): QueuedRequest | null {
    this.registry.upsert(capabilities.providerId, capabilities, capabilities.lastSeen);
    if (!this.registry.isActive(capabilities.providerId, now)) {
      this.logger.debug({ providerId: capabilities.providerId }, 'stale provider poll ignored');
      return null;
    }

    const excluded = new Set<string>();
    for (;;) {
      const chosen = this.select(capabilities, excluded);
      if (!chosen) return null;

      if (this.requests.claim(chosen.id, capabilities.providerId)) {
        return this.requests.get(chosen.id) ?? null;
      }
      // Lost the claim; other eligible requests may remain.
      excluded.add(chosen.id);
    }
  }

  private select(
    capabilities: ProviderCapabilities,
    excluded: ReadonlySet<string>,
  ): QueuedRequest | undefined {
    let best: QueuedRequest | undefined;
    for (const request of this.requests.snapshot()) {
      if (excluded.has(request.id) || !isEligible(request, capabilities)) continue;
      if (!best || compareForDispatch(request, best) < 0) best = request;
    }
    return best;
  }
}
