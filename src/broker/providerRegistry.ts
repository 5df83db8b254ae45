import type { ModelListing, ProviderCapabilities } from '../types/broker.types.js';
import { silentLogger, type Logger } from '../logging/logger.js';

export const DEFAULT_PROVIDER_TTL_MS = 300_000;

export interface CapabilityDeclaration {
  models: Iterable<string>;
  kinds: Iterable<string>;
}

export interface ProviderRegistryOptions {
  ttlMs?: number;
  logger?: Logger;
}

/**
 * Last-write-wins record of each provider's capabilities. There is no sweeper:
 * expired records are dropped by whichever read notices them first.
 */
export class ProviderRegistry {
  private providers = new Map<string, ProviderCapabilities>();
  readonly ttlMs: number;
  private readonly logger: Logger;

  constructor(options: ProviderRegistryOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_PROVIDER_TTL_MS;
    this.logger = options.logger ?? silentLogger;
  }

  upsert(providerId: string, declaration: CapabilityDeclaration, now: number): ProviderCapabilities {
    const record: ProviderCapabilities = {
      providerId,
      models: new Set(declaration.models),
      kinds: new Set(declaration.kinds),
      lastSeen: now,
    };
    this.providers.set(providerId, record);
    return record;
  }

  get(providerId: string): ProviderCapabilities | undefined {
    return this.providers.get(providerId);
  }

  isActive(providerId: string, now: number, ttlMs = this.ttlMs): boolean {
    const record = this.providers.get(providerId);
    return record !== undefined && now - record.lastSeen <= ttlMs;
  }

  activeSnapshot(now: number, ttlMs = this.ttlMs): ProviderCapabilities[] {
    const active: ProviderCapabilities[] = [];
    for (const [id, record] of this.providers) {
      if (now - record.lastSeen <= ttlMs) {
        active.push(record);
      } else {
        this.providers.delete(id);
        this.logger.info({ providerId: id, lastSeen: record.lastSeen }, 'provider evicted');
      }
    }
    return active;
  }

  /** Models served by at least one live provider, sorted by id. */
  activeModels(now: number): ModelListing[] {
    const byModel = new Map<string, string[]>();
    for (const record of this.activeSnapshot(now)) {
      for (const model of record.models) {
        const providers = byModel.get(model) ?? [];
        providers.push(record.providerId);
        byModel.set(model, providers);
      }
    }
    return [...byModel.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([id, providers]) => ({ id, providers: providers.sort() }));
  }

  remove(providerId: string): void {
    this.providers.delete(providerId);
  }

  get size(): number {
    return this.providers.size;
  }
}
