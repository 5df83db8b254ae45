import type {
  ModelListing,
  Payload,
  ProviderCapabilities,
  QueuedRequest,
  RequestStats,
  StatusView,
  WaitResult,
} from '../types/broker.types.js';
import type { BrokerConfig } from '../types/config.types.js';
import { NotFoundError, ValidationError } from '../errors/broker.js';
import { RequestStore } from './requestStore.js';
import { ResultStore } from './resultStore.js';
import { ProviderRegistry, type CapabilityDeclaration } from './providerRegistry.js';
import { DispatchMatcher } from './dispatchMatcher.js';
import { CompletionWaiter } from './completionWaiter.js';
import { silentLogger, type Logger } from '../logging/logger.js';

export interface BrokerOptions extends Partial<BrokerConfig> {
  now?: () => number;
  generateId?: () => string;
  logger?: Logger;
}

export type ResultSubmission =
  | { requestId: string; result: Payload; usage?: Payload; error?: undefined }
  | { requestId: string; error: string };

export interface SubmitAndWaitOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ProviderView {
  providerId: string;
  models: string[];
  kinds: string[];
  lastSeen: number;
}

function toProviderView(record: ProviderCapabilities): ProviderView {
  return {
    providerId: record.providerId,
    models: [...record.models].sort(),
    kinds: [...record.kinds].sort(),
    lastSeen: record.lastSeen,
  };
}

/**
 * The operations callers and providers drive. Transports bind these to wire
 * endpoints; nothing here knows about HTTP.
 */
export class InferenceBroker {
  readonly requests: RequestStore;
  readonly results: ResultStore;
  readonly registry: ProviderRegistry;
  private readonly matcher: DispatchMatcher;
  private readonly waiter: CompletionWaiter;
  private readonly now: () => number;
  private readonly defaultWaitTimeoutMs: number;
  private readonly maxWaitTimeoutMs: number;
  private readonly logger: Logger;

  constructor(options: BrokerOptions = {}) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
    this.defaultWaitTimeoutMs = options.defaultWaitTimeoutMs ?? 60_000;
    this.maxWaitTimeoutMs = options.maxWaitTimeoutMs ?? 600_000;

    this.results = new ResultStore();
    this.requests = new RequestStore(this.results, {
      now: this.now,
      logger: this.logger,
      ...(options.generateId !== undefined && { generateId: options.generateId }),
    });
    this.registry = new ProviderRegistry({
      logger: this.logger,
      ...(options.providerTtlMs !== undefined && { ttlMs: options.providerTtlMs }),
    });
    this.matcher = new DispatchMatcher(this.requests, this.registry, this.logger);
    this.waiter = new CompletionWaiter(this.requests, this.results, {
      logger: this.logger,
      ...(options.orphanPolicy !== undefined && { orphanPolicy: options.orphanPolicy }),
    });
  }

  submit(kind: string, model: string, payload: Payload): string {
    return this.requests.enqueue(kind, model, payload).id;
  }

  submitAndWait(
    kind: string,
    model: string,
    payload: Payload,
    options: SubmitAndWaitOptions = {},
  ): Promise<WaitResult> {
    const timeoutMs = Math.min(options.timeoutMs ?? this.defaultWaitTimeoutMs, this.maxWaitTimeoutMs);
    if (!(timeoutMs > 0)) {
      return Promise.reject(new ValidationError(`timeout must be positive, got ${timeoutMs}`));
    }
    return this.waiter.submitAndWait(kind, model, payload, {
      timeoutMs,
      ...(options.signal !== undefined && { signal: options.signal }),
    });
  }

  /** Returns null when there is no work for this provider right now. */
  poll(providerId: string, capabilities: CapabilityDeclaration): QueuedRequest | null {
    const now = this.now();
    const request = this.matcher.match(
      {
        providerId,
        models: new Set(capabilities.models),
        kinds: new Set(capabilities.kinds),
        lastSeen: now,
      },
      now,
    );
    if (request) {
      this.logger.info({ requestId: request.id, providerId, model: request.model }, 'request dispatched');
    }
    return request;
  }

  submitResult(submission: ResultSubmission): QueuedRequest {
    if (submission.error !== undefined) {
      return this.requests.fail(submission.requestId, submission.error);
    }
    return this.requests.complete(submission.requestId, submission.result, submission.usage);
  }

  /**
   * Pending and processing requests are reported as-is. A terminal request is
   * consumed by this call: its result is taken and the entry removed.
   */
  getStatus(requestId: string): StatusView {
    const request = this.requests.require(requestId);

    switch (request.status) {
      case 'pending':
      case 'processing':
        return {
          requestId,
          status: request.status,
          createdAt: request.createdAt,
          ...(request.startedAt !== undefined && { startedAt: request.startedAt }),
        };
      case 'completed': {
        const outcome = this.results.takeAndDelete(requestId);
        this.requests.remove(requestId);
        if (!outcome) throw new NotFoundError('result', requestId);
        return {
          requestId,
          status: 'completed',
          result: outcome.result,
          ...(outcome.usage !== undefined && { usage: outcome.usage }),
        };
      }
      case 'failed':
        this.results.delete(requestId);
        this.requests.remove(requestId);
        return { requestId, status: 'failed', error: request.error ?? 'unknown error' };
    }
  }

  stats(): RequestStats {
    return this.requests.stats();
  }

  registerProvider(providerId: string, capabilities: CapabilityDeclaration): ProviderView {
    return toProviderView(this.registry.upsert(providerId, capabilities, this.now()));
  }

  listProviders(): ProviderView[] {
    return this.registry
      .activeSnapshot(this.now())
      .map(toProviderView)
      .sort((a, b) => (a.providerId < b.providerId ? -1 : a.providerId > b.providerId ? 1 : 0));
  }

  listModels(): ModelListing[] {
    return this.registry.activeModels(this.now());
  }
}
