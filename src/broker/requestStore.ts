import { randomUUID } from 'node:crypto';
import type {
  Payload,
  QueuedRequest,
  RequestStats,
  RequestStatus,
} from '../types/broker.types.js';
import { InvalidStateError, NotFoundError } from '../errors/broker.js';
import type { ResultStore } from './resultStore.js';
import { silentLogger, type Logger } from '../logging/logger.js';

export type SettleListener = (request: QueuedRequest) => void;

export interface RequestStoreOptions {
  now?: () => number;
  generateId?: () => string;
  logger?: Logger;
}

const FAILABLE: readonly RequestStatus[] = ['pending', 'processing'];

/**
 * Owns every in-flight request. All mutators are synchronous so each one runs
 * to completion before any other caller on the event loop observes the map;
 * that is what makes claim() the single serialization point.
 */
export class RequestStore {
  private requests = new Map<string, QueuedRequest>();
  private listeners = new Map<string, Set<SettleListener>>();
  private readonly now: () => number;
  private readonly generateId: () => string;
  private readonly logger: Logger;

  constructor(
    private readonly results: ResultStore,
    options: RequestStoreOptions = {},
  ) {
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? randomUUID;
    this.logger = options.logger ?? silentLogger;
  }

  enqueue(kind: string, model: string, payload: Payload): QueuedRequest {
    let id = this.generateId();
    while (this.requests.has(id)) id = this.generateId();

    const request: QueuedRequest = {
      id,
      kind,
      model,
      payload,
      status: 'pending',
      createdAt: this.now(),
    };
    this.requests.set(id, request);
    this.logger.debug({ requestId: id, kind, model }, 'request enqueued');
    return { ...request };
  }

  claim(id: string, providerId?: string): boolean {
    const request = this.requests.get(id);
    if (!request || request.status !== 'pending') return false;

    request.status = 'processing';
    request.startedAt = this.now();
    if (providerId !== undefined) request.providerId = providerId;
    this.logger.debug({ requestId: id, providerId }, 'request claimed');
    return true;
  }

  complete(id: string, result: Payload, usage?: Payload): QueuedRequest {
    const request = this.requireStatus(id, ['processing']);

    request.status = 'completed';
    request.completedAt = this.now();
    this.results.put({ requestId: id, result, ...(usage !== undefined && { usage }) });
    this.logger.info(
      { requestId: id, elapsedMs: request.completedAt - request.createdAt },
      'request completed',
    );
    this.notify(request);
    return { ...request };
  }

  /** Accepts pending as a source too, for requests rejected before dispatch. */
  fail(id: string, error: string): QueuedRequest {
    const request = this.requireStatus(id, FAILABLE);

    request.status = 'failed';
    request.completedAt = this.now();
    request.error = error;
    this.results.put({ requestId: id, result: {}, error });
    this.logger.info({ requestId: id, error }, 'request failed');
    this.notify(request);
    return { ...request };
  }

  get(id: string): QueuedRequest | undefined {
    const request = this.requests.get(id);
    return request ? { ...request } : undefined;
  }

  require(id: string): QueuedRequest {
    const request = this.get(id);
    if (!request) throw new NotFoundError('request', id);
    return request;
  }

  remove(id: string): void {
    this.requests.delete(id);
  }

  snapshot(): QueuedRequest[] {
    return Array.from(this.requests.values(), (r) => ({ ...r }));
  }

  stats(): RequestStats {
    const stats: RequestStats = { pending: 0, processing: 0, completed: 0, failed: 0, total: 0 };
    for (const request of this.requests.values()) {
      stats[request.status]++;
      stats.total++;
    }
    return stats;
  }

  /**
   * Registers a one-shot listener for the request reaching completed or failed.
   * Returns the unsubscribe function.
   */
  onSettled(id: string, listener: SettleListener): () => void {
    let set = this.listeners.get(id);
    if (!set) {
      set = new Set();
      this.listeners.set(id, set);
    }
    set.add(listener);
    return () => {
      const current = this.listeners.get(id);
      if (!current) return;
      current.delete(listener);
      if (current.size === 0) this.listeners.delete(id);
    };
  }

  get size(): number {
    return this.requests.size;
  }

  private requireStatus(id: string, expected: readonly RequestStatus[]): QueuedRequest {
    const request = this.requests.get(id);
    if (!request) throw new InvalidStateError(id, 'unknown', expected);
    if (!expected.includes(request.status)) {
      throw new InvalidStateError(id, request.status, expected);
    }
    return request;
  }

  private notify(request: QueuedRequest): void {
    const set = this.listeners.get(request.id);
    if (!set) return;
    this.listeners.delete(request.id);
    const view = { ...request };
    for (const listener of set) listener(view);
  }
}
