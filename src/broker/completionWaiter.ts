import type { Payload, QueuedRequest, WaitResult } from '../types/broker.types.js';
import type { OrphanPolicy } from '../types/config.types.js';
import {
  NotFoundError,
  UpstreamFailureError,
  WaitCancelledError,
  WaitTimeoutError,
} from '../errors/broker.js';
import type { RequestStore } from './requestStore.js';
import type { ResultStore } from './resultStore.js';
import { silentLogger, type Logger } from '../logging/logger.js';

export interface WaitOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface CompletionWaiterOptions {
  orphanPolicy?: OrphanPolicy;
  logger?: Logger;
}

type Settlement =
  | { kind: 'settled'; request: QueuedRequest }
  | { kind: 'timeout' }
  | { kind: 'aborted'; reason: unknown };

export class CompletionWaiter {
  private readonly orphanPolicy: OrphanPolicy;
  private readonly logger: Logger;

  constructor(
    private readonly requests: RequestStore,
    private readonly results: ResultStore,
    options: CompletionWaiterOptions = {},
  ) {
    this.orphanPolicy = options.orphanPolicy ?? 'retain';
    this.logger = options.logger ?? silentLogger;
  }

  async submitAndWait(
    kind: string,
    model: string,
    payload: Payload,
    options: WaitOptions,
  ): Promise<WaitResult> {
    const { id } = this.requests.enqueue(kind, model, payload);
    return this.wait(id, options);
  }

  /**
   * Suspends until `requestId` completes or fails, the timeout elapses, or
   * the signal aborts. Consumes the outcome on completion or failure.
   */
  async wait(requestId: string, options: WaitOptions): Promise<WaitResult> {
    const settlement = await this.settlement(requestId, options);

    switch (settlement.kind) {
      case 'settled':
        return this.consume(settlement.request);
      case 'timeout':
        this.abandon(requestId);
        this.logger.warn({ requestId, timeoutMs: options.timeoutMs }, 'wait timed out');
        throw new WaitTimeoutError(requestId, options.timeoutMs);
      case 'aborted':
        this.abandon(requestId);
        this.logger.info({ requestId }, 'wait cancelled');
        throw new WaitCancelledError(requestId, settlement.reason);
    }
  }

  private settlement(requestId: string, options: WaitOptions): Promise<Settlement> {
    const current = this.requests.require(requestId);
    if (current.status === 'completed' || current.status === 'failed') {
      return Promise.resolve({ kind: 'settled', request: current });
    }
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.resolve({ kind: 'aborted', reason: signal.reason });
    }

    return new Promise<Settlement>((resolve) => {
      const finish = (outcome: Settlement): void => {
        unsubscribe();
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        resolve(outcome);
      };
      const onAbort = (): void => finish({ kind: 'aborted', reason: signal?.reason });

      const unsubscribe = this.requests.onSettled(requestId, (request) =>
        finish({ kind: 'settled', request }),
      );
      const timer = setTimeout(() => finish({ kind: 'timeout' }), options.timeoutMs);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private consume(request: QueuedRequest): WaitResult {
    const outcome = this.results.takeAndDelete(request.id);
    this.requests.remove(request.id);

    if (request.status === 'failed') {
      throw new UpstreamFailureError(request.id, request.error ?? outcome?.error ?? 'unknown error');
    }
    // A concurrent status lookup got there first.
    if (!outcome) throw new NotFoundError('result', request.id);

    return {
      requestId: request.id,
      result: outcome.result,
      ...(outcome.usage !== undefined && { usage: outcome.usage }),
    };
  }

  private abandon(requestId: string): void {
    if (this.orphanPolicy !== 'remove') return;
    this.requests.remove(requestId);
    this.results.delete(requestId);
  }
}
