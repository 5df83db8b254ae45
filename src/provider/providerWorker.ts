import { setTimeout as sleep } from 'node:timers/promises';
import type { QueuedRequest } from '../types/broker.types.js';
import type { CompletionKind } from '../types/inference.types.js';
import type { InferenceBackend } from '../backends/inferenceBackend.js';
import type { BrokerConnection } from './brokerClient.js';
import type { ResultSubmission } from '../broker/broker.js';
import { silentLogger, type Logger } from '../logging/logger.js';

export interface ProviderWorkerOptions {
  providerId: string;
  kinds: readonly string[];
  pollIntervalMs: number;
  modelRefreshIntervalMs: number;
  logger?: Logger;
}

const SUPPORTED_KINDS: readonly CompletionKind[] = ['completion', 'chat_completion'];

function isCompletionKind(kind: string): kind is CompletionKind {
  return (SUPPORTED_KINDS as readonly string[]).includes(kind);
}

/**
 * Example provider: pulls work from the broker, runs it against an upstream
 * OpenAI-style endpoint and reports the outcome.
 */
export class ProviderWorker {
  private models: string[] = [];
  private controller: AbortController | undefined;
  private readonly logger: Logger;

  constructor(
    private readonly client: BrokerConnection,
    private readonly backend: InferenceBackend,
    private readonly options: ProviderWorkerOptions,
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  get availableModels(): readonly string[] {
    return this.models;
  }

  get running(): boolean {
    return this.controller !== undefined;
  }

  /** Keeps the previous list when the upstream cannot be reached. */
  async refreshModels(): Promise<readonly string[]> {
    try {
      this.models = await this.backend.listModels();
      this.logger.info({ models: this.models }, 'refreshed upstream models');
    } catch (err) {
      this.logger.error({ err }, 'model refresh failed');
    }
    return this.models;
  }

  /** Polls once. Resolves true when a request was received and handled. */
  async runOnce(): Promise<boolean> {
    const request = await this.client.poll({
      providerId: this.options.providerId,
      models: this.models,
      kinds: this.options.kinds,
    });
    if (!request) return false;

    await this.process(request);
    return true;
  }

  async process(request: QueuedRequest): Promise<void> {
    if (!this.models.includes(request.model)) {
      await this.report({
        requestId: request.id,
        error: `Model '${request.model}' not available on upstream endpoint`,
      });
      return;
    }
    if (!isCompletionKind(request.kind)) {
      await this.report({ requestId: request.id, error: `Unsupported request type: ${request.kind}` });
      return;
    }

    let submission: ResultSubmission;
    try {
      const response = await this.backend.execute({ kind: request.kind, payload: request.payload });
      submission = {
        requestId: request.id,
        result: response.result,
        ...(response.usage !== undefined && { usage: response.usage }),
      };
    } catch (err) {
      this.logger.error({ err, requestId: request.id }, 'upstream execution failed');
      submission = { requestId: request.id, error: err instanceof Error ? err.message : String(err) };
    }
    await this.report(submission);
  }

  /** Runs the refresh and poll loops until stop() is called. */
  async start(): Promise<void> {
    if (this.controller) throw new Error('Provider worker is already running');
    const controller = new AbortController();
    this.controller = controller;
    this.logger.info({ providerId: this.options.providerId }, 'provider started');

    if (!(await this.backend.isAvailable())) {
      this.logger.warn(
        { providerId: this.options.providerId },
        'upstream endpoint not reachable, polling with the last known models',
      );
    }
    await this.refreshModels();
    await Promise.all([this.refreshLoop(controller.signal), this.pollLoop(controller.signal)]);
    this.logger.info({ providerId: this.options.providerId }, 'provider stopped');
  }

  stop(): void {
    this.controller?.abort();
    this.controller = undefined;
  }

  private async refreshLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await this.pause(this.options.modelRefreshIntervalMs, signal);
      if (signal.aborted) break;
      await this.refreshModels();
    }
  }

  private async pollLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let handled = false;
      try {
        handled = await this.runOnce();
      } catch (err) {
        this.logger.error({ err }, 'poll failed');
      }
      if (!handled) await this.pause(this.options.pollIntervalMs, signal);
    }
  }

  private async pause(ms: number, signal: AbortSignal): Promise<void> {
    try {
      await sleep(ms, undefined, { signal });
    } catch (err) {
      if (!signal.aborted) throw err;
    }
  }

  private async report(submission: ResultSubmission): Promise<void> {
    try {
      await this.client.submitResult(submission);
      this.logger.info(
        { requestId: submission.requestId, failed: submission.error !== undefined },
        'submitted result',
      );
    } catch (err) {
      this.logger.error({ err, requestId: submission.requestId }, 'result submission failed');
    }
  }
}
