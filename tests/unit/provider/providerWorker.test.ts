import { describe, it, expect, beforeEach, vi } from 'vitest';
import { pino } from 'pino';
import { ProviderWorker } from '../../../src/provider/providerWorker.js';
import { InferenceBroker } from '../../../src/broker/broker.js';
import { MockInferenceBackend } from '../../fixtures/mockInferenceBackend.js';
import { InProcessBrokerClient } from '../../fixtures/inProcessBrokerClient.js';
import { sequentialIds } from '../../fixtures/manualClock.js';

describe('ProviderWorker', () => {
  let broker: InferenceBroker;
  let client: InProcessBrokerClient;
  let backend: MockInferenceBackend;
  let worker: ProviderWorker;

  beforeEach(() => {
    broker = new InferenceBroker({ generateId: sequentialIds() });
    client = new InProcessBrokerClient(broker);
    backend = new MockInferenceBackend();
    worker = new ProviderWorker(client, backend, {
      providerId: 'worker-1',
      kinds: ['completion', 'chat_completion'],
      pollIntervalMs: 5,
      modelRefreshIntervalMs: 1_000,
    });
  });

  describe('refreshModels()', () => {
    it('loads the upstream model list', async () => {
      backend.models = ['m1', 'm2'];
      await expect(worker.refreshModels()).resolves.toEqual(['m1', 'm2']);
      expect(worker.availableModels).toEqual(['m1', 'm2']);
    });

    it('keeps the previous list when listing fails', async () => {
      await worker.refreshModels();
      backend.failListing = true;
      await expect(worker.refreshModels()).resolves.toEqual(['m1']);
    });
  });

  describe('runOnce()', () => {
    it('returns false when the broker has no work', async () => {
      await worker.refreshModels();
      await expect(worker.runOnce()).resolves.toBe(false);
      expect(client.polls).toEqual([
        { providerId: 'worker-1', models: ['m1'], kinds: ['completion', 'chat_completion'] },
      ]);
    });

    it('executes a claimed request and completes it on the broker', async () => {
      await worker.refreshModels();
      const waiting = broker.submitAndWait('completion', 'm1', { model: 'm1', prompt: 'hi' }, { timeoutMs: 1_000 });

      await expect(worker.runOnce()).resolves.toBe(true);

      expect(backend.requests).toEqual([{ kind: 'completion', payload: { model: 'm1', prompt: 'hi' } }]);
      await expect(waiting).resolves.toEqual({
        requestId: 'req-0001',
        result: { text: 'mock response' },
        usage: { tokens: 2 },
      });
    });

    it('reports upstream errors as request failures', async () => {
      await worker.refreshModels();
      backend.shouldFail = true;
      const waiting = broker.submitAndWait('completion', 'm1', {}, { timeoutMs: 1_000 });

      await worker.runOnce();

      await expect(waiting).rejects.toThrow('mock failure');
      expect(client.submissions).toEqual([{ requestId: 'req-0001', error: 'mock failure' }]);
    });

    it('does not poll for work before models are known', async () => {
      broker.submit('completion', 'm1', {});
      await expect(worker.runOnce()).resolves.toBe(false);
      expect(broker.stats().pending).toBe(1);
    });

    it('keeps going when a result cannot be delivered', async () => {
      await worker.refreshModels();
      client.failSubmissions = true;
      broker.submit('completion', 'm1', {});
      await expect(worker.runOnce()).resolves.toBe(true);
      expect(client.submissions).toHaveLength(1);
      expect(broker.stats().processing).toBe(1);
    });
  });

  describe('process()', () => {
    it('rejects a model the upstream no longer lists', async () => {
      await worker.refreshModels();
      const id = broker.submit('completion', 'gone', {});
      broker.poll('other', { models: ['gone'], kinds: ['completion'] });
      const request = broker.requests.require(id);

      await worker.process(request);

      expect(client.submissions).toEqual([
        { requestId: id, error: "Model 'gone' not available on upstream endpoint" },
      ]);
      expect(broker.getStatus(id)).toEqual({
        requestId: id,
        status: 'failed',
        error: "Model 'gone' not available on upstream endpoint",
      });
    });

    it('rejects request kinds the upstream cannot run', async () => {
      await worker.refreshModels();
      const id = broker.submit('embedding', 'm1', {});
      broker.poll('other', { models: ['m1'], kinds: ['embedding'] });

      await worker.process(broker.requests.require(id));

      expect(client.submissions).toEqual([{ requestId: id, error: 'Unsupported request type: embedding' }]);
    });
  });

  describe('start() / stop()', () => {
    it('serves queued work until stopped', async () => {
      const waiting = broker.submitAndWait('completion', 'm1', { prompt: 'hi' }, { timeoutMs: 2_000 });
      const running = worker.start();
      expect(worker.running).toBe(true);

      await expect(waiting).resolves.toMatchObject({ result: { text: 'mock response' } });

      worker.stop();
      await expect(running).resolves.toBeUndefined();
      expect(worker.running).toBe(false);
    });

    it('warns and keeps polling when the upstream is unreachable at start', async () => {
      const lines: string[] = [];
      const logger = pino({ level: 'warn' }, { write: (line: string) => { lines.push(line); } });
      backend.available = false;
      const checked = vi.spyOn(backend, 'isAvailable');
      const quiet = new ProviderWorker(client, backend, {
        providerId: 'worker-2',
        kinds: ['completion'],
        pollIntervalMs: 5,
        modelRefreshIntervalMs: 1_000,
        logger,
      });

      const waiting = broker.submitAndWait('completion', 'm1', {}, { timeoutMs: 2_000 });
      const running = quiet.start();
      await expect(waiting).resolves.toMatchObject({ result: { text: 'mock response' } });
      quiet.stop();
      await running;

      expect(checked).toHaveBeenCalledOnce();
      expect(lines.map((line) => JSON.parse(line).msg)).toEqual([
        'upstream endpoint not reachable, polling with the last known models',
      ]);
    });

    it('refuses to start twice', async () => {
      const running = worker.start();
      await expect(worker.start()).rejects.toThrow('already running');
      worker.stop();
      await running;
    });
  });
});
