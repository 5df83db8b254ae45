import { describe, it, expect, beforeEach } from 'vitest';
import { InferenceBroker } from '../../../src/broker/broker.js';
import {
  InvalidStateError,
  NotFoundError,
  UpstreamFailureError,
  ValidationError,
  WaitTimeoutError,
} from '../../../src/errors/broker.js';
import { ManualClock, sequentialIds } from '../../fixtures/manualClock.js';

const M1 = { models: ['m1'], kinds: ['completion'] };

describe('InferenceBroker', () => {
  let clock: ManualClock;
  let broker: InferenceBroker;

  beforeEach(() => {
    clock = new ManualClock();
    broker = new InferenceBroker({ now: clock.now, generateId: sequentialIds() });
  });

  describe('dispatch', () => {
    it('gives a request to exactly one of two overlapping providers', () => {
      const id = broker.submit('completion', 'm1', { model: 'm1', prompt: 'hi' });

      const first = broker.poll('P1', M1);
      const second = broker.poll('P2', M1);

      expect(first?.id).toBe(id);
      expect(first?.status).toBe('processing');
      expect(second).toBeNull();
    });

    it('never hands the same request to concurrent pollers', async () => {
      broker.submit('completion', 'm1', {});
      const polls = await Promise.all(
        ['P1', 'P2', 'P3', 'P4'].map(async (p) => broker.poll(p, M1)),
      );
      expect(polls.filter((r) => r !== null)).toHaveLength(1);
    });

    it('serves the older of two requests first', () => {
      const older = broker.submit('completion', 'm1', {});
      clock.advance(1);
      const newer = broker.submit('completion', 'm1', {});

      expect(broker.poll('P1', M1)?.id).toBe(older);
      expect(broker.poll('P1', M1)?.id).toBe(newer);
    });

    it('records every poll as provider liveness', () => {
      broker.poll('P1', M1);
      expect(broker.listProviders()).toEqual([
        { providerId: 'P1', models: ['m1'], kinds: ['completion'], lastSeen: clock.current },
      ]);
    });

    it('drops providers that stopped polling longer than the TTL ago', () => {
      broker.poll('P1', M1);
      clock.advance(301_000);
      broker.poll('P2', { models: ['m2'], kinds: ['completion'] });
      expect(broker.listProviders().map((p) => p.providerId)).toEqual(['P2']);
      expect(broker.listModels()).toEqual([{ id: 'm2', providers: ['P2'] }]);
    });
  });

  describe('submitResult()', () => {
    it('completes a processing request', () => {
      const id = broker.submit('completion', 'm1', {});
      broker.poll('P1', M1);
      const done = broker.submitResult({ requestId: id, result: { text: 'hello' }, usage: { tokens: 5 } });
      expect(done.status).toBe('completed');
    });

    it('fails a request when an error is reported', () => {
      const id = broker.submit('completion', 'm1', {});
      broker.poll('P1', M1);
      expect(broker.submitResult({ requestId: id, error: 'boom' }).status).toBe('failed');
    });

    it('rejects a second submission with InvalidStateError', () => {
      const id = broker.submit('completion', 'm1', {});
      broker.poll('P1', M1);
      broker.submitResult({ requestId: id, result: { text: 'one' } });
      expect(() => broker.submitResult({ requestId: id, result: { text: 'two' } })).toThrow(
        InvalidStateError,
      );
      expect(() => broker.submitResult({ requestId: id, error: 'late' })).toThrow(InvalidStateError);
    });

    it('rejects completing an unclaimed request', () => {
      const id = broker.submit('completion', 'm1', {});
      expect(() => broker.submitResult({ requestId: id, result: {} })).toThrow(InvalidStateError);
      expect(broker.stats().pending).toBe(1);
    });

    it('rejects unknown requests with InvalidStateError', () => {
      expect(() => broker.submitResult({ requestId: 'nope', result: {} })).toThrow(
        'Request nope is unknown, expected processing',
      );
    });

    it('rejects a duplicate result after the waiter has consumed the first', async () => {
      const waiting = broker.submitAndWait('completion', 'm1', {}, { timeoutMs: 1_000 });
      broker.poll('P1', M1);
      broker.submitResult({ requestId: 'req-0001', result: { text: 'one' } });
      await expect(waiting).resolves.toMatchObject({ result: { text: 'one' } });

      expect(() => broker.submitResult({ requestId: 'req-0001', result: { text: 'two' } })).toThrow(
        InvalidStateError,
      );
      expect(broker.stats().total).toBe(0);
      expect(broker.results.size).toBe(0);
    });
  });

  describe('getStatus()', () => {
    it('reports pending and processing without consuming', () => {
      const id = broker.submit('completion', 'm1', {});
      expect(broker.getStatus(id)).toEqual({ requestId: id, status: 'pending', createdAt: clock.current });

      clock.advance(5);
      broker.poll('P1', M1);
      expect(broker.getStatus(id)).toEqual({
        requestId: id,
        status: 'processing',
        createdAt: clock.current - 5,
        startedAt: clock.current,
      });
    });

    it('consumes a completed result', () => {
      const id = broker.submit('completion', 'm1', {});
      broker.poll('P1', M1);
      broker.submitResult({ requestId: id, result: { text: 'hello' }, usage: { tokens: 5 } });

      expect(broker.getStatus(id)).toEqual({
        requestId: id,
        status: 'completed',
        result: { text: 'hello' },
        usage: { tokens: 5 },
      });
      expect(() => broker.getStatus(id)).toThrow(NotFoundError);
    });

    it('consumes a failure', () => {
      const id = broker.submit('completion', 'm1', {});
      broker.poll('P1', M1);
      broker.submitResult({ requestId: id, error: 'model overloaded' });

      expect(broker.getStatus(id)).toEqual({ requestId: id, status: 'failed', error: 'model overloaded' });
      expect(() => broker.getStatus(id)).toThrow(NotFoundError);
      expect(broker.results.size).toBe(0);
    });
  });

  describe('submitAndWait()', () => {
    it('returns the provider result and removes the entry', async () => {
      const waiting = broker.submitAndWait('completion', 'm1', { model: 'm1', prompt: 'hi' }, { timeoutMs: 1_000 });
      const claimed = broker.poll('P1', M1);
      expect(claimed).not.toBeNull();
      if (claimed) broker.submitResult({ requestId: claimed.id, result: { text: 'hello' }, usage: { tokens: 5 } });

      await expect(waiting).resolves.toEqual({
        requestId: 'req-0001',
        result: { text: 'hello' },
        usage: { tokens: 5 },
      });
      expect(() => broker.getStatus('req-0001')).toThrow(NotFoundError);
    });

    it('surfaces provider failures as UpstreamFailureError', async () => {
      const waiting = broker.submitAndWait('completion', 'm1', {}, { timeoutMs: 1_000 });
      broker.poll('P1', M1);
      broker.submitResult({ requestId: 'req-0001', error: 'model overloaded' });

      await expect(waiting).rejects.toThrow(new UpstreamFailureError('req-0001', 'model overloaded'));
      expect(broker.stats().total).toBe(0);
    });

    it('times out when no provider polls and keeps the request pending', async () => {
      const waiting = broker.submitAndWait('completion', 'm1', {}, { timeoutMs: 20 });
      await expect(waiting).rejects.toThrow(WaitTimeoutError);
      expect(broker.getStatus('req-0001')).toMatchObject({ status: 'pending' });
    });

    it('removes timed-out requests under the remove orphan policy', async () => {
      const strict = new InferenceBroker({ orphanPolicy: 'remove', generateId: sequentialIds() });
      await expect(strict.submitAndWait('completion', 'm1', {}, { timeoutMs: 20 })).rejects.toThrow(
        WaitTimeoutError,
      );
      expect(strict.stats().total).toBe(0);
    });

    it('caps the wait at maxWaitTimeoutMs', async () => {
      const capped = new InferenceBroker({ maxWaitTimeoutMs: 20, generateId: sequentialIds() });
      await expect(capped.submitAndWait('completion', 'm1', {}, { timeoutMs: 60_000 })).rejects.toThrow(
        'did not finish within 20ms',
      );
    });

    it('rejects a non-positive timeout before enqueuing', async () => {
      await expect(broker.submitAndWait('completion', 'm1', {}, { timeoutMs: 0 })).rejects.toThrow(
        ValidationError,
      );
      expect(broker.stats().total).toBe(0);
    });
  });

  describe('stats() and providers', () => {
    it('counts requests per status', () => {
      broker.submit('completion', 'm1', {});
      broker.submit('completion', 'm1', {});
      broker.poll('P1', M1);
      expect(broker.stats()).toEqual({ pending: 1, processing: 1, completed: 0, failed: 0, total: 2 });
    });

    it('registerProvider is last-write-wins', () => {
      broker.registerProvider('P1', { models: ['m1'], kinds: ['completion'] });
      const view = broker.registerProvider('P1', { models: ['m2', 'm1'], kinds: ['chat_completion'] });
      expect(view).toEqual({
        providerId: 'P1',
        models: ['m1', 'm2'],
        kinds: ['chat_completion'],
        lastSeen: clock.current,
      });
      expect(broker.listProviders()).toHaveLength(1);
    });
  });
});
