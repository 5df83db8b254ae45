import type { FastifyInstance, FastifyReply } from 'fastify';
import type { InferenceBroker } from '../../broker/broker.js';
import {
  capabilitiesBodySchema,
  parseWith,
  resultBodySchema,
  statusParamsSchema,
  submitAndWaitBodySchema,
  submitBodySchema,
  type SubmitResponse,
} from '../schemas.js';

/**
 * Aborts when the client goes away before the reply has been written, so a
 * suspended wait stops promptly.
 */
export function disconnectSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) controller.abort(new Error('client disconnected'));
  });
  return controller.signal;
}

export function registerQueueRoutes(app: FastifyInstance, broker: InferenceBroker): void {
  app.post('/queue/submit', async (req, reply) => {
    const { kind, model, payload } = parseWith(submitBodySchema, req.body);
    const response: SubmitResponse = { requestId: broker.submit(kind, model, payload) };
    return reply.status(202).send(response);
  });

  app.post('/queue/submit-and-wait', async (req, reply) => {
    const { kind, model, payload, timeoutMs } = parseWith(submitAndWaitBodySchema, req.body);
    const result = await broker.submitAndWait(kind, model, payload, {
      signal: disconnectSignal(reply),
      ...(timeoutMs !== undefined && { timeoutMs }),
    });
    return reply.send(result);
  });

  app.post('/queue/next', async (req, reply) => {
    const { providerId, models, kinds } = parseWith(capabilitiesBodySchema, req.body);
    const request = broker.poll(providerId, { models, kinds });
    if (!request) return reply.status(204).send();
    return reply.send(request);
  });

  app.post('/queue/result', async (req, reply) => {
    const submission = parseWith(resultBodySchema, req.body);
    const request = broker.submitResult(submission);
    return reply.send({ ok: true, requestId: request.id, status: request.status });
  });

  app.get('/queue/status/:id', async (req, reply) => {
    const { id } = parseWith(statusParamsSchema, req.params);
    return reply.send(broker.getStatus(id));
  });

  app.get('/queue/stats', async (_req, reply) => {
    return reply.send({ ...broker.stats(), providers: broker.listProviders().length });
  });
}
