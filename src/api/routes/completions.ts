import type { FastifyInstance } from 'fastify';
import type { InferenceBroker } from '../../broker/broker.js';
import { chatCompletionBodySchema, completionBodySchema, parseWith } from '../schemas.js';
import { disconnectSignal } from './queue.js';

/**
 * OpenAI-style endpoints. The whole body is queued as the payload and the
 * provider's upstream response is returned unchanged.
 */
export function registerCompletionRoutes(app: FastifyInstance, broker: InferenceBroker): void {
  app.post('/completions', async (req, reply) => {
    const body = parseWith(completionBodySchema, req.body);
    const { result } = await broker.submitAndWait('completion', body.model, body, {
      signal: disconnectSignal(reply),
    });
    return reply.send(result);
  });

  app.post('/chat/completions', async (req, reply) => {
    const body = parseWith(chatCompletionBodySchema, req.body);
    const { result } = await broker.submitAndWait('chat_completion', body.model, body, {
      signal: disconnectSignal(reply),
    });
    return reply.send(result);
  });
}
