import type { FastifyInstance } from 'fastify';
import type { InferenceBroker } from '../../broker/broker.js';
import { capabilitiesBodySchema, parseWith, type ModelsResponse } from '../schemas.js';

export function registerProviderRoutes(app: FastifyInstance, broker: InferenceBroker): void {
  app.post('/providers/register', async (req, reply) => {
    const { providerId, models, kinds } = parseWith(capabilitiesBodySchema, req.body);
    return reply.send(broker.registerProvider(providerId, { models, kinds }));
  });

  app.get('/providers', async (_req, reply) => {
    return reply.send({ providers: broker.listProviders() });
  });

  app.get('/models', async (_req, reply) => {
    const created = Math.floor(Date.now() / 1000);
    const response: ModelsResponse = {
      object: 'list',
      data: broker.listModels().map((m) => ({
        id: m.id,
        object: 'model',
        created,
        owned_by: 'inferline',
        providers: m.providers,
      })),
    };
    return reply.send(response);
  });
}
