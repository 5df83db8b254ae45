import type { FastifyInstance } from 'fastify';

export function registerHealthRoute(app: FastifyInstance): void {
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'healthy', timestamp: Math.floor(Date.now() / 1000) });
  });
}
