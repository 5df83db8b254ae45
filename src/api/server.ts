import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import type { InferenceBroker } from '../broker/broker.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { InferlineError } from '../errors/base.js';
import type { ErrorResponse } from './schemas.js';
import { registerQueueRoutes } from './routes/queue.js';
import { registerProviderRoutes } from './routes/providers.js';
import { registerCompletionRoutes } from './routes/completions.js';
import { registerHealthRoute } from './routes/health.js';

export interface ApiServerDeps {
  broker: InferenceBroker;
  /** Shared with Fastify's request logging. Silent when omitted. */
  logger?: Logger;
}

const STATUS_BY_CODE: Record<string, number> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  INVALID_STATE: 409,
  WAIT_CANCELLED: 499,
  UPSTREAM_FAILURE: 502,
  WAIT_TIMEOUT: 504,
};

function statusFor(error: unknown): number {
  if (error instanceof InferlineError) return STATUS_BY_CODE[error.code] ?? 500;
  // Fastify's own errors (malformed JSON, oversized body) carry a status code.
  if (
    typeof error === 'object' &&
    error !== null &&
    'statusCode' in error &&
    typeof error.statusCode === 'number'
  ) {
    return error.statusCode;
  }
  return 500;
}

function codeFor(error: unknown): string {
  if (error instanceof InferlineError) return error.code;
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return 'INTERNAL_ERROR';
}

/**
 * Creates a Fastify server with every broker route registered.
 * Does NOT call listen(). The caller does that, or uses server.inject() in tests.
 */
export function createApiServer(deps: ApiServerDeps): FastifyInstance {
  const loggerInstance: FastifyBaseLogger = deps.logger ?? silentLogger;
  const app = Fastify({ loggerInstance });

  app.setErrorHandler((error: unknown, req, reply) => {
    const status = statusFor(error);
    if (status >= 500 && status !== 502 && status !== 504) {
      req.log.error({ err: error }, 'request failed');
    }
    const body: ErrorResponse = {
      error: {
        code: codeFor(error),
        message: error instanceof Error ? error.message : String(error),
      },
    };
    return reply.status(status).send(body);
  });

  registerQueueRoutes(app, deps.broker);
  registerProviderRoutes(app, deps.broker);
  registerCompletionRoutes(app, deps.broker);
  registerHealthRoute(app);

  return app;
}
