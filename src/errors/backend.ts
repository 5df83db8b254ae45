import { InferlineError } from './base.js';

export class BackendError extends InferlineError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: unknown,
  ) {
    super(message, 'BACKEND_ERROR', cause);
  }
}

/** Raised by the provider worker when the broker itself rejects or is unreachable. */
export class BrokerClientError extends InferlineError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: unknown,
  ) {
    super(message, 'BROKER_CLIENT_ERROR', cause);
  }
}
