import { InferlineError } from './base.js';
import type { RequestStatus } from '../types/broker.types.js';

export class NotFoundError extends InferlineError {
  constructor(
    public readonly entity: 'request' | 'result' | 'provider',
    public readonly id: string,
  ) {
    super(`Unknown ${entity}: ${id}`, 'NOT_FOUND');
  }
}

export class InvalidStateError extends InferlineError {
  constructor(
    public readonly requestId: string,
    /** 'unknown' when the request is no longer, or never was, in the store. */
    public readonly actual: RequestStatus | 'unknown',
    public readonly expected: readonly RequestStatus[],
  ) {
    super(
      `Request ${requestId} is ${actual}, expected ${expected.join(' or ')}`,
      'INVALID_STATE',
    );
  }
}

/** The provider reported a failure; `message` is forwarded verbatim. */
export class UpstreamFailureError extends InferlineError {
  constructor(
    public readonly requestId: string,
    message: string,
  ) {
    super(message, 'UPSTREAM_FAILURE');
  }
}

export class WaitTimeoutError extends InferlineError {
  constructor(
    public readonly requestId: string,
    public readonly timeoutMs: number,
  ) {
    super(`Request ${requestId} did not finish within ${timeoutMs}ms`, 'WAIT_TIMEOUT');
  }
}

export class WaitCancelledError extends InferlineError {
  constructor(
    public readonly requestId: string,
    cause?: unknown,
  ) {
    super(`Wait for request ${requestId} was cancelled`, 'WAIT_CANCELLED', cause);
  }
}

export class ValidationError extends InferlineError {
  constructor(message: string, cause?: unknown) {
    super(message, 'VALIDATION_ERROR', cause);
  }
}
