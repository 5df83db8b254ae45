import type { InferenceResult } from '../types/broker.types.js';

/**
 * Results keyed by request id. A result is handed out at most once through
 * takeAndDelete(); get() is a non-consuming peek.
 */
export class ResultStore {
  private results = new Map<string, InferenceResult>();

  put(result: InferenceResult): void {
    this.results.set(result.requestId, result);
  }

  get(requestId: string): InferenceResult | undefined {
    return this.results.get(requestId);
  }

  takeAndDelete(requestId: string): InferenceResult | undefined {
    const result = this.results.get(requestId);
    if (result === undefined) return undefined;
    this.results.delete(requestId);
    return result;
  }

  delete(requestId: string): void {
    this.results.delete(requestId);
  }

  get size(): number {
    return this.results.size;
  }
}
