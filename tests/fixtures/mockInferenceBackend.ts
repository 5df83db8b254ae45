import type { InferenceBackend } from '../../src/backends/inferenceBackend.js';
import type { UpstreamRequest, UpstreamResponse } from '../../src/types/inference.types.js';

export class MockInferenceBackend implements InferenceBackend {
  models: string[] = ['m1'];
  response: UpstreamResponse = { result: { text: 'mock response' }, usage: { tokens: 2 } };
  requests: UpstreamRequest[] = [];
  shouldFail = false;
  failListing = false;
  available = true;

  async listModels(): Promise<string[]> {
    if (this.failListing) throw new Error('listing unavailable');
    return [...this.models];
  }

  async execute(req: UpstreamRequest): Promise<UpstreamResponse> {
    this.requests.push(req);
    if (this.shouldFail) throw new Error('mock failure');
    return this.response;
  }

  async isAvailable(): Promise<boolean> { return this.available; }
}
