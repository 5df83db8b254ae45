import type { UpstreamRequest, UpstreamResponse } from '../types/inference.types.js';

/** An upstream model server a provider forwards claimed requests to. */
export interface InferenceBackend {
  listModels(): Promise<string[]>;
  execute(request: UpstreamRequest): Promise<UpstreamResponse>;
  isAvailable(): Promise<boolean>;
}
