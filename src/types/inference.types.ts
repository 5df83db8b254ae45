import type { Payload } from './broker.types.js';

export type CompletionKind = 'completion' | 'chat_completion';

export interface UpstreamRequest {
  kind: CompletionKind;
  payload: Payload;
}

export interface UpstreamResponse {
  result: Payload;
  usage?: Payload;
}
