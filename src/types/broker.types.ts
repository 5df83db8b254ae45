export type RequestStatus = 'pending' | 'processing' | 'completed' | 'failed';

/** Opaque caller data. The broker never looks inside. */
export type Payload = Record<string, unknown>;

export interface QueuedRequest {
  id: string;
  kind: string;
  model: string;
  payload: Payload;
  status: RequestStatus;
  createdAt: number;
  startedAt?: number;
  completedAt?: number;
  error?: string;
  providerId?: string;
}

export interface ProviderCapabilities {
  providerId: string;
  models: ReadonlySet<string>;
  kinds: ReadonlySet<string>;
  lastSeen: number;
}

export interface InferenceResult {
  requestId: string;
  result: Payload;
  usage?: Payload;
  error?: string;
}

export type RequestStats = Record<RequestStatus, number> & { total: number };

export type StatusView =
  | { requestId: string; status: 'pending' | 'processing'; createdAt: number; startedAt?: number }
  | { requestId: string; status: 'completed'; result: Payload; usage?: Payload }
  | { requestId: string; status: 'failed'; error: string };

export interface WaitResult {
  requestId: string;
  result: Payload;
  usage?: Payload;
}

export interface ModelListing {
  id: string;
  providers: string[];
}
