import type { OpenAICompatibleConfig } from '../types/config.types.js';
import type { Payload } from '../types/broker.types.js';
import type { CompletionKind, UpstreamRequest, UpstreamResponse } from '../types/inference.types.js';
import type { InferenceBackend } from './inferenceBackend.js';
import { BackendError } from '../errors/backend.js';

const ENDPOINTS: Record<CompletionKind, string> = {
  completion: '/v1/completions',
  chat_completion: '/v1/chat/completions',
};

function isPayload(value: unknown): value is Payload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class OpenAICompatibleBackend implements InferenceBackend {
  protected readonly baseUrl: string;
  private readonly apiKey: string | undefined;

  constructor(config: Pick<OpenAICompatibleConfig, 'baseUrl' | 'apiKey'>) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.apiKey = config.apiKey;
  }

  protected headers(): Record<string, string> {
    const h: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      h['Authorization'] = `Bearer ${this.apiKey}`;
    }
    return h;
  }

  async listModels(): Promise<string[]> {
    const res = await fetch(`${this.baseUrl}/v1/models`, { headers: this.headers() });
    if (!res.ok) {
      throw new BackendError(`Model listing failed: ${res.status} ${res.statusText}`, res.status);
    }
    const data = (await res.json()) as { data?: Array<{ id?: unknown }> };
    return (data.data ?? [])
      .map((m) => m.id)
      .filter((id): id is string => typeof id === 'string');
  }

  async execute(request: UpstreamRequest): Promise<UpstreamResponse> {
    const url = `${this.baseUrl}${ENDPOINTS[request.kind]}`;
    const res = await fetch(url, {
      method: 'POST',
      headers: this.headers(),
      body: JSON.stringify({ ...request.payload, stream: false }),
    });

    if (!res.ok) {
      const detail = await res.text();
      throw new BackendError(
        `Upstream API error ${res.status}: ${detail || res.statusText}`,
        res.status,
      );
    }

    const data: unknown = await res.json();
    if (!isPayload(data)) {
      throw new BackendError('Upstream returned a non-object response body');
    }
    const usage = data['usage'];
    return {
      result: data,
      ...(isPayload(usage) && { usage }),
    };
  }

  async isAvailable(): Promise<boolean> {
    try {
      const res = await fetch(`${this.baseUrl}/v1/models`, {
        headers: this.headers(),
      });
      return res.ok;
    } catch {
      return false;
    }
  }
}
