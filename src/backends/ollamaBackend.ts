import type { OllamaConfig } from '../types/config.types.js';
import { OpenAICompatibleBackend } from './openaiCompatibleBackend.js';
import { BackendError } from '../errors/backend.js';

/**
 * Ollama serves the OpenAI-style completion routes under /v1 but lists its
 * models through the native /api/tags endpoint.
 */
export class OllamaBackend extends OpenAICompatibleBackend {
  constructor(config: OllamaConfig) {
    super({ baseUrl: config.baseUrl });
  }

  override async listModels(): Promise<string[]> {
    const res = await fetch(`${this.baseUrl}/api/tags`);
    if (!res.ok) {
      throw new BackendError(`Ollama model listing failed: ${res.status} ${res.statusText}`, res.status);
    }
    const data = (await res.json()) as { models?: Array<{ name?: unknown }> };
    return (data.models ?? [])
      .map((m) => m.name)
      .filter((name): name is string => typeof name === 'string');
  }

  override async isAvailable(): Promise<boolean> {
    try {
      const res = await fetch(`${this.baseUrl}/api/tags`);
      return res.ok;
    } catch {
      return false;
    }
  }
}
