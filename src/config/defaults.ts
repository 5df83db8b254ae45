import type { AppConfig } from '../types/config.types.js';

export const DEFAULT_CONFIG: AppConfig = {
  api: {
    port: 8000,
    host: '127.0.0.1',
  },
  broker: {
    providerTtlMs: 300_000,
    defaultWaitTimeoutMs: 60_000,
    maxWaitTimeoutMs: 600_000,
    orphanPolicy: 'retain',
  },
  provider: {
    brokerUrl: 'http://localhost:8000',
    pollIntervalMs: 1_000,
    modelRefreshIntervalMs: 60_000,
    kinds: ['completion', 'chat_completion'],
    backend: {
      type: 'openai-compatible',
      baseUrl: 'http://localhost:8001',
    },
  },
  logLevel: 'info',
};
