export interface OllamaConfig {
  type: 'ollama';
  baseUrl: string;
}

export interface OpenAICompatibleConfig {
  type: 'openai-compatible';
  baseUrl: string;
  apiKey?: string;
}

export type BackendConfig = OllamaConfig | OpenAICompatibleConfig;

export interface ApiConfig {
  port: number;
  host: string;
}

/**
 * What happens to a request whose waiter gave up (timeout or disconnect).
 * `retain` leaves it queued for late dispatch, `remove` deletes it.
 */
export type OrphanPolicy = 'retain' | 'remove';

export interface BrokerConfig {
  providerTtlMs: number;
  defaultWaitTimeoutMs: number;
  maxWaitTimeoutMs: number;
  orphanPolicy: OrphanPolicy;
}

export interface ProviderConfig {
  brokerUrl: string;
  providerId?: string;
  pollIntervalMs: number;
  modelRefreshIntervalMs: number;
  kinds: string[];
  backend: BackendConfig;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface AppConfig {
  api: ApiConfig;
  broker: BrokerConfig;
  provider: ProviderConfig;
  logLevel: LogLevel;
}
