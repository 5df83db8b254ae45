import type { AppConfig, BackendConfig } from '../types/config.types.js';

export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigValidationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

function validateBackend(backend: BackendConfig): void {
  if (!backend.baseUrl || backend.baseUrl.trim() === '') {
    throw new ConfigValidationError(`Backend type "${backend.type}" requires baseUrl.`);
  }
}

function requirePositive(value: number, name: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigValidationError(`${name} must be a positive number, got ${value}.`);
  }
}

export function validateConfig(config: AppConfig): void {
  if (!Number.isInteger(config.api.port) || config.api.port < 1 || config.api.port > 65535) {
    throw new ConfigValidationError(
      `API port must be between 1 and 65535, got ${config.api.port}.`,
    );
  }

  requirePositive(config.broker.providerTtlMs, 'broker.providerTtlMs');
  requirePositive(config.broker.defaultWaitTimeoutMs, 'broker.defaultWaitTimeoutMs');
  requirePositive(config.broker.maxWaitTimeoutMs, 'broker.maxWaitTimeoutMs');
  if (config.broker.defaultWaitTimeoutMs > config.broker.maxWaitTimeoutMs) {
    throw new ConfigValidationError(
      'broker.defaultWaitTimeoutMs must not exceed broker.maxWaitTimeoutMs.',
    );
  }

  requirePositive(config.provider.pollIntervalMs, 'provider.pollIntervalMs');
  requirePositive(config.provider.modelRefreshIntervalMs, 'provider.modelRefreshIntervalMs');
  if (config.provider.kinds.length === 0) {
    throw new ConfigValidationError('provider.kinds must list at least one request kind.');
  }
  validateBackend(config.provider.backend);
}
