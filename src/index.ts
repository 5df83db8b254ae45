// Public API: explicit named exports only (no re-export *)

export type {
  QueuedRequest,
  RequestStatus,
  ProviderCapabilities,
  InferenceResult,
  RequestStats,
  StatusView,
  WaitResult,
  Payload,
} from './types/broker.types.js';
export type { AppConfig, BrokerConfig, OrphanPolicy } from './types/config.types.js';
export type { InferenceBackend } from './backends/inferenceBackend.js';
export type { ResultSubmission } from './broker/broker.js';

export { InferenceBroker } from './broker/broker.js';
export { RequestStore } from './broker/requestStore.js';
export { ResultStore } from './broker/resultStore.js';
export { ProviderRegistry } from './broker/providerRegistry.js';
export { DispatchMatcher } from './broker/dispatchMatcher.js';
export { CompletionWaiter } from './broker/completionWaiter.js';
export { createApiServer } from './api/server.js';
export { createBackend } from './backends/backendFactory.js';
export { BrokerClient } from './provider/brokerClient.js';
export { ProviderWorker } from './provider/providerWorker.js';
export { loadConfig } from './config/loader.js';
export { validateConfig, ConfigValidationError } from './config/validator.js';
export { InferlineError } from './errors/base.js';
export {
  NotFoundError,
  InvalidStateError,
  UpstreamFailureError,
  WaitTimeoutError,
  WaitCancelledError,
  ValidationError,
} from './errors/broker.js';
export { BackendError, BrokerClientError } from './errors/backend.js';
