export { AIRequestBroker, type AIRequestBrokerDeps, type EnqueueOutcome } from './services/ai/AIRequestBroker';
export { loadBrokerConfig, BrokerConfigSchema, ConfigError, type BrokerConfig } from './services/ai/config';
export { KeyGate, EnvCredentialProvider, type CredentialProvider } from './services/ai/KeyGate';
export { ChatCompletionsProvider } from './services/ai/providers/ChatCompletionsProvider';
export { ResponseCache } from './services/ai/cache/ResponseCache';
export { exactKey, bucketKey } from './services/ai/cache/KeyGenerator';
export { CircuitBreaker } from './services/ai/utils/CircuitBreaker';
export { ConcurrencyGate } from './services/ai/utils/ConcurrencyGate';
export { planClusters, buildRepresentative, areSimilar } from './services/ai/optimization/ClusterPlanner';
export { RequestBatcher, type Cluster, type ClusterStatus } from './services/ai/optimization/RequestBatcher';
export { OfflineGenerator, type OfflineGeneration, type OfflineStatistics } from './services/ai/offline/OfflineGenerator';
export { buildOfflineResult, buildOfflineVoterResponse } from './services/ai/offline/OfflineResult';
export {
  NullEventSink,
  type ResultEventSink,
  type ResultReadyEvent,
} from './services/events/ResultEventSink';
export {
  AIServiceError,
  InvalidRequestError,
  MissingKeyError,
  NetworkError,
  RateLimitError,
  ServiceUnavailableError,
  MalformedResponseError,
} from './services/ai/errors/AIServiceErrors';
export type { CompletionBackend, Outcome, ServiceStatus, CircuitState, BackendResult } from './services/ai/types';
export type * from './shared/types';
