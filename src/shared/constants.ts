// Shared constants for the AI broker

// Batching
export const BATCH_CONFIG = {
  MAX_BATCH_SIZE: 50,
  MIN_BATCH_SIZE: 5,
  MAX_CLUSTER_SIZE: 20,
  BATCH_TIMEOUT_MS: 2_000,
};

// Similarity thresholds used when clustering requests
export const SIMILARITY_THRESHOLDS = {
  OPINION: 0.15,
  BEHAVIOR: 0.2,
  MAX_AGE_DIFFERENCE: 15,
};

// Cache tiers
export const CACHE_CONFIG = {
  EXACT_CAPACITY: 1_000,
  EXACT_TTL_MS: 60 * 60 * 1000, // 1 hour
  BUCKET_CAPACITY: 500,
  BUCKET_TTL_MS: 24 * 60 * 60 * 1000, // 24 hours
  SWEEP_INTERVAL_MS: 60_000,
};

// Offline generator cache
export const OFFLINE_CONFIG = {
  CAPACITY: 1_000,
  TTL_MS: 7 * 24 * 60 * 60 * 1000, // 7 days
};

// Resilience
export const RESILIENCE_CONFIG = {
  MAX_CONCURRENT_REQUESTS: 3,
  REQUEST_TIMEOUT_MS: 5_000,
  FAILURE_THRESHOLD: 5,
  OPEN_DURATION_MS: 30_000,
};

// Backend defaults
export const BACKEND_CONFIG = {
  BASE_URL: 'https://integrate.api.nvidia.com/v1',
  MODEL: 'nvidia/llama-3.1-nemotron-70b-instruct',
  API_KEY_SECRET: 'nim_api_key',
  USER_AGENT: 'electorate-ai-broker/0.1',
};

// Event types published on the result sink
export const EVENT_TYPES = {
  RESULT_READY: 'ai.result.ready',
} as const;
