// Broker configuration: compile-time defaults, AI_BROKER_* environment overrides, zod validation

import { z } from 'zod';
import {
  BACKEND_CONFIG,
  BATCH_CONFIG,
  CACHE_CONFIG,
  RESILIENCE_CONFIG,
  SIMILARITY_THRESHOLDS,
} from '../../shared/constants';

const positiveInt = z.coerce.number().int().positive();
const fraction = z.coerce.number().min(0).max(1);

export const BrokerConfigSchema = z
  .object({
    baseUrl: z.string().url().default(BACKEND_CONFIG.BASE_URL),
    model: z.string().min(1).default(BACKEND_CONFIG.MODEL),
    apiKeySecret: z.string().min(1).default(BACKEND_CONFIG.API_KEY_SECRET),
    userAgent: z.string().default(BACKEND_CONFIG.USER_AGENT),
    timeoutMs: positiveInt.default(RESILIENCE_CONFIG.REQUEST_TIMEOUT_MS),
    maxConcurrentRequests: positiveInt.default(RESILIENCE_CONFIG.MAX_CONCURRENT_REQUESTS),
    failureThreshold: positiveInt.default(RESILIENCE_CONFIG.FAILURE_THRESHOLD),
    openDurationMs: positiveInt.default(RESILIENCE_CONFIG.OPEN_DURATION_MS),
    minBatchSize: positiveInt.default(BATCH_CONFIG.MIN_BATCH_SIZE),
    maxBatchSize: positiveInt.default(BATCH_CONFIG.MAX_BATCH_SIZE),
    maxClusterSize: positiveInt.default(BATCH_CONFIG.MAX_CLUSTER_SIZE),
    batchTimeoutMs: positiveInt.default(BATCH_CONFIG.BATCH_TIMEOUT_MS),
    opinionThreshold: fraction.default(SIMILARITY_THRESHOLDS.OPINION),
    behaviorThreshold: fraction.default(SIMILARITY_THRESHOLDS.BEHAVIOR),
    maxAgeDifference: z.coerce.number().min(0).default(SIMILARITY_THRESHOLDS.MAX_AGE_DIFFERENCE),
    exactCacheCapacity: positiveInt.default(CACHE_CONFIG.EXACT_CAPACITY),
    exactCacheTtlMs: positiveInt.default(CACHE_CONFIG.EXACT_TTL_MS),
    bucketCacheCapacity: positiveInt.default(CACHE_CONFIG.BUCKET_CAPACITY),
    bucketCacheTtlMs: positiveInt.default(CACHE_CONFIG.BUCKET_TTL_MS),
    bucketEvictionPolicy: z.enum(['oldest', 'lru']).default('oldest'),
    sweepIntervalMs: positiveInt.default(CACHE_CONFIG.SWEEP_INTERVAL_MS),
  })
  .refine((c) => c.minBatchSize <= c.maxBatchSize, {
    message: 'minBatchSize must not exceed maxBatchSize',
    path: ['minBatchSize'],
  });

export type BrokerConfig = z.infer<typeof BrokerConfigSchema>;

// Environment variable for each key, e.g. maxBatchSize -> AI_BROKER_MAX_BATCH_SIZE
const ENV_KEYS: Record<keyof BrokerConfig, string> = {
  baseUrl: 'AI_BROKER_BASE_URL',
  model: 'AI_BROKER_MODEL',
  apiKeySecret: 'AI_BROKER_API_KEY_SECRET',
  userAgent: 'AI_BROKER_USER_AGENT',
  timeoutMs: 'AI_BROKER_TIMEOUT_MS',
  maxConcurrentRequests: 'AI_BROKER_MAX_CONCURRENT_REQUESTS',
  failureThreshold: 'AI_BROKER_FAILURE_THRESHOLD',
  openDurationMs: 'AI_BROKER_OPEN_DURATION_MS',
  minBatchSize: 'AI_BROKER_MIN_BATCH_SIZE',
  maxBatchSize: 'AI_BROKER_MAX_BATCH_SIZE',
  maxClusterSize: 'AI_BROKER_MAX_CLUSTER_SIZE',
  batchTimeoutMs: 'AI_BROKER_BATCH_TIMEOUT_MS',
  opinionThreshold: 'AI_BROKER_OPINION_THRESHOLD',
  behaviorThreshold: 'AI_BROKER_BEHAVIOR_THRESHOLD',
  maxAgeDifference: 'AI_BROKER_MAX_AGE_DIFFERENCE',
  exactCacheCapacity: 'AI_BROKER_EXACT_CACHE_CAPACITY',
  exactCacheTtlMs: 'AI_BROKER_EXACT_CACHE_TTL_MS',
  bucketCacheCapacity: 'AI_BROKER_BUCKET_CACHE_CAPACITY',
  bucketCacheTtlMs: 'AI_BROKER_BUCKET_CACHE_TTL_MS',
  bucketEvictionPolicy: 'AI_BROKER_BUCKET_EVICTION_POLICY',
  sweepIntervalMs: 'AI_BROKER_SWEEP_INTERVAL_MS',
};

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid broker configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Merge defaults, environment and explicit overrides (highest priority), then validate.
 * Blank environment values are ignored.
 */
export function loadBrokerConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<BrokerConfig> = {}
): BrokerConfig {
  const raw: Record<string, unknown> = {};
  for (const [key, variable] of Object.entries(ENV_KEYS)) {
    const value = env[variable]?.trim();
    if (value) raw[key] = value;
  }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) raw[key] = value;
  }

  const parsed = BrokerConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`));
  }
  return parsed.data;
}
