import { describe, it, expect } from 'vitest';
import { ConfigError, loadBrokerConfig } from '../config';

describe('loadBrokerConfig', () => {
  it('uses the compiled defaults for an empty environment', () => {
    const cfg = loadBrokerConfig({});
    expect(cfg.minBatchSize).toBe(5);
    expect(cfg.maxBatchSize).toBe(50);
    expect(cfg.maxClusterSize).toBe(20);
    expect(cfg.batchTimeoutMs).toBe(2_000);
    expect(cfg.opinionThreshold).toBe(0.15);
    expect(cfg.behaviorThreshold).toBe(0.2);
    expect(cfg.maxAgeDifference).toBe(15);
    expect(cfg.maxConcurrentRequests).toBe(3);
    expect(cfg.failureThreshold).toBe(5);
    expect(cfg.openDurationMs).toBe(30_000);
    expect(cfg.timeoutMs).toBe(5_000);
    expect(cfg.exactCacheTtlMs).toBe(3_600_000);
    expect(cfg.bucketCacheTtlMs).toBe(86_400_000);
    expect(cfg.bucketEvictionPolicy).toBe('oldest');
    expect(cfg.apiKeySecret).toBe('nim_api_key');
  });

  it('coerces AI_BROKER_* variables and ignores blank ones', () => {
    const cfg = loadBrokerConfig({
      AI_BROKER_MAX_BATCH_SIZE: '80',
      AI_BROKER_OPINION_THRESHOLD: '0.25',
      AI_BROKER_BUCKET_EVICTION_POLICY: 'lru',
      AI_BROKER_MODEL: '   ',
    });
    expect(cfg.maxBatchSize).toBe(80);
    expect(cfg.opinionThreshold).toBe(0.25);
    expect(cfg.bucketEvictionPolicy).toBe('lru');
    expect(cfg.model).toBe('nvidia/llama-3.1-nemotron-70b-instruct');
  });

  it('lets explicit overrides win over the environment', () => {
    const cfg = loadBrokerConfig({ AI_BROKER_FAILURE_THRESHOLD: '9' }, { failureThreshold: 2 });
    expect(cfg.failureThreshold).toBe(2);
  });

  it('reports every invalid field', () => {
    let caught: unknown;
    try {
      loadBrokerConfig({ AI_BROKER_TIMEOUT_MS: 'soon', AI_BROKER_BASE_URL: 'not a url' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues.map((i) => i.split(':')[0]).sort()).toEqual(['baseUrl', 'timeoutMs']);
    }
  });

  it('rejects a minimum batch size above the maximum', () => {
    expect(() => loadBrokerConfig({}, { minBatchSize: 10, maxBatchSize: 4 })).toThrow(
      'minBatchSize: minBatchSize must not exceed maxBatchSize'
    );
  });
});
