// Cache module shared types.

export type EvictionPolicy = 'oldest' | 'lru';

// A single cached value with its bookkeeping.
export interface CacheEntry<T> {
  value: T;
  createdAt: number;      // epoch ms when stored; drives TTL and 'oldest' eviction
  lastAccessedAt: number; // epoch ms of the last hit; drives 'lru' eviction
  accessCount: number;    // number of hits
}

export interface ResponseCacheOptions {
  name?: string;
  capacity: number;
  ttlMs: number;
  policy?: EvictionPolicy;
}

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  hitRate: number; // [0, 1]
  size: number;
}
