/* Bounded in-memory response cache with TTL and single-entry eviction */

import type { CacheEntry, CacheStats, EvictionPolicy, ResponseCacheOptions } from './types';

interface Node<T> extends CacheEntry<T> {
  key: string;
  // Doubly-linked list pointers; head is the newest (or most recently used) entry
  prev?: Node<T>;
  next?: Node<T>;
}

/**
 * ResponseCache keeps at most `capacity` entries, each valid while
 * `now - createdAt < ttlMs`.
 * - 'oldest' policy: list order is creation order; lookups do not reorder.
 * - 'lru' policy: lookups move the entry to the head.
 * Eviction always removes the tail.
 */
export class ResponseCache<T> {
  readonly name: string;
  private readonly capacity: number;
  private readonly ttlMs: number;
  private readonly policy: EvictionPolicy;

  private map: Map<string, Node<T>> = new Map();
  private head?: Node<T>;
  private tail?: Node<T>;

  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(opts: ResponseCacheOptions) {
    if (!Number.isInteger(opts.capacity) || opts.capacity < 1) {
      throw new RangeError(`[ResponseCache] capacity must be a positive integer, got ${opts.capacity}`);
    }
    this.name = opts.name ?? 'cache';
    this.capacity = opts.capacity;
    this.ttlMs = opts.ttlMs;
    this.policy = opts.policy ?? 'oldest';
  }

  /**
   * Fresh value for `key`, or undefined. Expired entries are deleted here.
   */
  public lookup(key: string): T | undefined {
    const entry = this.map.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    const now = Date.now();
    if (this.isExpired(entry, now)) {
      this.deleteEntry(entry);
      this.misses++;
      return undefined;
    }
    entry.accessCount++;
    entry.lastAccessedAt = now;
    if (this.policy === 'lru') {
      this.moveToFront(entry);
    }
    this.hits++;
    return entry.value;
  }

  /**
   * Insert or replace. A new key at capacity evicts exactly one entry first.
   */
  public store(key: string, value: T): void {
    const now = Date.now();
    const existing = this.map.get(key);
    if (existing) {
      existing.value = value;
      existing.createdAt = now;
      existing.lastAccessedAt = now;
      this.moveToFront(existing);
      return;
    }
    if (this.map.size >= this.capacity) {
      this.evictOne();
    }
    const entry: Node<T> = { key, value, createdAt: now, lastAccessedAt: now, accessCount: 0 };
    this.map.set(key, entry);
    this.insertAtFront(entry);
  }

  /**
   * Remove every expired entry. Returns the number removed.
   */
  public sweepExpired(): number {
    const now = Date.now();
    let removed = 0;
    for (const entry of Array.from(this.map.values())) {
      if (this.isExpired(entry, now)) {
        this.deleteEntry(entry);
        removed++;
      }
    }
    return removed;
  }

  /**
   * True when a fresh entry exists. Does not touch counters, order or expiry.
   */
  public has(key: string): boolean {
    const entry = this.map.get(key);
    return entry !== undefined && !this.isExpired(entry, Date.now());
  }

  public clear(): void {
    this.map.clear();
    this.head = undefined;
    this.tail = undefined;
  }

  public resetStats(): void {
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
  }

  public get size(): number {
    return this.map.size;
  }

  public stats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      hitRate: total === 0 ? 0 : this.hits / total,
      size: this.map.size,
    };
  }

  /** Test hook: entry metadata without touching counters or order. */
  public _inspect(key: string): CacheEntry<T> | undefined {
    const entry = this.map.get(key);
    if (!entry) return undefined;
    return {
      value: entry.value,
      createdAt: entry.createdAt,
      lastAccessedAt: entry.lastAccessedAt,
      accessCount: entry.accessCount,
    };
  }

  // Internal helpers

  private isExpired(entry: Node<T>, now: number): boolean {
    return now - entry.createdAt >= this.ttlMs;
  }

  private evictOne(): void {
    if (!this.tail) return;
    console.debug(`[ResponseCache:${this.name}] evicting ${this.policy} entry`);
    this.deleteEntry(this.tail);
    this.evictions++;
  }

  private insertAtFront(entry: Node<T>): void {
    entry.prev = undefined;
    entry.next = this.head;
    if (this.head) {
      this.head.prev = entry;
    }
    this.head = entry;
    if (!this.tail) {
      this.tail = entry;
    }
  }

  private moveToFront(entry: Node<T>): void {
    if (this.head === entry) return;
    this.unlink(entry);
    this.insertAtFront(entry);
  }

  private unlink(entry: Node<T>): void {
    if (entry.prev) {
      entry.prev.next = entry.next;
    }
    if (entry.next) {
      entry.next.prev = entry.prev;
    }
    if (this.head === entry) {
      this.head = entry.next;
    }
    if (this.tail === entry) {
      this.tail = entry.prev;
    }
    entry.prev = undefined;
    entry.next = undefined;
  }

  private deleteEntry(entry: Node<T>): void {
    this.unlink(entry);
    this.map.delete(entry.key);
  }
}

export default ResponseCache;
