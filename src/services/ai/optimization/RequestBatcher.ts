// RequestBatcher.ts
// Clustering batcher: pools pending requests, groups similar ones and sends one
// representative per group.
// - add() is O(1); a burst reaching minBatchSize schedules one eager flush as a microtask
// - tick() flushes everything once batchTimeoutMs has passed
// - dispatch failures never throw through here: every member gets a fallback result

import type { BrokerRequest, BrokerResult, ResultCallback } from '../../../shared/types';
import { ProviderError, failure, type BackendFailure, type BackendResult, type Outcome } from '../types';
import {
  buildRepresentative,
  planClusters,
  type RepresentativeRequest,
  type SimilarityThresholds,
} from './ClusterPlanner';
import { customizeForActor } from './ResponseCustomizer';

export type ClusterStatus = 'pending' | 'processing' | 'completed' | 'failed';

export interface Cluster {
  id: string;
  requestType: BrokerRequest['requestType'];
  members: BrokerRequest[];
  representative: RepresentativeRequest;
  status: ClusterStatus;
  createdAt: number;
  completedAt?: number;
  result?: BackendResult;
  error?: BackendFailure;
}

export interface DeliveredResult {
  request: BrokerRequest;
  result: BrokerResult;
}

export interface RequestBatcherOptions {
  minBatchSize: number;
  maxBatchSize: number;
  maxClusterSize: number;
  batchTimeoutMs: number;
  thresholds: SimilarityThresholds;
  /** Sends the representative. Expected to return failures, not throw. */
  dispatch: (cluster: Cluster) => Promise<Outcome<BackendResult>>;
  /** Result handed to each member when the dispatch fails. */
  fallback: (member: BrokerRequest, cluster: Cluster) => BrokerResult;
  /** Called once per cluster after every member callback has run. */
  onClusterSettled?: (cluster: Cluster, delivered: DeliveredResult[]) => void;
  random?: () => number;
}

export interface FlushOptions {
  force?: boolean;
}

export interface BatcherCounters {
  pending: number;
  batchedRequests: number;
  batchesCreated: number;
  activeBatches: number;
  averageBatchSize: number;
}

/**
 * Invoke a caller-supplied callback; a throw is logged and does not stop the fan-out.
 */
export function invokeCallback(callback: ResultCallback, result: BrokerResult, requestId: string): void {
  try {
    callback(result);
  } catch (err) {
    console.error(`[RequestBatcher] callback for ${requestId} threw:`, err);
  }
}

export class RequestBatcher {
  private readonly opts: RequestBatcherOptions;
  private pool: BrokerRequest[] = [];
  private readonly clusters = new Map<string, Cluster>();

  private flushing = false;
  private flushAgain: FlushOptions | null = null;
  private eagerScheduled = false;
  private lastFlushAt: number;
  private seq = 0;

  private batchedRequests = 0;
  private batchesCreated = 0;
  private dispatchedMembers = 0;

  constructor(opts: RequestBatcherOptions) {
    this.opts = opts;
    this.lastFlushAt = Date.now();
  }

  public add(request: BrokerRequest): void {
    this.pool.push(request);
    if (this.pool.length >= this.opts.minBatchSize && !this.eagerScheduled) {
      this.eagerScheduled = true;
      queueMicrotask(() => {
        this.eagerScheduled = false;
        this.flush().catch((err: unknown) => {
          console.error('[RequestBatcher] eager flush failed:', err);
        });
      });
    }
  }

  /**
   * Flush when the batch timeout has elapsed since the last flush, or the oldest
   * pending request has waited that long. Returns null when nothing is due.
   */
  public tick(now: number = Date.now()): Promise<void> | null {
    if (this.pool.length === 0) return null;
    const oldest = this.pool[0].enqueuedAt;
    const due =
      now - this.lastFlushAt >= this.opts.batchTimeoutMs || now - oldest >= this.opts.batchTimeoutMs;
    return due ? this.flush({ force: true }) : null;
  }

  /**
   * Plan and dispatch. Resolves when every cluster dispatched by this call has settled.
   * A non-forced flush keeps undersized, still-young clusters pooled.
   */
  public flush(opts: FlushOptions = {}): Promise<void> {
    if (this.flushing) {
      this.flushAgain = { force: Boolean(this.flushAgain?.force || opts.force) };
      return Promise.resolve();
    }
    this.flushing = true;
    const settling: Promise<void>[] = [];
    try {
      let force = Boolean(opts.force);
      let rerun: FlushOptions | null;
      do {
        settling.push(...this.planAndDispatch(force));
        // Set by a flush() call made while this one was planning
        rerun = this.flushAgain;
        this.flushAgain = null;
        force = Boolean(rerun?.force);
      } while (rerun);
    } finally {
      this.flushing = false;
    }
    return Promise.all(settling).then(() => undefined);
  }

  public get pendingCount(): number {
    return this.pool.length;
  }

  public getCounters(): BatcherCounters {
    return {
      pending: this.pool.length,
      batchedRequests: this.batchedRequests,
      batchesCreated: this.batchesCreated,
      activeBatches: this.clusters.size,
      averageBatchSize: this.batchesCreated === 0 ? 0 : this.dispatchedMembers / this.batchesCreated,
    };
  }

  // Internals

  private planAndDispatch(force: boolean): Promise<void>[] {
    if (this.pool.length === 0) return [];
    const now = Date.now();
    const drained = this.pool;
    this.pool = [];

    const groups = planClusters(drained, {
      maxClusterSize: this.opts.maxClusterSize,
      maxBatchSize: this.opts.maxBatchSize,
      thresholds: this.opts.thresholds,
    });

    const keep: BrokerRequest[] = [];
    const settling: Promise<void>[] = [];
    for (const members of groups) {
      if (!force && members.length < this.opts.minBatchSize) {
        const oldest = Math.min(...members.map((m) => m.enqueuedAt));
        if (now - oldest < this.opts.batchTimeoutMs) {
          keep.push(...members);
          continue;
        }
      }
      settling.push(this.dispatchCluster(this.createCluster(members, now)));
    }

    if (keep.length > 0) {
      // Restore arrival order for the next planning pass
      const arrival = new Map(drained.map((r, i) => [r, i] as const));
      this.pool = keep.sort((a, b) => (arrival.get(a) ?? 0) - (arrival.get(b) ?? 0));
    }
    if (settling.length > 0) {
      this.lastFlushAt = now;
    }
    return settling;
  }

  private createCluster(members: BrokerRequest[], now: number): Cluster {
    const id = `batch-${++this.seq}`;
    const cluster: Cluster = {
      id,
      requestType: members[0].requestType,
      members,
      representative: buildRepresentative(members, id),
      status: 'pending',
      createdAt: now,
    };
    this.clusters.set(id, cluster);
    this.batchesCreated++;
    this.dispatchedMembers += members.length;
    console.debug(`[RequestBatcher] created ${id} (${cluster.requestType}, ${members.length} members)`);
    return cluster;
  }

  private async dispatchCluster(cluster: Cluster): Promise<void> {
    cluster.status = 'processing';
    let outcome: Outcome<BackendResult>;
    try {
      outcome = await this.opts.dispatch(cluster);
    } catch (err) {
      outcome = failure(new ProviderError('batcher', `Dispatch of ${cluster.id} threw`, { cause: err }));
    }
    cluster.completedAt = Date.now();
    const processingTimeMs = cluster.completedAt - cluster.createdAt;

    const delivered: DeliveredResult[] = [];
    if (outcome.ok) {
      cluster.status = 'completed';
      cluster.result = outcome.value;
      for (const member of cluster.members) {
        const result = customizeForActor(outcome.value, member.actor, {
          batchSize: cluster.members.length,
          processingTimeMs,
          source: 'batch',
          random: this.opts.random,
        });
        delivered.push({ request: member, result });
        invokeCallback(member.callback, result, member.id);
      }
      this.batchedRequests += cluster.members.length;
      console.debug(`[RequestBatcher] ${cluster.id} completed in ${processingTimeMs}ms`);
    } else {
      cluster.status = 'failed';
      cluster.error = outcome.error;
      console.error(`[RequestBatcher] ${cluster.id} failed, serving offline results:`, outcome.error.message);
      for (const member of cluster.members) {
        const result = this.opts.fallback(member, cluster);
        delivered.push({ request: member, result });
        invokeCallback(member.callback, result, member.id);
      }
    }

    try {
      this.opts.onClusterSettled?.(cluster, delivered);
    } catch (err) {
      console.error(`[RequestBatcher] settle hook for ${cluster.id} threw:`, err);
    } finally {
      this.clusters.delete(cluster.id);
    }
  }
}

export default RequestBatcher;
