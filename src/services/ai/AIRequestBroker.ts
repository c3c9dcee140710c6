import type {
  ActorSnapshot,
  BrokerRequest,
  BrokerResult,
  BrokerStatistics,
  RequestType,
  ResultCallback,
  VoterResponse,
} from '../../shared/types';
import type { BackendFailure, BackendResult, BuiltPrompt, CompletionBackend, Outcome, ServiceStatus } from './types';
import { loadBrokerConfig, type BrokerConfig } from './config';
import { ResponseCache } from './cache/ResponseCache';
import { bucketKey, exactKey } from './cache/KeyGenerator';
import CircuitBreaker from './utils/CircuitBreaker';
import ConcurrencyGate from './utils/ConcurrencyGate';
import KeyGate, { EnvCredentialProvider, type CredentialProvider } from './KeyGate';
import ChatCompletionsProvider from './providers/ChatCompletionsProvider';
import { buildContentAnalysisPrompt, buildPoliticalPrompt, buildVoterResponsesPrompt } from './prompts/PoliticalPrompts';
import RequestBatcher, { invokeCallback, type Cluster, type DeliveredResult } from './optimization/RequestBatcher';
import { fromCache } from './optimization/ResponseCustomizer';
import OfflineGenerator from './offline/OfflineGenerator';
import { buildOfflineResult, buildOfflineVoterResponse } from './offline/OfflineResult';
import { ActorSnapshotSchema, RequestTypeEnum, type VoterResponseEntry } from './schemas/ResponseSchemas';
import { parseVoterResponses } from './utils/ResponseValidator';
import { InvalidRequestError, classifyFailure } from './errors/AIServiceErrors';
import {
  NullEventSink,
  publishSafely,
  resultReadyEvent,
  type ResultEventSink,
} from '../events/ResultEventSink';

export interface AIRequestBrokerDeps {
  config?: BrokerConfig;
  credentials?: CredentialProvider;
  eventSink?: ResultEventSink;
  backend?: CompletionBackend;
  offline?: OfflineGenerator;
  /** Jitter source for per-member customization */
  random?: () => number;
}

/**
 * How enqueue() handled a request: answered from a cache tier, or pooled for batching.
 */
export type EnqueueOutcome = 'exact-cache' | 'bucket-cache' | 'queued';

type AvailabilityListener = (available: boolean) => void;

interface DailyCounters {
  day: string;
  requests: number;
  failed: number;
}

function localDay(now: number): string {
  return new Date(now).toDateString();
}

/**
 * Entry point for the simulation. Owns both cache tiers, the batcher, the
 * circuit breaker, the concurrency gate and the offline fallback.
 *
 * Lifecycle is explicit: start() arms the periodic tick, stop() disarms it and
 * force-flushes whatever is still pooled.
 */
export class AIRequestBroker {
  private readonly config: BrokerConfig;
  private readonly exactCache: ResponseCache<BrokerResult>;
  private readonly bucketCache: ResponseCache<BrokerResult>;
  private readonly breaker: CircuitBreaker;
  private readonly gate: ConcurrencyGate;
  private readonly keyGate: KeyGate;
  private readonly backend: CompletionBackend;
  private readonly offline: OfflineGenerator;
  private readonly sink: ResultEventSink;
  private readonly batcher: RequestBatcher;

  private timer: ReturnType<typeof setInterval> | null = null;
  private lastSweepAt: number;
  private seq = 0;

  private totalRequests = 0;
  private cacheHits = 0;

  private daily: DailyCounters;
  private lastSuccessfulRequestAt: number | null = null;
  private successfulCalls = 0;
  private averageResponseTimeMs = 0;
  private lastError?: { errorType: string; message: string };

  private available = false;
  private readonly availabilityListeners = new Set<AvailabilityListener>();

  constructor(deps: AIRequestBrokerDeps = {}) {
    const config = deps.config ?? loadBrokerConfig();
    this.config = config;

    this.exactCache = new ResponseCache<BrokerResult>({
      name: 'exact',
      capacity: config.exactCacheCapacity,
      ttlMs: config.exactCacheTtlMs,
      policy: 'oldest',
    });
    this.bucketCache = new ResponseCache<BrokerResult>({
      name: 'bucket',
      capacity: config.bucketCacheCapacity,
      ttlMs: config.bucketCacheTtlMs,
      policy: config.bucketEvictionPolicy,
    });

    this.breaker = new CircuitBreaker({
      name: 'backend',
      failureThreshold: config.failureThreshold,
      openDurationMs: config.openDurationMs,
    });
    this.breaker.onStateChange(() => this.refreshAvailability());

    this.gate = new ConcurrencyGate(config.maxConcurrentRequests);
    this.keyGate = new KeyGate(deps.credentials ?? new EnvCredentialProvider(), config.apiKeySecret);
    this.backend =
      deps.backend ??
      new ChatCompletionsProvider({
        baseUrl: config.baseUrl,
        model: config.model,
        timeoutMs: config.timeoutMs,
        userAgent: config.userAgent,
      });
    this.offline = deps.offline ?? new OfflineGenerator();
    this.sink = deps.eventSink ?? new NullEventSink();

    this.batcher = new RequestBatcher({
      minBatchSize: config.minBatchSize,
      maxBatchSize: config.maxBatchSize,
      maxClusterSize: config.maxClusterSize,
      batchTimeoutMs: config.batchTimeoutMs,
      thresholds: {
        opinion: config.opinionThreshold,
        behavior: config.behaviorThreshold,
        maxAgeDifference: config.maxAgeDifference,
      },
      dispatch: (cluster) => this.dispatchCluster(cluster),
      fallback: (member, cluster) =>
        buildOfflineResult(member, this.offline, {
          batchSize: cluster.members.length,
          processingTimeMs: (cluster.completedAt ?? Date.now()) - cluster.createdAt,
        }),
      onClusterSettled: (cluster, delivered) => this.onClusterSettled(cluster, delivered),
      random: deps.random,
    });

    const now = Date.now();
    this.lastSweepAt = now;
    this.daily = { day: localDay(now), requests: 0, failed: 0 };
  }

  // ---------- Lifecycle ----------

  /**
   * Arm the periodic tick. Calling it again while running does nothing.
   */
  public start(): void {
    if (this.timer) return;
    const interval = Math.max(1, Math.floor(this.config.batchTimeoutMs / 2));
    this.timer = setInterval(() => {
      this.tick()?.catch((err: unknown) => {
        console.error('[AIRequestBroker] scheduled flush failed:', err);
      });
    }, interval);
    this.timer.unref();
    console.info(`[AIRequestBroker] started (tick every ${interval}ms, model ${this.config.model})`);

    this.keyGate
      .resolveKey()
      .then(() => this.refreshAvailability())
      .catch((err: unknown) => {
        console.error('[AIRequestBroker] initial key check failed:', err);
      });
  }

  /**
   * Disarm the tick and force-flush pending work. Resolves when those batches settle.
   */
  public stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      console.info('[AIRequestBroker] stopped');
    }
    return this.batcher.flush({ force: true });
  }

  /**
   * Periodic work: cache sweeps, day rollover of status counters, timeout flush.
   * Returns the flush promise when a flush was started.
   */
  public tick(now: number = Date.now()): Promise<void> | null {
    if (now - this.lastSweepAt >= this.config.sweepIntervalMs) {
      const removed = this.exactCache.sweepExpired() + this.bucketCache.sweepExpired();
      if (removed > 0) console.debug(`[AIRequestBroker] swept ${removed} expired cache entries`);
      this.lastSweepAt = now;
    }
    this.rollDay(now);
    return this.batcher.tick(now);
  }

  public flush(): Promise<void> {
    return this.batcher.flush({ force: true });
  }

  // ---------- Requests ----------

  /**
   * Non-blocking intake. The callback fires exactly once; synchronously for cache hits.
   * Throws InvalidRequestError for a malformed snapshot or request type.
   */
  public enqueue(
    snapshot: ActorSnapshot,
    requestType: RequestType,
    callback: ResultCallback,
    content?: string
  ): EnqueueOutcome {
    const actor = this.validateSnapshot(snapshot);
    const type = RequestTypeEnum.safeParse(requestType);
    if (!type.success) {
      throw new InvalidRequestError(`unknown request type "${String(requestType)}"`);
    }
    if (typeof callback !== 'function') {
      throw new InvalidRequestError('callback must be a function');
    }

    this.totalRequests++;
    const prompt = buildPoliticalPrompt({ requestType: type.data, actor, content });
    const request: BrokerRequest = {
      id: `req-${++this.seq}`,
      actor,
      requestType: type.data,
      content,
      callback,
      enqueuedAt: Date.now(),
      exactKey: exactKey(type.data, prompt.literal),
      bucketKey: bucketKey(type.data, actor, content),
    };

    const exact = this.exactCache.lookup(request.exactKey);
    if (exact) {
      this.cacheHits++;
      invokeCallback(callback, fromCache(exact, 'exact-cache'), request.id);
      return 'exact-cache';
    }
    const bucket = this.bucketCache.lookup(request.bucketKey);
    if (bucket) {
      this.cacheHits++;
      invokeCallback(callback, fromCache(bucket, 'bucket-cache'), request.id);
      return 'bucket-cache';
    }

    this.batcher.add(request);
    return 'queued';
  }

  /**
   * Single-content analysis outside the batcher. Never rejects for backend trouble:
   * failures come back as offline results.
   */
  public async analyzeContent(content: string): Promise<BrokerResult> {
    if (typeof content !== 'string' || !content.trim()) {
      throw new InvalidRequestError('content must be a non-empty string');
    }
    this.totalRequests++;
    const prompt = buildContentAnalysisPrompt(content);
    const key = exactKey('analysis', prompt.literal);

    const hit = this.exactCache.lookup(key);
    if (hit) {
      this.cacheHits++;
      return fromCache(hit, 'exact-cache');
    }

    const started = Date.now();
    const outcome = await this.callBackend(prompt);
    const elapsed = Date.now() - started;
    if (!outcome.ok) {
      return buildOfflineResult({ requestType: 'analysis', content }, this.offline, { processingTimeMs: elapsed });
    }

    const result: BrokerResult = { ...outcome.value, batchSize: 1, processingTimeMs: elapsed, source: 'batch' };
    this.exactCache.store(key, result);
    publishSafely(this.sink, resultReadyEvent(content, result, elapsed));
    return result;
  }

  /**
   * analyzeContent() for several contents at once, results in input order.
   * Every entry is checked before any backend call is made.
   */
  public async analyzeBatch(contents: readonly string[]): Promise<BrokerResult[]> {
    if (contents.length === 0) return [];
    const blank = contents.findIndex((c) => typeof c !== 'string' || !c.trim());
    if (blank >= 0) {
      throw new InvalidRequestError(`contents[${blank}] must be a non-empty string`);
    }
    return Promise.all(contents.map((c) => this.analyzeContent(c)));
  }

  /**
   * Reactions of several voters to one piece of content from a single backend call.
   * Voters the reply leaves out, or all of them when the call fails, get offline reactions.
   * Blank content or no profiles gives [].
   */
  public async generateVoterResponses(content: string, profiles: readonly ActorSnapshot[]): Promise<VoterResponse[]> {
    if (typeof content !== 'string' || !content.trim() || profiles.length === 0) return [];
    const actors = profiles.map((p) => this.validateSnapshot(p));
    this.totalRequests++;

    const prompt = buildVoterResponsesPrompt(content, actors);
    const started = Date.now();
    const outcome = await this.guardedCall(async (apiKey): Promise<Outcome<VoterResponseEntry[]>> => {
      const text = await this.backend.completeText(prompt, apiKey);
      return text.ok ? parseVoterResponses(this.backend.providerName, text.value) : text;
    });
    const elapsed = Date.now() - started;

    const entries = new Map<string, VoterResponseEntry>();
    if (outcome.ok) {
      for (const entry of outcome.value) {
        if (entry.content.trim() && !entries.has(entry.voterId)) entries.set(entry.voterId, entry);
      }
    }

    const createdAt = Date.now();
    const responses = actors.map((actor): VoterResponse => {
      const entry = entries.get(actor.actorId);
      if (!entry) return buildOfflineVoterResponse(actor, content, this.offline, elapsed);
      return {
        actorId: actor.actorId,
        content: entry.content.trim(),
        sentiment: entry.sentiment,
        engagementLevel: entry.engagementLevel,
        responseType: entry.responseType,
        generationTimeMs: elapsed,
        createdAt,
        source: 'batch',
      };
    });
    const offline = responses.filter((r) => r.source === 'offline').length;
    if (outcome.ok && offline > 0) {
      console.debug(`[AIRequestBroker] ${offline}/${actors.length} voter responses missing from the reply, served offline`);
    }
    return responses;
  }

  /**
   * One-token check through the gate and the breaker.
   */
  public async isHealthy(): Promise<boolean> {
    const key = await this.keyGate.resolveKey();
    this.refreshAvailability();
    if (!key.ok) return false;
    const outcome = await this.gate.run(() => this.breaker.execute(() => this.backend.healthCheck(key.value)));
    return outcome.ok;
  }

  // ---------- Observability ----------

  public getStatistics(): BrokerStatistics {
    const counters = this.batcher.getCounters();
    return {
      totalRequests: this.totalRequests,
      cacheHits: this.cacheHits,
      batchedRequests: counters.batchedRequests,
      cacheHitRatio: this.totalRequests === 0 ? 0 : this.cacheHits / this.totalRequests,
      batchingEfficiency: this.totalRequests === 0 ? 0 : counters.batchedRequests / this.totalRequests,
      activeCacheEntries: this.exactCache.size + this.bucketCache.size,
      activeBatches: counters.activeBatches,
      averageBatchSize: counters.averageBatchSize,
    };
  }

  public getStatus(): ServiceStatus {
    this.rollDay(Date.now());
    const status: ServiceStatus = {
      isOperational: this.timer !== null,
      isAvailable: this.available,
      requestsToday: this.daily.requests,
      failedRequestsToday: this.daily.failed,
      lastSuccessfulRequestAt: this.lastSuccessfulRequestAt,
      averageResponseTimeMs: this.averageResponseTimeMs,
      circuitState: this.breaker.getState(),
      cacheHitRate: this.totalRequests === 0 ? 0 : this.cacheHits / this.totalRequests,
    };
    if (this.lastError) status.lastError = { ...this.lastError };
    return status;
  }

  /**
   * Notified when "available" (breaker closed and key present) flips. Returns an unsubscribe function.
   */
  public onAvailabilityChanged(listener: AvailabilityListener): () => void {
    this.availabilityListeners.add(listener);
    return () => {
      this.availabilityListeners.delete(listener);
    };
  }

  // ---------- Internals ----------

  private validateSnapshot(snapshot: ActorSnapshot): ActorSnapshot {
    const parsed = ActorSnapshotSchema.safeParse(snapshot);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
      throw new InvalidRequestError(`invalid actor snapshot (${issues.length} issue(s))`, issues);
    }
    // zod returns a fresh object, so later mutations of the caller's actor are not seen
    return parsed.data;
  }

  private dispatchCluster(cluster: Cluster): Promise<Outcome<BackendResult>> {
    const rep = cluster.representative;
    return this.callBackend(buildPoliticalPrompt({ requestType: rep.requestType, actor: rep.actor, content: rep.content }));
  }

  private callBackend(prompt: BuiltPrompt): Promise<Outcome<BackendResult>> {
    return this.guardedCall((apiKey) => this.backend.complete(prompt, apiKey));
  }

  /**
   * key -> gate -> breaker -> backend. The key is looked up on every attempt; admission
   * is decided once a gate slot is held, so calls queued at the gate see a circuit that opened meanwhile.
   */
  private async guardedCall<T>(op: (apiKey: string) => Promise<Outcome<T>>): Promise<Outcome<T>> {
    const key = await this.keyGate.resolveKey();
    this.refreshAvailability();
    if (!key.ok) {
      this.recordError(key.error);
      return key;
    }

    const started = Date.now();
    this.daily.requests++;
    const apiKey = key.value;
    const outcome = await this.gate.run(() => this.breaker.execute(() => op(apiKey)));
    if (outcome.ok) {
      this.recordSuccess(Date.now() - started);
    } else {
      this.daily.failed++;
      this.recordError(outcome.error);
    }
    return outcome;
  }

  private onClusterSettled(cluster: Cluster, delivered: DeliveredResult[]): void {
    if (cluster.status !== 'completed' || !cluster.result) return;
    for (const { request, result } of delivered) {
      this.exactCache.store(request.exactKey, result);
      this.bucketCache.store(request.bucketKey, result);
    }
    const processingTimeMs = (cluster.completedAt ?? Date.now()) - cluster.createdAt;
    const shared: BrokerResult = {
      ...cluster.result,
      batchSize: cluster.members.length,
      processingTimeMs,
      source: 'batch',
    };
    publishSafely(this.sink, resultReadyEvent(cluster.representative.content ?? '', shared, processingTimeMs));
  }

  private recordSuccess(elapsedMs: number): void {
    this.successfulCalls++;
    this.averageResponseTimeMs += (elapsedMs - this.averageResponseTimeMs) / this.successfulCalls;
    this.lastSuccessfulRequestAt = Date.now();
  }

  private recordError(error: BackendFailure): void {
    const classified = classifyFailure(error);
    this.lastError = { errorType: classified.errorType, message: classified.message };
  }

  private rollDay(now: number): void {
    const day = localDay(now);
    if (day !== this.daily.day) {
      console.info(`[AIRequestBroker] new day ${day}, resetting daily counters`);
      this.daily = { day, requests: 0, failed: 0 };
    }
  }

  private refreshAvailability(): void {
    const next = this.breaker.getState() === 'closed' && this.keyGate.keyFound === true;
    if (next === this.available) return;
    this.available = next;
    console.info(`[AIRequestBroker] backend ${next ? 'available' : 'unavailable'}`);
    for (const listener of this.availabilityListeners) {
      try {
        listener(next);
      } catch (err) {
        console.warn('[AIRequestBroker] availability listener failed:', err);
      }
    }
  }
}

export default AIRequestBroker;
