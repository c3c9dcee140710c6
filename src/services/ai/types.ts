// AI broker shared types
// Strict TypeScript compatible

import type { BrokerResult, RequestType } from '../../shared/types';
import type { MissingKeyError } from './errors/AIServiceErrors';

/**
 * Base configuration for the chat-completions backend.
 * The API key is not part of it; KeyGate resolves it per dispatch attempt.
 */
export interface BaseProviderConfig {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  userAgent?: string;
}

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/**
 * Request envelope sent to {baseUrl}/chat/completions.
 */
export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature: number;
}

/**
 * Prompt built for one (possibly representative) request.
 * `literal` is the exact text the exact-cache key is derived from.
 */
export interface BuiltPrompt {
  requestType: RequestType;
  messages: ChatMessage[];
  maxTokens: number;
  temperature: number;
  literal: string;
}

/**
 * Result of a backend call before per-member customization.
 */
export type BackendResult = Omit<BrokerResult, 'source' | 'batchSize' | 'processingTimeMs'>;

/**
 * Typed success/failure value used instead of exceptions across the dispatch path.
 */
export type Outcome<T, E = BackendFailure> = { ok: true; value: T } | { ok: false; error: E };

export function success<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function failure<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitStateChange {
  from: CircuitState;
  to: CircuitState;
  at: number;
}

/**
 * Aggregate counters read by external monitoring.
 */
export interface ServiceStatus {
  isOperational: boolean;
  isAvailable: boolean;
  requestsToday: number;
  failedRequestsToday: number;
  lastSuccessfulRequestAt: number | null;
  averageResponseTimeMs: number;
  circuitState: CircuitState;
  cacheHitRate: number;
  lastError?: { errorType: string; message: string };
}

/**
 * Base error for backend failures (non-2xx, transport errors).
 */
export class ProviderError extends Error {
  public readonly provider: string;
  public readonly status?: number;
  public readonly isRetriable: boolean;
  public readonly causeOriginal?: unknown;

  constructor(
    provider: string,
    message: string,
    options?: { status?: number; cause?: unknown; retriable?: boolean }
  ) {
    super(message);
    this.name = 'ProviderError';
    this.provider = provider;
    this.status = options?.status;
    this.isRetriable = Boolean(options?.retriable);
    this.causeOriginal = options?.cause;
  }
}

/**
 * HTTP 429 from the backend.
 */
export class RateLimitError extends Error {
  public readonly provider: string;
  public readonly retryAfterSeconds?: number;

  constructor(provider: string, message = 'Rate limit exceeded', retryAfterSeconds?: number) {
    super(message);
    this.name = 'RateLimitError';
    this.provider = provider;
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

/**
 * Unparseable or schema-violating backend payload.
 */
export class ValidationError extends Error {
  public readonly provider: string;

  constructor(provider: string, message = 'Response validation failed') {
    super(message);
    this.name = 'ValidationError';
    this.provider = provider;
  }
}

/**
 * Returned when the circuit breaker rejects a call without reaching the backend.
 */
export class CircuitBreakerOpenError extends Error {
  public readonly provider: string;

  constructor(provider: string, message = 'Circuit breaker open') {
    super(message);
    this.name = 'CircuitBreakerOpenError';
    this.provider = provider;
  }
}

/**
 * Thrown when a backend call exceeds its timeout.
 */
export class TimeoutError extends Error {
  public readonly provider: string;
  public readonly timeoutMs: number;

  constructor(provider: string, timeoutMs: number, message?: string) {
    super(message ?? `Request timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.provider = provider;
    this.timeoutMs = timeoutMs;
  }
}

export type BackendFailure =
  | ProviderError
  | RateLimitError
  | ValidationError
  | CircuitBreakerOpenError
  | TimeoutError
  | MissingKeyError;

/**
 * Backend seen by the broker. ChatCompletionsProvider is the production implementation.
 */
export interface CompletionBackend {
  readonly providerName: string;
  complete(prompt: BuiltPrompt, apiKey: string): Promise<Outcome<BackendResult>>;
  /** Raw message content, for replies the caller parses itself */
  completeText(prompt: BuiltPrompt, apiKey: string): Promise<Outcome<string>>;
  healthCheck(apiKey: string): Promise<Outcome<void>>;
}
