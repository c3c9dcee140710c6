// Structured AI error classification for status reporting

import {
  CircuitBreakerOpenError,
  ProviderError,
  RateLimitError as ProviderRateLimitError,
  TimeoutError,
  ValidationError,
} from '../types';

export type AIServiceErrorType =
  | 'missing_key'
  | 'invalid_request'
  | 'service_unavailable'
  | 'network_error'
  | 'rate_limit'
  | 'malformed_response';

export abstract class AIServiceError extends Error {
  abstract readonly errorType: AIServiceErrorType;
  abstract readonly userMessage: string;
  abstract readonly retryable: boolean;

  constructor(message: string) {
    super(message);
    this.name = 'AIServiceError';
  }
}

export class MissingKeyError extends AIServiceError {
  readonly errorType = 'missing_key' as const;
  readonly retryable = false;
  readonly userMessage: string;
  readonly secretName: string;

  constructor(secretName: string) {
    super(`Missing credential "${secretName}" - backend calls are disabled, offline results will be used`);
    this.name = 'MissingKeyError';
    this.secretName = secretName;
    this.userMessage = `API key "${secretName}" is not configured. AI results are generated offline.`;
  }
}

export class InvalidRequestError extends AIServiceError {
  readonly errorType = 'invalid_request' as const;
  readonly retryable = false;
  readonly userMessage = 'The AI request was rejected before dispatch.';
  readonly issues: string[];

  constructor(details: string, issues: string[] = []) {
    super(`Invalid AI request: ${details}`);
    this.name = 'InvalidRequestError';
    this.issues = issues;
  }
}

export class ServiceUnavailableError extends AIServiceError {
  readonly errorType = 'service_unavailable' as const;
  readonly retryable = true;
  readonly userMessage = 'AI service is temporarily unavailable. Offline results are used meanwhile.';

  constructor(provider: string, statusCode?: number) {
    super(`${provider} service unavailable (${statusCode || 'unknown'})`);
    this.name = 'ServiceUnavailableError';
  }
}

export class NetworkError extends AIServiceError {
  readonly errorType = 'network_error' as const;
  readonly retryable = true;
  readonly userMessage = 'Network connection to the AI service failed.';

  constructor(details: string) {
    super(`Network error: ${details}`);
    this.name = 'NetworkError';
  }
}

export class RateLimitError extends AIServiceError {
  readonly errorType = 'rate_limit' as const;
  readonly retryable = true;
  readonly userMessage = 'Rate limit exceeded. Requests will resume shortly.';

  constructor(provider: string, retryAfter?: number) {
    super(`Rate limit exceeded for ${provider}${retryAfter ? ` (retry after ${retryAfter}s)` : ''}`);
    this.name = 'RateLimitError';
  }
}

export class MalformedResponseError extends AIServiceError {
  readonly errorType = 'malformed_response' as const;
  readonly retryable = true;
  readonly userMessage = 'The AI service returned an unreadable response.';

  constructor(details: string) {
    super(`Malformed response: ${details}`);
    this.name = 'MalformedResponseError';
  }
}

/**
 * Map a pipeline failure onto the service-level classification used by getStatus().
 */
export function classifyFailure(err: unknown): AIServiceError {
  if (err instanceof AIServiceError) return err;
  if (err instanceof ProviderRateLimitError) return new RateLimitError(err.provider, err.retryAfterSeconds);
  if (err instanceof ValidationError) return new MalformedResponseError(err.message);
  if (err instanceof CircuitBreakerOpenError) return new ServiceUnavailableError(err.provider);
  if (err instanceof TimeoutError) return new NetworkError(err.message);
  if (err instanceof ProviderError) {
    return err.status !== undefined
      ? new ServiceUnavailableError(err.provider, err.status)
      : new NetworkError(err.message);
  }
  return new NetworkError(err instanceof Error ? err.message : String(err));
}
