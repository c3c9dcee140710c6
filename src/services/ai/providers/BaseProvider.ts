import {
  ProviderError,
  RateLimitError,
  TimeoutError,
  ValidationError,
  failure,
  success,
  type BackendFailure,
  type BaseProviderConfig,
  type Outcome,
} from '../types';
import { redactSecrets } from '../../../shared/security';

/**
 * Abstract base class for HTTP backends.
 * Handles:
 * - Timeouts using AbortController
 * - Standardized error translation into Outcome failures
 *
 * There is no retry loop here: the circuit breaker and the offline fallback
 * decide what happens after a failed call.
 */
export abstract class BaseProvider<C extends BaseProviderConfig> {
  protected readonly name: string;
  protected readonly config: C;

  constructor(name: string, config: C) {
    this.name = name;
    this.config = config;
  }

  public get providerName(): string {
    return this.name;
  }

  /**
   * POST a JSON body and return the decoded JSON response.
   * Never throws: every failure mode is returned as a typed value.
   */
  protected async postJson(path: string, body: unknown, apiKey: string): Promise<Outcome<unknown, BackendFailure>> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}${path}`;
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${apiKey}`,
    };
    if (this.config.userAgent) headers['User-Agent'] = this.config.userAgent;

    let res: Response;
    try {
      res = await this.timedFetch(url, { method: 'POST', headers, body: JSON.stringify(body) }, this.config.timeoutMs);
    } catch (e) {
      if (e instanceof TimeoutError) return failure(e);
      return failure(
        new ProviderError(this.name, `Network error calling ${this.name}`, { cause: e, retriable: true })
      );
    }

    if (res.status === 429) {
      return failure(new RateLimitError(this.name, '429 Too Many Requests', this.retryAfterSeconds(res)));
    }
    if (!res.ok) {
      // Error bodies sometimes echo request headers
      const text = redactSecrets(await this.safeText(res), [apiKey]);
      const retriable = res.status >= 500 || res.status === 408;
      return failure(
        new ProviderError(this.name, `HTTP ${res.status} ${res.statusText} from ${this.name}: ${text.slice(0, 500)}`, {
          status: res.status,
          retriable,
        })
      );
    }

    try {
      return success(await res.json());
    } catch (e) {
      return failure(
        new ValidationError(this.name, `Response body is not JSON: ${e instanceof Error ? e.message : String(e)}`)
      );
    }
  }

  // Internals

  private async timedFetch(url: string, init: RequestInit, timeoutMs: number): Promise<Response> {
    const controller = new AbortController();
    const id = setTimeout(() => controller.abort(), timeoutMs);
    try {
      return await fetch(url, { ...init, signal: controller.signal });
    } catch (e) {
      if (e instanceof Error && e.name === 'AbortError') {
        throw new TimeoutError(this.name, timeoutMs);
      }
      throw e;
    } finally {
      clearTimeout(id);
    }
  }

  private retryAfterSeconds(res: Response): number | undefined {
    const raw = res.headers.get('retry-after');
    if (!raw) return undefined;
    const n = Number(raw);
    return Number.isFinite(n) && n >= 0 ? n : undefined;
  }

  private async safeText(res: Response): Promise<string> {
    try {
      return await res.text();
    } catch {
      return '';
    }
  }
}

export default BaseProvider;
