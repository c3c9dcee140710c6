import {
  CircuitBreakerOpenError,
  ProviderError,
  failure,
  success,
  type BackendFailure,
  type CircuitState,
  type CircuitStateChange,
  type Outcome,
} from '../types';

interface BreakerOptions {
  name?: string;
  failureThreshold?: number;
  openDurationMs?: number;
}

type StateListener = (change: CircuitStateChange) => void;

/**
 * Circuit breaker for a single downstream endpoint.
 * - CLOSED: calls pass; consecutive failures are counted, reaching the threshold opens the circuit
 * - OPEN: calls fail fast until openDurationMs has elapsed since the last failure
 * - HALF_OPEN: one trial call; success closes, failure re-opens with a fresh clock
 *
 * State is owned here; callers only report outcomes. Every transition bumps a
 * generation counter, and execute() drops outcomes of calls admitted under an
 * earlier generation.
 */
export class CircuitBreaker {
  readonly name: string;
  private readonly failureThreshold: number;
  private readonly openDurationMs: number;

  private state: CircuitState = 'closed';
  private failures = 0;
  private lastFailureAt: number | null = null;
  private trialInFlight = false;
  private generation = 0;
  private readonly listeners = new Set<StateListener>();

  constructor(opts: BreakerOptions = {}) {
    this.name = opts.name ?? 'backend';
    this.failureThreshold = Math.max(1, Math.trunc(opts.failureThreshold ?? 5));
    this.openDurationMs = Math.max(0, opts.openDurationMs ?? 30_000);
  }

  /**
   * Run `op` if the circuit admits it and record its outcome.
   * A rejected call never invokes `op`.
   */
  public async execute<T>(op: () => Promise<Outcome<T>>): Promise<Outcome<T>> {
    const admission = this.beforeCall();
    if (!admission.ok) return admission;
    const admittedIn = this.generation;

    let outcome: Outcome<T>;
    try {
      outcome = await op();
    } catch (err) {
      // Operations are expected to return failures, but a throw still counts
      outcome = failure(new ProviderError(this.name, 'Unexpected error during guarded call', { cause: err }));
    }

    if (admittedIn !== this.generation) {
      console.debug(`[CircuitBreaker:${this.name}] ignoring outcome of a call admitted before the last state change`);
    } else if (outcome.ok) {
      this.onSuccess();
    } else {
      this.onFailure(outcome.error);
    }
    return outcome;
  }

  /**
   * Admission check. Moves OPEN -> HALF_OPEN once the open duration has elapsed.
   */
  public beforeCall(): Outcome<void, CircuitBreakerOpenError> {
    if (this.state === 'open') {
      const elapsed = Date.now() - (this.lastFailureAt ?? 0);
      if (elapsed < this.openDurationMs) {
        return failure(new CircuitBreakerOpenError(this.name, `Circuit OPEN for ${this.name}`));
      }
      this.transition('half-open');
    }
    if (this.state === 'half-open') {
      if (this.trialInFlight) {
        return failure(new CircuitBreakerOpenError(this.name, `Circuit HALF_OPEN for ${this.name}, trial in progress`));
      }
      this.trialInFlight = true;
    }
    return success(undefined);
  }

  /**
   * Mark a successful call. Resets the failure counter; only a half-open trial closes the circuit.
   */
  public onSuccess(): void {
    if (this.state === 'open') return;
    this.failures = 0;
    if (this.state === 'half-open') {
      this.trialInFlight = false;
      this.transition('closed');
    }
  }

  /**
   * Mark a failed call.
   */
  public onFailure(_err: BackendFailure): void {
    this.failures++;
    this.lastFailureAt = Date.now();

    if (this.state === 'half-open') {
      // Trial failed - re-open immediately
      this.trialInFlight = false;
      this.transition('open');
    } else if (this.state === 'closed' && this.failures >= this.failureThreshold) {
      this.transition('open');
    }
  }

  public getState(): CircuitState {
    return this.state;
  }

  public getFailureCount(): number {
    return this.failures;
  }

  public getLastFailureAt(): number | null {
    return this.lastFailureAt;
  }

  /**
   * Subscribe to state transitions. Returns an unsubscribe function.
   */
  public onStateChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Force CLOSED with a clean counter (operator action, tests).
   */
  public reset(): void {
    this.failures = 0;
    this.lastFailureAt = null;
    this.trialInFlight = false;
    this.generation++;
    if (this.state !== 'closed') {
      this.transition('closed');
    }
  }

  // Internal

  private transition(to: CircuitState): void {
    const from = this.state;
    if (from === to) return;
    this.state = to;
    this.generation++;
    const change: CircuitStateChange = { from, to, at: Date.now() };
    console.info(`[CircuitBreaker:${this.name}] ${from} -> ${to}`);
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (err) {
        console.warn(`[CircuitBreaker:${this.name}] state listener failed:`, err);
      }
    }
  }
}

export default CircuitBreaker;
