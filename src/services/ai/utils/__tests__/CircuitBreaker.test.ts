import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import CircuitBreaker from '../CircuitBreaker';
import { CircuitBreakerOpenError, ProviderError, failure, success, type Outcome } from '../../types';

const fail = async (): Promise<Outcome<string>> => failure(new ProviderError('test', 'boom', { status: 500 }));
const ok = async (): Promise<Outcome<string>> => success('fine');

describe('CircuitBreaker', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('opens after exactly failureThreshold consecutive failures', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 3, openDurationMs: 1_000 });
    await breaker.execute(fail);
    await breaker.execute(fail);
    expect(breaker.getState()).toBe('closed');
    await breaker.execute(fail);
    expect(breaker.getState()).toBe('open');
    expect(breaker.getFailureCount()).toBe(3);
  });

  it('a success in between resets the counter', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 3 });
    await breaker.execute(fail);
    await breaker.execute(fail);
    await breaker.execute(ok);
    await breaker.execute(fail);
    expect(breaker.getState()).toBe('closed');
    expect(breaker.getFailureCount()).toBe(1);
  });

  it('fails fast while open without running the operation', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 1, openDurationMs: 1_000 });
    await breaker.execute(fail);

    const op = vi.fn(ok);
    vi.setSystemTime(999);
    const res = await breaker.execute(op);

    expect(op).not.toHaveBeenCalled();
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error).toBeInstanceOf(CircuitBreakerOpenError);
  });

  it('after the open duration a trial runs in half-open and success closes the circuit', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 2, openDurationMs: 1_000 });
    const changes: string[] = [];
    breaker.onStateChange((c) => changes.push(`${c.from}->${c.to}`));
    await breaker.execute(fail);
    await breaker.execute(fail);

    vi.setSystemTime(1_000);
    const res = await breaker.execute(ok);

    expect(res).toEqual({ ok: true, value: 'fine' });
    expect(breaker.getState()).toBe('closed');
    expect(breaker.getFailureCount()).toBe(0);
    expect(changes).toEqual(['closed->open', 'open->half-open', 'half-open->closed']);
  });

  it('a failed trial re-opens with a fresh clock', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 1, openDurationMs: 1_000 });
    await breaker.execute(fail);

    vi.setSystemTime(1_500);
    await breaker.execute(fail);
    expect(breaker.getState()).toBe('open');
    expect(breaker.getLastFailureAt()).toBe(1_500);

    vi.setSystemTime(2_400);
    const op = vi.fn(ok);
    await breaker.execute(op);
    expect(op).not.toHaveBeenCalled();
  });

  it('admits only one trial while half-open', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 1, openDurationMs: 1_000 });
    await breaker.execute(fail);
    vi.setSystemTime(1_000);

    let release: (v: Outcome<string>) => void = () => undefined;
    const slow = () =>
      new Promise<Outcome<string>>((resolve) => {
        release = resolve;
      });
    const trial = breaker.execute(slow);
    const second = await breaker.execute(ok);

    expect(second.ok).toBe(false);
    release(success('trial'));
    expect(await trial).toEqual({ ok: true, value: 'trial' });
    expect(breaker.getState()).toBe('closed');
  });

  it('a late success from a call admitted while closed leaves an open circuit open', async () => {
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const breaker = new CircuitBreaker({ failureThreshold: 1, openDurationMs: 1_000 });

    let release: (v: Outcome<string>) => void = () => undefined;
    const slow = breaker.execute(
      () =>
        new Promise<Outcome<string>>((resolve) => {
          release = resolve;
        })
    );
    await breaker.execute(fail);
    expect(breaker.getState()).toBe('open');

    release(success('late'));
    expect(await slow).toEqual({ ok: true, value: 'late' });
    expect(breaker.getState()).toBe('open');
    expect(breaker.getFailureCount()).toBe(1);
  });

  it('a late failure does not end the half-open trial', async () => {
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const breaker = new CircuitBreaker({ failureThreshold: 1, openDurationMs: 1_000 });

    let releaseEarly: (v: Outcome<string>) => void = () => undefined;
    const early = breaker.execute(
      () =>
        new Promise<Outcome<string>>((resolve) => {
          releaseEarly = resolve;
        })
    );
    await breaker.execute(fail);

    vi.setSystemTime(1_000);
    let releaseTrial: (v: Outcome<string>) => void = () => undefined;
    const trial = breaker.execute(
      () =>
        new Promise<Outcome<string>>((resolve) => {
          releaseTrial = resolve;
        })
    );
    expect(breaker.getState()).toBe('half-open');

    releaseEarly(failure(new ProviderError('test', 'stale', { status: 500 })));
    await early;
    expect(breaker.getState()).toBe('half-open');
    expect(breaker.getLastFailureAt()).toBe(0);

    const op = vi.fn(ok);
    const rejected = await breaker.execute(op);
    expect(op).not.toHaveBeenCalled();
    if (!rejected.ok) expect(rejected.error).toBeInstanceOf(CircuitBreakerOpenError);
    else throw new Error('expected the second half-open call to be rejected');

    releaseTrial(success('trial'));
    await trial;
    expect(breaker.getState()).toBe('closed');
  });

  it('onSuccess outside a trial does not close an open circuit', () => {
    const breaker = new CircuitBreaker({ failureThreshold: 1 });
    breaker.onFailure(new ProviderError('test', 'boom', { status: 500 }));
    breaker.onSuccess();
    expect(breaker.getState()).toBe('open');
  });

  it('treats a throwing operation as a failure', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 1 });
    const res = await breaker.execute<string>(async () => {
      throw new Error('unexpected');
    });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error).toBeInstanceOf(ProviderError);
    expect(breaker.getState()).toBe('open');
  });

  it('keeps going when a state listener throws', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const breaker = new CircuitBreaker({ failureThreshold: 1 });
    breaker.onStateChange(() => {
      throw new Error('listener bug');
    });
    await breaker.execute(fail);
    expect(breaker.getState()).toBe('open');
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('reset() closes the circuit and unsubscribed listeners stay quiet', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 1 });
    const listener = vi.fn();
    const unsubscribe = breaker.onStateChange(listener);
    await breaker.execute(fail);
    unsubscribe();
    breaker.reset();
    expect(breaker.getState()).toBe('closed');
    expect(breaker.getFailureCount()).toBe(0);
    expect(listener).toHaveBeenCalledTimes(1);
  });
});
