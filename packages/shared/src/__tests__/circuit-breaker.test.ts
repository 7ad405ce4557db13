import { describe, it, expect, vi } from 'vitest';
import { CircuitBreaker, CircuitOpenError } from '../circuit-breaker.js';

const fail = () => Promise.reject(new Error('boom'));
const ok = () => Promise.resolve('ok');

describe('CircuitBreaker', () => {
  it('opens after the failure threshold and fast-fails with the remaining reset time', async () => {
    let now = 1_000;
    const breaker = new CircuitBreaker({ name: 'server', failureThreshold: 2, resetTimeoutMs: 500, now: () => now });

    await expect(breaker.execute(fail)).rejects.toThrow('boom');
    await expect(breaker.execute(fail)).rejects.toThrow('boom');
    expect(breaker.currentState).toBe('open');

    now = 1_200;
    const err = await breaker.execute(ok).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CircuitOpenError);
    expect(err instanceof CircuitOpenError && err.retryAfterMs).toBe(300);
  });

  it('closes again after a successful half-open trial', async () => {
    let now = 0;
    const onStateChange = vi.fn();
    const breaker = new CircuitBreaker({
      name: 'server',
      failureThreshold: 1,
      resetTimeoutMs: 100,
      now: () => now,
      onStateChange,
    });

    await expect(breaker.execute(fail)).rejects.toThrow('boom');
    now = 100;
    await expect(breaker.execute(ok)).resolves.toBe('ok');

    expect(breaker.currentState).toBe('closed');
    expect(onStateChange.mock.calls).toEqual([
      ['closed', 'open'],
      ['open', 'half-open'],
      ['half-open', 'closed'],
    ]);
  });

  it('does not count errors rejected by isFailure', async () => {
    const breaker = new CircuitBreaker({
      name: 'server',
      failureThreshold: 1,
      isFailure: (err) => !(err instanceof RangeError),
    });

    await expect(breaker.execute(() => Promise.reject(new RangeError('client error')))).rejects.toThrow(RangeError);
    expect(breaker.currentState).toBe('closed');
  });
});
