import { describe, it, expect } from 'vitest';
import { computeBackoffMs, DEFAULT_BACKOFF } from '../backoff.js';

describe('computeBackoffMs', () => {
  it('doubles from the base delay', () => {
    const policy = { baseMs: 1_000, maxMs: 60_000 };
    expect([1, 2, 3, 4].map((n) => computeBackoffMs(n, policy))).toEqual([1_000, 2_000, 4_000, 8_000]);
  });

  it('treats a first attempt as one failure', () => {
    expect(computeBackoffMs(0, { baseMs: 500, maxMs: 10_000 })).toBe(500);
  });

  it('stops at the cap', () => {
    expect(computeBackoffMs(7, { baseMs: 1_000, maxMs: 60_000 })).toBe(60_000);
    expect(computeBackoffMs(200, DEFAULT_BACKOFF)).toBe(DEFAULT_BACKOFF.maxMs);
  });
});
