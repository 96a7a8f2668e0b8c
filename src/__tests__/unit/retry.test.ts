import { describe, it, expect } from 'vitest';

import {
  backoffDelay,
  ConditionTimeoutError,
  retry,
  waitForCondition,
} from '../../core/retry.js';
import { FakeClock } from '../helpers/fakes.js';

describe('retry', () => {
  it('returns the first successful value without sleeping', async () => {
    const clock = new FakeClock();
    const result = await retry(async (attempt) => attempt * 10, {
      maxAttempts: 3,
      delayMs: 1000,
      backoff: 'exponential',
    }, { clock });

    expect(result).toEqual({ ok: true, value: 10, attempts: 1 });
    expect(clock.sleeps).toEqual([]);
  });

  it('doubles the delay between attempts and skips the delay after the last one', async () => {
    const clock = new FakeClock();
    const seen: number[] = [];
    const result = await retry(async (attempt) => {
      seen.push(attempt);
      throw new Error(`attempt ${String(attempt)} failed`);
    }, { maxAttempts: 3, delayMs: 1000, backoff: 'exponential' }, { clock });

    expect(seen).toEqual([1, 2, 3]);
    expect(clock.sleeps).toEqual([1000, 2000]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.attempts).toBe(3);
      expect(result.error).toMatchObject({ message: 'attempt 3 failed' });
    }
  });

  it('succeeds on a later attempt', async () => {
    const clock = new FakeClock();
    const result = await retry(async (attempt) => {
      if (attempt < 3) throw new Error('not yet');
      return 'done';
    }, { maxAttempts: 5, delayMs: 100, backoff: 'fixed' }, { clock });

    expect(result).toEqual({ ok: true, value: 'done', attempts: 3 });
    expect(clock.sleeps).toEqual([100, 100]);
  });

  it('clamps delays so the deadline is never overshot', async () => {
    const clock = new FakeClock();
    const result = await retry(async () => {
      throw new Error('never');
    }, { timeoutMs: 1000, delayMs: 300, backoff: 'fixed' }, { clock });

    expect(result.ok).toBe(false);
    expect(result.attempts).toBe(5);
    expect(clock.sleeps).toEqual([300, 300, 300, 100]);
    expect(clock.now()).toBe(1000);
  });

  it('rethrows errors rejected by retryIf', async () => {
    const clock = new FakeClock();
    const fatal = new Error('fatal');

    await expect(
      retry(async () => {
        throw fatal;
      }, { maxAttempts: 3, delayMs: 10, backoff: 'fixed' }, {
        clock,
        retryIf: (err) => err !== fatal,
      }),
    ).rejects.toBe(fatal);
    expect(clock.sleeps).toEqual([]);
  });

  it('stops when the signal is aborted', async () => {
    const clock = new FakeClock();
    const controller = new AbortController();
    let calls = 0;

    const pending = retry(async () => {
      calls++;
      controller.abort();
      throw new Error('fails, then interrupt');
    }, { maxAttempts: 3, delayMs: 10, backoff: 'fixed' }, {
      clock,
      signal: controller.signal,
    });

    await expect(pending).rejects.toThrow('fails, then interrupt');
    expect(calls).toBe(1);
  });

  it('requires a bound', async () => {
    await expect(
      retry(async () => 1, { delayMs: 10, backoff: 'fixed' }, { clock: new FakeClock() }),
    ).rejects.toThrow('RetryPolicy needs maxAttempts or timeoutMs');
  });
});

describe('backoffDelay', () => {
  it('computes exponential and fixed delays', () => {
    const exponential = { delayMs: 1000, backoff: 'exponential' as const, maxAttempts: 3 };
    expect([1, 2, 3].map((n) => backoffDelay(exponential, n))).toEqual([1000, 2000, 4000]);
    expect(backoffDelay({ delayMs: 250, backoff: 'fixed', timeoutMs: 1 }, 4)).toBe(250);
  });
});

describe('waitForCondition', () => {
  it('polls at a fixed interval until the probe is true', async () => {
    const clock = new FakeClock();
    let probes = 0;

    await waitForCondition(async () => ++probes === 3, {
      clock,
      timeoutMs: 15_000,
      intervalMs: 250,
    });

    expect(probes).toBe(3);
    expect(clock.sleeps).toEqual([250, 250]);
  });

  it('throws ConditionTimeoutError exactly at the deadline', async () => {
    const clock = new FakeClock();

    const pending = waitForCondition(async () => false, {
      clock,
      timeoutMs: 1000,
      intervalMs: 300,
      description: '#results',
    });

    await expect(pending).rejects.toBeInstanceOf(ConditionTimeoutError);
    await expect(pending).rejects.toThrow('Timed out after 1000ms waiting for #results');
    expect(clock.now()).toBe(1000);
  });

  it('hands each probe the time left before the deadline', async () => {
    const clock = new FakeClock();
    const budgets: number[] = [];

    await expect(
      waitForCondition(async (remainingMs) => {
        budgets.push(remainingMs);
        return false;
      }, { clock, timeoutMs: 1000, intervalMs: 300 }),
    ).rejects.toBeInstanceOf(ConditionTimeoutError);
    expect(budgets).toEqual([1000, 700, 400, 100, 0]);
  });

  it('counts a condition met only after the deadline as a timeout', async () => {
    const clock = new FakeClock();

    await expect(
      waitForCondition(async () => {
        await clock.sleep(1500);
        return true;
      }, { clock, timeoutMs: 1000, intervalMs: 100, description: '#b_results' }),
    ).rejects.toThrow('Timed out after 1000ms waiting for #b_results');
    expect(clock.now()).toBe(1500);
  });

  it('times out at once on an exhausted budget', async () => {
    const clock = new FakeClock();
    let probes = 0;

    await expect(
      waitForCondition(async () => {
        probes++;
        return true;
      }, { clock, timeoutMs: 0, intervalMs: 100 }),
    ).rejects.toBeInstanceOf(ConditionTimeoutError);
    expect(probes).toBe(0);
  });

  it('does not retry when the probe itself throws', async () => {
    const clock = new FakeClock();
    const broken = new Error('session gone');

    await expect(
      waitForCondition(async () => {
        throw broken;
      }, { clock, timeoutMs: 1000, intervalMs: 100 }),
    ).rejects.toBe(broken);
    expect(clock.sleeps).toEqual([]);
  });
});
