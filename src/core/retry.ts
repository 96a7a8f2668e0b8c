import type { Clock } from '../utils/clock.js';
import { isAbortError } from '../utils/clock.js';

// ── Public types ─────────────────────────────────────────────

/**
 * Bounded attempts with a delay between them. At least one of
 * `maxAttempts` or `timeoutMs` must be set.
 */
export interface RetryPolicy {
  maxAttempts?: number | undefined;
  /** Hard bound measured from the first attempt; delays are clamped to it. */
  timeoutMs?: number | undefined;
  delayMs: number;
  backoff: 'exponential' | 'fixed';
}

export interface RetryOptions {
  clock: Clock;
  signal?: AbortSignal | undefined;
  /** Errors rejected here are rethrown at once instead of retried. */
  retryIf?: ((err: unknown) => boolean) | undefined;
  onRetry?: ((err: unknown, attempt: number, delayMs: number) => void) | undefined;
}

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

// ── Retry loop ───────────────────────────────────────────────

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return policy.backoff === 'exponential'
    ? policy.delayMs * 2 ** (attempt - 1)
    : policy.delayMs;
}

export async function retry<T>(
  task: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions,
): Promise<RetryResult<T>> {
  if (policy.maxAttempts === undefined && policy.timeoutMs === undefined) {
    throw new Error('RetryPolicy needs maxAttempts or timeoutMs');
  }

  const { clock, signal } = options;
  const startedAt = clock.now();

  for (let attempt = 1; ; attempt++) {
    signal?.throwIfAborted();

    let error: unknown;
    try {
      return { ok: true, value: await task(attempt), attempts: attempt };
    } catch (err) {
      if (isAbortError(err) || signal?.aborted) throw err;
      if (options.retryIf && !options.retryIf(err)) throw err;
      error = err;
    }

    if (policy.maxAttempts !== undefined && attempt >= policy.maxAttempts) {
      return { ok: false, error, attempts: attempt };
    }

    let delayMs = backoffDelay(policy, attempt);
    if (policy.timeoutMs !== undefined) {
      const remaining = policy.timeoutMs - (clock.now() - startedAt);
      if (remaining <= 0) return { ok: false, error, attempts: attempt };
      delayMs = Math.min(delayMs, remaining);
    }

    options.onRetry?.(error, attempt, delayMs);
    await clock.sleep(delayMs, signal);
  }
}

// ── Bounded wait ─────────────────────────────────────────────

export class ConditionTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(description: string, timeoutMs: number) {
    super(`Timed out after ${String(timeoutMs)}ms waiting for ${description}`);
    this.name = 'ConditionTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

class ConditionNotMet extends Error {}

export interface WaitOptions {
  clock: Clock;
  timeoutMs: number;
  intervalMs: number;
  signal?: AbortSignal | undefined;
  description?: string;
}

/**
 * Poll `probe` at a fixed interval until it reports true. Each probe is
 * handed the time left before the deadline and must settle within it; a
 * true reported after the deadline still counts as a timeout. Errors
 * thrown by the probe are not retried. Throws ConditionTimeoutError at
 * the deadline.
 */
export async function waitForCondition(
  probe: (remainingMs: number) => Promise<boolean>,
  options: WaitOptions,
): Promise<void> {
  const { clock, timeoutMs } = options;
  const description = options.description ?? 'condition';
  options.signal?.throwIfAborted();
  if (timeoutMs <= 0) throw new ConditionTimeoutError(description, timeoutMs);

  const startedAt = clock.now();
  const remaining = (): number =>
    Math.max(0, timeoutMs - (clock.now() - startedAt));

  const result = await retry(
    async () => {
      const met = await probe(remaining());
      if (!met || clock.now() - startedAt > timeoutMs) {
        throw new ConditionNotMet();
      }
    },
    { timeoutMs, delayMs: options.intervalMs, backoff: 'fixed' },
    {
      clock,
      signal: options.signal,
      retryIf: (err) => err instanceof ConditionNotMet,
    },
  );

  if (!result.ok) {
    throw new ConditionTimeoutError(description, timeoutMs);
  }
}
