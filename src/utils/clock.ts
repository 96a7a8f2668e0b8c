import { setTimeout as delay } from 'node:timers/promises';

// ── Clock ────────────────────────────────────────────────────

/**
 * Time source and suspension point for the whole run.
 * `sleep` rejects with an AbortError as soon as `signal` fires.
 */
export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0) {
      signal?.throwIfAborted();
      return;
    }
    await delay(ms, undefined, signal !== undefined ? { signal } : {});
  },
};

// ── Abort detection ──────────────────────────────────────────

export function isAbortError(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'name' in err &&
    err.name === 'AbortError'
  );
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
