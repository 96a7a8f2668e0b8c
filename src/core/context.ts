import type { ExitReason, RunSummary } from '../schema/index.js';

/**
 * Mutable per-run tallies, owned by one orchestrator run.
 */
export class RunContext {
  private successes = 0;
  private failures = 0;

  constructor(
    readonly plannedCycles: number,
    readonly startedAt: number,
  ) {}

  get successful(): number {
    return this.successes;
  }

  get failed(): number {
    return this.failures;
  }

  get attempted(): number {
    return this.successes + this.failures;
  }

  record(success: boolean): void {
    if (success) this.successes++;
    else this.failures++;
  }

  successRate(): number {
    return this.attempted > 0 ? (this.successes / this.attempted) * 100 : 0;
  }

  summarize(
    exitReason: ExitReason,
    endedAt: number,
    fatalError?: string,
  ): RunSummary {
    return {
      plannedCycles: this.plannedCycles,
      successful: this.successes,
      failed: this.failures,
      successRate: this.successRate(),
      durationMs: Math.max(0, Math.round(endedAt - this.startedAt)),
      exitReason,
      ...(fatalError !== undefined ? { fatalError } : {}),
    };
  }
}
