import type {
  GeneratedQuery,
  RunLogRow,
  RunSummary,
  SearchOutcome,
} from '../schema/index.js';
import type { SessionState } from '../browser/session.js';
import { isSessionFault } from '../browser/errors.js';
import { RunLogError } from '../report/runLog.js';
import type { Clock } from '../utils/clock.js';
import { errorMessage, isAbortError, systemClock } from '../utils/clock.js';
import type { RandomSource } from '../utils/random.js';
import { mathRandom, randomInt } from '../utils/random.js';
import * as log from '../utils/logger.js';
import { RunContext } from './context.js';

// ── Collaborators ────────────────────────────────────────────

export interface QuerySource {
  generate(signal?: AbortSignal): Promise<GeneratedQuery>;
}

export interface SearchSession {
  readonly state: SessionState;
  executeSearch(query: string, signal?: AbortSignal): Promise<SearchOutcome>;
  recover(signal?: AbortSignal): Promise<boolean>;
  close(): Promise<void>;
}

export interface RunLogSink {
  append(row: RunLogRow): Promise<void>;
}

export interface OrchestratorDeps {
  generator: QuerySource;
  session: SearchSession;
  runLog: RunLogSink;
  /** Inter-cycle pause bounds, whole seconds. */
  delay: { minSeconds: number; maxSeconds: number };
  random?: RandomSource;
  clock?: Clock;
}

type CycleResult =
  | { kind: 'continue' }
  | { kind: 'stop'; reason: 'interrupted' }
  | { kind: 'stop'; reason: 'fatal'; error: string };

const CONTINUE: CycleResult = { kind: 'continue' };
const INTERRUPTED: CycleResult = { kind: 'stop', reason: 'interrupted' };
const RECOVERY_FAILED = 'Cannot continue - browser recovery failed';

export function toRunLogRow(
  query: GeneratedQuery,
  outcome: SearchOutcome,
  at: Date,
): RunLogRow {
  return {
    timestamp: at.toISOString(),
    query: query.text,
    locator: outcome.locator,
    status: outcome.success ? 'success' : 'failed',
    executionTime: outcome.executionTime,
    category: query.category,
    queryType: query.queryType,
  };
}

// ── Orchestrator ─────────────────────────────────────────────

/**
 * The search-cycle loop. Per-cycle faults are absorbed and counted; only
 * a failed session recovery or an unwritable run log ends a run early.
 * The browser session is closed on every exit path.
 */
export class CycleOrchestrator {
  private readonly generator: QuerySource;
  private readonly session: SearchSession;
  private readonly runLog: RunLogSink;
  private readonly delay: { minSeconds: number; maxSeconds: number };
  private readonly random: RandomSource;
  private readonly clock: Clock;

  constructor(deps: OrchestratorDeps) {
    if (deps.delay.minSeconds > deps.delay.maxSeconds) {
      throw new RangeError('Minimum delay must not exceed maximum delay');
    }
    this.generator = deps.generator;
    this.session = deps.session;
    this.runLog = deps.runLog;
    this.delay = deps.delay;
    this.random = deps.random ?? mathRandom;
    this.clock = deps.clock ?? systemClock;
  }

  async run(cycles: number, signal?: AbortSignal): Promise<RunSummary> {
    const context = new RunContext(cycles, this.clock.now());
    let result: CycleResult = CONTINUE;

    try {
      for (let cycle = 1; cycle <= cycles; cycle++) {
        if (signal?.aborted) {
          result = INTERRUPTED;
          break;
        }

        log.cycle(cycle, cycles);
        result = await this.runCycle(cycle, cycles, context, signal);
        if (result.kind === 'stop') break;
      }
    } finally {
      await this.session.close();
    }

    if (result.kind === 'continue') {
      return context.summarize('completed', this.clock.now());
    }
    if (result.reason === 'interrupted') {
      return context.summarize('interrupted', this.clock.now());
    }
    return context.summarize('fatal', this.clock.now(), result.error);
  }

  // ── Cycle ──────────────────────────────────────────────────

  private async runCycle(
    cycle: number,
    cycles: number,
    context: RunContext,
    signal?: AbortSignal,
  ): Promise<CycleResult> {
    try {
      const query = await this.generator.generate(signal);
      const outcome = await this.session.executeSearch(query.text, signal);

      await this.runLog.append(
        toRunLogRow(query, outcome, new Date(this.clock.now())),
      );
      context.record(outcome.success);
      log.outcome(outcome.success, query.text);
      log.progress(context.successful, context.attempted);

      if (this.session.state === 'crashed') {
        const recovery = await this.recoverAfterFault(signal);
        if (recovery.kind === 'stop') return recovery;
      }

      if (cycle < cycles) await this.pause(signal);
      return CONTINUE;
    } catch (err) {
      if (isAbortError(err) || signal?.aborted) {
        log.warn('User interrupted execution');
        return INTERRUPTED;
      }
      if (err instanceof RunLogError) {
        log.error(err.message);
        return { kind: 'stop', reason: 'fatal', error: err.message };
      }

      context.record(false);
      log.error(`Cycle ${String(cycle)} failed: ${errorMessage(err)}`);

      if (isSessionFault(err) || this.session.state === 'crashed') {
        return this.recoverAfterFault(signal);
      }
      return CONTINUE;
    }
  }

  private async recoverAfterFault(signal?: AbortSignal): Promise<CycleResult> {
    try {
      const recovered = await this.session.recover(signal);
      if (recovered) return CONTINUE;
      log.error(RECOVERY_FAILED);
      return { kind: 'stop', reason: 'fatal', error: RECOVERY_FAILED };
    } catch (err) {
      if (isAbortError(err) || signal?.aborted) return INTERRUPTED;
      throw err;
    }
  }

  // ── Pacing ─────────────────────────────────────────────────

  private async pause(signal?: AbortSignal): Promise<void> {
    const seconds = randomInt(
      this.random,
      this.delay.minSeconds,
      this.delay.maxSeconds,
    );
    if (seconds <= 0) return;

    log.info(`Waiting ${String(seconds)} seconds before next search...`);
    try {
      for (let remaining = seconds; remaining > 0; remaining--) {
        log.countdown(remaining);
        await this.clock.sleep(1000, signal);
      }
    } finally {
      log.countdownDone();
    }
  }
}
