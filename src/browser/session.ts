import { TIMEOUTS, HUMAN_TIMING } from '../config/defaults.js';
import type { SearchOutcome } from '../schema/index.js';
import { ConditionTimeoutError, waitForCondition } from '../core/retry.js';
import type { Clock } from '../utils/clock.js';
import { errorMessage, isAbortError, systemClock } from '../utils/clock.js';
import type { RandomSource } from '../utils/random.js';
import { chance, mathRandom, uniform } from '../utils/random.js';
import * as log from '../utils/logger.js';
import type { BrowserDriver, DriverFactory, SessionSettings } from './driver.js';
import { DriverError, LaunchError } from './errors.js';
import { buildLaunchOptions } from './fingerprint.js';
import { HumanInteractionSimulator } from './human.js';
import { launchPlaywrightDriver } from './playwright.js';

// ── Public types ─────────────────────────────────────────────

export type SessionState = 'uninitialized' | 'ready' | 'in_search' | 'crashed';

export interface BrowserSessionDeps {
  settings: SessionSettings;
  driverFactory?: DriverFactory;
  simulator?: HumanInteractionSimulator;
  random?: RandomSource;
  clock?: Clock;
}

// ── Session ──────────────────────────────────────────────────

/**
 * Sole owner of the live browser. At most one driver exists at a time;
 * recovery discards it and launches a replacement.
 *
 *   uninitialized → ready            launch()
 *   ready → in_search → ready        executeSearch()
 *   in_search → crashed              session fault during a search
 *   crashed → ready | uninitialized  recover()
 */
export class BrowserSession {
  private driver: BrowserDriver | undefined;
  private current: SessionState = 'uninitialized';

  private readonly settings: SessionSettings;
  private readonly driverFactory: DriverFactory;
  private readonly simulator: HumanInteractionSimulator;
  private readonly random: RandomSource;
  private readonly clock: Clock;

  constructor(deps: BrowserSessionDeps) {
    this.settings = deps.settings;
    this.driverFactory = deps.driverFactory ?? launchPlaywrightDriver;
    this.random = deps.random ?? mathRandom;
    this.clock = deps.clock ?? systemClock;
    this.simulator =
      deps.simulator ??
      new HumanInteractionSimulator({ random: this.random, clock: this.clock });
  }

  get state(): SessionState {
    return this.current;
  }

  async launch(): Promise<void> {
    if (this.driver !== undefined) {
      throw new LaunchError('Browser session is already running');
    }

    const options = buildLaunchOptions(this.settings, this.random);
    try {
      this.driver = await this.driverFactory(options);
    } catch (err) {
      this.current = 'uninitialized';
      if (err instanceof LaunchError) throw err;
      throw new LaunchError(`Failed to launch browser: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    this.current = 'ready';
    log.web(`Browser ready (${options.userAgent})`);
  }

  /**
   * Driver failures become failed outcomes; only an abort or a missing
   * session throws. A session fault leaves the session crashed.
   */
  async executeSearch(query: string, signal?: AbortSignal): Promise<SearchOutcome> {
    const driver = this.driver;
    if (driver === undefined || this.current !== 'ready') {
      throw new DriverError(
        'session_fault',
        `No usable browser session (state: ${this.current})`,
      );
    }

    const { engine } = this.settings;
    const startedAt = this.clock.now();
    const elapsed = (): number =>
      Math.max(0, (this.clock.now() - startedAt) / 1000);

    this.current = 'in_search';
    try {
      // Navigation and the search box share one page-state budget.
      log.web(`Navigating to ${engine.homeUrl}...`);
      await driver.goto(engine.homeUrl, TIMEOUTS.PAGE_STATE_WAIT);
      await this.waitFor(
        driver,
        engine.inputSelector,
        TIMEOUTS.PAGE_STATE_WAIT - (this.clock.now() - startedAt),
        signal,
      );

      await driver.clear(engine.inputSelector);
      await this.simulator.type(driver, engine.inputSelector, query, signal);

      await this.clock.sleep(
        uniform(this.random, HUMAN_TIMING.SUBMIT_DELAY_MIN, HUMAN_TIMING.SUBMIT_DELAY_MAX),
        signal,
      );

      if (chance(this.random, 0.5)) {
        await driver.press(engine.inputSelector, 'Enter');
      } else {
        await driver.click(engine.submitSelector);
      }

      await this.waitFor(driver, engine.resultsSelector, TIMEOUTS.PAGE_STATE_WAIT, signal);
      await this.simulator.postSearchBehavior(driver, signal);

      const executionTime = elapsed();
      const url = driver.currentUrl();
      this.current = 'ready';
      log.web(`Search completed in ${executionTime.toFixed(2)}s`);
      return { success: true, locator: url, executionTime };
    } catch (err) {
      if (isAbortError(err) || signal?.aborted) {
        this.current = 'ready';
        throw err;
      }
      return this.failedOutcome(err, query, elapsed());
    }
  }

  /**
   * Tear down whatever is left, cool down, relaunch. Resolves false when
   * the relaunch fails; the session is then terminal. Only an abort
   * during the cooldown rejects.
   */
  async recover(signal?: AbortSignal): Promise<boolean> {
    log.recovery('Attempting browser recovery...');
    this.current = 'crashed';
    await this.discardDriver();

    await this.clock.sleep(TIMEOUTS.RECOVERY_COOLDOWN, signal);

    try {
      await this.launch();
      log.recovery('Browser recovered');
      return true;
    } catch (err) {
      this.current = 'uninitialized';
      log.error(`Browser recovery failed: ${errorMessage(err)}`);
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.driver === undefined) return;
    const driver = this.driver;
    this.driver = undefined;
    this.current = 'uninitialized';

    try {
      await driver.close();
      log.info('Browser cleanup completed');
    } catch (err) {
      log.warn(`Cleanup warning: ${errorMessage(err)}`);
    }
  }

  // ── Internals ──────────────────────────────────────────────

  private async waitFor(
    driver: BrowserDriver,
    selector: string,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<void> {
    await waitForCondition((remainingMs) => driver.isPresent(selector, remainingMs), {
      clock: this.clock,
      timeoutMs,
      intervalMs: TIMEOUTS.POLL_INTERVAL,
      signal,
      description: selector,
    });
  }

  private failedOutcome(
    err: unknown,
    query: string,
    executionTime: number,
  ): SearchOutcome {
    if (err instanceof ConditionTimeoutError || (err instanceof DriverError && err.kind === 'timeout')) {
      this.current = 'ready';
      log.error(`Search timeout for query: ${query}`);
      return { success: false, locator: 'timeout', executionTime, errorKind: 'timeout' };
    }

    const kind = err instanceof DriverError ? err.kind : 'other';
    this.current = kind === 'session_fault' ? 'crashed' : 'ready';
    log.error(`Search failed: ${errorMessage(err)}`);
    return {
      success: false,
      locator: `error: ${errorMessage(err)}`,
      executionTime,
      errorKind: kind,
    };
  }

  private async discardDriver(): Promise<void> {
    const driver = this.driver;
    this.driver = undefined;
    if (driver === undefined) return;

    try {
      await driver.close();
    } catch (err) {
      log.debug(`Ignoring teardown error: ${errorMessage(err)}`);
    }
  }
}
