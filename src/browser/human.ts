import { HUMAN_TIMING } from '../config/defaults.js';
import type { Clock } from '../utils/clock.js';
import { errorMessage, isAbortError, systemClock } from '../utils/clock.js';
import type { RandomSource } from '../utils/random.js';
import { chance, mathRandom, randomInt, uniform } from '../utils/random.js';
import * as log from '../utils/logger.js';
import type { BrowserDriver } from './driver.js';

export interface HumanInteractionDeps {
  random?: RandomSource;
  clock?: Clock;
}

/**
 * Randomized input pacing and post-search browsing noise.
 * Stateless between calls: every draw comes fresh from the RandomSource.
 */
export class HumanInteractionSimulator {
  private readonly random: RandomSource;
  private readonly clock: Clock;

  constructor(deps: HumanInteractionDeps = {}) {
    this.random = deps.random ?? mathRandom;
    this.clock = deps.clock ?? systemClock;
  }

  /** One keystroke per character, with occasional "thinking" pauses. */
  async type(
    driver: BrowserDriver,
    selector: string,
    text: string,
    signal?: AbortSignal,
  ): Promise<void> {
    for (const char of text) {
      await driver.type(selector, char);
      await this.pause(HUMAN_TIMING.KEY_DELAY_MIN, HUMAN_TIMING.KEY_DELAY_MAX, signal);

      if (chance(this.random, HUMAN_TIMING.THINK_CHANCE)) {
        await this.pause(
          HUMAN_TIMING.THINK_DELAY_MIN,
          HUMAN_TIMING.THINK_DELAY_MAX,
          signal,
        );
      }
    }
  }

  /**
   * Pointer wiggle, a downward scroll, a reading pause and sometimes a
   * partial scroll back. Cosmetic: failures are logged at debug level and
   * never propagate. An abort still unwinds.
   */
  async postSearchBehavior(
    driver: BrowserDriver,
    signal?: AbortSignal,
  ): Promise<void> {
    try {
      const moves = randomInt(
        this.random,
        HUMAN_TIMING.POINTER_MOVES_MIN,
        HUMAN_TIMING.POINTER_MOVES_MAX,
      );
      for (let i = 0; i < moves; i++) {
        const dx = randomInt(this.random, -HUMAN_TIMING.POINTER_OFFSET, HUMAN_TIMING.POINTER_OFFSET);
        const dy = randomInt(this.random, -HUMAN_TIMING.POINTER_OFFSET, HUMAN_TIMING.POINTER_OFFSET);
        await driver.moveBy(dx, dy);
      }

      const distance = randomInt(this.random, HUMAN_TIMING.SCROLL_MIN, HUMAN_TIMING.SCROLL_MAX);
      await driver.scrollBy(distance);

      await this.pause(HUMAN_TIMING.READ_DELAY_MIN, HUMAN_TIMING.READ_DELAY_MAX, signal);

      if (chance(this.random, HUMAN_TIMING.SCROLL_BACK_CHANCE)) {
        await driver.scrollBy(-Math.floor(distance / 2));
      }
    } catch (err) {
      if (isAbortError(err) || signal?.aborted) throw err;
      log.debug(`Human behavior simulation failed: ${errorMessage(err)}`);
    }
  }

  private async pause(minMs: number, maxMs: number, signal?: AbortSignal): Promise<void> {
    await this.clock.sleep(uniform(this.random, minMs, maxMs), signal);
  }
}
