/**
 * Injectable randomness. Every randomized decision in the search cycle
 * draws from a RandomSource so tests can script the sequence.
 */

export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
}

export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

/** Uniform float in [min, max]. */
export function uniform(rng: RandomSource, min: number, max: number): number {
  return min + rng.next() * (max - min);
}

/** Uniform integer in [min, max], both inclusive. */
export function randomInt(rng: RandomSource, min: number, max: number): number {
  return min + Math.floor(rng.next() * (max - min + 1));
}

export function chance(rng: RandomSource, probability: number): boolean {
  return rng.next() < probability;
}

export function pick<T>(rng: RandomSource, items: readonly [T, ...T[]]): T {
  const index = Math.floor(rng.next() * items.length);
  return items[index] ?? items[0];
}
