import type { Random } from './types.ts';

/**
 * Creates a deterministic pseudo-random number generator.
 *
 * Linear Congruential Generator with the Numerical Recipes constants
 * (a = 1664525, c = 1013904223, m = 2^32). The same seed always produces
 * the same sequence.
 *
 * @param seed - Initial seed value (integer)
 * @returns Function that returns next random number in [0, 1)
 */
export function createRng(seed: number): Random {
  let state = seed >>> 0;

  return () => {
    state = (1664525 * state + 1013904223) >>> 0;
    return state / 4294967296; // 2^32
  };
}

/**
 * Uniform number in [min, max).
 */
export function randomRange(rng: Random, min: number, max: number): number {
  return min + rng() * (max - min);
}

/**
 * Picks the seeded generator when a seed is configured, Math.random otherwise.
 */
export function rngFromSeed(seed: number | null): Random {
  return seed === null ? Math.random : createRng(seed);
}
