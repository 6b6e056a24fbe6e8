/**
 * Random sources for the randomized ring generators.
 *
 * Generators never call Math.random directly; they take a RandomSource so that
 * tests and exports can reproduce the exact same spans.
 */

import type { NumberRange } from '@/types/rings';

/** Returns a number in [0, 1). */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * Seeded linear congruential generator for deterministic ring layouts.
 */
export function createSeededRandom(seed: number): RandomSource {
  let s = Math.floor(seed) & 0x7fffffff;
  return () => {
    s = (Math.imul(s, 1103515245) + 12345) & 0x7fffffff;
    return s / 0x80000000;
  };
}

/**
 * Uniform float in `[min, max)`.
 */
export function randomBetween(random: RandomSource, [min, max]: NumberRange): number {
  return min + random() * (max - min);
}

/**
 * Uniform integer in `[min, max]` (both inclusive).
 */
export function randomInt(random: RandomSource, [min, max]: NumberRange): number {
  const lo = Math.ceil(Math.min(min, max));
  const hi = Math.floor(Math.max(min, max));
  return lo + Math.floor(random() * (hi - lo + 1));
}
