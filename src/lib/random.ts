/**
 * Random sources and permutation helpers.
 *
 * A RandomSource is any function returning a float in [0, 1), like
 * Math.random. Shuffling takes one as a parameter so tests can pass a
 * seeded source and assert exact permutations.
 */

import { InvalidArgumentError } from './errors';

export type RandomSource = () => number;

export const defaultRandom: RandomSource = () => Math.random();

/** Weyl-sequence increment (2^32 / golden ratio). */
const GOLDEN_GAMMA = 0x9e3779b9;

/** 32-bit integer hash (murmur3 finalizer). Returns a value in [0, 1). */
function hashToUnit(value: number): number {
  let s = Math.imul(value, 2654435761) >>> 0;
  s = Math.imul(s ^ (s >>> 16), 2246822507) >>> 0;
  s = Math.imul(s ^ (s >>> 13), 3266489909) >>> 0;
  s = (s ^ (s >>> 16)) >>> 0;
  return s / 4294967296;
}

/**
 * Deterministic source: the same seed always yields the same sequence.
 * Seeds are truncated to an unsigned 32-bit integer.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + GOLDEN_GAMMA) >>> 0;
    return hashToUnit(state);
  };
}

/** Uniform integer in [0, n). */
export function randomIndex(random: RandomSource, n: number): number {
  const r = random();
  if (!(r >= 0 && r < 1)) {
    throw new InvalidArgumentError(`Random source returned ${r}, expected a value in [0, 1)`);
  }
  return Math.floor(r * n);
}

/**
 * Fisher–Yates shuffle. Every permutation is equally likely given a
 * uniform source. Mutates and returns `items`.
 */
export function shuffleInPlace<T>(items: T[], random: RandomSource): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = randomIndex(random, i + 1);
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}
