import { randomInt } from "crypto";

export type Rng = () => number;

const MAX_SEED = 2 ** 31 - 1;
const SEED_LIMIT = 2 ** 32;

/** Seeds are the generator's 32-bit state, so only integers in [0, 2^32) are distinct. */
export function isValidSeed(seed: number): boolean {
  return Number.isInteger(seed) && seed >= 0 && seed < SEED_LIMIT;
}

/**
 * Deterministic mulberry32 generator. Every environment owns one, so parallel
 * instances never share random state.
 */
export function createRng(seed: number): Rng {
  if (!isValidSeed(seed)) {
    throw new Error(`Seed must be an integer in [0, ${SEED_LIMIT}), got ${seed}`);
  }
  let state = seed;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomSeed(): number {
  return randomInt(MAX_SEED);
}

export function choice<T>(rng: Rng, items: readonly T[]): T {
  if (items.length === 0) throw new Error("Cannot choose from an empty list");
  const idx = Math.min(items.length - 1, Math.floor(rng() * items.length));
  return items[idx];
}
