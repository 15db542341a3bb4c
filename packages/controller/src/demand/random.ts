/**
 * Injectable random sources for the demand model.
 */

/** Returns a float in [0, 1), like Math.random */
export type RandomSource = () => number;

/**
 * Seeded PRNG (Mulberry32).
 * Same seed, same sequence: lets simulations and tests replay exactly.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed;
  return function () {
    state |= 0;
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Uniform integer in [min, max], both inclusive. */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}
