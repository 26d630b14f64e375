/**
 * Source of uniform numbers in [0, 1), shaped like Math.random.
 * @public
 */
export type RandomSource = () => number;

/**
 * Small seedable PRNG (mulberry32). Same seed, same sequence, which keeps
 * weight initialisation and synthetic data reproducible.
 * @public
 */
export function mulberry32(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Uniform draw in [min, max). */
export function uniform(random: RandomSource, min: number, max: number): number {
  return min + (max - min) * random();
}
