/** Uniform draw in [0, 1). */
export type RandomSource = () => number;

/**
 * Mulberry32. Deterministic for a given seed; falls back to Math.random when
 * no seed is given.
 */
export function createRandom(seed?: number): RandomSource {
  if (seed === undefined) return Math.random;

  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function uniform(random: RandomSource, min: number, max: number): number {
  return min + random() * (max - min);
}

// Box-Muller
export function gaussian(random: RandomSource, mean: number, stdDev: number): number {
  const u1 = 1 - random();
  const u2 = random();
  return mean + stdDev * Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

export function exponential(random: RandomSource, scale: number): number {
  return -Math.log(1 - random()) * scale;
}
