export type RandomSource = () => number;

/**
 * Mulberry32. Same seed, same sequence; values in [0, 1).
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = Math.floor(seed) >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Injected sources win over `seed`; output is clamped into [0, 1).
 */
export function normalizeRandom(random: RandomSource | undefined, seed?: number): RandomSource {
  const source = random ?? (seed !== undefined ? createSeededRandom(seed) : Math.random);
  return () => {
    const value = source();
    if (!Number.isFinite(value) || value <= 0) {
      return 0;
    }
    if (value >= 1) {
      return 0.999999999999;
    }
    return value;
  };
}
