// packages/game-core/src/rng.ts
//
// Seedable random source for the random strategy.

export type RandomSource = () => number;

/** FNV-1a over the seed's UTF-16 code units. */
export function hashSeed(seed: string): number {
  let h = 2166136261;
  for (const ch of seed) {
    h ^= ch.charCodeAt(0);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

/**
 * createRng returns a mulberry32 generator; the same seed always yields the
 * same sequence of numbers in [0, 1).
 */
export function createRng(seed: string | number): RandomSource {
  let state = typeof seed === 'number' ? seed >>> 0 : hashSeed(seed);
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
