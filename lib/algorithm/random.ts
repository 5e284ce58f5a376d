export type RandomSource = () => number;

// Seeded random number generator (mulberry32)
function seededRandom(seed: number): RandomSource {
  let state = seed;
  return function () {
    state |= 0;
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Seeded generator when a seed is given, Math.random otherwise
 */
export function createRandom(seed?: number): RandomSource {
  return seed !== undefined ? seededRandom(seed) : Math.random;
}

/**
 * Fisher-Yates shuffle on a copy
 */
export function shuffle<T>(values: readonly T[], random: RandomSource = Math.random): T[] {
  const result = [...values];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}
