export type RandomSource = () => number;

/**
 * Linear congruential generator; falls back to Math.random without a seed.
 */
export function createSeededRandom(seed?: number): RandomSource {
  if (seed === undefined) return Math.random;
  let state = (seed >>> 0) || 0x6d2b79f5;
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

export function randomInt(random: RandomSource, exclusiveMax: number): number {
  return Math.min(exclusiveMax - 1, Math.floor(random() * exclusiveMax));
}

export function pickRandom<T>(random: RandomSource, items: readonly T[]): T {
  return items[randomInt(random, items.length)];
}

export function shuffleArray<T>(random: RandomSource, array: readonly T[]): T[] {
  const result = [...array];
  for (let i = result.length - 1; i > 0; i--) {
    const j = randomInt(random, i + 1);
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}
