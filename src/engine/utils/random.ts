/**
 * Seeded PRNG using mulberry32 algorithm.
 * All game and AI randomness MUST flow through this for reproducibility.
 */
export interface PRNG {
  next(): number; // [0, 1)
  nextInt(min: number, max: number): number; // [min, max] inclusive
  seed: number;
}

export function createPRNG(seed: number): PRNG {
  let state = seed | 0;

  function next(): number {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  function nextInt(min: number, max: number): number {
    return min + Math.floor(next() * (max - min + 1));
  }

  return { next, nextInt, seed };
}

/** Uniform pick from a non-empty array */
export function pick<T>(array: readonly T[], prng: PRNG): T {
  if (array.length === 0) {
    throw new Error('Cannot pick from an empty array');
  }
  return array[prng.nextInt(0, array.length - 1)];
}

/** Weighted pick; weights must be non-negative with a positive sum */
export function weightedPick<T>(entries: readonly (readonly [T, number])[], prng: PRNG): T {
  const total = entries.reduce((sum, [, w]) => sum + w, 0);
  if (entries.length === 0 || total <= 0) {
    throw new Error('Cannot pick from an empty or zero-weight distribution');
  }
  let roll = prng.next() * total;
  for (const [value, weight] of entries) {
    roll -= weight;
    if (roll < 0) return value;
  }
  return entries[entries.length - 1][0];
}

/** Fisher-Yates shuffle using seeded PRNG */
export function shuffle<T>(array: readonly T[], prng: PRNG): T[] {
  const result = [...array];
  for (let i = result.length - 1; i > 0; i--) {
    const j = prng.nextInt(0, i);
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}
