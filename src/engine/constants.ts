import type { Letter } from './types';

// ─── Letter Pool ─────────────────────────────────────

/** Shared letters are drawn without replacement from the most common letters. */
export const COMMON_LETTERS: readonly Letter[] = 'ETAOINSHRDLU'.split('');

export const VOWELS: ReadonlySet<Letter> = new Set(['A', 'E', 'I', 'O', 'U']);

/** Relative draw weights for private letters. */
export const LETTER_WEIGHTS: Readonly<Record<Letter, number>> = {
  E: 10, A: 7, R: 5, I: 5, O: 5, T: 4, N: 4, S: 4,
  L: 3, C: 3, U: 2, D: 2, M: 2, P: 2,
  B: 1, G: 1, Y: 1, F: 1, W: 1, K: 1, V: 1, X: 1, Z: 1, J: 1, Q: 1, H: 1,
};

export const SHARED_LETTER_COUNT = 4;
export const PRIVATE_LETTER_COUNT = 6;

// ─── Words & Scoring ─────────────────────────────────

export const MIN_WORD_LENGTH = 3;
export const MAX_WORD_LENGTH = 15;

/** Bonus per shared letter a word uses. */
export const SHARED_LETTER_BONUS = 1;

// ─── Turns ───────────────────────────────────────────

/** Total turns in a game, counting both players. */
export const DEFAULT_MAX_TURNS = 20;
