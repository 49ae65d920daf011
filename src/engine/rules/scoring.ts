import { SHARED_LETTER_BONUS } from '../constants';
import { normalizeWord } from '../utils/letter-utils';

/**
 * Score a word by its length. A repeated word scores
 * max(1, floor(length / (repeats + 1))).
 */
export function scoreWord(word: string, repeatCount: number = 0): number {
  const base = normalizeWord(word).length;
  if (base === 0) return 0;
  if (repeatCount > 0) {
    return Math.max(1, Math.floor(base / (repeatCount + 1)));
  }
  return base;
}

/** Full move score including the shared-letter bonus */
export function scoreMove(word: string, repeatCount: number, sharedLettersUsed: number): number {
  return scoreWord(word, repeatCount) + sharedLettersUsed * SHARED_LETTER_BONUS;
}
