import type { Letter } from '../types';
import type { PRNG } from '../utils/random';
import { shuffle, weightedPick } from '../utils/random';
import {
  COMMON_LETTERS,
  LETTER_WEIGHTS,
  SHARED_LETTER_COUNT,
  PRIVATE_LETTER_COUNT,
} from '../constants';
import { isVowel } from '../utils/letter-utils';

const WEIGHTED_ALPHABET: readonly (readonly [Letter, number])[] = Object.entries(LETTER_WEIGHTS);

/**
 * Draw distinct shared letters containing at least one vowel and one consonant.
 */
export function drawSharedLetters(prng: PRNG, count: number = SHARED_LETTER_COUNT): Letter[] {
  if (count < 2 || count > COMMON_LETTERS.length) {
    throw new Error(`Shared letter count must be between 2 and ${COMMON_LETTERS.length}`);
  }
  for (;;) {
    const shared = shuffle(COMMON_LETTERS, prng).slice(0, count);
    if (shared.some(isVowel) && shared.some((l) => !isVowel(l))) {
      return shared;
    }
  }
}

/** Draw private letters with replacement from the weighted alphabet */
export function drawPrivateLetters(prng: PRNG, count: number = PRIVATE_LETTER_COUNT): Letter[] {
  const letters: Letter[] = [];
  for (let i = 0; i < count; i++) {
    letters.push(weightedPick(WEIGHTED_ALPHABET, prng));
  }
  return letters;
}

/** Top a private rack back up to the standard size */
export function refillPrivateLetters(
  letters: readonly Letter[],
  prng: PRNG,
  size: number = PRIVATE_LETTER_COUNT,
): Letter[] {
  const missing = Math.max(0, size - letters.length);
  return [...letters, ...drawPrivateLetters(prng, missing)];
}
