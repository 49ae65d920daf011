import type { Letter } from '../types';
import { VOWELS } from '../constants';

export type LetterCount = Map<Letter, number>;

export function normalizeWord(word: string): string {
  return word.trim().toUpperCase();
}

export function countLetters(letters: Iterable<Letter>): LetterCount {
  const counts: LetterCount = new Map();
  for (const l of letters) {
    counts.set(l, (counts.get(l) ?? 0) + 1);
  }
  return counts;
}

/** Sorted, order-independent form of a letter multiset */
export function canonicalLetters(letters: readonly Letter[]): string {
  return [...letters].map((l) => l.toUpperCase()).sort().join('');
}

export function isVowel(letter: Letter): boolean {
  return VOWELS.has(letter);
}

export interface LetterAssignment {
  fromShared: Letter[];
  fromPrivate: Letter[];
}

/**
 * Assign each letter of a word to the shared or private rack.
 * Shared letters are consumed first. Returns null if the word can't be formed.
 */
export function assignLetters(
  word: string,
  shared: readonly Letter[],
  privateLetters: readonly Letter[],
): LetterAssignment | null {
  const sharedLeft = countLetters(shared);
  const privateLeft = countLetters(privateLetters);
  const fromShared: Letter[] = [];
  const fromPrivate: Letter[] = [];

  for (const l of normalizeWord(word)) {
    const s = sharedLeft.get(l) ?? 0;
    if (s > 0) {
      sharedLeft.set(l, s - 1);
      fromShared.push(l);
      continue;
    }
    const p = privateLeft.get(l) ?? 0;
    if (p > 0) {
      privateLeft.set(l, p - 1);
      fromPrivate.push(l);
      continue;
    }
    return null;
  }

  return { fromShared, fromPrivate };
}

export function canForm(word: string, letters: readonly Letter[]): boolean {
  return assignLetters(word, letters, []) !== null;
}

/** Remove one occurrence of each used letter; throws if a letter is missing */
export function removeLetters(letters: readonly Letter[], used: readonly Letter[]): Letter[] {
  const result = [...letters];
  for (const l of used) {
    const idx = result.indexOf(l);
    if (idx === -1) {
      throw new Error(`Letter ${l} not available`);
    }
    result.splice(idx, 1);
  }
  return result;
}
