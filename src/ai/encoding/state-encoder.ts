/**
 * Turns an AI view into the canonical keys shared by every model.
 * Letter order never matters; the hash is stable across restarts.
 */
import { createHash } from 'node:crypto';
import type { AIView, StateKey } from '../types';
import { InvalidStateError } from '../errors';
import { canonicalLetters, isVowel, normalizeWord } from '@engine/utils/letter-utils';

export const DEFAULT_HISTORY_WINDOW = 3;

function readLetters(value: readonly string[] | undefined, field: string): string[] {
  if (!Array.isArray(value)) {
    throw new InvalidStateError(`Missing ${field}`);
  }
  return value.map((l: unknown) => {
    if (typeof l !== 'string' || !/^[A-Za-z]$/.test(l)) {
      throw new InvalidStateError(`Invalid letter in ${field}: ${String(l)}`);
    }
    return l.toUpperCase();
  });
}

/** Meta-selector state: only the number of letters in play */
export function metaKeyFor(letterCount: number): string {
  return `letters:${letterCount}`;
}

export function encodeState(
  view: Partial<AIView>,
  historyWindow: number = DEFAULT_HISTORY_WINDOW,
): StateKey {
  const shared = readLetters(view.sharedLetters, 'sharedLetters');
  const priv = readLetters(view.privateLetters, 'privateLetters');
  if (shared.length + priv.length === 0) {
    throw new InvalidStateError('Letter pool is empty');
  }

  const turn = view.turn;
  if (typeof turn !== 'number' || !Number.isInteger(turn) || turn < 0) {
    throw new InvalidStateError(`Invalid turn: ${String(turn)}`);
  }

  const recent = view.recentWords ?? [];
  const context = historyWindow > 0 ? recent.slice(-historyWindow).map(normalizeWord) : [];

  const all = [...shared, ...priv];
  const letters = canonicalLetters(all);
  const sharedKey = canonicalLetters(shared);
  const privateKey = canonicalLetters(priv);

  const canonical = `S:${sharedKey}|P:${privateKey}|T:${turn}|H:${context.join(',')}`;
  const hash = createHash('sha1').update(canonical).digest('hex').slice(0, 16);

  const vowels = all.filter(isVowel).length;
  const features = [
    all.length,
    vowels / all.length,
    shared.length,
    priv.length,
    turn,
    context.length,
  ];

  return {
    hash,
    letters,
    shared: sharedKey,
    private: privateKey,
    turn,
    context,
    features,
    metaKey: metaKeyFor(all.length),
  };
}
