import type { GameState, PlayerId } from './types';
import type { GameAction } from './actions';
import { MIN_WORD_LENGTH, MAX_WORD_LENGTH } from './constants';
import { assignLetters, normalizeWord } from './utils/letter-utils';
import type { LetterAssignment } from './utils/letter-utils';

export interface ValidationResult {
  valid: boolean;
  reason?: string;
}

/** Anything that can answer dictionary membership. */
export interface WordDictionary {
  has(word: string): boolean;
}

export interface WordCheck extends ValidationResult {
  word: string;
  assignment: LetterAssignment | null;
}

function ok(): ValidationResult {
  return { valid: true };
}

function fail(reason: string): ValidationResult {
  return { valid: false, reason };
}

/**
 * Structural validity of an action: phase and turn order.
 * A submitted word that isn't in the dictionary is still a legal action; it just scores nothing.
 */
export function validateAction(state: GameState, action: GameAction): ValidationResult {
  switch (action.type) {
    case 'START_GAME':
      return state.phase === 'PRE_GAME' ? ok() : fail('Game already started');
    case 'SUBMIT_WORD':
    case 'REDRAW':
    case 'PASS':
      return validateTurn(state, action.player);
  }
}

function validateTurn(state: GameState, player: PlayerId): ValidationResult {
  if (state.phase !== 'PLAYING') return fail(`Cannot act in phase ${state.phase}`);
  if (state.currentPlayer !== player) return fail(`Not player ${player}'s turn`);
  return ok();
}

/**
 * Check a word against the player's letters and the dictionary.
 */
export function checkWord(
  state: GameState,
  player: PlayerId,
  rawWord: string,
  dictionary: WordDictionary,
): WordCheck {
  const word = normalizeWord(rawWord);
  const reject = (reason: string): WordCheck => ({ valid: false, reason, word, assignment: null });

  if (!/^[A-Z]+$/.test(word)) return reject('Word must contain only letters');
  if (word.length < MIN_WORD_LENGTH) return reject(`Word must be at least ${MIN_WORD_LENGTH} letters`);
  if (word.length > MAX_WORD_LENGTH) return reject(`Word must be at most ${MAX_WORD_LENGTH} letters`);

  const assignment = assignLetters(word, state.sharedLetters, state.players[player].privateLetters);
  if (!assignment) return reject(`${word} can't be formed from the available letters`);
  if (!dictionary.has(word)) return reject(`${word} is not in the dictionary`);

  return { valid: true, word, assignment };
}
