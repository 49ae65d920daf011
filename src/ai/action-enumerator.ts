/**
 * Enumerate the words a player could legally submit, and build the AI's view
 * of the game for the state encoder.
 */
import type { GameState, PlayerId } from '@engine/types';
import type { Trie } from '@engine/dictionary/trie';
import { MIN_WORD_LENGTH } from '@engine/constants';
import type { AIView } from './types';

/** Every dictionary word formable from the player's shared + private letters */
export function enumerateCandidates(state: GameState, player: PlayerId, dictionary: Trie): string[] {
  if (state.phase !== 'PLAYING') return [];
  const letters = [...state.sharedLetters, ...state.players[player].privateLetters];
  return dictionary.wordsFrom(letters, MIN_WORD_LENGTH);
}

/** Accepted words in play order, both players */
export function playedWords(state: GameState): string[] {
  const words: string[] = [];
  for (const move of state.history) {
    if (move.kind === 'word' && move.valid && move.word !== null) words.push(move.word);
  }
  return words;
}

export function toAIView(state: GameState, player: PlayerId): AIView {
  return {
    sharedLetters: [...state.sharedLetters],
    privateLetters: [...state.players[player].privateLetters],
    turn: state.turnNumber,
    recentWords: playedWords(state),
  };
}
