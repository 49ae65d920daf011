import { describe, it, expect } from 'vitest';
import { createInitialState } from '@engine/state';
import { gameReducer, GameError, lastMove } from '@engine/reducer';
import { validateAction } from '@engine/validator';
import { getWinner, scoreMargin } from '@engine/rules/victory';
import { Trie } from '@engine/dictionary/trie';
import { COMMON_LETTERS, PRIVATE_LETTER_COUNT, SHARED_LETTER_COUNT } from '@engine/constants';
import { isVowel } from '@engine/utils/letter-utils';
import type { GameState } from '@engine/types';

const SEED = 42;
const dictionary = new Trie(['CAT', 'CATS', 'DOG', 'TEA', 'EAT']);

/** Started game with fixed letters so scores don't depend on the draw */
function stateWith(shared: string[], rack0: string[], rack1: string[], maxTurns: number = 20): GameState {
  const base = gameReducer(createInitialState(['Ann', 'Bot'], SEED, maxTurns), { type: 'START_GAME' }, dictionary);
  return {
    ...base,
    sharedLetters: shared,
    players: [
      { ...base.players[0], privateLetters: rack0 },
      { ...base.players[1], privateLetters: rack1 },
    ],
  };
}

describe('Game State Creation', () => {
  it('creates a valid initial state', () => {
    const state = createInitialState(['Ann', 'Bot'], SEED);
    expect(state.phase).toBe('PRE_GAME');
    expect(state.players).toHaveLength(2);
    expect(state.sharedLetters).toHaveLength(SHARED_LETTER_COUNT);
    expect(state.players[0].privateLetters).toHaveLength(PRIVATE_LETTER_COUNT);
    expect(state.players[1].privateLetters).toHaveLength(PRIVATE_LETTER_COUNT);
    expect(state.turnNumber).toBe(0);
    expect(state.maxTurns).toBe(20);
    expect(state.prngState).toBe(SEED + 1);
  });

  it('draws distinct common shared letters with a vowel and a consonant', () => {
    for (let seed = 1; seed <= 50; seed++) {
      const { sharedLetters } = createInitialState(['A', 'B'], seed);
      expect(new Set(sharedLetters).size).toBe(SHARED_LETTER_COUNT);
      expect(sharedLetters.every((l) => COMMON_LETTERS.includes(l))).toBe(true);
      expect(sharedLetters.some(isVowel)).toBe(true);
      expect(sharedLetters.some((l) => !isVowel(l))).toBe(true);
    }
  });

  it('is deterministic for a seed', () => {
    expect(createInitialState(['A', 'B'], 7)).toEqual(createInitialState(['A', 'B'], 7));
  });

  it('rejects a non-positive turn limit', () => {
    expect(() => createInitialState(['A', 'B'], SEED, 0)).toThrow('maxTurns must be a positive integer');
  });
});

describe('Turn flow', () => {
  it('START_GAME moves to PLAYING with player 0 first', () => {
    const state = gameReducer(createInitialState(['Ann', 'Bot'], SEED), { type: 'START_GAME' }, dictionary);
    expect(state.phase).toBe('PLAYING');
    expect(state.currentPlayer).toBe(0);
  });

  it('rejects starting twice', () => {
    const state = stateWith(['C', 'A', 'T', 'E'], [], []);
    expect(() => gameReducer(state, { type: 'START_GAME' }, dictionary)).toThrow('Game already started');
  });

  it('rejects moves before the game starts', () => {
    const state = createInitialState(['Ann', 'Bot'], SEED);
    const result = validateAction(state, { type: 'PASS', player: 0 });
    expect(result).toEqual({ valid: false, reason: 'Cannot act in phase PRE_GAME' });
  });

  it('rejects acting out of turn', () => {
    const state = stateWith(['C', 'A', 'T', 'E'], [], []);
    expect(() => gameReducer(state, { type: 'SUBMIT_WORD', player: 1, word: 'cat' }, dictionary)).toThrow(GameError);
    expect(() => gameReducer(state, { type: 'SUBMIT_WORD', player: 1, word: 'cat' }, dictionary)).toThrow(
      "Not player 1's turn",
    );
  });
});

describe('Submitting words', () => {
  it('scores length plus one per shared letter and refills the rack', () => {
    const state = stateWith(['C', 'A', 'T', 'E'], ['D', 'O', 'G', 'S', 'R', 'N'], ['X', 'X', 'X', 'X', 'X', 'X']);
    const next = gameReducer(state, { type: 'SUBMIT_WORD', player: 0, word: 'cats' }, dictionary);

    expect(lastMove(next)).toEqual({ player: 0, turn: 0, kind: 'word', word: 'CATS', valid: true, score: 7 });
    expect(next.players[0].score).toBe(7);
    expect(next.players[0].privateLetters).toHaveLength(6);
    expect(next.players[0].privateLetters.slice(0, 5)).toEqual(['D', 'O', 'G', 'R', 'N']);
    expect(next.usedWords).toEqual({ CATS: 1 });
    expect(next.prngState).toBe(state.prngState + 1);
    expect(next.currentPlayer).toBe(1);
    expect(next.turnNumber).toBe(1);
    expect(next.log[next.log.length - 1]).toBe('Ann played CATS for 7');
  });

  it('scores a word built only from private letters at its length', () => {
    const state = stateWith(['C', 'A', 'T', 'E'], ['D', 'O', 'G', 'S', 'R', 'N'], []);
    const next = gameReducer(state, { type: 'SUBMIT_WORD', player: 0, word: 'DOG' }, dictionary);
    expect(next.players[0].score).toBe(3);
  });

  it('applies repeat fatigue to a word already played', () => {
    const state = stateWith(['C', 'A', 'T', 'E'], ['S', 'O', 'G', 'D', 'R', 'N'], ['S', 'X', 'X', 'X', 'X', 'X']);
    const afterFirst = gameReducer(state, { type: 'SUBMIT_WORD', player: 0, word: 'cats' }, dictionary);
    const afterSecond = gameReducer(afterFirst, { type: 'SUBMIT_WORD', player: 1, word: 'cats' }, dictionary);

    // floor(4 / 2) + 3 shared letters
    expect(afterSecond.players[1].score).toBe(5);
    expect(afterSecond.usedWords).toEqual({ CATS: 2 });
  });

  it('records a word missing from the dictionary as rejected', () => {
    const state = stateWith(['C', 'A', 'T', 'E'], ['D', 'O', 'G', 'S', 'R', 'N'], []);
    const next = gameReducer(state, { type: 'SUBMIT_WORD', player: 0, word: 'tac' }, dictionary);

    expect(lastMove(next)).toEqual({ player: 0, turn: 0, kind: 'word', word: 'TAC', valid: false, score: 0 });
    expect(next.players[0].score).toBe(0);
    expect(next.players[0].privateLetters).toEqual(['D', 'O', 'G', 'S', 'R', 'N']);
    expect(next.currentPlayer).toBe(1);
    expect(next.log[next.log.length - 1]).toBe('Ann played TAC: rejected (TAC is not in the dictionary)');
  });

  it('rejects words that cannot be formed or are malformed', () => {
    const state = stateWith(['C', 'A', 'T', 'E'], ['D', 'O', 'G', 'S', 'R', 'N'], []);
    const cases: [string, string][] = [
      ['zoo', "Ann played ZOO: rejected (ZOO can't be formed from the available letters)"],
      ['at', 'Ann played AT: rejected (Word must be at least 3 letters)'],
      ['c4t', 'Ann played C4T: rejected (Word must contain only letters)'],
    ];
    for (const [word, message] of cases) {
      const next = gameReducer(state, { type: 'SUBMIT_WORD', player: 0, word }, dictionary);
      expect(next.log[next.log.length - 1]).toBe(message);
      expect(lastMove(next)?.valid).toBe(false);
    }
  });
});

describe('Redraw and pass', () => {
  it('REDRAW replaces the rack and counts the redraw', () => {
    const state = stateWith(['C', 'A', 'T', 'E'], ['Q', 'Q', 'Q', 'Q', 'Q', 'Q'], []);
    const next = gameReducer(state, { type: 'REDRAW', player: 0 }, dictionary);

    expect(next.players[0].redraws).toBe(1);
    expect(next.players[0].privateLetters).toHaveLength(6);
    expect(next.prngState).toBe(state.prngState + 1);
    expect(lastMove(next)?.kind).toBe('redraw');
    expect(next.currentPlayer).toBe(1);
  });

  it('PASS only advances the turn', () => {
    const state = stateWith(['C', 'A', 'T', 'E'], ['D', 'O', 'G', 'S', 'R', 'N'], []);
    const next = gameReducer(state, { type: 'PASS', player: 0 }, dictionary);

    expect(lastMove(next)).toEqual({ player: 0, turn: 0, kind: 'pass', word: null, valid: true, score: 0 });
    expect(next.players[0]).toEqual(state.players[0]);
    expect(next.log[next.log.length - 1]).toBe('Ann passed');
  });
});

describe('Game over', () => {
  it('ends in a draw after the turn limit with equal scores', () => {
    let state = stateWith(['C', 'A', 'T', 'E'], [], [], 2);
    state = gameReducer(state, { type: 'PASS', player: 0 }, dictionary);
    state = gameReducer(state, { type: 'PASS', player: 1 }, dictionary);

    expect(state.phase).toBe('GAME_OVER');
    expect(state.turnNumber).toBe(2);
    expect(state.log[state.log.length - 1]).toBe('Game over: Draw (0-0)');
    expect(getWinner(state)).toBeNull();
    expect(() => gameReducer(state, { type: 'PASS', player: 0 }, dictionary)).toThrow(
      'Cannot act in phase GAME_OVER',
    );
  });

  it('names the winner by score', () => {
    let state = stateWith(['C', 'A', 'T', 'E'], ['D', 'O', 'G', 'S', 'R', 'N'], [], 2);
    state = gameReducer(state, { type: 'SUBMIT_WORD', player: 0, word: 'dog' }, dictionary);
    state = gameReducer(state, { type: 'PASS', player: 1 }, dictionary);

    expect(state.log[state.log.length - 1]).toBe('Game over: Ann wins (3-0)');
    expect(getWinner(state)).toBe(0);
    expect(scoreMargin(state, 1)).toBe(-3);
  });

  it('has no winner while the game is running', () => {
    expect(getWinner(stateWith(['C', 'A', 'T', 'E'], [], []))).toBeNull();
  });
});
