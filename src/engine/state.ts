import type { GameState, PlayerId, PlayerState } from './types';
import { createPRNG } from './utils/random';
import { drawSharedLetters, drawPrivateLetters } from './rules/letter-pool';
import { DEFAULT_MAX_TURNS } from './constants';

function createPlayer(id: PlayerId, name: string, privateLetters: string[]): PlayerState {
  return {
    id,
    name,
    privateLetters,
    score: 0,
    redraws: 0,
  };
}

export function createInitialState(
  playerNames: [string, string],
  seed: number = Date.now(),
  maxTurns: number = DEFAULT_MAX_TURNS,
): GameState {
  if (!Number.isInteger(maxTurns) || maxTurns < 1) {
    throw new Error('maxTurns must be a positive integer');
  }

  const prng = createPRNG(seed);
  const sharedLetters = drawSharedLetters(prng);
  const players: [PlayerState, PlayerState] = [
    createPlayer(0, playerNames[0], drawPrivateLetters(prng)),
    createPlayer(1, playerNames[1], drawPrivateLetters(prng)),
  ];

  return {
    phase: 'PRE_GAME',
    players,
    currentPlayer: 0,
    sharedLetters,
    usedWords: {},
    history: [],
    turnNumber: 0,
    maxTurns,
    prngState: seed + 1,
    log: [],
  };
}
