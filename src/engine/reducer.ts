import type { GameState, PlayerId, PlayedMove, PlayerState } from './types';
import type { GameAction } from './actions';
import { validateAction, checkWord } from './validator';
import type { WordDictionary } from './validator';
import { createPRNG } from './utils/random';
import { removeLetters } from './utils/letter-utils';
import { drawPrivateLetters, refillPrivateLetters } from './rules/letter-pool';
import { scoreMove } from './rules/scoring';

export class GameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GameError';
  }
}

/**
 * Main game reducer. Validates the action, applies it, and advances the turn.
 */
export function gameReducer(
  state: GameState,
  action: GameAction,
  dictionary: WordDictionary,
): GameState {
  const validation = validateAction(state, action);
  if (!validation.valid) {
    throw new GameError(validation.reason ?? 'Invalid action');
  }

  switch (action.type) {
    case 'START_GAME':
      return {
        ...state,
        phase: 'PLAYING',
        currentPlayer: 0,
        log: [...state.log, `Game started! Shared letters: ${state.sharedLetters.join(' ')}`],
      };

    case 'SUBMIT_WORD':
      return endTurn(applySubmitWord(state, action.player, action.word, dictionary));

    case 'REDRAW':
      return endTurn(applyRedraw(state, action.player));

    case 'PASS':
      return endTurn(
        recordMove(
          state,
          { player: action.player, turn: state.turnNumber, kind: 'pass', word: null, valid: true, score: 0 },
          `${state.players[action.player].name} passed`,
        ),
      );
  }
}

/** The most recent move, if any */
export function lastMove(state: GameState): PlayedMove | null {
  return state.history.length > 0 ? state.history[state.history.length - 1] : null;
}

function applySubmitWord(
  state: GameState,
  player: PlayerId,
  rawWord: string,
  dictionary: WordDictionary,
): GameState {
  const check = checkWord(state, player, rawWord, dictionary);
  const name = state.players[player].name;

  if (!check.valid || !check.assignment) {
    return recordMove(
      state,
      { player, turn: state.turnNumber, kind: 'word', word: check.word, valid: false, score: 0 },
      `${name} played ${check.word}: rejected (${check.reason ?? 'invalid'})`,
    );
  }

  const repeats = state.usedWords[check.word] ?? 0;
  const score = scoreMove(check.word, repeats, check.assignment.fromShared.length);

  const prng = createPRNG(state.prngState);
  const remaining = removeLetters(state.players[player].privateLetters, check.assignment.fromPrivate);
  const privateLetters = refillPrivateLetters(remaining, prng);

  const withPlayer = updatePlayer(state, player, (p) => ({
    ...p,
    privateLetters,
    score: p.score + score,
  }));

  return recordMove(
    {
      ...withPlayer,
      usedWords: { ...state.usedWords, [check.word]: repeats + 1 },
      prngState: state.prngState + 1,
    },
    { player, turn: state.turnNumber, kind: 'word', word: check.word, valid: true, score },
    `${name} played ${check.word} for ${score}`,
  );
}

function applyRedraw(state: GameState, player: PlayerId): GameState {
  const prng = createPRNG(state.prngState);
  const current = state.players[player];
  const withPlayer = updatePlayer(state, player, (p) => ({
    ...p,
    privateLetters: drawPrivateLetters(prng, current.privateLetters.length),
    redraws: p.redraws + 1,
  }));

  return recordMove(
    { ...withPlayer, prngState: state.prngState + 1 },
    { player, turn: state.turnNumber, kind: 'redraw', word: null, valid: true, score: 0 },
    `${current.name} redrew their letters`,
  );
}

function updatePlayer(
  state: GameState,
  player: PlayerId,
  fn: (p: PlayerState) => PlayerState,
): GameState {
  const players: [PlayerState, PlayerState] = [state.players[0], state.players[1]];
  players[player] = fn(players[player]);
  return { ...state, players };
}

function recordMove(state: GameState, move: PlayedMove, message: string): GameState {
  return {
    ...state,
    history: [...state.history, move],
    log: [...state.log, message],
  };
}

function endTurn(state: GameState): GameState {
  const turnNumber = state.turnNumber + 1;
  if (turnNumber >= state.maxTurns) {
    const [human, ai] = state.players;
    const result =
      human.score === ai.score
        ? 'Draw'
        : `${human.score > ai.score ? human.name : ai.name} wins`;
    return {
      ...state,
      turnNumber,
      phase: 'GAME_OVER',
      log: [...state.log, `Game over: ${result} (${human.score}-${ai.score})`],
    };
  }
  return {
    ...state,
    turnNumber,
    currentPlayer: state.currentPlayer === 0 ? 1 : 0,
  };
}
