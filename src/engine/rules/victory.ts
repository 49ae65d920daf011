import type { GameState, PlayerId } from '../types';

/** Winning player once the game is over; null for a draw or an unfinished game */
export function getWinner(state: GameState): PlayerId | null {
  if (state.phase !== 'GAME_OVER') return null;
  const [human, ai] = state.players;
  if (human.score === ai.score) return null;
  return human.score > ai.score ? 0 : 1;
}

export function scoreMargin(state: GameState, player: PlayerId): number {
  const other: PlayerId = player === 0 ? 1 : 0;
  return state.players[player].score - state.players[other].score;
}
