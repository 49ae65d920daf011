import type { GameState, PlayerId, PlayerState } from '../src/engine/types.js';
import type { PublicGameState, PublicPlayer } from '../src/shared/protocol.js';

function publicPlayer(p: PlayerState, visible: boolean): PublicPlayer {
  return {
    id: p.id,
    name: p.name,
    score: p.score,
    redraws: p.redraws,
    letterCount: p.privateLetters.length,
    privateLetters: visible ? [...p.privateLetters] : null,
  };
}

/**
 * Sanitize game state for a specific seat.
 * Hides the opponent's private letters and the PRNG position.
 */
export function sanitizeStateForPlayer(gameId: string, state: GameState, seat: PlayerId): PublicGameState {
  return {
    gameId,
    phase: state.phase,
    players: [publicPlayer(state.players[0], seat === 0), publicPlayer(state.players[1], seat === 1)],
    currentPlayer: state.currentPlayer,
    sharedLetters: [...state.sharedLetters],
    history: state.history.map((m) => ({ ...m })),
    turnNumber: state.turnNumber,
    maxTurns: state.maxTurns,
    log: [...state.log],
  };
}
