import type { GameState } from '../src/engine/types.js';

export const AI_SEAT = 1;

/**
 * Schedule the AI's turn if it is the AI's move.
 * Returns a cleanup function to cancel the pending timer.
 */
export function maybeRunAI(
  state: GameState,
  run: () => void,
  delayMs: number,
): (() => void) | null {
  if (state.phase !== 'PLAYING' || state.currentPlayer !== AI_SEAT) return null;

  const timer = setTimeout(run, delayMs);
  return () => clearTimeout(timer);
}
