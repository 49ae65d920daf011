import type { PlayerId } from './types';

// ─── Game Actions (Discriminated Union) ──────────────

export type GameAction =
  | StartGameAction
  | SubmitWordAction
  | RedrawAction
  | PassAction;

export interface StartGameAction {
  type: 'START_GAME';
}

export interface SubmitWordAction {
  type: 'SUBMIT_WORD';
  player: PlayerId;
  word: string;
}

/** Swap the whole private rack for a fresh draw; forfeits the turn's score. */
export interface RedrawAction {
  type: 'REDRAW';
  player: PlayerId;
}

export interface PassAction {
  type: 'PASS';
  player: PlayerId;
}
