// ─── Players ──────────────────────────────────────────

/** 0 is the human seat, 1 the AI seat. */
export type PlayerId = 0 | 1;

export type Letter = string;

// ─── Phases ───────────────────────────────────────────

export type GamePhase = 'PRE_GAME' | 'PLAYING' | 'GAME_OVER';

// ─── Player ───────────────────────────────────────────

export interface PlayerState {
  id: PlayerId;
  name: string;
  privateLetters: Letter[];
  score: number;
  redraws: number;
}

// ─── History ──────────────────────────────────────────

export type MoveKind = 'word' | 'redraw' | 'pass';

export interface PlayedMove {
  player: PlayerId;
  turn: number;
  kind: MoveKind;
  word: string | null;
  valid: boolean;
  score: number;
}

// ─── Game State ───────────────────────────────────────

export interface GameState {
  phase: GamePhase;
  players: [PlayerState, PlayerState];
  currentPlayer: PlayerId;

  sharedLetters: Letter[];

  /** Times each word has been accepted this game, keyed by upper-case word. */
  usedWords: Record<string, number>;
  history: PlayedMove[];

  turnNumber: number;
  maxTurns: number;

  prngState: number;
  log: string[];
}
