import { z } from 'zod';
import type { GamePhase, MoveKind, PlayedMove, PlayerId } from '../engine/types';
import type { ModelKind, ModelStats, ModelWeights } from '../ai/types';

// ─── Client → Server Messages ────────────────────────

export const difficultySchema = z.enum(['easy', 'medium', 'hard']);

export const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('NEW_GAME'),
    playerName: z.string().trim().min(1).max(32).default('Player'),
    difficulty: difficultySchema.default('medium'),
    maxTurns: z.number().int().min(2).max(100).optional(),
    seed: z.number().int().optional(),
  }),
  z.object({ type: z.literal('RESUME'), gameId: z.string().min(1), secret: z.string().min(1) }),
  z.object({ type: z.literal('SUBMIT_WORD'), word: z.string().min(1).max(32) }),
  z.object({ type: z.literal('REDRAW') }),
  z.object({ type: z.literal('PASS') }),
  z.object({ type: z.literal('END_GAME') }),
]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;

/** Parse a raw frame; errors carry a message fit to send back to the client */
export function parseClientMessage(raw: string): { ok: true; message: ClientMessage } | { ok: false; error: string } {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, error: 'Invalid JSON' };
  }
  const parsed = clientMessageSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return { ok: false, error: `Invalid message: ${where}${issue.message}` };
  }
  return { ok: true, message: parsed.data };
}

// ─── Public game state ───────────────────────────────

export interface PublicPlayer {
  id: PlayerId;
  name: string;
  score: number;
  redraws: number;
  letterCount: number;
  /** Only filled in for the viewing seat */
  privateLetters: string[] | null;
}

export interface PublicGameState {
  gameId: string;
  phase: GamePhase;
  players: [PublicPlayer, PublicPlayer];
  currentPlayer: PlayerId;
  sharedLetters: string[];
  history: PlayedMove[];
  turnNumber: number;
  maxTurns: number;
  log: string[];
}

export interface AIMoveSummary {
  kind: MoveKind;
  word: string | null;
  valid: boolean;
  score: number;
  confidence: number | null;
  lead: ModelKind | null;
  contributors: ModelKind[];
}

export type GameOverReason = 'turn_limit' | 'ended';

// ─── Server → Client Messages ────────────────────────

export type ServerMessage =
  | { type: 'GAME_CREATED'; gameId: string; secret: string; seat: PlayerId }
  | { type: 'STATE_UPDATE'; state: PublicGameState }
  | { type: 'AI_MOVE'; move: AIMoveSummary }
  | { type: 'GAME_OVER'; winner: PlayerId | null; scores: [number, number]; reason: GameOverReason }
  | { type: 'ERROR'; message: string };

// ─── HTTP ────────────────────────────────────────────

export interface StatsResponse {
  sessions: number;
  models: ModelStats[];
  metaEntries: number;
  weights: ModelWeights;
}
