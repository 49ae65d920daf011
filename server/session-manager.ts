import { randomBytes } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { GameState, PlayerId } from '../src/engine/types.js';
import type { GameAction } from '../src/engine/actions.js';
import type { Trie } from '../src/engine/dictionary/trie.js';
import { gameReducer, GameError, lastMove } from '../src/engine/reducer.js';
import { createInitialState } from '../src/engine/state.js';
import type { AIDifficulty } from '../src/ai/types.js';
import type { EnsembleCoordinator } from '../src/ai/ensemble/ensemble-coordinator.js';
import { chooseAIMove, observeMove } from '../src/ai/controller/ai-controller.js';
import type { AIMove } from '../src/ai/controller/ai-controller.js';
import type { GameOverReason, PublicGameState, ServerMessage } from '../src/shared/protocol.js';
import { createLogger } from '../src/shared/logger.js';
import { sanitizeStateForPlayer } from './sanitize.js';
import { AI_SEAT, maybeRunAI } from './ai-runner.js';

const log = createLogger('sessions');

const HUMAN_SEAT = 0;
const STALE_SESSION_MS = 7 * 24 * 60 * 60 * 1000; // 7 days

/** The subset of a ws WebSocket the manager talks to */
export interface ClientConnection {
  readonly readyState: number;
  readonly OPEN: number;
  send(data: string): void;
}

interface Session {
  id: string;
  secret: string;
  difficulty: AIDifficulty;
  state: GameState;
  finished: boolean;
  connection: ClientConnection | null;
  lastActivity: number;
  aiCleanup: (() => void) | null;
}

const playerIdSchema = z.union([z.literal(0), z.literal(1)]);

const playerSchema = z.object({
  id: playerIdSchema,
  name: z.string(),
  privateLetters: z.array(z.string()),
  score: z.number(),
  redraws: z.number(),
});

const gameStateSchema = z.object({
  phase: z.enum(['PRE_GAME', 'PLAYING', 'GAME_OVER']),
  players: z.tuple([playerSchema, playerSchema]),
  currentPlayer: playerIdSchema,
  sharedLetters: z.array(z.string()),
  usedWords: z.record(z.number()),
  history: z.array(
    z.object({
      player: playerIdSchema,
      turn: z.number(),
      kind: z.enum(['word', 'redraw', 'pass']),
      word: z.string().nullable(),
      valid: z.boolean(),
      score: z.number(),
    }),
  ),
  turnNumber: z.number(),
  maxTurns: z.number(),
  prngState: z.number(),
  log: z.array(z.string()),
});

const sessionFileSchema = z.object({
  id: z.string(),
  secret: z.string(),
  difficulty: z.enum(['easy', 'medium', 'hard']),
  state: gameStateSchema,
  finished: z.boolean(),
  lastActivity: z.number(),
});

export interface SessionManagerOptions {
  sessionsDir: string;
  dictionary: Trie;
  coordinatorFor: (difficulty: AIDifficulty) => EnsembleCoordinator;
  aiDelayMs?: number;
}

export interface NewGameOptions {
  playerName: string;
  difficulty: AIDifficulty;
  maxTurns?: number;
  seed?: number;
}

function generateId(length: number): string {
  return randomBytes(length).toString('base64url').slice(0, length).toUpperCase();
}

function generateSecret(): string {
  return randomBytes(24).toString('base64url');
}

export class SessionManager {
  private sessions = new Map<string, Session>();
  private readonly options: SessionManagerOptions;

  constructor(options: SessionManagerOptions) {
    this.options = options;
    this.loadSessions();
  }

  get size(): number {
    return this.sessions.size;
  }

  createGame(opts: NewGameOptions, ws: ClientConnection): { gameId: string; secret: string } {
    const gameId = generateId(8);
    const secret = generateSecret();
    const label = opts.difficulty.charAt(0).toUpperCase() + opts.difficulty.slice(1);

    let state = createInitialState([opts.playerName, `AI ${label}`], opts.seed ?? Date.now(), opts.maxTurns);
    state = gameReducer(state, { type: 'START_GAME' }, this.options.dictionary);

    const session: Session = {
      id: gameId,
      secret,
      difficulty: opts.difficulty,
      state,
      finished: false,
      connection: ws,
      lastActivity: Date.now(),
      aiCleanup: null,
    };
    this.sessions.set(gameId, session);
    log.info({ gameId, difficulty: opts.difficulty, maxTurns: state.maxTurns }, 'Game created');

    this.send(session, { type: 'GAME_CREATED', gameId, secret, seat: HUMAN_SEAT });
    this.sendState(session);
    this.persistSession(session);
    this.scheduleAI(session);
    return { gameId, secret };
  }

  resume(gameId: string, secret: string, ws: ClientConnection): void {
    const session = this.getSession(gameId);
    if (session.secret !== secret) {
      throw new Error('Invalid session secret');
    }
    session.connection = ws;
    session.lastActivity = Date.now();
    this.sendState(session);
    this.scheduleAI(session);
  }

  /** Apply an action from the human seat */
  handleAction(gameId: string, action: GameAction): void {
    const session = this.getSession(gameId);
    if (session.finished) {
      throw new Error('Game is not in progress');
    }
    if (session.aiCleanup) {
      session.aiCleanup();
      session.aiCleanup = null;
    }
    this.applyMove(session, action, null);
  }

  /** Play the AI's turn now; normally driven by the scheduled timer */
  runAITurn(gameId: string): void {
    const session = this.getSession(gameId);
    session.aiCleanup = null;
    if (session.finished || session.state.currentPlayer !== AI_SEAT) return;

    const move = chooseAIMove(session.state, AI_SEAT, this.options.dictionary, this.coordinator(session));
    this.applyMove(session, move.action, move);
  }

  endGame(gameId: string): void {
    const session = this.getSession(gameId);
    if (session.finished) return;
    this.finish(session, 'ended');
  }

  handleDisconnect(gameId: string): void {
    const session = this.sessions.get(gameId);
    if (!session) return;
    session.connection = null;
    if (session.aiCleanup) {
      session.aiCleanup();
      session.aiCleanup = null;
    }
  }

  /** Current (sanitized) state for the human seat */
  publicState(gameId: string): PublicGameState {
    const session = this.getSession(gameId);
    return sanitizeStateForPlayer(session.id, session.state, HUMAN_SEAT);
  }

  cleanupStaleSessions(): void {
    const now = Date.now();
    for (const [gameId, session] of this.sessions) {
      if (now - session.lastActivity <= STALE_SESSION_MS) continue;
      if (session.aiCleanup) session.aiCleanup();
      this.sessions.delete(gameId);
      try {
        fs.unlinkSync(this.sessionPath(gameId));
      } catch (e) {
        log.warn({ err: e, gameId }, 'Failed to remove stale session file');
      }
    }
  }

  // ─── Private helpers ───────────────────────────────

  private applyMove(session: Session, action: GameAction, aiMove: AIMove | null): void {
    const before = session.state;
    try {
      session.state = gameReducer(before, action, this.options.dictionary);
    } catch (e) {
      if (e instanceof GameError) {
        this.send(session, { type: 'ERROR', message: e.message });
        this.scheduleAI(session);
        return;
      }
      throw e;
    }
    session.lastActivity = Date.now();

    const coordinator = this.coordinator(session);
    observeMove(coordinator, before, session.state, session.id);
    coordinator.checkpoint();

    if (aiMove) {
      const move = lastMove(session.state);
      this.send(session, {
        type: 'AI_MOVE',
        move: {
          kind: move?.kind ?? 'pass',
          word: move?.word ?? null,
          valid: move?.valid ?? false,
          score: move?.score ?? 0,
          confidence: aiMove.decision?.confidence ?? null,
          lead: aiMove.decision?.lead ?? null,
          contributors: aiMove.decision?.contributors ?? [],
        },
      });
    }

    this.sendState(session);
    if (session.state.phase === 'GAME_OVER') {
      this.finish(session, 'turn_limit');
      return;
    }
    this.persistSession(session);
    this.scheduleAI(session);
  }

  private finish(session: Session, reason: GameOverReason): void {
    if (session.aiCleanup) {
      session.aiCleanup();
      session.aiCleanup = null;
    }
    session.finished = true;
    const { players } = session.state;
    const scores: [number, number] = [players[0].score, players[1].score];
    const winner: PlayerId | null = scores[0] === scores[1] ? null : scores[0] > scores[1] ? 0 : 1;

    this.send(session, { type: 'GAME_OVER', winner, scores, reason });
    this.coordinator(session).cleanupGame(session.id);
    this.persistSession(session);
    log.info({ gameId: session.id, scores, reason }, 'Game over');
  }

  private coordinator(session: Session): EnsembleCoordinator {
    return this.options.coordinatorFor(session.difficulty);
  }

  private scheduleAI(session: Session): void {
    if (session.finished || session.aiCleanup || !session.connection) return;
    session.aiCleanup = maybeRunAI(
      session.state,
      () => {
        try {
          this.runAITurn(session.id);
        } catch (e) {
          log.error({ err: e, gameId: session.id }, 'AI turn failed');
          this.send(session, { type: 'ERROR', message: 'AI failed to move' });
        }
      },
      this.options.aiDelayMs ?? 400,
    );
  }

  private getSession(gameId: string): Session {
    const session = this.sessions.get(gameId);
    if (!session) throw new Error(`Game ${gameId} not found`);
    return session;
  }

  private send(session: Session, msg: ServerMessage): void {
    const ws = session.connection;
    if (ws && ws.readyState === ws.OPEN) {
      ws.send(JSON.stringify(msg));
    }
  }

  private sendState(session: Session): void {
    this.send(session, { type: 'STATE_UPDATE', state: sanitizeStateForPlayer(session.id, session.state, HUMAN_SEAT) });
  }

  private sessionPath(gameId: string): string {
    return path.join(this.options.sessionsDir, `${gameId}.json`);
  }

  private persistSession(session: Session): void {
    try {
      fs.mkdirSync(this.options.sessionsDir, { recursive: true });
      const data: z.infer<typeof sessionFileSchema> = {
        id: session.id,
        secret: session.secret,
        difficulty: session.difficulty,
        state: session.state,
        finished: session.finished,
        lastActivity: session.lastActivity,
      };
      fs.writeFileSync(this.sessionPath(session.id), JSON.stringify(data));
    } catch (e) {
      log.error({ err: e, gameId: session.id }, 'Failed to persist session');
    }
  }

  private loadSessions(): void {
    if (!fs.existsSync(this.options.sessionsDir)) return;

    for (const file of fs.readdirSync(this.options.sessionsDir)) {
      if (!file.endsWith('.json')) continue;
      try {
        const raw = fs.readFileSync(path.join(this.options.sessionsDir, file), 'utf-8');
        const data = sessionFileSchema.parse(JSON.parse(raw));
        this.sessions.set(data.id, { ...data, connection: null, aiCleanup: null });
      } catch (e) {
        log.warn({ err: e, file }, 'Failed to load session');
      }
    }
    log.info({ count: this.sessions.size }, 'Loaded sessions from disk');
  }
}
