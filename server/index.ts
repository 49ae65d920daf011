import express from 'express';
import { createServer } from 'node:http';
import { WebSocketServer, type WebSocket } from 'ws';
import type { ClientMessage, ServerMessage, StatsResponse } from '../src/shared/protocol.js';
import { difficultySchema, parseClientMessage } from '../src/shared/protocol.js';
import { logger } from '../src/shared/logger.js';
import { loadDictionary } from '../src/engine/dictionary/loader.js';
import { SHARED_LETTER_COUNT, PRIVATE_LETTER_COUNT } from '../src/engine/constants.js';
import { metaKeyFor } from '../src/ai/encoding/state-encoder.js';
import { openModelStore } from '../src/ai/persistence/file-store.js';
import { getCoordinator } from '../src/ai/controller/ai-controller.js';
import type { StoreSource } from '../src/ai/controller/ai-controller.js';
import { SessionManager } from './session-manager.js';
import { loadServerConfig, modelsDirFor } from './config.js';

const log = logger.child({ module: 'server' });
const config = loadServerConfig();

const dictionary = loadDictionary();
// Opened on a difficulty's first game
const storeFor: StoreSource = (difficulty) => openModelStore(modelsDirFor(config, difficulty));
log.info({ words: dictionary.size, modelsDir: config.modelsDir }, 'Dictionary loaded');

const app = express();
const httpServer = createServer(app);

const sessions = new SessionManager({
  sessionsDir: config.sessionsDir,
  dictionary,
  coordinatorFor: (difficulty) => getCoordinator(difficulty, storeFor),
});

// Health check
app.get('/api/health', (_req, res) => {
  res.json({ status: 'ok' });
});

// Learned table sizes and the current voting weights for a difficulty
app.get('/api/stats', (req, res) => {
  const difficulty = difficultySchema.safeParse(req.query['difficulty'] ?? 'medium');
  if (!difficulty.success) {
    res.status(400).json({ error: 'Unknown difficulty' });
    return;
  }
  const coordinator = getCoordinator(difficulty.data, storeFor);
  const stats = coordinator.stats();
  const body: StatsResponse = {
    sessions: sessions.size,
    models: stats.models,
    metaEntries: stats.metaEntries,
    weights: coordinator.meta.weights(metaKeyFor(SHARED_LETTER_COUNT + PRIVATE_LETTER_COUNT)),
  };
  res.json(body);
});

// WebSocket server
const wss = new WebSocketServer({ server: httpServer, path: '/ws' });

// Track which game each WebSocket is playing
const wsGame = new WeakMap<WebSocket, string | null>();

function send(ws: WebSocket, msg: ServerMessage): void {
  if (ws.readyState === ws.OPEN) {
    ws.send(JSON.stringify(msg));
  }
}

wss.on('connection', (ws: WebSocket) => {
  wsGame.set(ws, null);

  ws.on('message', (raw) => {
    const parsed = parseClientMessage(String(raw));
    if (!parsed.ok) {
      send(ws, { type: 'ERROR', message: parsed.error });
      return;
    }

    try {
      handleMessage(ws, parsed.message);
    } catch (e) {
      const message = e instanceof Error ? e.message : 'Unknown error';
      log.warn({ err: e, type: parsed.message.type }, 'Message handling failed');
      send(ws, { type: 'ERROR', message });
    }
  });

  ws.on('close', () => {
    const gameId = wsGame.get(ws);
    if (gameId) sessions.handleDisconnect(gameId);
  });
});

function requireGame(ws: WebSocket): string {
  const gameId = wsGame.get(ws);
  if (!gameId) throw new Error('Not in a game');
  return gameId;
}

function handleMessage(ws: WebSocket, msg: ClientMessage): void {
  switch (msg.type) {
    case 'NEW_GAME': {
      const { gameId } = sessions.createGame(msg, ws);
      wsGame.set(ws, gameId);
      break;
    }

    case 'RESUME':
      sessions.resume(msg.gameId, msg.secret, ws);
      wsGame.set(ws, msg.gameId);
      break;

    case 'SUBMIT_WORD':
      sessions.handleAction(requireGame(ws), { type: 'SUBMIT_WORD', player: 0, word: msg.word });
      break;

    case 'REDRAW':
      sessions.handleAction(requireGame(ws), { type: 'REDRAW', player: 0 });
      break;

    case 'PASS':
      sessions.handleAction(requireGame(ws), { type: 'PASS', player: 0 });
      break;

    case 'END_GAME':
      sessions.endGame(requireGame(ws));
      wsGame.set(ws, null);
      break;
  }
}

// Cleanup stale sessions every hour
setInterval(() => {
  sessions.cleanupStaleSessions();
}, 60 * 60 * 1000);

httpServer.listen(config.port, config.host, () => {
  log.info({ host: config.host, port: config.port, env: config.nodeEnv }, 'Lexiduel server listening');
});
