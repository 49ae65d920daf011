/**
 * Self-play: both seats driven by the same coordinator, every move fed back
 * through observe. Used to warm up the learned tables before human play.
 */
import type { GameState, PlayerId } from '@engine/types';
import type { Trie } from '@engine/dictionary/trie';
import { createInitialState } from '@engine/state';
import { gameReducer } from '@engine/reducer';
import { getWinner } from '@engine/rules/victory';
import type { EnsembleCoordinator } from '../ensemble/ensemble-coordinator';
import { chooseAIMove, observeMove } from '../controller/ai-controller';
import { createLogger } from '@shared/logger';

const log = createLogger('self-play');

export interface SelfPlayOptions {
  games: number;
  seed?: number;
  maxTurns?: number;
  /** Keep per-game training records instead of cleaning them up */
  keepRecords?: boolean;
}

export interface GameSummary {
  gameId: string;
  scores: [number, number];
  winner: PlayerId | null;
  moves: number;
}

export interface SelfPlayReport {
  games: GameSummary[];
  accepted: number;
  rejected: number;
  redraws: number;
  passes: number;
}

export function playSelfGame(
  coordinator: EnsembleCoordinator,
  dictionary: Trie,
  gameId: string,
  seed: number,
  maxTurns?: number,
): GameState {
  let state = gameReducer(createInitialState(['AI 0', 'AI 1'], seed, maxTurns), { type: 'START_GAME' }, dictionary);

  while (state.phase === 'PLAYING') {
    const { action } = chooseAIMove(state, state.currentPlayer, dictionary, coordinator);
    const next = gameReducer(state, action, dictionary);
    observeMove(coordinator, state, next, gameId);
    state = next;
  }
  return state;
}

export function runSelfPlay(
  coordinator: EnsembleCoordinator,
  dictionary: Trie,
  options: SelfPlayOptions,
): SelfPlayReport {
  const baseSeed = options.seed ?? 1;
  const report: SelfPlayReport = { games: [], accepted: 0, rejected: 0, redraws: 0, passes: 0 };

  for (let g = 0; g < options.games; g++) {
    const gameId = `selfplay-${baseSeed + g}`;
    const final = playSelfGame(coordinator, dictionary, gameId, baseSeed + g, options.maxTurns);

    for (const move of final.history) {
      if (move.kind === 'redraw') report.redraws++;
      else if (move.kind === 'pass') report.passes++;
      else if (move.valid) report.accepted++;
      else report.rejected++;
    }
    report.games.push({
      gameId,
      scores: [final.players[0].score, final.players[1].score],
      winner: getWinner(final),
      moves: final.history.length,
    });

    coordinator.checkpoint();
    if (!options.keepRecords) coordinator.cleanupGame(gameId);
    log.info({ gameId, scores: [final.players[0].score, final.players[1].score] }, 'Self-play game finished');
  }
  return report;
}
