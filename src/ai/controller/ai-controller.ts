/**
 * AI Controller: one ensemble coordinator per difficulty, and the glue that
 * turns its decisions into engine actions and engine results into outcomes.
 */
import type { GameState, PlayerId } from '@engine/types';
import type { GameAction } from '@engine/actions';
import type { Trie } from '@engine/dictionary/trie';
import { lastMove } from '@engine/reducer';
import type { AIDifficulty, EnsembleDecision } from '../types';
import type { AIConfigInput } from '../config';
import { configForDifficulty } from '../config';
import { InvalidStateError, NoCandidatesError } from '../errors';
import { EnsembleCoordinator } from '../ensemble/ensemble-coordinator';
import type { ObservationReport } from '../ensemble/ensemble-coordinator';
import type { ModelStore } from '../persistence/model-store';
import { enumerateCandidates, toAIView } from '../action-enumerator';
import { createLogger } from '@shared/logger';

const log = createLogger('ai-controller');

const coordinatorCache = new Map<AIDifficulty, EnsembleCoordinator>();
const storeOwners = new Map<ModelStore, AIDifficulty>();

/** A store, or a way to open one per difficulty */
export type StoreSource = ModelStore | ((difficulty: AIDifficulty) => ModelStore);

/**
 * Get or create the coordinator for a difficulty. The first call for a
 * difficulty fixes its store and overrides. Each difficulty keeps its own
 * store: two live coordinators on one store would overwrite each other's
 * Q-values.
 */
export function getCoordinator(
  difficulty: AIDifficulty,
  source?: StoreSource,
  overrides: AIConfigInput = {},
): EnsembleCoordinator {
  let coordinator = coordinatorCache.get(difficulty);
  if (!coordinator) {
    const store = typeof source === 'function' ? source(difficulty) : source;
    if (store) {
      const owner = storeOwners.get(store);
      if (owner !== undefined && owner !== difficulty) {
        throw new Error(`Model store is already used by the ${owner} coordinator`);
      }
      storeOwners.set(store, difficulty);
    }
    coordinator = new EnsembleCoordinator(configForDifficulty(difficulty, overrides), { store });
    coordinatorCache.set(difficulty, coordinator);
  }
  return coordinator;
}

export interface AIMove {
  action: GameAction;
  /** null when the AI had nothing to play and redrew or passed */
  decision: EnsembleDecision | null;
}

/**
 * Choose an action for an AI player. With no formable word the AI redraws;
 * a view the encoder rejects forfeits the turn.
 */
export function chooseAIMove(
  state: GameState,
  player: PlayerId,
  dictionary: Trie,
  coordinator: EnsembleCoordinator,
): AIMove {
  const candidates = enumerateCandidates(state, player, dictionary);
  try {
    const decision = coordinator.decide(toAIView(state, player), candidates);
    return { action: { type: 'SUBMIT_WORD', player, word: decision.word }, decision };
  } catch (e) {
    if (e instanceof NoCandidatesError) {
      log.info({ player, turn: state.turnNumber }, 'No formable word, redrawing');
      return { action: { type: 'REDRAW', player }, decision: null };
    }
    if (e instanceof InvalidStateError) {
      log.warn({ err: e, player }, 'Unencodable view, passing');
      return { action: { type: 'PASS', player }, decision: null };
    }
    throw e;
  }
}

/**
 * Feed the move that took `before` to `after` back to the coordinator.
 * Redraws and passes carry no word and are not observed.
 */
export function observeMove(
  coordinator: EnsembleCoordinator,
  before: GameState,
  after: GameState,
  gameId: string,
): ObservationReport | null {
  const move = lastMove(after);
  if (!move || move.kind !== 'word' || move.word === null || after.history.length === before.history.length) {
    return null;
  }
  return coordinator.observe({
    view: toAIView(before, move.player),
    nextView: after.phase === 'GAME_OVER' ? null : toAIView(after, move.player),
    actual: move.word,
    valid: move.valid,
    score: move.score,
    gameId,
  });
}

/**
 * Clear the coordinator cache (tests, or after swapping the store).
 */
export function clearCoordinatorCache(): void {
  coordinatorCache.clear();
  storeOwners.clear();
}
