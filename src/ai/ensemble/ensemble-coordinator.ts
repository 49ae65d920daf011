/**
 * Queries the four base models, combines their normalised scores by
 * meta-weighted vote, and fans every outcome back out to all of them.
 */
import { createPRNG } from '@engine/utils/random';
import type { PRNG } from '@engine/utils/random';
import { normalizeWord } from '@engine/utils/letter-utils';
import type {
  AIView,
  EnsembleDecision,
  ModelKind,
  ModelStats,
  ModelSuggestion,
  ModelWeights,
  MoveOutcome,
  StateKey,
  TrainingSignal,
  WordModel,
} from '../types';
import { MODEL_KINDS, byKind } from '../types';
import type { AIConfig } from '../config';
import { encodeState } from '../encoding/state-encoder';
import { NoCandidatesError, PersistenceUnavailableError, ensureError } from '../errors';
import { MemoryModelStore, joinKey } from '../persistence/model-store';
import type { ModelStore } from '../persistence/model-store';
import { MarkovModel } from '../models/markov-model';
import { NaiveBayesModel } from '../models/naive-bayes-model';
import { QLearningModel } from '../models/q-learning-model';
import { MCTSModel } from '../models/mcts-model';
import type { RewardFunction } from '../models/mcts-model';
import { outcomeReward } from '../models/model-utils';
import { MetaSelector } from './meta-selector';
import { INDIFFERENT, minMaxNormalize } from './normalize';
import { createLogger } from '@shared/logger';

const log = createLogger('ensemble');

/** Undecided-but-unobserved decisions kept for meta credit */
const MAX_PENDING_DECISIONS = 64;
const TIE_EPSILON = 1e-12;
/** Search checks its clock once per rollout, so it may finish slightly late */
export const OVERRUN_GRACE_MS = 50;

export interface BaseModels {
  markov: MarkovModel;
  bayes: NaiveBayesModel;
  qlearning: QLearningModel;
  mcts: MCTSModel;
}

export interface CoordinatorOptions {
  store?: ModelStore;
  /** Reward used by MCTS rollouts; defaults to the engine's word score */
  reward?: RewardFunction;
}

interface PendingDecision {
  word: string;
  normalized: Record<ModelKind, Map<string, number>>;
  lead: ModelKind;
  /** Indifferent by failure this turn; earn no meta credit */
  fallbacks: ModelKind[];
}

export type TrainingRecord = {
  gameId: string;
  turn: number;
  stateHash: string;
  predicted: string | null;
  actual: string;
  valid: boolean;
  score: number;
};

export interface ObservationReport {
  applied: boolean;
  /** Meta rewards credited per model; empty when no decision was pending */
  metaRewards: Partial<Record<ModelKind, number>>;
}

export interface CoordinatorStats {
  models: ModelStats[];
  metaEntries: number;
  pendingDecisions: number;
  bufferedRecords: number;
}

export function decisionSeed(seed: number, stateHash: string): number {
  return (seed ^ parseInt(stateHash.slice(0, 8), 16)) | 0;
}

export class EnsembleCoordinator {
  readonly models: BaseModels;
  readonly meta: MetaSelector;
  private readonly config: AIConfig;
  private readonly store: ModelStore;
  private pending = new Map<string, PendingDecision>();
  private records: TrainingRecord[] = [];

  constructor(config: AIConfig, options: CoordinatorOptions = {}) {
    this.config = config;
    this.store = options.store ?? new MemoryModelStore();
    this.models = {
      markov: new MarkovModel(config),
      bayes: new NaiveBayesModel(config),
      qlearning: new QLearningModel(config),
      mcts: new MCTSModel(config, options.reward),
    };
    this.meta = new MetaSelector(config);
    this.load();
  }

  private get all(): WordModel[] {
    return MODEL_KINDS.map((k) => this.models[k]);
  }

  /**
   * Pick a word from the candidates. Throws NoCandidatesError on an empty
   * set and InvalidStateError when the view can't be encoded.
   */
  decide(view: Partial<AIView>, candidates: readonly string[]): EnsembleDecision {
    const words = [...new Set(candidates.map(normalizeWord).filter((w) => w.length > 0))];
    if (words.length === 0) {
      throw new NoCandidatesError();
    }

    const key = encodeState(view, this.config.historyWindow);
    // Lead and tie-break draw from their own stream; how much the models draw
    // depends on how far their search got before the clock ran out
    const rng = createPRNG(decisionSeed(this.config.seed, key.hash));
    const modelRng = createPRNG(decisionSeed(this.config.seed + 1, key.hash));
    const deadline = Date.now() + this.config.turnTimeLimitMs;
    const share = this.config.turnTimeLimitMs / MODEL_KINDS.length;

    const lead = this.meta.selectLead(key.metaKey, rng);

    const suggestions = byKind((kind) => this.query(this.models[kind], key, words, modelRng, deadline, share));
    const fallbacks = MODEL_KINDS.filter((k) => suggestions[k] === null);

    const normalized = byKind((kind) => {
      const s = suggestions[kind];
      return s ? minMaxNormalize(s.scores, words) : new Map(words.map((w) => [w, INDIFFERENT]));
    });

    const weights = this.votingWeights(key.metaKey, lead);

    const totals = new Map<string, number>(
      words.map((w) => [w, MODEL_KINDS.reduce((sum, k) => sum + weights[k] * (normalized[k].get(w) ?? 0), 0)]),
    );
    const word = this.breakTie(words, totals, rng);
    const confidence = Math.min(1, Math.max(0, totals.get(word) ?? 0));

    this.remember(key.hash, { word, normalized, lead, fallbacks });

    const decision: EnsembleDecision = {
      word,
      confidence,
      contributors: MODEL_KINDS.filter((k) => suggestions[k]?.best === word),
      lead,
      weights,
      scores: byKind((k) => Object.fromEntries(normalized[k])),
      fallbacks,
      stateHash: key.hash,
    };
    log.debug({ word, confidence, lead, stateHash: key.hash }, 'Ensemble decision');
    return decision;
  }

  /**
   * Feed an outcome to every model. The single point where all models learn
   * from the same ground truth. Never throws.
   */
  observe(outcome: MoveOutcome): ObservationReport {
    let key: StateKey;
    let nextKey: StateKey | null;
    try {
      key = encodeState(outcome.view, this.config.historyWindow);
      nextKey = outcome.nextView ? encodeState(outcome.nextView, this.config.historyWindow) : null;
    } catch (e) {
      log.warn({ err: e }, 'Cannot encode observed state, skipping training');
      return { applied: false, metaRewards: {} };
    }

    const actual = normalizeWord(outcome.actual);
    const decision = this.pending.get(key.hash);
    const signal: TrainingSignal = {
      key,
      nextKey,
      actual,
      predicted: decision?.word ?? null,
      valid: outcome.valid,
      score: outcome.score,
    };

    for (const model of this.all) {
      try {
        model.learn(signal);
      } catch (e) {
        log.warn({ err: e, model: model.kind }, 'Model failed to learn from outcome');
      }
    }

    const metaRewards: Partial<Record<ModelKind, number>> = {};
    if (decision) {
      const reward = outcomeReward(signal, this.config, log);
      const credited = new Map<ModelKind, number>();
      for (const kind of MODEL_KINDS) {
        if (decision.fallbacks.includes(kind)) continue;
        const r = reward * (decision.normalized[kind].get(actual) ?? 0);
        credited.set(kind, r);
        metaRewards[kind] = r;
      }
      this.meta.reward(key.metaKey, credited, nextKey?.metaKey ?? null);
      this.pending.delete(key.hash);
    }

    this.records.push({
      gameId: outcome.gameId ?? 'unassigned',
      turn: key.turn,
      stateHash: key.hash,
      predicted: signal.predicted,
      actual,
      valid: outcome.valid,
      score: outcome.score,
    });

    return { applied: true, metaRewards };
  }

  /** Current voting weights for a view, without the lead bonus */
  weightsFor(view: Partial<AIView>): ModelWeights {
    return this.meta.weights(encodeState(view, this.config.historyWindow).metaKey);
  }

  /**
   * Write every pending change to the store. Returns false (and logs) when
   * the store is unavailable; learning carries on in memory.
   */
  checkpoint(): boolean {
    try {
      for (const model of this.all) model.checkpoint(this.store);
      this.meta.checkpoint(this.store);
      for (const record of [...this.records]) {
        this.store.put('history', joinKey(record.gameId, record.turn), record);
        this.records.shift();
      }
      this.store.flush();
      return true;
    } catch (e) {
      const err = e instanceof PersistenceUnavailableError
        ? e
        : new PersistenceUnavailableError('Checkpoint failed', ensureError(e));
      log.warn({ err }, 'Checkpoint failed, continuing in memory');
      return false;
    }
  }

  /**
   * Delete a finished game's training records, persisted or buffered, and
   * flush the deletion. A failed flush is logged; the records stay gone in
   * memory and leave the disk on the next checkpoint.
   */
  cleanupGame(gameId: string): number {
    const before = this.records.length;
    this.records = this.records.filter((r) => r.gameId !== gameId);
    let removed = before - this.records.length;

    const prefix = joinKey(gameId, '');
    for (const [key] of this.store.entries('history')) {
      if (key.startsWith(prefix) && this.store.remove('history', key)) removed++;
    }
    try {
      this.store.flush();
    } catch (e) {
      const err = e instanceof PersistenceUnavailableError
        ? e
        : new PersistenceUnavailableError('Cleanup flush failed', ensureError(e));
      log.warn({ err, gameId }, 'Could not persist record cleanup');
    }
    log.info({ gameId, removed }, 'Cleaned up game records');
    return removed;
  }

  /** Named backup of both Q-tables */
  backup(name: string): void {
    this.models.qlearning.backup(this.store, name);
    this.meta.backup(this.store, name);
    this.store.flush();
  }

  restore(name: string): void {
    this.models.qlearning.restore(this.store, name);
    this.meta.restore(this.store, name);
  }

  /** Buffered (not yet checkpointed) training records for a game */
  pendingRecords(gameId: string): TrainingRecord[] {
    return this.records.filter((r) => r.gameId === gameId);
  }

  stats(): CoordinatorStats {
    return {
      models: this.all.map((m) => m.stats()),
      metaEntries: this.meta.table.size,
      pendingDecisions: this.pending.size,
      bufferedRecords: this.records.length,
    };
  }

  private load(): void {
    try {
      for (const model of this.all) model.load(this.store);
      this.meta.load(this.store);
    } catch (e) {
      log.warn({ err: e }, 'Could not load learned tables, starting empty');
    }
  }

  /**
   * Ask one model, holding it to its share of the turn. A model that throws
   * or answers past its deadline counts as indifferent (null).
   */
  private query(
    model: WordModel,
    key: StateKey,
    candidates: string[],
    rng: PRNG,
    turnDeadline: number,
    share: number,
  ): ModelSuggestion | null {
    const started = Date.now();
    const deadline = Math.min(turnDeadline, started + share);
    try {
      const suggestion = model.suggest({ key, candidates, rng, deadline });
      const late = Date.now() - deadline;
      if (late > OVERRUN_GRACE_MS) {
        log.warn(
          { model: model.kind, elapsed: Date.now() - started, share },
          'Model overran its share of the turn, treating it as indifferent',
        );
        return null;
      }
      if (suggestion.partial) {
        log.debug({ model: model.kind }, 'Model answered from partial work');
      }
      return suggestion;
    } catch (e) {
      log.warn({ err: e, model: model.kind }, 'Model failed to suggest, treating it as indifferent');
      return null;
    }
  }

  private votingWeights(metaKey: string, lead: ModelKind): ModelWeights {
    const base = this.meta.weights(metaKey);
    const boosted: ModelWeights = { ...base, [lead]: base[lead] + this.config.leadBonus };
    const sum = MODEL_KINDS.reduce((s, k) => s + boosted[k], 0);
    for (const k of MODEL_KINDS) boosted[k] /= sum;
    return boosted;
  }

  private breakTie(words: string[], totals: Map<string, number>, rng: PRNG): string {
    const best = Math.max(...words.map((w) => totals.get(w) ?? 0));
    const tied = words.filter((w) => best - (totals.get(w) ?? 0) <= TIE_EPSILON);
    switch (this.config.tieBreak) {
      case 'candidate-order':
        return tied[0];
      case 'random':
        return tied[rng.nextInt(0, tied.length - 1)];
      case 'lexical':
        return [...tied].sort()[0];
    }
  }

  private remember(stateHash: string, decision: PendingDecision): void {
    this.pending.delete(stateHash);
    this.pending.set(stateHash, decision);
    while (this.pending.size > MAX_PENDING_DECISIONS) {
      const oldest = this.pending.keys().next();
      if (oldest.done) break;
      this.pending.delete(oldest.value);
    }
  }
}
