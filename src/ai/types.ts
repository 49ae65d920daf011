import type { PRNG } from '@engine/utils/random';
import type { ModelStore } from './persistence/model-store';

export type AIDifficulty = 'easy' | 'medium' | 'hard';

/** The four base models; also the meta-selector's action space. */
export type ModelKind = 'markov' | 'bayes' | 'qlearning' | 'mcts';

export const MODEL_KINDS: readonly ModelKind[] = ['bayes', 'markov', 'mcts', 'qlearning'];

/** Build a per-model record, one call per kind */
export function byKind<T>(fn: (kind: ModelKind) => T): Record<ModelKind, T> {
  return { bayes: fn('bayes'), markov: fn('markov'), mcts: fn('mcts'), qlearning: fn('qlearning') };
}

export function isModelKind(value: string): value is ModelKind {
  return MODEL_KINDS.some((kind) => kind === value);
}

/** The AI's view of a game situation, as handed over by the engine. */
export interface AIView {
  sharedLetters: readonly string[];
  privateLetters: readonly string[];
  turn: number;
  recentWords: readonly string[];
}

export interface StateKey {
  /** Opaque, restart-stable hash of the whole situation */
  hash: string;
  /** Sorted multiset of every available letter */
  letters: string;
  shared: string;
  private: string;
  turn: number;
  /** Last N words played, upper-case, oldest first */
  context: readonly string[];
  features: readonly number[];
  /** Coarse key for the meta-selector */
  metaKey: string;
}

/** Native-scale score per candidate word. */
export type CandidateScores = Map<string, number>;

export interface DecisionContext {
  key: StateKey;
  candidates: readonly string[];
  rng: PRNG;
  /** Epoch ms by which the model must answer */
  deadline: number;
  signal?: AbortSignal;
}

export interface ModelSuggestion {
  kind: ModelKind;
  scores: CandidateScores;
  best: string | null;
  confidence: number;
  /** True when the model ran out of budget and answered from partial work */
  partial: boolean;
}

export interface TrainingSignal {
  key: StateKey;
  /** null when the move ended the game */
  nextKey: StateKey | null;
  actual: string;
  predicted: string | null;
  valid: boolean;
  score: number;
}

export interface ModelStats {
  kind: ModelKind;
  entries: number;
  updates: number;
}

/**
 * Flat capability interface shared by every base model.
 */
export interface WordModel {
  readonly kind: ModelKind;
  /** Number of training events received */
  readonly updates: number;
  suggest(ctx: DecisionContext): ModelSuggestion;
  /** Never throws; malformed signals are clamped and logged */
  learn(signal: TrainingSignal): void;
  load(store: ModelStore): void;
  /** Write pending changes to the store */
  checkpoint(store: ModelStore): void;
  stats(): ModelStats;
}

export type ModelWeights = Record<ModelKind, number>;

export interface EnsembleDecision {
  word: string;
  /** Weighted vote share of the winning word, in [0, 1] */
  confidence: number;
  /** Models whose own top pick was the chosen word */
  contributors: ModelKind[];
  /** Model the meta-selector chose to trust this turn */
  lead: ModelKind;
  weights: ModelWeights;
  /** Min-max normalised score per model per candidate */
  scores: Record<ModelKind, Record<string, number>>;
  /** Models that failed or overran and were treated as indifferent */
  fallbacks: ModelKind[];
  stateHash: string;
}

export interface MoveOutcome {
  view: AIView;
  /** View after the move; null if the move ended the game */
  nextView: AIView | null;
  actual: string;
  valid: boolean;
  score: number;
  gameId?: string;
}
