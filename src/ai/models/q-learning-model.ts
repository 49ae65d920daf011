/**
 * Q-learning over (state hash, word) pairs. Reward is the move score,
 * or a penalty when the word was rejected.
 */
import type { PRNG } from '@engine/utils/random';
import type {
  DecisionContext,
  ModelStats,
  ModelSuggestion,
  TrainingSignal,
  WordModel,
} from '../types';
import type { AIConfig } from '../config';
import type { ModelStore } from '../persistence/model-store';
import { QTable } from './q-table';
import { outcomeReward } from './model-utils';
import { normalizeWord } from '@engine/utils/letter-utils';
import { createLogger } from '@shared/logger';

const log = createLogger('q-learning');

export class QLearningModel implements WordModel {
  readonly kind = 'qlearning' as const;
  private readonly config: AIConfig;
  private readonly values: QTable;
  private updateCount = 0;

  constructor(config: AIConfig) {
    this.config = config;
    this.values = new QTable(config, 'qlearning');
  }

  get updates(): number {
    return this.updateCount;
  }

  get table(): QTable {
    return this.values;
  }

  update(state: string, action: string, reward: number, nextState: string | null): number {
    return this.values.update(state, normalizeWord(action), reward, nextState);
  }

  selectAction(state: string, candidates: readonly string[], epsilon: number, rng: PRNG): string {
    return this.values.selectAction(state, candidates.map(normalizeWord), epsilon, rng);
  }

  suggest(ctx: DecisionContext): ModelSuggestion {
    const state = ctx.key.hash;
    const scores = new Map(ctx.candidates.map((c) => [c, this.values.qValue(state, c)]));
    const best = this.values.selectAction(state, ctx.candidates, 0, ctx.rng);
    return {
      kind: this.kind,
      scores,
      best,
      confidence: scores.get(best) ?? 0,
      partial: false,
    };
  }

  learn(signal: TrainingSignal): void {
    this.updateCount++;
    try {
      const reward = outcomeReward(signal, this.config, log);
      this.values.update(signal.key.hash, normalizeWord(signal.actual), reward, signal.nextKey?.hash ?? null);
    } catch (e) {
      log.warn({ err: e, word: signal.actual }, 'Q-learning update failed');
    }
  }

  backup(store: ModelStore, name: string): void {
    this.values.backup(store, name);
  }

  restore(store: ModelStore, name: string): void {
    this.values.restore(store, name);
  }

  prune(minVisits: number): number {
    return this.values.prune(minVisits);
  }

  load(store: ModelStore): void {
    this.values.load(store);
  }

  checkpoint(store: ModelStore): void {
    this.values.checkpoint(store);
  }

  stats(): ModelStats {
    return { kind: this.kind, entries: this.values.size, updates: this.updateCount };
  }
}
