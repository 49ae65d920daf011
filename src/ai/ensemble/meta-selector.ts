/**
 * Meta-level Q-learning over "which base model to trust".
 * Its Q-values become the ensemble's voting weights.
 */
import type { PRNG } from '@engine/utils/random';
import type { ModelKind, ModelWeights } from '../types';
import { MODEL_KINDS, byKind, isModelKind } from '../types';
import type { AIConfig } from '../config';
import type { ModelStore } from '../persistence/model-store';
import { QTable } from '../models/q-table';
import { softmax } from './normalize';

export class MetaSelector {
  private readonly config: AIConfig;
  private readonly values: QTable;

  constructor(config: AIConfig) {
    this.config = config;
    this.values = new QTable(config, 'meta');
  }

  get table(): QTable {
    return this.values;
  }

  get updates(): number {
    return this.values.updates;
  }

  /** Softmax over the models' Q-values in this meta state */
  weights(metaKey: string): ModelWeights {
    const w = softmax(
      MODEL_KINDS.map((k) => this.values.qValue(metaKey, k)),
      this.config.weightTemperature,
    );
    return byKind((k) => w[MODEL_KINDS.indexOf(k)]);
  }

  /** The model to lead this turn, epsilon-greedy */
  selectLead(metaKey: string, rng: PRNG): ModelKind {
    const lead = this.values.selectAction(metaKey, MODEL_KINDS, this.config.explorationRate, rng);
    return isModelKind(lead) ? lead : MODEL_KINDS[0];
  }

  /** Credit every model for the same outcome against one shared max Q(s',.) */
  reward(metaKey: string, rewards: ReadonlyMap<ModelKind, number>, nextMetaKey: string | null): void {
    this.values.updateBatch(metaKey, rewards, nextMetaKey);
  }

  backup(store: ModelStore, name: string): void {
    this.values.backup(store, name);
  }

  restore(store: ModelStore, name: string): void {
    this.values.restore(store, name);
  }

  load(store: ModelStore): void {
    this.values.load(store);
  }

  checkpoint(store: ModelStore): void {
    this.values.checkpoint(store);
  }
}
