/**
 * Naive Bayes over letter and pattern features of a word, conditioned on
 * the outcome the word earned.
 *
 * score() is a relative ranking score, NOT a calibrated probability: it sums
 * prior x geometric-mean likelihood over the positive labels. The ensemble
 * min-max normalises it before weighting.
 */
import type {
  DecisionContext,
  ModelStats,
  ModelSuggestion,
  TrainingSignal,
  WordModel,
} from '../types';
import type { AIConfig } from '../config';
import type { ModelStore } from '../persistence/model-store';
import { joinKey, splitKey } from '../persistence/model-store';
import { outcomeReward, readCount, toSuggestion } from './model-utils';
import { normalizeWord } from '@engine/utils/letter-utils';
import { createLogger } from '@shared/logger';

const log = createLogger('naive-bayes');

export type OutcomeLabel = 'accepted' | 'high-score' | 'rejected';

export const OUTCOME_LABELS: readonly OutcomeLabel[] = ['accepted', 'high-score', 'rejected'];
const POSITIVE_LABELS: readonly OutcomeLabel[] = ['accepted', 'high-score'];

function isOutcomeLabel(value: string): value is OutcomeLabel {
  return OUTCOME_LABELS.some((label) => label === value);
}

export function extractWordFeatures(word: string): string[] {
  const w = normalizeWord(word);
  const features = [...w].map((l) => `l:${l}`);
  if (w.length >= 2) {
    features.push(`p:${w.slice(0, 2)}`, `s:${w.slice(-2)}`);
  }
  features.push(`n:${Math.min(w.length, 7)}`);
  return features;
}

/** prior x geometric mean of the likelihoods; monotone in each likelihood */
export function combineLikelihoods(prior: number, likelihoods: readonly number[]): number {
  if (likelihoods.length === 0) return prior;
  const logMean = likelihoods.reduce((sum, p) => sum + Math.log(p), 0) / likelihoods.length;
  return prior * Math.exp(logMean);
}

export class NaiveBayesModel implements WordModel {
  readonly kind = 'bayes' as const;
  private readonly config: AIConfig;
  private classCounts = new Map<OutcomeLabel, number>();
  private featureCounts = new Map<OutcomeLabel, Map<string, number>>();
  private featureTotals = new Map<OutcomeLabel, number>();
  private vocabulary = new Set<string>();
  private pending = new Map<string, number>();
  private updateCount = 0;

  constructor(config: AIConfig) {
    this.config = config;
  }

  get updates(): number {
    return this.updateCount;
  }

  get observations(): number {
    let n = 0;
    for (const c of this.classCounts.values()) n += c;
    return n;
  }

  train(word: string, label: OutcomeLabel): void {
    const w = normalizeWord(word);
    if (!/^[A-Z]+$/.test(w)) {
      log.warn({ word }, 'Skipping non-alphabetic word');
      return;
    }
    this.addClass(label, 1);
    this.addPending(joinKey('C', label), 1);
    for (const f of extractWordFeatures(w)) {
      this.addFeature(label, f, 1);
      this.addPending(joinKey('F', label, f), 1);
    }
  }

  prior(label: OutcomeLabel): number {
    const eps = this.config.smoothing;
    return ((this.classCounts.get(label) ?? 0) + eps) / (this.observations + eps * OUTCOME_LABELS.length);
  }

  /** Smoothed P(feature | label); never zero */
  likelihood(feature: string, label: OutcomeLabel): number {
    const eps = this.config.smoothing;
    const count = this.featureCounts.get(label)?.get(feature) ?? 0;
    const total = this.featureTotals.get(label) ?? 0;
    return (count + eps) / (total + eps * (this.vocabulary.size + 1));
  }

  classScore(word: string, label: OutcomeLabel): number {
    const likelihoods = extractWordFeatures(word).map((f) => this.likelihood(f, label));
    return combineLikelihoods(this.prior(label), likelihoods);
  }

  score(word: string): number {
    return POSITIVE_LABELS.reduce((sum, label) => sum + this.classScore(word, label), 0);
  }

  suggest(ctx: DecisionContext): ModelSuggestion {
    const scores = new Map(ctx.candidates.map((c) => [c, this.score(c)]));
    return toSuggestion(this.kind, scores);
  }

  learn(signal: TrainingSignal): void {
    this.updateCount++;
    const reward = outcomeReward(signal, this.config, log);
    let label: OutcomeLabel = 'accepted';
    if (!signal.valid) label = 'rejected';
    else if (reward >= this.config.highScoreThreshold) label = 'high-score';
    this.train(signal.actual, label);
  }

  load(store: ModelStore): void {
    this.classCounts.clear();
    this.featureCounts.clear();
    this.featureTotals.clear();
    this.vocabulary.clear();
    this.pending.clear();

    for (const [key, value] of store.entries('bayes')) {
      const count = readCount(value);
      const [table, label, feature] = splitKey(key);
      if (count === null || label === undefined || !isOutcomeLabel(label)) {
        log.warn({ key }, 'Skipping malformed bayes entry');
        continue;
      }
      if (table === 'C') this.addClass(label, count);
      else if (table === 'F' && feature !== undefined) this.addFeature(label, feature, count);
    }
  }

  checkpoint(store: ModelStore): void {
    for (const [key, delta] of [...this.pending]) {
      store.increment('bayes', key, delta);
      this.pending.delete(key);
    }
  }

  stats(): ModelStats {
    let entries = this.classCounts.size;
    for (const row of this.featureCounts.values()) entries += row.size;
    return { kind: this.kind, entries, updates: this.updateCount };
  }

  private addClass(label: OutcomeLabel, n: number): void {
    this.classCounts.set(label, (this.classCounts.get(label) ?? 0) + n);
  }

  private addFeature(label: OutcomeLabel, feature: string, n: number): void {
    let row = this.featureCounts.get(label);
    if (!row) {
      row = new Map();
      this.featureCounts.set(label, row);
    }
    row.set(feature, (row.get(feature) ?? 0) + n);
    this.featureTotals.set(label, (this.featureTotals.get(label) ?? 0) + n);
    this.vocabulary.add(feature);
  }

  private addPending(key: string, n: number): void {
    this.pending.set(key, (this.pending.get(key) ?? 0) + n);
  }
}
