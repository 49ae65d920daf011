/**
 * Markov chain over letters (order-k, padded with ^ and terminated by $)
 * and over consecutive words.
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
import { TransitionTable } from './transition-table';
import type { RankedSymbol } from './transition-table';
import { outcomeReward, readCount, toSuggestion } from './model-utils';
import { normalizeWord } from '@engine/utils/letter-utils';
import { createLogger } from '@shared/logger';

const log = createLogger('markov');

export const START = '^';
export const END = '$';

/** Weight of the word-to-word transition relative to letter likelihood */
const WORD_TRANSITION_WEIGHT = 0.5;

export class MarkovModel implements WordModel {
  readonly kind = 'markov' as const;
  private readonly config: AIConfig;
  private readonly order: number;
  private letters = new TransitionTable();
  private words = new TransitionTable();
  private pending = new Map<string, number>();
  private updateCount = 0;

  constructor(config: AIConfig) {
    this.config = config;
    this.order = config.markovOrder;
  }

  get updates(): number {
    return this.updateCount;
  }

  /**
   * Train on an ordered word sequence: letter transitions inside each word,
   * word transitions between each adjacent pair.
   */
  train(sequence: readonly string[]): void {
    const words = sequence.map(normalizeWord).filter((w) => {
      const ok = /^[A-Z]+$/.test(w);
      if (!ok) log.warn({ word: w }, 'Skipping non-alphabetic word');
      return ok;
    });
    for (const w of words) this.recordWord(w);
    for (let i = 1; i < words.length; i++) {
      this.recordWordTransition(words[i - 1], words[i]);
    }
  }

  predictNextLetters(context: string, k: number): RankedSymbol[] {
    return this.letters.predict(this.letterContext(context), k);
  }

  predictNextWords(previous: string, k: number): RankedSymbol[] {
    return this.words.predict(normalizeWord(previous), k);
  }

  letterDistribution(context: string): Map<string, number> {
    return this.letters.distribution(this.letterContext(context));
  }

  wordDistribution(previous: string): Map<string, number> {
    return this.words.distribution(normalizeWord(previous));
  }

  /**
   * Geometric mean of the smoothed letter transition probabilities, plus a
   * bonus for following the previous word.
   */
  scoreWord(word: string, previous: string | null = null): number {
    const w = normalizeWord(word);
    const transitions = this.letterTransitions(w);
    let logSum = 0;
    for (const [context, next] of transitions) {
      logSum += Math.log(this.letters.smoothedProbability(context, next, this.config.smoothing));
    }
    const likelihood = Math.exp(logSum / transitions.length);

    if (previous === null) return likelihood;
    const follow = this.words.distribution(normalizeWord(previous)).get(w) ?? 0;
    return likelihood + WORD_TRANSITION_WEIGHT * follow;
  }

  suggest(ctx: DecisionContext): ModelSuggestion {
    const previous = ctx.key.context.length > 0 ? ctx.key.context[ctx.key.context.length - 1] : null;
    const scores = new Map(ctx.candidates.map((c) => [c, this.scoreWord(c, previous)]));
    return toSuggestion(this.kind, scores);
  }

  learn(signal: TrainingSignal): void {
    this.updateCount++;
    const reward = outcomeReward(signal, this.config, log);
    if (reward <= 0) return;

    const word = normalizeWord(signal.actual);
    if (!/^[A-Z]+$/.test(word)) {
      log.warn({ word: signal.actual }, 'Ignoring malformed word in training signal');
      return;
    }
    this.recordWord(word);
    const previous = signal.key.context[signal.key.context.length - 1];
    if (previous !== undefined) this.recordWordTransition(previous, word);
  }

  load(store: ModelStore): void {
    this.letters = new TransitionTable();
    this.words = new TransitionTable();
    this.pending.clear();
    for (const [key, value] of store.entries('markov')) {
      const count = readCount(value);
      const [table, current, next] = splitKey(key);
      if (count === null || current === undefined || next === undefined) {
        log.warn({ key }, 'Skipping malformed markov entry');
        continue;
      }
      if (table === 'L') this.letters.record(current, next, count);
      else if (table === 'W') this.words.record(current, next, count);
    }
  }

  checkpoint(store: ModelStore): void {
    for (const [key, delta] of [...this.pending]) {
      store.increment('markov', key, delta);
      this.pending.delete(key);
    }
  }

  stats(): ModelStats {
    return { kind: this.kind, entries: this.letters.size + this.words.size, updates: this.updateCount };
  }

  private recordWord(word: string): void {
    for (const [context, next] of this.letterTransitions(word)) {
      this.letters.record(context, next);
      this.addPending(joinKey('L', context, next));
    }
  }

  private recordWordTransition(previous: string, word: string): void {
    const prev = normalizeWord(previous);
    this.words.record(prev, word);
    this.addPending(joinKey('W', prev, word));
  }

  private addPending(key: string): void {
    this.pending.set(key, (this.pending.get(key) ?? 0) + 1);
  }

  private letterContext(context: string): string {
    return (START.repeat(this.order) + normalizeWord(context)).slice(-this.order);
  }

  private letterTransitions(word: string): [string, string][] {
    const padded = START.repeat(this.order) + word + END;
    const result: [string, string][] = [];
    for (let i = this.order; i < padded.length; i++) {
      result.push([padded.slice(i - this.order, i), padded[i]]);
    }
    return result;
  }
}
