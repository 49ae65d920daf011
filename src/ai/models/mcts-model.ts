/**
 * Monte Carlo Tree Search over sequences of words playable from the
 * current letters.
 *
 * UCB1 selection: avg + C * sqrt(ln(N_parent) / N)
 * A node's value is the discounted score of the word sequence from the root,
 * so a root child's average reward estimates "play this word now, then keep
 * playing from what's left". The tree lives for one decision; persisted
 * per-(state, word) aggregates seed root children as prior visits.
 */
import type { PRNG } from '@engine/utils/random';
import { pick } from '@engine/utils/random';
import { scoreWord } from '@engine/rules/scoring';
import { assignLetters, normalizeWord } from '@engine/utils/letter-utils';
import type {
  DecisionContext,
  ModelStats,
  ModelSuggestion,
  StateKey,
  TrainingSignal,
  WordModel,
} from '../types';
import type { AIConfig } from '../config';
import type { ModelStore } from '../persistence/model-store';
import { joinKey, splitKey } from '../persistence/model-store';
import { BudgetExhaustedError, NoCandidatesError } from '../errors';
import { outcomeReward } from './model-utils';
import { createLogger } from '@shared/logger';

const log = createLogger('mcts');

export type RewardFunction = (word: string, repeatCount: number) => number;

export interface SearchBudget {
  iterations?: number;
  timeMs?: number;
  signal?: AbortSignal;
}

export interface SearchRoot {
  /** Hash used to look up persisted aggregates */
  stateHash: string;
  letters: readonly string[];
  candidates: readonly string[];
}

export interface ChildSummary {
  visits: number;
  averageReward: number;
}

export interface SearchResult {
  action: string;
  averageReward: number;
  visits: number;
  rollouts: number;
  /** No rollout completed; the action is a random legal one */
  fallback: boolean;
  /** Stopped by time or cancellation before the iteration budget ran out */
  interrupted: boolean;
  children: Map<string, ChildSummary>;
}

interface Aggregate {
  visits: number;
  total: number;
}

interface SearchNode {
  action: string | null;
  parent: SearchNode | null;
  depth: number;
  letters: string[];
  played: string[];
  /** Discounted reward of the words from the root to this node */
  pathReturn: number;
  children: Map<string, SearchNode>;
  untried: string[];
  visits: number;
  totalReward: number;
}

function removeWordLetters(letters: readonly string[], word: string): string[] {
  const result = [...letters];
  for (const l of word) {
    const idx = result.indexOf(l);
    if (idx !== -1) result.splice(idx, 1);
  }
  return result;
}

function formable(word: string, letters: readonly string[]): boolean {
  return assignLetters(word, letters, []) !== null;
}

function average(node: { visits: number; totalReward: number }): number {
  return node.visits > 0 ? node.totalReward / node.visits : 0;
}

/** Higher average reward, then more visits, then lexical order */
function outranks([a, x]: [string, ChildSummary], [b, y]: [string, ChildSummary]): boolean {
  if (x.averageReward !== y.averageReward) return x.averageReward > y.averageReward;
  if (x.visits !== y.visits) return x.visits > y.visits;
  return a < b;
}

export class MCTSModel implements WordModel {
  readonly kind = 'mcts' as const;
  private readonly config: AIConfig;
  private readonly reward: RewardFunction;
  private aggregates = new Map<string, Map<string, Aggregate>>();
  private pending = new Map<string, number>();
  private updateCount = 0;
  private rolloutCount = 0;

  constructor(config: AIConfig, reward: RewardFunction = scoreWord) {
    this.config = config;
    this.reward = reward;
  }

  get updates(): number {
    return this.updateCount;
  }

  get rollouts(): number {
    return this.rolloutCount;
  }

  /**
   * Search until the iteration budget, the time budget or the abort signal
   * runs out, then return the root child with the best average reward
   * (ties: more visits, then lexical).
   */
  chooseMove(root: SearchRoot, budget: SearchBudget, rng: PRNG): SearchResult {
    const candidates = [...new Set(root.candidates.map(normalizeWord))];
    if (candidates.length === 0) {
      throw new NoCandidatesError('MCTS needs at least one legal word');
    }

    const maxIterations = budget.iterations ?? this.config.mctsIterations;
    const deadline = Date.now() + (budget.timeMs ?? this.config.mctsTimeBudgetMs);
    const rootNode = this.createNode(null, null, [...root.letters].map((l) => l.toUpperCase()), candidates);
    rootNode.untried = candidates;
    const seeds = this.aggregates.get(root.stateHash);

    let rollouts = 0;
    let interrupted = false;
    while (rollouts < maxIterations) {
      if (budget.signal?.aborted || Date.now() >= deadline) {
        interrupted = true;
        break;
      }

      let node = this.select(rootNode);
      if (node.untried.length > 0 && node.depth < this.config.mctsMaxDepth) {
        node = this.expand(node, candidates, node === rootNode ? seeds : undefined);
      }
      const value = this.rollout(node, candidates, rng);
      this.backpropagate(node, value);
      rollouts++;
    }
    this.rolloutCount += rollouts;

    const children = new Map<string, ChildSummary>();
    for (const [action, child] of rootNode.children) {
      children.set(action, { visits: child.visits, averageReward: average(child) });
    }

    if (rollouts === 0) {
      const action = pick(candidates, rng);
      log.warn(
        { err: new BudgetExhaustedError(), stateHash: root.stateHash, action },
        'No rollouts completed, falling back to a random legal word',
      );
      return { action, averageReward: 0, visits: 0, rollouts, fallback: true, interrupted, children };
    }

    let best: [string, ChildSummary] | null = null;
    for (const entry of children) {
      if (best === null || outranks(entry, best)) best = entry;
    }
    if (best === null) {
      const action = pick(candidates, rng);
      return { action, averageReward: 0, visits: 0, rollouts, fallback: true, interrupted, children };
    }

    const [action, summary] = best;
    return {
      action,
      averageReward: summary.averageReward,
      visits: summary.visits,
      rollouts,
      fallback: false,
      interrupted,
      children,
    };
  }

  suggest(ctx: DecisionContext): ModelSuggestion {
    const result = this.chooseMove(
      this.rootFor(ctx.key, ctx.candidates),
      {
        iterations: this.config.mctsIterations,
        timeMs: Math.max(0, Math.min(this.config.mctsTimeBudgetMs, ctx.deadline - Date.now())),
        signal: ctx.signal,
      },
      ctx.rng,
    );

    const seeds = this.aggregates.get(ctx.key.hash);
    const scores = new Map<string, number>();
    for (const c of ctx.candidates) {
      const child = result.children.get(c);
      const seed = seeds?.get(c);
      if (child && child.visits > 0) scores.set(c, child.averageReward);
      else if (seed && seed.visits > 0) scores.set(c, seed.total / seed.visits);
      else scores.set(c, 0);
    }

    return {
      kind: this.kind,
      scores,
      best: result.action,
      confidence: result.averageReward,
      partial: result.fallback || result.interrupted,
    };
  }

  learn(signal: TrainingSignal): void {
    this.updateCount++;
    const reward = outcomeReward(signal, this.config, log);
    const word = normalizeWord(signal.actual);
    if (!/^[A-Z]+$/.test(word)) {
      log.warn({ word: signal.actual }, 'Ignoring malformed word in training signal');
      return;
    }
    this.addAggregate(signal.key.hash, word, 1, reward);
    this.addPending(joinKey(signal.key.hash, word, 'visits'), 1);
    this.addPending(joinKey(signal.key.hash, word, 'reward'), reward);
  }

  load(store: ModelStore): void {
    this.aggregates.clear();
    this.pending.clear();
    for (const [key, value] of store.entries('mcts')) {
      const [state, action, field] = splitKey(key);
      if (typeof value !== 'number' || !Number.isFinite(value) || action === undefined) {
        log.warn({ key }, 'Skipping malformed mcts entry');
        continue;
      }
      if (field === 'visits') this.addAggregate(state, action, value, 0);
      else if (field === 'reward') this.addAggregate(state, action, 0, value);
    }
  }

  checkpoint(store: ModelStore): void {
    for (const [key, delta] of [...this.pending]) {
      store.increment('mcts', key, delta);
      this.pending.delete(key);
    }
  }

  stats(): ModelStats {
    let entries = 0;
    for (const row of this.aggregates.values()) entries += row.size;
    return { kind: this.kind, entries, updates: this.updateCount };
  }

  private rootFor(key: StateKey, candidates: readonly string[]): SearchRoot {
    return { stateHash: key.hash, letters: [...key.letters], candidates };
  }

  private createNode(
    parent: SearchNode | null,
    action: string | null,
    letters: string[],
    candidates: readonly string[],
  ): SearchNode {
    const played = parent && action ? [...parent.played, action] : [];
    const depth = parent ? parent.depth + 1 : 0;
    let pathReturn = parent?.pathReturn ?? 0;
    if (parent && action) {
      const repeats = parent.played.filter((w) => w === action).length;
      pathReturn += Math.pow(this.config.discountFactor, parent.depth) * this.reward(action, repeats);
    }
    return {
      action,
      parent,
      depth,
      letters,
      played,
      pathReturn,
      children: new Map(),
      untried: candidates.filter((c) => formable(c, letters)),
      visits: 0,
      totalReward: 0,
    };
  }

  private select(root: SearchNode): SearchNode {
    let node = root;
    while (node.untried.length === 0 && node.children.size > 0 && node.depth < this.config.mctsMaxDepth) {
      let best: SearchNode | null = null;
      let bestScore = -Infinity;
      for (const child of node.children.values()) {
        const score = this.ucb(child, node.visits);
        if (score > bestScore) {
          best = child;
          bestScore = score;
        }
      }
      if (!best) break;
      node = best;
    }
    return node;
  }

  private ucb(child: SearchNode, parentVisits: number): number {
    if (child.visits === 0) return Infinity;
    const exploration = this.config.mctsExploration * Math.sqrt(Math.log(Math.max(1, parentVisits)) / child.visits);
    return average(child) + exploration;
  }

  private expand(node: SearchNode, candidates: readonly string[], seeds?: Map<string, Aggregate>): SearchNode {
    const action = node.untried.shift();
    if (action === undefined) return node;

    const child = this.createNode(node, action, removeWordLetters(node.letters, action), candidates);
    const seed = seeds?.get(action);
    if (seed && seed.visits > 0 && this.config.mctsSeedCap > 0) {
      const prior = Math.min(seed.visits, this.config.mctsSeedCap);
      child.visits = prior;
      child.totalReward = (seed.total / seed.visits) * prior;
      node.visits += prior;
      node.totalReward += child.totalReward;
    }
    node.children.set(action, child);
    return child;
  }

  /** Continue from the node with random or greedy plays until the depth bound */
  private rollout(node: SearchNode, candidates: readonly string[], rng: PRNG): number {
    let value = node.pathReturn;
    let letters = node.letters;
    const played = [...node.played];

    for (let depth = node.depth; depth < this.config.mctsMaxDepth; depth++) {
      const options = candidates.filter((c) => formable(c, letters));
      if (options.length === 0) break;

      const repeatsOf = (w: string): number => played.filter((p) => p === w).length;
      let word: string;
      if (this.config.mctsRollout === 'greedy') {
        word = options.reduce((best, w) => {
          const d = this.reward(w, repeatsOf(w)) - this.reward(best, repeatsOf(best));
          return d > 0 || (d === 0 && w < best) ? w : best;
        });
      } else {
        word = pick(options, rng);
      }

      value += Math.pow(this.config.discountFactor, depth) * this.reward(word, repeatsOf(word));
      letters = removeWordLetters(letters, word);
      played.push(word);
    }
    return value;
  }

  private backpropagate(node: SearchNode, value: number): void {
    let current: SearchNode | null = node;
    while (current) {
      current.visits++;
      current.totalReward += value;
      current = current.parent;
    }
  }

  private addAggregate(state: string, action: string, visits: number, total: number): void {
    let row = this.aggregates.get(state);
    if (!row) {
      row = new Map();
      this.aggregates.set(state, row);
    }
    const a = row.get(action) ?? { visits: 0, total: 0 };
    row.set(action, { visits: a.visits + visits, total: a.total + total });
  }

  private addPending(key: string, delta: number): void {
    this.pending.set(key, (this.pending.get(key) ?? 0) + delta);
  }
}
