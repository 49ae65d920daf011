/**
 * Tabular Q-learning value function over (state, action) pairs.
 * Q-values change only through the Bellman update; visit counts only grow.
 */
import { z } from 'zod';
import type { PRNG } from '@engine/utils/random';
import type { AIConfig } from '../config';
import type { ModelStore, StoreNamespace } from '../persistence/model-store';
import { joinKey, splitKey } from '../persistence/model-store';
import { NoCandidatesError } from '../errors';
import { createLogger } from '@shared/logger';

const log = createLogger('q-table');

export interface QEntry {
  q: number;
  visits: number;
  /** Sum of every reward received for this pair */
  reward: number;
}

const qEntrySchema = z.object({
  q: z.number(),
  visits: z.number().int().min(0),
  reward: z.number(),
});

export class QTable {
  readonly namespace: StoreNamespace;
  private readonly config: AIConfig;
  private table = new Map<string, Map<string, QEntry>>();
  private dirty = new Set<string>();
  private removed = new Set<string>();
  /** Entry as last read from or written to the store, per key */
  private persisted = new Map<string, QEntry>();
  private updateCount = 0;

  constructor(config: AIConfig, namespace: StoreNamespace) {
    this.config = config;
    this.namespace = namespace;
  }

  get updates(): number {
    return this.updateCount;
  }

  get size(): number {
    let n = 0;
    for (const row of this.table.values()) n += row.size;
    return n;
  }

  entry(state: string, action: string): QEntry | null {
    const e = this.table.get(state)?.get(action);
    return e ? { ...e } : null;
  }

  qValue(state: string, action: string): number {
    return this.table.get(state)?.get(action)?.q ?? 0;
  }

  visits(state: string, action: string): number {
    return this.table.get(state)?.get(action)?.visits ?? 0;
  }

  /** Best Q-value recorded for a state; 0 for an unseen state */
  maxQ(state: string | null): number {
    if (state === null) return 0;
    const row = this.table.get(state);
    if (!row || row.size === 0) return 0;
    let max = -Infinity;
    for (const e of row.values()) max = Math.max(max, e.q);
    return max;
  }

  /**
   * Q(s,a) <- Q(s,a) + alpha * (r + gamma * max Q(s',.) - Q(s,a)).
   * A null next state is terminal.
   */
  update(state: string, action: string, reward: number, nextState: string | null): number {
    return this.apply(state, action, this.sanitizeReward(reward, action), this.maxQ(nextState));
  }

  /** Update several actions of one state against the same pre-update max Q(s',.) */
  updateBatch(state: string, rewards: ReadonlyMap<string, number>, nextState: string | null): void {
    const maxNext = this.maxQ(nextState);
    for (const [action, reward] of rewards) {
      this.apply(state, action, this.sanitizeReward(reward, action), maxNext);
    }
  }

  /**
   * Epsilon-greedy choice. Exploitation takes the highest Q-value, ties going to the
   * more visited action, then lexical order. No randomness is drawn when epsilon is 0.
   */
  selectAction(state: string, candidates: readonly string[], epsilon: number, rng: PRNG): string {
    if (candidates.length === 0) {
      throw new NoCandidatesError(`No actions to select from in state ${state}`);
    }
    if (epsilon > 0 && rng.next() < epsilon) {
      return candidates[rng.nextInt(0, candidates.length - 1)];
    }

    let best = candidates[0];
    for (const action of candidates.slice(1)) {
      const dq = this.qValue(state, action) - this.qValue(state, best);
      const dv = this.visits(state, action) - this.visits(state, best);
      if (dq > 0 || (dq === 0 && (dv > 0 || (dv === 0 && action < best)))) {
        best = action;
      }
    }
    return best;
  }

  /** Drop entries visited fewer than minVisits times; returns how many went */
  prune(minVisits: number): number {
    let count = 0;
    for (const [state, row] of this.table) {
      for (const [action, e] of row) {
        if (e.visits < minVisits) {
          row.delete(action);
          const key = joinKey(state, action);
          this.dirty.delete(key);
          this.persisted.delete(key);
          this.removed.add(key);
          count++;
        }
      }
      if (row.size === 0) this.table.delete(state);
    }
    return count;
  }

  load(store: ModelStore): void {
    this.table.clear();
    this.dirty.clear();
    this.removed.clear();
    this.persisted.clear();
    for (const [key, value] of store.entries(this.namespace)) {
      const parsed = qEntrySchema.safeParse(value);
      const [state, action] = splitKey(key);
      if (!parsed.success || state === undefined || action === undefined) {
        log.warn({ key, namespace: this.namespace }, 'Skipping malformed Q entry');
        continue;
      }
      this.row(state).set(action, parsed.data);
      this.persisted.set(key, parsed.data);
    }
  }

  /**
   * Write dirty entries. Visits and reward sums are merged as deltas into
   * what the store holds now, so tables sharing a store never lose counts;
   * the Q-value is the last writer's.
   */
  checkpoint(store: ModelStore): void {
    for (const key of [...this.removed]) {
      store.remove(this.namespace, key);
      this.removed.delete(key);
    }
    for (const key of [...this.dirty]) {
      this.dirty.delete(key);
      const [state, action] = splitKey(key);
      const row = this.table.get(state);
      const e = row?.get(action);
      if (!row || !e) continue;

      const base = this.persisted.get(key) ?? { q: 0, visits: 0, reward: 0 };
      const stored = qEntrySchema.safeParse(store.get(this.namespace, key));
      const current = stored.success ? stored.data : { q: 0, visits: 0, reward: 0 };
      const merged: QEntry = {
        q: e.q,
        visits: current.visits + e.visits - base.visits,
        reward: current.reward + e.reward - base.reward,
      };
      store.put(this.namespace, key, { q: merged.q, visits: merged.visits, reward: merged.reward });
      row.set(action, merged);
      this.persisted.set(key, merged);
    }
  }

  /** Checkpoint, then copy the persisted table into a named backup */
  backup(store: ModelStore, name: string): void {
    this.checkpoint(store);
    store.snapshot(this.namespace, name);
    log.info({ namespace: this.namespace, name, entries: this.size }, 'Backed up Q-table');
  }

  /** Replace the persisted and live tables with a named backup */
  restore(store: ModelStore, name: string): void {
    store.restore(this.namespace, name);
    this.load(store);
    log.info({ namespace: this.namespace, name, entries: this.size }, 'Restored Q-table');
  }

  private apply(state: string, action: string, reward: number, maxNext: number): number {
    const row = this.row(state);
    const e = row.get(action) ?? { q: 0, visits: 0, reward: 0 };
    const { learningRate: alpha, discountFactor: gamma } = this.config;
    const q = e.q + alpha * (reward + gamma * maxNext - e.q);
    row.set(action, { q, visits: e.visits + 1, reward: e.reward + reward });
    this.dirty.add(joinKey(state, action));
    this.removed.delete(joinKey(state, action));
    this.updateCount++;
    return q;
  }

  private sanitizeReward(reward: number, action: string): number {
    if (!Number.isFinite(reward)) {
      log.warn({ action, reward }, 'Non-finite reward, using 0');
      return 0;
    }
    const clamp = this.config.rewardClamp;
    if (Math.abs(reward) > clamp) {
      log.warn({ action, reward, clamp }, 'Reward outside clamp range');
      return Math.max(-clamp, Math.min(clamp, reward));
    }
    return reward;
  }

  private row(state: string): Map<string, QEntry> {
    let row = this.table.get(state);
    if (!row) {
      row = new Map();
      this.table.set(state, row);
    }
    return row;
  }
}
