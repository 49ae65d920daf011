import { describe, it, expect } from 'vitest';
import { MCTSModel } from '@ai/models/mcts-model';
import type { SearchRoot } from '@ai/models/mcts-model';
import { MemoryModelStore } from '@ai/persistence/model-store';
import { NoCandidatesError } from '@ai/errors';
import { encodeState } from '@ai/encoding/state-encoder';
import { createPRNG } from '@engine/utils/random';
import { S0, signalFor, testConfig } from './fixtures';

const ROOT: SearchRoot = {
  stateHash: 'root',
  letters: 'CATALOGDOG'.split(''),
  candidates: ['CAT', 'GOAT', 'DOG', 'CATALOG'],
};

describe('MCTSModel search', () => {
  it('returns a legal word with a zero budget', () => {
    const mcts = new MCTSModel(testConfig());
    const result = mcts.chooseMove(ROOT, { iterations: 0 }, createPRNG(1));
    expect(ROOT.candidates).toContain(result.action);
    expect(result.fallback).toBe(true);
    expect(result.rollouts).toBe(0);
  });

  it('falls back when time runs out or the search is cancelled', () => {
    const mcts = new MCTSModel(testConfig());
    const timedOut = mcts.chooseMove(ROOT, { iterations: 100, timeMs: 0 }, createPRNG(1));
    expect(timedOut.fallback).toBe(true);
    expect(timedOut.interrupted).toBe(true);

    const controller = new AbortController();
    controller.abort();
    const cancelled = mcts.chooseMove(ROOT, { iterations: 100, timeMs: 10_000, signal: controller.signal }, createPRNG(1));
    expect(cancelled.fallback).toBe(true);
    expect(ROOT.candidates).toContain(cancelled.action);
  });

  it('throws when there is nothing to play', () => {
    const mcts = new MCTSModel(testConfig());
    expect(() => mcts.chooseMove({ ...ROOT, candidates: [] }, { iterations: 10 }, createPRNG(1))).toThrow(
      NoCandidatesError,
    );
  });

  it('never lowers the chosen average reward as the budget grows', () => {
    const mcts = new MCTSModel(testConfig({ mctsMaxDepth: 1, mctsRollout: 'greedy' }));
    const averages: number[] = [];
    for (let iterations = 1; iterations <= 8; iterations++) {
      averages.push(mcts.chooseMove(ROOT, { iterations, timeMs: 10_000 }, createPRNG(1)).averageReward);
    }
    // children expand in candidate order: CAT 3, GOAT 4, DOG 3, CATALOG 7
    expect(averages).toEqual([3, 4, 4, 7, 7, 7, 7, 7]);
  });

  it('values a word by what it leaves to play afterwards', () => {
    const mcts = new MCTSModel(testConfig({ mctsMaxDepth: 2, mctsRollout: 'greedy', discountFactor: 0.5 }));
    const result = mcts.chooseMove(
      { stateHash: 'r', letters: 'CATDOG'.split(''), candidates: ['CAT', 'DOG', 'GOAT'] },
      { iterations: 50, timeMs: 10_000 },
      createPRNG(1),
    );
    // CAT then DOG: 3 + 0.5 * 3; GOAT leaves only C and D: 4
    expect(result.children.get('CAT')?.averageReward).toBeCloseTo(4.5, 12);
    expect(result.children.get('GOAT')?.averageReward).toBeCloseTo(4, 12);
    expect(result.action).toBe('CAT');
    expect(result.fallback).toBe(false);
  });
});

describe('MCTSModel learning', () => {
  it('scores every candidate and reports full searches as complete', () => {
    const mcts = new MCTSModel(testConfig({ mctsIterations: 30 }));
    const suggestion = mcts.suggest({
      key: encodeState(S0),
      candidates: ['CAT', 'DOG'],
      rng: createPRNG(2),
      deadline: Date.now() + 10_000,
    });
    expect([...suggestion.scores.keys()]).toEqual(['CAT', 'DOG']);
    expect(suggestion.partial).toBe(false);
    expect(mcts.rollouts).toBe(30);
  });

  it('persists per-state aggregates and seeds later searches from them', () => {
    const store = new MemoryModelStore();
    const mcts = new MCTSModel(testConfig());
    const signal = signalFor(S0, 'dog', true, 9);
    mcts.learn(signal);
    mcts.learn(signal);
    mcts.checkpoint(store);
    expect(store.get('mcts', `${signal.key.hash}|DOG|visits`)).toBe(2);
    expect(store.get('mcts', `${signal.key.hash}|DOG|reward`)).toBe(18);

    const restored = new MCTSModel(testConfig());
    restored.load(store);
    expect(restored.stats().entries).toBe(1);

    // with no time to search, the seeded average is the score
    const suggestion = restored.suggest({
      key: signal.key,
      candidates: ['CAT', 'DOG'],
      rng: createPRNG(2),
      deadline: Date.now() - 1,
    });
    expect(suggestion.scores.get('DOG')).toBe(9);
    expect(suggestion.scores.get('CAT')).toBe(0);
    expect(suggestion.partial).toBe(true);
  });
});
