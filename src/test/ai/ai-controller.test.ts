import { afterEach, describe, it, expect, vi } from 'vitest';
import { createInitialState } from '@engine/state';
import { gameReducer } from '@engine/reducer';
import { Trie } from '@engine/dictionary/trie';
import { loadDictionary } from '@engine/dictionary/loader';
import type { GameState } from '@engine/types';
import { EnsembleCoordinator } from '@ai/ensemble/ensemble-coordinator';
import { chooseAIMove, clearCoordinatorCache, getCoordinator, observeMove } from '@ai/controller/ai-controller';
import { enumerateCandidates, playedWords, toAIView } from '@ai/action-enumerator';
import { runSelfPlay } from '@ai/training/self-play';
import { MODEL_KINDS } from '@ai/types';
import { MemoryModelStore } from '@ai/persistence/model-store';
import { S0, testConfig } from './fixtures';

const dictionary = new Trie(['CAT', 'DOG', 'GOD', 'ACT']);

function stateWith(shared: string[], rack0: string[], rack1: string[], maxTurns: number = 20): GameState {
  const base = gameReducer(createInitialState(['Ann', 'Bot'], 3, maxTurns), { type: 'START_GAME' }, dictionary);
  return {
    ...base,
    sharedLetters: shared,
    players: [
      { ...base.players[0], privateLetters: rack0 },
      { ...base.players[1], privateLetters: rack1 },
    ],
  };
}

function freshCoordinator(): EnsembleCoordinator {
  return new EnsembleCoordinator(testConfig({ mctsIterations: 10 }));
}

afterEach(() => {
  clearCoordinatorCache();
});

describe('enumerateCandidates', () => {
  it('lists dictionary words formable from shared and private letters', () => {
    const state = stateWith(['C', 'A', 'T', 'D'], ['O', 'G', 'X', 'Y', 'Z', 'Q'], ['E', 'E', 'E', 'E', 'E', 'E']);
    expect(enumerateCandidates(state, 0, dictionary)).toEqual(['ACT', 'CAT', 'DOG', 'GOD']);
    expect(enumerateCandidates(state, 1, dictionary)).toEqual(['ACT', 'CAT']);
  });

  it('is empty outside of play', () => {
    const state = createInitialState(['Ann', 'Bot'], 3);
    expect(enumerateCandidates(state, 0, dictionary)).toEqual([]);
  });
});

describe('toAIView', () => {
  it('shows the player its own rack and the accepted words so far', () => {
    const start = stateWith(['C', 'A', 'T', 'D'], ['O', 'G', 'X', 'Y', 'Z', 'Q'], ['E', 'E', 'E', 'E', 'E', 'E']);
    const afterMiss = gameReducer(start, { type: 'SUBMIT_WORD', player: 0, word: 'TAD' }, dictionary);
    const afterHit = gameReducer(afterMiss, { type: 'SUBMIT_WORD', player: 1, word: 'CAT' }, dictionary);

    expect(playedWords(afterHit)).toEqual(['CAT']);
    const view = toAIView(afterHit, 0);
    expect(view.sharedLetters).toEqual(['C', 'A', 'T', 'D']);
    expect(view.privateLetters).toEqual(['O', 'G', 'X', 'Y', 'Z', 'Q']);
    expect(view.turn).toBe(2);
    expect(view.recentWords).toEqual(['CAT']);
  });
});

describe('chooseAIMove', () => {
  it('submits one of the formable words', () => {
    const state = stateWith(['C', 'A', 'T', 'D'], ['E', 'E', 'E', 'E', 'E', 'E'], ['O', 'G', 'X', 'Y', 'Z', 'Q']);
    const move = chooseAIMove(state, 1, dictionary, freshCoordinator());
    expect(move.action.type).toBe('SUBMIT_WORD');
    expect(move.decision).not.toBeNull();
    if (move.action.type === 'SUBMIT_WORD') {
      expect(move.action.player).toBe(1);
      expect(['ACT', 'CAT', 'DOG', 'GOD']).toContain(move.action.word);
      expect(move.action.word).toBe(move.decision?.word);
    }
  });

  it('redraws when nothing is formable', () => {
    const state = stateWith(['E', 'I', 'N', 'S'], ['E', 'E', 'E', 'E', 'E', 'E'], ['X', 'Y', 'Z', 'Q', 'J', 'K']);
    expect(chooseAIMove(state, 1, dictionary, freshCoordinator())).toEqual({
      action: { type: 'REDRAW', player: 1 },
      decision: null,
    });
  });

  it('passes when the view cannot be encoded', () => {
    const state = stateWith(['C', 'A', 'T', '1'], ['E', 'E', 'E', 'E', 'E', 'E'], ['O', 'G', 'X', 'Y', 'Z', 'Q']);
    expect(chooseAIMove(state, 1, dictionary, freshCoordinator()).action).toEqual({ type: 'PASS', player: 1 });
  });
});

describe('observeMove', () => {
  it('feeds a submitted word back with the engine result', () => {
    const coordinator = freshCoordinator();
    const before = stateWith(['C', 'A', 'T', 'D'], ['O', 'G', 'X', 'Y', 'Z', 'Q'], ['E', 'E', 'E', 'E', 'E', 'E']);
    const after = gameReducer(before, { type: 'SUBMIT_WORD', player: 0, word: 'dog' }, dictionary);

    const report = observeMove(coordinator, before, after, 'g1');
    expect(report?.applied).toBe(true);
    const [record] = coordinator.pendingRecords('g1');
    expect(record.actual).toBe('DOG');
    expect(record.valid).toBe(true);
    expect(record.score).toBe(after.players[0].score);
    expect(record.turn).toBe(0);
    for (const kind of MODEL_KINDS) {
      expect(coordinator.models[kind].updates).toBe(1);
    }
  });

  it('feeds rejected words back as invalid', () => {
    const coordinator = freshCoordinator();
    const before = stateWith(['C', 'A', 'T', 'D'], ['O', 'G', 'X', 'Y', 'Z', 'Q'], ['E', 'E', 'E', 'E', 'E', 'E']);
    const after = gameReducer(before, { type: 'SUBMIT_WORD', player: 0, word: 'TOD' }, dictionary);

    observeMove(coordinator, before, after, 'g1');
    expect(coordinator.pendingRecords('g1').map((r) => [r.actual, r.valid, r.score])).toEqual([['TOD', false, 0]]);
  });

  it('ignores redraws and passes', () => {
    const coordinator = freshCoordinator();
    const before = stateWith(['C', 'A', 'T', 'D'], ['O', 'G', 'X', 'Y', 'Z', 'Q'], ['E', 'E', 'E', 'E', 'E', 'E']);
    const redrawn = gameReducer(before, { type: 'REDRAW', player: 0 }, dictionary);
    const passed = gameReducer(redrawn, { type: 'PASS', player: 1 }, dictionary);

    expect(observeMove(coordinator, before, redrawn, 'g1')).toBeNull();
    expect(observeMove(coordinator, redrawn, passed, 'g1')).toBeNull();
    expect(coordinator.models.qlearning.updates).toBe(0);
  });

  it('marks the move that ends the game as terminal', () => {
    const coordinator = freshCoordinator();
    const observe = vi.spyOn(coordinator, 'observe');
    const before = stateWith(['C', 'A', 'T', 'D'], ['O', 'G', 'X', 'Y', 'Z', 'Q'], ['E', 'E', 'E', 'E', 'E', 'E'], 1);
    const after = gameReducer(before, { type: 'SUBMIT_WORD', player: 0, word: 'CAT' }, dictionary);

    expect(after.phase).toBe('GAME_OVER');
    observeMove(coordinator, before, after, 'g1');
    expect(observe).toHaveBeenCalledWith(expect.objectContaining({ actual: 'CAT', nextView: null, gameId: 'g1' }));
  });
});

describe('getCoordinator', () => {
  it('keeps one coordinator per difficulty', () => {
    const easy = getCoordinator('easy');
    expect(getCoordinator('easy')).toBe(easy);
    expect(getCoordinator('hard')).not.toBe(easy);

    clearCoordinatorCache();
    expect(getCoordinator('easy')).not.toBe(easy);
  });

  it('refuses to share one store between difficulties', () => {
    const store = new MemoryModelStore();
    getCoordinator('easy', store);
    expect(() => getCoordinator('hard', store)).toThrow('Model store is already used by the easy coordinator');
  });

  it('opens a store per difficulty from a store source', () => {
    const stores = new Map<string, MemoryModelStore>();
    const source = vi.fn((difficulty: string) => {
      const store = new MemoryModelStore();
      stores.set(difficulty, store);
      return store;
    });

    getCoordinator('easy', source).observe({
      view: S0,
      nextView: null,
      actual: 'DOG',
      valid: true,
      score: 4,
    });
    getCoordinator('easy', source).checkpoint();
    getCoordinator('hard', source);

    expect(source.mock.calls.map(([d]) => d)).toEqual(['easy', 'hard']);
    expect(stores.get('easy')?.entries('qlearning')).toHaveLength(1);
    expect(stores.get('hard')?.entries('qlearning')).toEqual([]);
  });
});

describe('runSelfPlay', () => {
  it('plays full games and trains every model on each accepted word', () => {
    const coordinator = freshCoordinator();
    const report = runSelfPlay(coordinator, loadDictionary(), { games: 2, seed: 5, maxTurns: 6 });

    expect(report.games.map((g) => g.gameId)).toEqual(['selfplay-5', 'selfplay-6']);
    expect(report.games.map((g) => g.moves)).toEqual([6, 6]);
    expect(report.rejected).toBe(0);
    expect(report.passes).toBe(0);
    expect(report.accepted + report.redraws).toBe(12);
    for (const kind of MODEL_KINDS) {
      expect(coordinator.models[kind].updates).toBe(report.accepted);
    }
    expect(coordinator.pendingRecords('selfplay-5')).toEqual([]);
    expect(coordinator.stats().bufferedRecords).toBe(0);
  });

  it('keeps the training records when asked', () => {
    const coordinator = freshCoordinator();
    const report = runSelfPlay(coordinator, loadDictionary(), { games: 1, seed: 5, maxTurns: 4, keepRecords: true });
    // records were checkpointed to the store, so the buffer is empty but cleanup still finds them
    expect(coordinator.stats().bufferedRecords).toBe(0);
    expect(coordinator.cleanupGame('selfplay-5')).toBe(report.accepted);
  });
});
