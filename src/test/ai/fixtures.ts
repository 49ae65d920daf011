import { createAIConfig } from '@ai/config';
import type { AIConfig, AIConfigInput } from '@ai/config';
import { encodeState } from '@ai/encoding/state-encoder';
import type { AIView, TrainingSignal } from '@ai/types';
import type { PRNG } from '@engine/utils/random';

/** Small deterministic budgets unless a test asks otherwise */
export function testConfig(overrides: AIConfigInput = {}): AIConfig {
  return createAIConfig({
    explorationRate: 0,
    mctsIterations: 40,
    mctsTimeBudgetMs: 5_000,
    turnTimeLimitMs: 20_000,
    ...overrides,
  });
}

export function viewOf(
  shared: string[],
  privateLetters: string[],
  turn: number = 0,
  recentWords: string[] = [],
): AIView {
  return { sharedLetters: shared, privateLetters, turn, recentWords };
}

/** The S0 situation: CAT and DOG are both formable */
export const S0 = viewOf(['C', 'A', 'T', 'D'], ['O', 'G', 'X', 'Y', 'Z', 'Q']);

export function signalFor(
  view: AIView,
  actual: string,
  valid: boolean,
  score: number,
  nextView: AIView | null = null,
): TrainingSignal {
  return {
    key: encodeState(view),
    nextKey: nextView ? encodeState(nextView) : null,
    actual,
    predicted: null,
    valid,
    score,
  };
}

/** A PRNG that fails the test if anything draws from it */
export const forbiddenRng: PRNG = {
  seed: 0,
  next: () => {
    throw new Error('rng must not be used');
  },
  nextInt: () => {
    throw new Error('rng must not be used');
  },
};
