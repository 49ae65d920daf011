/**
 * AI configuration: one frozen object, validated once at construction time.
 */
import { z } from 'zod';
import type { AIDifficulty } from './types';

export const aiConfigSchema = z.object({
  learningRate: z.number().gt(0).max(1).default(0.1),
  explorationRate: z.number().min(0).max(1).default(0.1),
  discountFactor: z.number().min(0).lt(1).default(0.9),
  /** Additive smoothing constant shared by the Markov and Bayes models */
  smoothing: z.number().gt(0).default(1),

  mctsTimeBudgetMs: z.number().int().min(0).default(200),
  mctsIterations: z.number().int().min(0).default(400),
  mctsMaxDepth: z.number().int().min(1).default(3),
  mctsExploration: z.number().min(0).default(Math.SQRT2),
  mctsRollout: z.enum(['random', 'greedy']).default('random'),
  /** Cap on prior visits a persisted aggregate may contribute to a root child */
  mctsSeedCap: z.number().int().min(0).default(5),

  markovOrder: z.number().int().min(1).max(4).default(2),
  historyWindow: z.number().int().min(0).default(3),

  tieBreak: z.enum(['lexical', 'candidate-order', 'random']).default('lexical'),
  leadBonus: z.number().min(0).default(0.15),
  weightTemperature: z.number().gt(0).default(5),

  rewardClamp: z.number().gt(0).default(100),
  invalidPenalty: z.number().min(0).default(5),
  highScoreThreshold: z.number().min(0).default(6),

  turnTimeLimitMs: z.number().int().min(1).default(1000),
  seed: z.number().int().default(1),
});

export type AIConfig = Readonly<z.infer<typeof aiConfigSchema>>;
export type AIConfigInput = z.input<typeof aiConfigSchema>;

export const DIFFICULTY_PRESETS: Record<AIDifficulty, AIConfigInput> = {
  easy: { explorationRate: 0.35, mctsIterations: 60, mctsTimeBudgetMs: 50, mctsMaxDepth: 1 },
  medium: {},
  // each model gets a quarter of the turn; the search budget must fit in it
  hard: {
    explorationRate: 0.02,
    mctsIterations: 1500,
    mctsTimeBudgetMs: 500,
    mctsRollout: 'greedy',
    turnTimeLimitMs: 2400,
  },
};

export function createAIConfig(overrides: AIConfigInput = {}): AIConfig {
  return Object.freeze(aiConfigSchema.parse(overrides));
}

export function configForDifficulty(difficulty: AIDifficulty, overrides: AIConfigInput = {}): AIConfig {
  return createAIConfig({ ...DIFFICULTY_PRESETS[difficulty], ...overrides });
}
