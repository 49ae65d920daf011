import type { Logger } from 'pino';
import type { CandidateScores, ModelKind, ModelSuggestion, TrainingSignal } from '../types';
import type { AIConfig } from '../config';

/** Highest score wins; ties go to the lexically smaller word */
export function bestCandidate(scores: CandidateScores): string | null {
  let best: string | null = null;
  let bestScore = -Infinity;
  for (const [word, score] of scores) {
    if (score > bestScore || (score === bestScore && best !== null && word < best)) {
      best = word;
      bestScore = score;
    }
  }
  return best;
}

export function toSuggestion(kind: ModelKind, scores: CandidateScores, partial: boolean = false): ModelSuggestion {
  const best = bestCandidate(scores);
  return {
    kind,
    scores,
    best,
    confidence: best === null ? 0 : scores.get(best) ?? 0,
    partial,
  };
}

/**
 * Reward for a training signal: the move score for accepted words, a fixed
 * penalty for rejected ones. Malformed scores are clamped and logged.
 */
export function outcomeReward(signal: TrainingSignal, config: AIConfig, log: Logger): number {
  if (!signal.valid) return -config.invalidPenalty;

  let score = signal.score;
  if (!Number.isFinite(score)) {
    log.warn({ word: signal.actual, score }, 'Non-finite score in training signal, using 0');
    return 0;
  }
  if (score < 0) {
    log.warn({ word: signal.actual, score }, 'Negative score for an accepted word, clamping to 0');
    score = 0;
  }
  if (score > config.rewardClamp) {
    log.warn({ word: signal.actual, score, clamp: config.rewardClamp }, 'Score above reward clamp');
    score = config.rewardClamp;
  }
  return score;
}

export function readCount(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : null;
}
