/**
 * Models score candidates on different native scales (probabilities,
 * relative likelihoods, average rewards, Q-values). Before voting, each
 * model's scores are min-max normalised per decision to [0, 1]. A model that
 * scores every candidate the same has no preference and gets 0.5 everywhere.
 */
import type { CandidateScores } from '../types';

export const INDIFFERENT = 0.5;

/** Spreads below this fraction of the largest magnitude count as equal scores */
const RELATIVE_EPSILON = 1e-9;

export function minMaxNormalize(scores: CandidateScores, candidates: readonly string[]): Map<string, number> {
  const values = candidates.map((c) => scores.get(c)).filter((v): v is number => v !== undefined && Number.isFinite(v));
  if (values.length === 0) {
    return new Map(candidates.map((c) => [c, INDIFFERENT]));
  }

  const min = Math.min(...values);
  const max = Math.max(...values);
  const range = max - min > RELATIVE_EPSILON * Math.max(1, Math.abs(min), Math.abs(max)) ? max - min : 0;

  return new Map(
    candidates.map((c) => {
      const v = scores.get(c);
      if (v === undefined || !Number.isFinite(v)) return [c, 0];
      return [c, range > 0 ? (v - min) / range : INDIFFERENT];
    }),
  );
}

/** Softmax with temperature; stable for large inputs */
export function softmax(values: readonly number[], temperature: number): number[] {
  if (values.length === 0) return [];
  const max = Math.max(...values);
  const exps = values.map((v) => Math.exp((v - max) / temperature));
  const sum = exps.reduce((a, b) => a + b, 0);
  return exps.map((e) => e / sum);
}
