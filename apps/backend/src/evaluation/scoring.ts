import { DIMENSIONS, DIMENSION_CEILINGS, type Dimension } from '../judgment/dimensions';
import type { RubricWeights } from './rubric-weights';

export const roundToTenth = (value: number) => Math.round(value * 10) / 10;

export const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

/** Deduction applied to a judged grammar score for the checker's findings. */
export const patternPenalty = (issueCount: number): number => {
  if (issueCount > 10) {
    return 8;
  }
  if (issueCount > 5) {
    return 5;
  }
  if (issueCount > 2) {
    return 3;
  }
  return 0;
};

export const judgedGrammarScore = (judged: number, issueCount: number) =>
  clamp(judged - patternPenalty(issueCount), 0, DIMENSION_CEILINGS.grammar);

export const degradedGrammarScore = (issueCount: number, penaltyPerIssue: number) => {
  const ceiling = DIMENSION_CEILINGS.grammar;
  return ceiling - Math.min(ceiling, issueCount * penaltyPerIssue);
};

export const diversityAdjustment = (diversity: number): number => {
  if (diversity < 0.3) {
    return -5;
  }
  if (diversity > 0.6) {
    return 3;
  }
  return 0;
};

export const judgedVocabularyScore = (judged: number, diversity: number) =>
  clamp(judged + diversityAdjustment(diversity), 0, DIMENSION_CEILINGS.vocabulary);

export const degradedVocabularyScore = (diversity: number) =>
  roundToTenth(DIMENSION_CEILINGS.vocabulary * clamp(diversity, 0, 1));

/**
 * Weighted share of each available dimension's ceiling, scaled to 0-100.
 * Weights are renormalized over the dimensions that have a score; with all
 * three present this is the plain weighted sum.
 */
export const computeOverallScore = (
  scores: Readonly<Record<Dimension, number | null>>,
  weights: RubricWeights,
): number => {
  let weighted = 0;
  let availableWeight = 0;
  for (const dimension of DIMENSIONS) {
    const score = scores[dimension];
    const ceiling = DIMENSION_CEILINGS[dimension];
    if (score === null) {
      continue;
    }
    const weight = weights.weightOf(dimension);
    weighted += (score / ceiling) * weight;
    availableWeight += weight;
  }

  if (availableWeight <= 0) {
    return 0;
  }
  return roundToTenth((weighted / availableWeight) * 100);
};
