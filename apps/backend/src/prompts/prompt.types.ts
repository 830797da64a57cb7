import type { GradeTier, ProficiencyLevel } from './grade-tiers';
import { normalizeGenre, normalizeTopic } from './prompt-tags';

export type PromptRecord = Readonly<{
  id: string;
  title: string;
  prompt: string;
  gradeTier: GradeTier;
  level: ProficiencyLevel;
  genre: string;
  topic: string;
  requirements: readonly string[];
  keywords: readonly string[];
  embedding: readonly number[];
  minWords: number;
  maxWords: number;
}>;

/** Insertion input: bounds are derived from the tier, the embedding is computed when absent. */
export type PromptDraft = {
  id: string;
  title: string;
  prompt: string;
  gradeTier: GradeTier;
  level: ProficiencyLevel;
  genre: string;
  topic: string;
  requirements?: readonly string[];
  keywords?: readonly string[];
  embedding?: readonly number[];
};

export type EvaluationCriteria = Readonly<{
  gradeTier: GradeTier;
  level: ProficiencyLevel;
  genre?: string;
  topic?: string;
}>;

/**
 * Filter stages tried in order; each drops more constraints than the last.
 * The tier goes last because it carries the word-count expectations.
 */
export const RELAXATION_CHAIN = ['exact', 'genre-topic', 'level', 'tier'] as const;
export type RelaxationTier = (typeof RELAXATION_CHAIN)[number];

export type SearchHit = {
  record: PromptRecord;
  similarity: number | null;
};

export type CorpusSearchResult = {
  hits: SearchHit[];
  relaxation: RelaxationTier | null;
};

/**
 * Resolves genre and topic labels to their canonical tags. `search` applies it
 * again, so criteria built by hand filter the same way.
 */
export const createCriteria = (input: {
  gradeTier: GradeTier;
  level: ProficiencyLevel;
  genre?: string;
  topic?: string;
}): EvaluationCriteria => {
  const genre = normalizeGenre(input.genre);
  const topic = normalizeTopic(input.topic);
  return Object.freeze({
    gradeTier: input.gradeTier,
    level: input.level,
    ...(genre && { genre }),
    ...(topic && { topic }),
  });
};
