import { Injectable, Logger } from '@nestjs/common';
import { EmbeddingError } from '../embeddings';
import type { GradeTier, ProficiencyLevel } from './grade-tiers';
import { PromptCorpusService } from './prompt-corpus.service';
import { compareIds } from './similarity';
import { normalizeTopic } from './prompt-tags';
import {
  createCriteria,
  type CorpusSearchResult,
  type EvaluationCriteria,
  type PromptRecord,
  type RelaxationTier,
} from './prompt.types';

export const NO_MATCH = Symbol('NO_MATCH');

export type RetrievalRequest = {
  gradeTier: GradeTier;
  level: ProficiencyLevel;
  genre?: string;
  topic?: string;
  /** Free-text query; a synthetic one is built from the criteria when absent. */
  query?: string;
  /** How many ranked candidates to consider; the first is the match. */
  k?: number;
  signal?: AbortSignal;
};

export type RetrievalMatch = {
  kind: 'match';
  prompt: PromptRecord;
  similarity: number | null;
  relaxation: RelaxationTier;
  alternatives: PromptRecord[];
  criteria: EvaluationCriteria;
};

export type RetrievalOutcome = RetrievalMatch | typeof NO_MATCH;

export type RecommendationRequest = {
  gradeTier: GradeTier;
  level: ProficiencyLevel;
  /** Topics the learner practised lately; prompts on them are skipped. */
  recentTopics?: readonly string[];
  limit?: number;
};

export const DEFAULT_RECOMMENDATION_LIMIT = 5;
/** Below this many same-tier prompts, other tiers at the same level fill in. */
export const MIN_SAME_TIER_RECOMMENDATIONS = 3;

export const buildSyntheticQuery = (criteria: EvaluationCriteria): string => {
  const parts: string[] = [];
  if (criteria.genre) {
    parts.push(`${criteria.genre} essay`);
  }
  if (criteria.topic) {
    parts.push(criteria.topic);
  }
  if (!parts.length) {
    parts.push('english essay');
  }
  parts.push(`${criteria.level} level`);
  return parts.join(' ');
};

@Injectable()
export class RetrievalService {
  private readonly logger = new Logger(RetrievalService.name);

  constructor(private readonly corpus: PromptCorpusService) {}

  async select(request: RetrievalRequest): Promise<RetrievalOutcome> {
    const criteria = createCriteria(request);
    const query = request.query?.trim() || buildSyntheticQuery(criteria);
    const k = Math.max(1, request.k ?? 3);

    const result = await this.searchWithFallback(criteria, query, k, request.signal);
    const [best, ...rest] = result.hits;
    if (!best || !result.relaxation) {
      this.logger.warn(
        `No prompt for tier=${criteria.gradeTier} level=${criteria.level} (corpus size ${this.corpus.count()})`,
      );
      return NO_MATCH;
    }

    if (result.relaxation !== 'exact') {
      this.logger.log(`Prompt ${best.record.id} selected after relaxing to "${result.relaxation}"`);
    }

    return {
      kind: 'match',
      prompt: best.record,
      similarity: best.similarity,
      relaxation: result.relaxation,
      alternatives: rest.map((hit) => hit.record),
      criteria,
    };
  }

  /**
   * Practice suggestions in identifier order: prompts for the learner's tier
   * and level first, topped up from other tiers at the same level when fewer
   * than three are found. Recently practised topics are skipped in both passes.
   */
  recommend(request: RecommendationRequest): PromptRecord[] {
    const limit = Math.max(1, Math.floor(request.limit ?? DEFAULT_RECOMMENDATION_LIMIT));
    const recent = new Set((request.recentTopics ?? []).flatMap((topic) => normalizeTopic(topic) ?? []));
    const candidates = this.corpus
      .getAll()
      .filter((record) => record.level === request.level && !recent.has(record.topic))
      .sort((a, b) => compareIds(a.id, b.id));

    const picked = candidates.filter((record) => record.gradeTier === request.gradeTier).slice(0, limit);
    if (picked.length < MIN_SAME_TIER_RECOMMENDATIONS) {
      const others = candidates.filter((record) => record.gradeTier !== request.gradeTier);
      picked.push(...others.slice(0, limit - picked.length));
    }
    return picked;
  }

  /**
   * Similarity only orders candidates that already passed the filters, so an
   * unreachable embedding service costs ranking quality, not the answer.
   */
  private async searchWithFallback(
    criteria: EvaluationCriteria,
    query: string,
    k: number,
    signal?: AbortSignal,
  ): Promise<CorpusSearchResult> {
    try {
      return await this.corpus.search(criteria, query, k, { signal });
    } catch (error) {
      if (!(error instanceof EmbeddingError) || signal?.aborted) {
        throw error;
      }
      this.logger.warn(`Query embedding failed, ranking by identifier: ${error.message}`);
      return this.corpus.search(criteria, undefined, k);
    }
  }
}
