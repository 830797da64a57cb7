import { Injectable, Logger } from '@nestjs/common';
import { BaseAppError } from '../common/errors';
import { EvaluationFailedError, InvalidInputError } from '../evaluation/evaluation.errors';
import type { EssayPrompt, EvaluateOptions, GradingResult } from '../evaluation/evaluation.types';
import { EvaluationPipelineService } from '../evaluation/evaluation-pipeline.service';
import { GradingConfigService } from '../evaluation/grading-config.service';
import { RubricWeights, type RubricWeightsInput } from '../evaluation/rubric-weights';
import { wordBoundsFor } from '../prompts/grade-tiers';
import { PromptCorpusService } from '../prompts/prompt-corpus.service';
import {
  createCriteria,
  type EvaluationCriteria,
  type PromptRecord,
  type RelaxationTier,
} from '../prompts/prompt.types';
import { NoMatchError, PromptNotFoundError } from '../prompts/prompts.errors';
import {
  NO_MATCH,
  RetrievalService,
  type RecommendationRequest,
  type RetrievalRequest,
} from '../prompts/retrieval.service';

export type PromptFound = {
  status: 'found';
  prompt: PromptRecord;
  relaxation: RelaxationTier;
  similarity: number | null;
  alternatives: PromptRecord[];
};

export type PromptNoMatch = {
  status: 'no-match';
  criteria: EvaluationCriteria;
};

export type SelectPromptOutcome = PromptFound | PromptNoMatch;

export type GradeEssayOutcome = {
  status: 'graded';
  result: GradingResult;
};

export type PromptReference = {
  promptId?: string;
  prompt?: Omit<EssayPrompt, 'requirements' | 'keywords' | 'id'> & {
    requirements?: readonly string[];
    keywords?: readonly string[];
  };
};

export type WeightsOverride = Pick<RubricWeightsInput, 'grammar' | 'vocabulary' | 'content'> &
  Partial<Pick<RubricWeightsInput, 'minWords' | 'maxWords'>>;

/**
 * Entry point for callers: picks a prompt, grades an essay against it. Holds
 * no state of its own; failures come back as classified application errors.
 */
@Injectable()
export class WorkflowCoordinatorService {
  private readonly logger = new Logger(WorkflowCoordinatorService.name);

  constructor(
    private readonly retrieval: RetrievalService,
    private readonly corpus: PromptCorpusService,
    private readonly pipeline: EvaluationPipelineService,
    private readonly gradingConfig: GradingConfigService,
  ) {}

  async selectPrompt(request: RetrievalRequest): Promise<SelectPromptOutcome> {
    const outcome = await this.retrieval.select(request);
    if (outcome === NO_MATCH) {
      return {
        status: 'no-match',
        criteria: createCriteria(request),
      };
    }
    return {
      status: 'found',
      prompt: outcome.prompt,
      relaxation: outcome.relaxation,
      similarity: outcome.similarity,
      alternatives: outcome.alternatives,
    };
  }

  recommendPrompts(request: RecommendationRequest): PromptRecord[] {
    const recommendations = this.retrieval.recommend(request);
    this.logger.log(
      `Recommended ${recommendations.length} prompt(s) for tier=${request.gradeTier} level=${request.level}`,
    );
    return recommendations;
  }

  requireMatch(outcome: SelectPromptOutcome): PromptFound {
    if (outcome.status === 'no-match') {
      throw new NoMatchError(outcome.criteria);
    }
    return outcome;
  }

  async gradeEssay(
    essay: string,
    prompt: EssayPrompt | null | undefined,
    weights?: RubricWeights,
    options: EvaluateOptions = {},
  ): Promise<GradeEssayOutcome> {
    if (typeof essay !== 'string' || !essay.trim()) {
      throw new InvalidInputError('Essay text is empty');
    }
    if (!prompt) {
      throw new InvalidInputError('A prompt is required to grade an essay');
    }

    const effectiveWeights = weights ?? this.gradingConfig.weightsFor(prompt);
    const startedAt = Date.now();
    try {
      const result = await this.pipeline.evaluate(essay, prompt, effectiveWeights, options);
      this.logger.log(
        `Graded essay for prompt ${prompt.id ?? '(inline)'}: ${result.overallScore} in ${Date.now() - startedAt}ms` +
          (result.degraded ? ' (degraded)' : ''),
      );
      return { status: 'graded', result };
    } catch (error) {
      if (error instanceof BaseAppError) {
        throw error;
      }
      this.logger.error(
        'Unexpected evaluation failure',
        error instanceof Error ? error.stack : String(error),
      );
      throw new EvaluationFailedError('Evaluation failed unexpectedly', error);
    }
  }

  /** A stored prompt by id, or an inline prompt with defaults filled in. */
  resolvePrompt(reference: PromptReference): EssayPrompt {
    if (reference.promptId) {
      const record = this.corpus.findById(reference.promptId);
      if (!record) {
        throw new PromptNotFoundError(reference.promptId);
      }
      return record;
    }
    if (reference.prompt) {
      return {
        ...reference.prompt,
        requirements: reference.prompt.requirements ?? [],
        keywords: reference.prompt.keywords ?? [],
      };
    }
    throw new InvalidInputError('Provide either promptId or an inline prompt');
  }

  /** Caller-supplied weights; word bounds default to the prompt tier's. */
  buildWeights(override: WeightsOverride, prompt: EssayPrompt): RubricWeights {
    const bounds = wordBoundsFor(prompt.gradeTier);
    return RubricWeights.create({
      grammar: override.grammar,
      vocabulary: override.vocabulary,
      content: override.content,
      minWords: override.minWords ?? bounds.minWords,
      maxWords: override.maxWords ?? bounds.maxWords,
    });
  }
}
