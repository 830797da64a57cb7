import { Inject, Injectable, Logger } from '@nestjs/common';
import { DIMENSIONS, DIMENSION_CEILINGS, type Dimension } from '../judgment/dimensions';
import {
  JUDGMENT_CLIENT,
  type Judgment,
  type JudgmentClient,
  type JudgmentPromptContext,
  type JudgmentRequest,
} from '../judgment/judgment-client.interface';
import { JudgmentUnavailableError } from '../judgment/judgment.errors';
import {
  detectPatternIssues,
  sentenceCount,
  vocabularyProfile,
  type PatternIssue,
  type VocabularyProfile,
} from '../text-metrics';
import { EvaluationCancelledError, InvalidInputError } from './evaluation.errors';
import type {
  DimensionScore,
  EssayPrompt,
  EvaluateOptions,
  GradingResult,
  TaggedNote,
} from './evaluation.types';
import { GradingConfigService } from './grading-config.service';
import type { RubricWeights } from './rubric-weights';
import {
  clamp,
  computeOverallScore,
  degradedGrammarScore,
  degradedVocabularyScore,
  judgedGrammarScore,
  judgedVocabularyScore,
} from './scoring';

type EssayMetrics = {
  text: string;
  wordCount: number;
  sentenceCount: number;
  characterCount: number;
  profile: VocabularyProfile;
  patternIssues: PatternIssue[];
  lengthCompliant: boolean;
  lengthNotes: TaggedNote[];
  minWords: number;
  maxWords: number;
};

const LOW_DIVERSITY = 0.4;
const LOW_ADVANCED_RATIO = 0.1;
const GUIDANCE_ISSUE_LIMIT = 10;

const SCORE_BANDS: Array<[number, string]> = [
  [90, 'Excellent work: accurate, varied and fully on task.'],
  [80, 'Good work with a few points to polish.'],
  [70, 'A solid essay; the notes below show where to improve.'],
  [60, 'A fair attempt; several areas need attention.'],
  [0, 'This essay needs substantial revision.'],
];

const formatPatternIssue = (issue: PatternIssue) =>
  `${issue.message} ("${issue.original}" → "${issue.suggestion}")`;

const capitalize = (value: string) => value.charAt(0).toUpperCase() + value.slice(1);

const toJudgmentContext = (prompt: EssayPrompt): JudgmentPromptContext => ({
  title: prompt.title,
  prompt: prompt.prompt,
  gradeTier: prompt.gradeTier,
  level: prompt.level,
  requirements: prompt.requirements,
  keywords: prompt.keywords,
});

const freezeScore = (score: DimensionScore): DimensionScore =>
  Object.freeze({
    ...score,
    issues: Object.freeze([...score.issues]),
    suggestions: Object.freeze([...score.suggestions]),
  });

/**
 * Grades one essay. The steps always run in the same order:
 * metrics, then the three judge calls (concurrently, awaited together),
 * grammar, vocabulary, content, and finally aggregation. A failed judge call
 * degrades its dimension instead of failing the evaluation.
 */
@Injectable()
export class EvaluationPipelineService {
  private readonly logger = new Logger(EvaluationPipelineService.name);

  constructor(
    @Inject(JUDGMENT_CLIENT) private readonly judgmentClient: JudgmentClient,
    private readonly gradingConfig: GradingConfigService,
  ) {}

  async evaluate(
    essay: string,
    prompt: EssayPrompt,
    weights: RubricWeights,
    options: EvaluateOptions = {},
  ): Promise<GradingResult> {
    if (!prompt) {
      throw new InvalidInputError('A prompt is required to grade an essay');
    }
    const metrics = this.computeMetrics(essay, weights);
    const { signal } = options;
    this.throwIfCancelled(signal);

    const context = toJudgmentContext(prompt);
    const [grammar, vocabulary, content] = await Promise.allSettled([
      this.callJudge(this.buildRequest('grammar', metrics, context), signal),
      this.callJudge(this.buildRequest('vocabulary', metrics, context), signal),
      this.callJudge(this.buildRequest('content', metrics, context), signal),
    ]);
    this.throwIfCancelled(signal);

    const dimensions: Record<Dimension, DimensionScore> = {
      grammar: this.computeGrammar(grammar, metrics),
      vocabulary: this.computeVocabulary(vocabulary, metrics),
      content: this.computeContent(content),
    };
    return this.aggregate(dimensions, metrics, weights, prompt);
  }

  private computeMetrics(essay: string, weights: RubricWeights): EssayMetrics {
    if (typeof essay !== 'string' || !essay.trim()) {
      throw new InvalidInputError('Essay text is empty');
    }

    const text = essay;
    const profile = vocabularyProfile(essay);
    const { minWords, maxWords } = weights;
    const lengthNotes: TaggedNote[] = [];
    if (profile.wordCount < minWords) {
      lengthNotes.push({
        source: 'length',
        text: `The essay has ${profile.wordCount} words; aim for at least ${minWords}.`,
      });
    } else if (profile.wordCount > maxWords) {
      lengthNotes.push({
        source: 'length',
        text: `The essay has ${profile.wordCount} words; keep it within ${maxWords}.`,
      });
    }

    return {
      text,
      wordCount: profile.wordCount,
      sentenceCount: sentenceCount(text),
      characterCount: text.length,
      profile,
      patternIssues: detectPatternIssues(text),
      lengthCompliant: lengthNotes.length === 0,
      lengthNotes,
      minWords,
      maxWords,
    };
  }

  private buildRequest(
    dimension: Dimension,
    metrics: EssayMetrics,
    prompt: JudgmentPromptContext,
  ): JudgmentRequest {
    return {
      dimension,
      essayText: metrics.text,
      prompt,
      rubricGuidance: this.guidanceFor(dimension, metrics),
    };
  }

  private guidanceFor(dimension: Dimension, metrics: EssayMetrics): string {
    switch (dimension) {
      case 'grammar': {
        const issues = metrics.patternIssues;
        if (!issues.length) {
          return 'A rule-based checker found no issues.';
        }
        return [
          `A rule-based checker found ${issues.length} issue(s):`,
          ...issues.slice(0, GUIDANCE_ISSUE_LIMIT).map((issue) => `- ${formatPatternIssue(issue)}`),
        ].join('\n');
      }
      case 'vocabulary':
        return [
          `Words: ${metrics.wordCount}, unique: ${metrics.profile.uniqueWords}.`,
          `Lexical diversity: ${metrics.profile.lexicalDiversity.toFixed(2)}.`,
          `Share of unique words beyond a basic list: ${metrics.profile.advancedRatio.toFixed(2)}.`,
        ].join('\n');
      case 'content':
        return `Word count: ${metrics.wordCount} (expected ${metrics.minWords}-${metrics.maxWords}).`;
    }
  }

  private async callJudge(request: JudgmentRequest, signal?: AbortSignal): Promise<Judgment> {
    return this.judgmentClient.judge(request, { signal });
  }

  private computeGrammar(outcome: PromiseSettledResult<Judgment>, metrics: EssayMetrics): DimensionScore {
    const ceiling = DIMENSION_CEILINGS.grammar;
    const issueCount = metrics.patternIssues.length;
    const checkerIssues = metrics.patternIssues.map(formatPatternIssue);

    if (outcome.status === 'fulfilled') {
      const judgment = outcome.value;
      return freezeScore({
        dimension: 'grammar',
        status: 'judged',
        score: judgedGrammarScore(judgment.score, issueCount),
        ceiling,
        feedback: judgment.feedback,
        issues: [...checkerIssues, ...judgment.issues],
        suggestions: judgment.suggestions,
      });
    }

    this.logFailure('grammar', outcome.reason);
    return freezeScore({
      dimension: 'grammar',
      status: 'degraded',
      score: degradedGrammarScore(issueCount, this.gradingConfig.penaltyPerIssue),
      ceiling,
      feedback: `Scored from ${issueCount} automatically detected issue(s); the detailed review was unavailable.`,
      issues: checkerIssues,
      suggestions: issueCount ? ['Correct the highlighted grammar issues, then reread each sentence.'] : [],
    });
  }

  private computeVocabulary(
    outcome: PromiseSettledResult<Judgment>,
    metrics: EssayMetrics,
  ): DimensionScore {
    const ceiling = DIMENSION_CEILINGS.vocabulary;
    const { lexicalDiversity, advancedRatio } = metrics.profile;
    const hints: string[] = [];
    if (lexicalDiversity < LOW_DIVERSITY) {
      hints.push('Vary your word choice; many words are repeated.');
    }
    if (advancedRatio < LOW_ADVANCED_RATIO) {
      hints.push('Try some less common, more precise words.');
    }

    if (outcome.status === 'fulfilled') {
      const judgment = outcome.value;
      return freezeScore({
        dimension: 'vocabulary',
        status: 'judged',
        score: judgedVocabularyScore(judgment.score, lexicalDiversity),
        ceiling,
        feedback: judgment.feedback,
        issues: judgment.issues,
        suggestions: [...judgment.suggestions, ...hints],
      });
    }

    this.logFailure('vocabulary', outcome.reason);
    return freezeScore({
      dimension: 'vocabulary',
      status: 'degraded',
      score: degradedVocabularyScore(lexicalDiversity),
      ceiling,
      feedback: `Scored from lexical diversity (${Math.round(lexicalDiversity * 100)}%); the detailed review was unavailable.`,
      issues: [],
      suggestions: hints,
    });
  }

  private computeContent(outcome: PromiseSettledResult<Judgment>): DimensionScore {
    const ceiling = DIMENSION_CEILINGS.content;
    if (outcome.status === 'fulfilled') {
      const judgment = outcome.value;
      return freezeScore({
        dimension: 'content',
        status: 'judged',
        score: clamp(judgment.score, 0, ceiling),
        ceiling,
        feedback: judgment.feedback,
        issues: judgment.issues,
        suggestions: judgment.suggestions,
      });
    }

    this.logFailure('content', outcome.reason);
    return freezeScore({
      dimension: 'content',
      status: 'unavailable',
      score: null,
      ceiling,
      feedback: 'Content could not be assessed.',
      issues: [],
      suggestions: [],
    });
  }

  private aggregate(
    dimensions: Record<Dimension, DimensionScore>,
    metrics: EssayMetrics,
    weights: RubricWeights,
    prompt: EssayPrompt,
  ): GradingResult {
    const overallScore = computeOverallScore(
      {
        grammar: dimensions.grammar.score,
        vocabulary: dimensions.vocabulary.score,
        content: dimensions.content.score,
      },
      weights,
    );

    const issues: TaggedNote[] = [];
    const suggestions: TaggedNote[] = [];
    for (const dimension of DIMENSIONS) {
      const score = dimensions[dimension];
      issues.push(...score.issues.map((text) => Object.freeze({ source: dimension, text })));
      suggestions.push(...score.suggestions.map((text) => Object.freeze({ source: dimension, text })));
    }
    suggestions.push(...metrics.lengthNotes.map((note) => Object.freeze({ ...note })));

    const degradedDimensions = DIMENSIONS.filter((dimension) => dimensions[dimension].status === 'degraded');
    const unavailableDimensions = DIMENSIONS.filter(
      (dimension) => dimensions[dimension].status === 'unavailable',
    );

    return Object.freeze({
      overallScore,
      dimensions: Object.freeze({ ...dimensions }),
      grammarErrors: Object.freeze(metrics.patternIssues.map((issue) => Object.freeze({ ...issue }))),
      issues: Object.freeze(issues),
      suggestions: Object.freeze(suggestions),
      overallFeedback: this.buildOverallFeedback(
        overallScore,
        dimensions,
        degradedDimensions,
        unavailableDimensions,
      ),
      wordCount: metrics.wordCount,
      sentenceCount: metrics.sentenceCount,
      characterCount: metrics.characterCount,
      lexicalDiversity: Math.round(metrics.profile.lexicalDiversity * 1000) / 1000,
      lengthCompliant: metrics.lengthCompliant,
      degraded: degradedDimensions.length > 0 || unavailableDimensions.length > 0,
      degradedDimensions: Object.freeze(degradedDimensions),
      unavailableDimensions: Object.freeze(unavailableDimensions),
      promptId: prompt.id ?? null,
    });
  }

  private buildOverallFeedback(
    overallScore: number,
    dimensions: Record<Dimension, DimensionScore>,
    degraded: Dimension[],
    unavailable: Dimension[],
  ): string {
    const band = SCORE_BANDS.find(([threshold]) => overallScore >= threshold) ?? SCORE_BANDS[SCORE_BANDS.length - 1];
    const parts = [band[1]];
    for (const dimension of DIMENSIONS) {
      const score = dimensions[dimension];
      if (score.status === 'judged' && score.feedback) {
        parts.push(`${capitalize(dimension)}: ${score.feedback}`);
      }
    }
    if (degraded.length) {
      parts.push(`Scored automatically without the detailed review: ${degraded.join(', ')}.`);
    }
    if (unavailable.length) {
      parts.push(`Not assessed and left out of the overall score: ${unavailable.join(', ')}.`);
    }
    return parts.join(' ');
  }

  private logFailure(dimension: Dimension, reason: unknown) {
    const detail =
      reason instanceof JudgmentUnavailableError
        ? `${reason.code}: ${reason.message}`
        : reason instanceof Error
          ? reason.message
          : String(reason);
    this.logger.warn(`Judge unavailable for ${dimension}, degrading: ${detail}`);
  }

  private throwIfCancelled(signal?: AbortSignal) {
    if (signal?.aborted) {
      throw new EvaluationCancelledError();
    }
  }
}
