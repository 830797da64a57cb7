import { ConfigService } from '@nestjs/config';
import type { Dimension } from '../judgment/dimensions';
import type { Judgment, JudgmentClient, JudgmentRequest } from '../judgment/judgment-client.interface';
import { JudgmentUnavailableError } from '../judgment/judgment.errors';
import { EvaluationCancelledError, InvalidInputError } from './evaluation.errors';
import { EvaluationPipelineService } from './evaluation-pipeline.service';
import type { EssayPrompt } from './evaluation.types';
import { GradingConfigService } from './grading-config.service';
import { RubricWeights } from './rubric-weights';

// 20 words, no checker findings, diversity 0.9
const CLEAN_ESSAY =
  'My family is small. We eat dinner together every night. My mother cooks rice and my father tells funny stories.';
// 11 words, two checker findings ("He have", "the the")
const FLAWED_ESSAY = 'He have a dog. We walk the the dog every day.';

const prompt: EssayPrompt = {
  id: '1',
  title: 'My Family',
  prompt: 'Write about your family.',
  gradeTier: 'primary',
  level: 'beginner',
  requirements: ['Mention at least three family members'],
  keywords: ['family'],
};

const judgmentOf = (score: number, feedback: string): Judgment => ({
  score,
  feedback,
  issues: [],
  suggestions: [],
});

describe('EvaluationPipelineService', () => {
  let judgmentClient: jest.Mocked<JudgmentClient>;
  let pipeline: EvaluationPipelineService;
  let weights: RubricWeights;
  let outcomes: Record<Dimension, Judgment | Error>;

  beforeEach(() => {
    outcomes = {
      grammar: judgmentOf(24, 'Good control.'),
      vocabulary: judgmentOf(18, 'Nice words.'),
      content: judgmentOf(32, 'On topic.'),
    };
    judgmentClient = {
      judge: jest.fn(async (request: JudgmentRequest) => {
        const outcome = outcomes[request.dimension];
        if (outcome instanceof Error) {
          throw outcome;
        }
        return outcome;
      }),
      isConfigured: jest.fn().mockReturnValue(true),
    } as unknown as jest.Mocked<JudgmentClient>;

    const configService = {
      get: jest.fn().mockReturnValue(undefined),
    } as unknown as jest.Mocked<ConfigService>;
    pipeline = new EvaluationPipelineService(judgmentClient, new GradingConfigService(configService));
    weights = RubricWeights.create({
      grammar: 0.3,
      vocabulary: 0.3,
      content: 0.4,
      minWords: 5,
      maxWords: 100,
    });
  });

  it('should combine judged dimensions into the weighted overall score', async () => {
    const result = await pipeline.evaluate(CLEAN_ESSAY, prompt, weights);

    // vocabulary 18 + 3 for diversity above 0.6
    expect(result.dimensions.grammar).toMatchObject({ status: 'judged', score: 24, ceiling: 30 });
    expect(result.dimensions.vocabulary).toMatchObject({ status: 'judged', score: 21, ceiling: 30 });
    expect(result.dimensions.content).toMatchObject({ status: 'judged', score: 32, ceiling: 40 });
    expect(result.overallScore).toBe(77);
    expect(result.degraded).toBe(false);
    expect(result.degradedDimensions).toEqual([]);
    expect(result.unavailableDimensions).toEqual([]);
    expect(result.overallFeedback).toBe(
      'A solid essay; the notes below show where to improve. Grammar: Good control. Vocabulary: Nice words. Content: On topic.',
    );
  });

  it('should report the essay metrics', async () => {
    const result = await pipeline.evaluate(CLEAN_ESSAY, prompt, weights);

    expect(result).toMatchObject({
      wordCount: 20,
      sentenceCount: 3,
      characterCount: CLEAN_ESSAY.length,
      lexicalDiversity: 0.9,
      lengthCompliant: true,
      grammarErrors: [],
      promptId: '1',
    });
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.dimensions.grammar)).toBe(true);
  });

  it('should call the judge once per dimension with the prompt context', async () => {
    const controller = new AbortController();

    await pipeline.evaluate(CLEAN_ESSAY, prompt, weights, { signal: controller.signal });

    expect(judgmentClient.judge).toHaveBeenCalledTimes(3);
    expect(judgmentClient.judge.mock.calls.map(([request]) => request.dimension)).toEqual([
      'grammar',
      'vocabulary',
      'content',
    ]);
    const [contentRequest, contentOptions] = judgmentClient.judge.mock.calls[2];
    expect(contentRequest.prompt.requirements).toEqual(['Mention at least three family members']);
    expect(contentRequest.rubricGuidance).toBe('Word count: 20 (expected 5-100).');
    expect(contentOptions).toEqual({ signal: controller.signal });
  });

  it('should degrade grammar to the checker score when the judge fails', async () => {
    outcomes.grammar = new JudgmentUnavailableError('LLM_TIMEOUT', 'timed out');
    outcomes.vocabulary = judgmentOf(20, 'Fine.');
    outcomes.content = judgmentOf(30, 'Relevant.');

    const result = await pipeline.evaluate(FLAWED_ESSAY, prompt, weights);

    expect(result.grammarErrors.map((issue) => issue.rule)).toEqual([
      'subject-verb-agreement',
      'repeated-word',
    ]);
    expect(result.dimensions.grammar).toMatchObject({ status: 'degraded', score: 20 });
    expect(result.dimensions.grammar.issues).toHaveLength(2);
    // 20/30*0.3 + 23/30*0.3 + 30/40*0.4
    expect(result.overallScore).toBe(73);
    expect(result.degraded).toBe(true);
    expect(result.degradedDimensions).toEqual(['grammar']);
    expect(result.overallFeedback).toContain('Scored automatically without the detailed review: grammar.');
  });

  it('should deduct checker findings from a judged grammar score', async () => {
    outcomes.grammar = judgmentOf(20, 'Some slips.');

    const result = await pipeline.evaluate(FLAWED_ESSAY, prompt, weights);

    // two findings cost nothing; the penalty starts above two
    expect(result.dimensions.grammar.score).toBe(20);
    expect(result.issues.filter((note) => note.source === 'grammar')).toHaveLength(2);
  });

  it('should leave content out and renormalize when its judge fails', async () => {
    outcomes.content = new JudgmentUnavailableError('LLM_API_ERROR', 'upstream down');

    const result = await pipeline.evaluate(CLEAN_ESSAY, prompt, weights);

    expect(result.dimensions.content).toMatchObject({ status: 'unavailable', score: null });
    // (24/30*0.3 + 21/30*0.3) / 0.6
    expect(result.overallScore).toBe(75);
    expect(result.unavailableDimensions).toEqual(['content']);
    expect(result.degradedDimensions).toEqual([]);
    expect(result.degraded).toBe(true);
  });

  it('should still return a result when every judge call fails', async () => {
    const unavailable = new JudgmentUnavailableError('LLM_NOT_CONFIGURED', 'not configured');
    outcomes = { grammar: unavailable, vocabulary: unavailable, content: unavailable };

    const result = await pipeline.evaluate(CLEAN_ESSAY, prompt, weights);

    expect(result.dimensions.grammar.score).toBe(30);
    expect(result.dimensions.vocabulary.score).toBe(27);
    expect(result.dimensions.content.score).toBeNull();
    // (1*0.3 + 0.9*0.3) / 0.6
    expect(result.overallScore).toBe(95);
    expect(result.degradedDimensions).toEqual(['grammar', 'vocabulary']);
  });

  it('should flag an essay shorter than the minimum without stopping', async () => {
    const essay = `${CLEAN_ESSAY} They love our home.`;
    const strict = RubricWeights.create({ ...weights.toJSON(), minWords: 25, maxWords: 500 });

    const result = await pipeline.evaluate(essay, prompt, strict);

    expect(result.wordCount).toBe(24);
    expect(result.lengthCompliant).toBe(false);
    expect(result.suggestions).toContainEqual({
      source: 'length',
      text: 'The essay has 24 words; aim for at least 25.',
    });
    expect(result.overallScore).toBe(77);
  });

  it('should reject an empty essay before calling the judge', async () => {
    await expect(pipeline.evaluate('   \n', prompt, weights)).rejects.toBeInstanceOf(InvalidInputError);
    expect(judgmentClient.judge).not.toHaveBeenCalled();
  });

  it('should not start when the caller already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      pipeline.evaluate(CLEAN_ESSAY, prompt, weights, { signal: controller.signal }),
    ).rejects.toBeInstanceOf(EvaluationCancelledError);
    expect(judgmentClient.judge).not.toHaveBeenCalled();
  });

  it('should raise instead of returning a result when cancelled mid-flight', async () => {
    const controller = new AbortController();
    judgmentClient.judge.mockImplementation(async (request: JudgmentRequest) => {
      if (request.dimension === 'content') {
        controller.abort();
        throw new JudgmentUnavailableError('LLM_ABORTED', 'cancelled');
      }
      return judgmentOf(20, 'ok');
    });

    await expect(
      pipeline.evaluate(CLEAN_ESSAY, prompt, weights, { signal: controller.signal }),
    ).rejects.toBeInstanceOf(EvaluationCancelledError);
  });
});
