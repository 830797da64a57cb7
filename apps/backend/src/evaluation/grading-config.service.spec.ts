import { ConfigService } from '@nestjs/config';
import { ConfigurationError } from '../common/errors';
import { GradingConfigService } from './grading-config.service';

const configWith = (values: Record<string, string>) =>
  ({
    get: jest.fn((key: string) => values[key]),
  }) as unknown as jest.Mocked<ConfigService>;

describe('GradingConfigService', () => {
  it('should fall back to the default rubric', () => {
    const service = new GradingConfigService(configWith({}));

    expect(service.getDefaultWeights().toJSON()).toEqual({
      grammar: 0.3,
      vocabulary: 0.3,
      content: 0.4,
      minWords: 25,
      maxWords: 500,
    });
    expect(service.penaltyPerIssue).toBe(5);
  });

  it('should fail at construction on weights that do not sum to one', () => {
    expect(
      () =>
        new GradingConfigService(
          configWith({
            GRADING_WEIGHT_GRAMMAR: '0.3',
            GRADING_WEIGHT_VOCABULARY: '0.3',
            GRADING_WEIGHT_CONTENT: '0.3',
          }),
        ),
    ).toThrow(ConfigurationError);
  });

  it('should apply the word bounds of the prompt tier', () => {
    const service = new GradingConfigService(configWith({ GRADING_PENALTY_PER_ISSUE: '4' }));

    expect(service.weightsFor({ gradeTier: 'high' }).toJSON()).toMatchObject({
      minWords: 150,
      maxWords: 300,
    });
    expect(service.penaltyPerIssue).toBe(4);
  });

  it('should ignore an invalid penalty', () => {
    expect(new GradingConfigService(configWith({ GRADING_PENALTY_PER_ISSUE: 'lots' })).penaltyPerIssue).toBe(5);
  });
});
