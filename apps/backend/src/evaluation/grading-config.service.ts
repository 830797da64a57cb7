import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { wordBoundsFor } from '../prompts/grade-tiers';
import type { EssayPrompt } from './evaluation.types';
import { RubricWeights } from './rubric-weights';

const readNumber = (configService: ConfigService, key: string, fallback: number) => {
  const raw = configService.get<string>(key);
  return raw === undefined || raw === '' ? fallback : Number(raw);
};

/**
 * Default rubric from the environment. Built in the constructor so a bad
 * value stops the application during bootstrap.
 */
@Injectable()
export class GradingConfigService {
  private readonly logger = new Logger(GradingConfigService.name);
  private readonly defaults: RubricWeights;
  readonly penaltyPerIssue: number;

  constructor(configService: ConfigService) {
    this.defaults = RubricWeights.create({
      grammar: readNumber(configService, 'GRADING_WEIGHT_GRAMMAR', 0.3),
      vocabulary: readNumber(configService, 'GRADING_WEIGHT_VOCABULARY', 0.3),
      content: readNumber(configService, 'GRADING_WEIGHT_CONTENT', 0.4),
      minWords: readNumber(configService, 'GRADING_MIN_WORDS', 25),
      maxWords: readNumber(configService, 'GRADING_MAX_WORDS', 500),
    });

    const penalty = readNumber(configService, 'GRADING_PENALTY_PER_ISSUE', 5);
    this.penaltyPerIssue = Number.isFinite(penalty) && penalty >= 0 ? penalty : 5;
    if (this.penaltyPerIssue !== penalty) {
      this.logger.warn(`Ignoring GRADING_PENALTY_PER_ISSUE=${penalty}; using ${this.penaltyPerIssue}`);
    }
  }

  getDefaultWeights(): RubricWeights {
    return this.defaults;
  }

  /** The configured weights with the word bounds of the prompt's tier. */
  weightsFor(prompt: Pick<EssayPrompt, 'gradeTier'>): RubricWeights {
    return this.defaults.withWordBounds(wordBoundsFor(prompt.gradeTier));
  }
}
