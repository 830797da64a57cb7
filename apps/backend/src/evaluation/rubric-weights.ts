import { ConfigurationError, type ValidationField } from '../common/errors';
import type { Dimension } from '../judgment/dimensions';
import type { WordBounds } from '../prompts/grade-tiers';

export type RubricWeightsInput = {
  grammar: number;
  vocabulary: number;
  content: number;
  minWords: number;
  maxWords: number;
};

export const WEIGHT_SUM_TOLERANCE = 1e-6;

const checkWeight = (fields: ValidationField[], field: Dimension, value: number) => {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    fields.push({ field, message: 'must be a finite number >= 0' });
  }
};

/**
 * Dimension weights plus the accepted essay length. Instances only come out
 * of `create`, so holding one means the values were checked.
 */
export class RubricWeights {
  private constructor(
    readonly grammar: number,
    readonly vocabulary: number,
    readonly content: number,
    readonly minWords: number,
    readonly maxWords: number,
  ) {
    Object.freeze(this);
  }

  static create(input: RubricWeightsInput): RubricWeights {
    const fields: ValidationField[] = [];
    checkWeight(fields, 'grammar', input.grammar);
    checkWeight(fields, 'vocabulary', input.vocabulary);
    checkWeight(fields, 'content', input.content);

    if (!fields.length) {
      const sum = input.grammar + input.vocabulary + input.content;
      if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
        fields.push({ field: 'weights', message: `must sum to 1, got ${Number(sum.toFixed(6))}` });
      }
    }

    if (!Number.isInteger(input.minWords) || input.minWords < 0) {
      fields.push({ field: 'minWords', message: 'must be an integer >= 0' });
    }
    if (!Number.isInteger(input.maxWords) || input.maxWords < input.minWords) {
      fields.push({ field: 'maxWords', message: 'must be an integer >= minWords' });
    }

    if (fields.length) {
      throw new ConfigurationError(
        `Invalid rubric weights: ${fields.map((item) => `${item.field} ${item.message}`).join('; ')}`,
        fields,
      );
    }

    return new RubricWeights(input.grammar, input.vocabulary, input.content, input.minWords, input.maxWords);
  }

  withWordBounds(bounds: WordBounds): RubricWeights {
    return RubricWeights.create({ ...this.toJSON(), ...bounds });
  }

  weightOf(dimension: Dimension): number {
    return this[dimension];
  }

  toJSON(): RubricWeightsInput {
    return {
      grammar: this.grammar,
      vocabulary: this.vocabulary,
      content: this.content,
      minWords: this.minWords,
      maxWords: this.maxWords,
    };
  }
}
