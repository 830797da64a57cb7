import { RubricWeights } from './rubric-weights';
import {
  computeOverallScore,
  degradedGrammarScore,
  degradedVocabularyScore,
  judgedGrammarScore,
  judgedVocabularyScore,
  patternPenalty,
} from './scoring';

describe('scoring', () => {
  const weights = RubricWeights.create({
    grammar: 0.3,
    vocabulary: 0.3,
    content: 0.4,
    minWords: 25,
    maxWords: 500,
  });

  describe('computeOverallScore', () => {
    it('should weight each dimension by its share of the ceiling', () => {
      expect(computeOverallScore({ grammar: 24, vocabulary: 21, content: 32 }, weights)).toBe(77);
    });

    it('should renormalize over the dimensions that have a score', () => {
      // (24/30 * 0.3 + 21/30 * 0.3) / 0.6
      expect(computeOverallScore({ grammar: 24, vocabulary: 21, content: null }, weights)).toBe(75);
    });

    it('should return 0 when nothing could be scored', () => {
      expect(computeOverallScore({ grammar: null, vocabulary: null, content: null }, weights)).toBe(0);
    });

    it('should round to one decimal', () => {
      // (0.2 + 0.21) / 0.6 = 0.68333...
      expect(computeOverallScore({ grammar: 20, vocabulary: 21, content: null }, weights)).toBe(68.3);
    });
  });

  describe('grammar', () => {
    it('should degrade to the ceiling minus the issue penalty', () => {
      expect(degradedGrammarScore(2, 5)).toBe(20);
      expect(degradedGrammarScore(0, 5)).toBe(30);
      expect(degradedGrammarScore(9, 5)).toBe(0);
    });

    it('should deduct more from a judged score as checker findings grow', () => {
      expect(patternPenalty(2)).toBe(0);
      expect(patternPenalty(3)).toBe(3);
      expect(patternPenalty(6)).toBe(5);
      expect(patternPenalty(11)).toBe(8);
      expect(judgedGrammarScore(24, 4)).toBe(21);
      expect(judgedGrammarScore(5, 12)).toBe(0);
    });
  });

  describe('vocabulary', () => {
    it('should scale the ceiling by diversity when degraded', () => {
      expect(degradedVocabularyScore(0.55)).toBe(16.5);
      expect(degradedVocabularyScore(1.4)).toBe(30);
      expect(degradedVocabularyScore(-1)).toBe(0);
    });

    it('should adjust a judged score for very low or high diversity', () => {
      expect(judgedVocabularyScore(20, 0.2)).toBe(15);
      expect(judgedVocabularyScore(20, 0.5)).toBe(20);
      expect(judgedVocabularyScore(28, 0.7)).toBe(30);
    });
  });
});
