import { detectPatternIssues } from './pattern-issues';
import {
  lexicalDiversity,
  sentenceCount,
  splitSentences,
  vocabularyProfile,
  wordCount,
} from './text-metrics';

describe('text metrics', () => {
  describe('wordCount', () => {
    it('should count words split on whitespace and punctuation', () => {
      expect(wordCount('My family is very nice. I love them!')).toBe(8);
    });

    it('should keep contractions and hyphenated words whole', () => {
      expect(wordCount("don't stop well-known")).toBe(3);
    });

    it('should return 0 for empty or blank text', () => {
      expect(wordCount('')).toBe(0);
      expect(wordCount('   \n ')).toBe(0);
    });

    it('should return the same count on repeated calls', () => {
      const text = 'We walked to school together, and then we played football.';
      expect(wordCount(text)).toBe(wordCount(text));
      expect(wordCount(text)).toBe(10);
    });
  });

  describe('sentenceCount', () => {
    it('should count sentences ending in . ! or ?', () => {
      expect(sentenceCount('Hello there. How are you? Fine!')).toBe(3);
    });

    it('should treat runs of terminal punctuation as one boundary', () => {
      expect(sentenceCount('Wait... what?!')).toBe(2);
    });

    it('should ignore segments without words', () => {
      expect(sentenceCount('...')).toBe(0);
      expect(sentenceCount('')).toBe(0);
    });

    it('should report sentence offsets in the original text', () => {
      const [first, second] = splitSentences('Hi.  Bye now.');
      expect(first).toMatchObject({ text: 'Hi.', start: 0, end: 3 });
      expect(second).toMatchObject({ text: 'Bye now.', start: 5, end: 13 });
    });
  });

  describe('lexicalDiversity', () => {
    it('should compare unique words case-insensitively', () => {
      expect(lexicalDiversity('The cat saw the dog')).toBe(0.8);
    });

    it('should return 0 for empty text', () => {
      expect(lexicalDiversity('')).toBe(0);
    });
  });

  describe('vocabularyProfile', () => {
    it('should report counts, advanced ratio and most common words', () => {
      const profile = vocabularyProfile('the cat and the dog and the bird');

      expect(profile.wordCount).toBe(8);
      expect(profile.uniqueWords).toBe(5);
      expect(profile.lexicalDiversity).toBe(0.625);
      expect(profile.advancedRatio).toBe(0.6);
      expect(profile.commonWords).toEqual([
        { word: 'the', count: 3 },
        { word: 'and', count: 2 },
        { word: 'bird', count: 1 },
        { word: 'cat', count: 1 },
        { word: 'dog', count: 1 },
      ]);
    });

    it('should return an empty profile for empty text', () => {
      expect(vocabularyProfile('')).toEqual({
        wordCount: 0,
        uniqueWords: 0,
        lexicalDiversity: 0,
        advancedRatio: 0,
        commonWords: [],
      });
    });
  });
});

describe('detectPatternIssues', () => {
  it('should flag repeated words', () => {
    expect(detectPatternIssues('I saw the the cat.')).toEqual([
      {
        rule: 'repeated-word',
        message: 'Repeated word "the".',
        original: 'the the',
        suggestion: 'the',
        startIndex: 6,
        endIndex: 13,
      },
    ]);
  });

  it('should flag article mismatches', () => {
    const issues = detectPatternIssues('She ate a apple and an banana.');

    expect(issues.map((issue) => [issue.rule, issue.original, issue.suggestion])).toEqual([
      ['article', 'a apple', 'an apple'],
      ['article', 'an banana', 'a banana'],
    ]);
  });

  it('should follow sound rather than spelling for articles', () => {
    expect(detectPatternIssues('It was a useful tool and an honest answer.')).toEqual([]);
  });

  it('should flag subject-verb disagreement and a lowercase sentence start', () => {
    const issues = detectPatternIssues('he have a dog.');

    expect(issues.map((issue) => issue.rule)).toEqual(['sentence-case', 'subject-verb-agreement']);
    expect(issues[1]).toMatchObject({
      original: 'he have',
      suggestion: 'he has',
      startIndex: 0,
      endIndex: 7,
    });
  });

  it('should not flag bare verbs after an auxiliary', () => {
    expect(detectPatternIssues('Does she have a pen?')).toEqual([]);
  });

  it('should flag plural and first-person agreement', () => {
    const issues = detectPatternIssues('They is happy. I are tired.');

    expect(issues.map((issue) => [issue.original, issue.suggestion, issue.startIndex])).toEqual([
      ['They is', 'They are', 0],
      ['I are', 'I am', 15],
    ]);
  });

  it('should flag a lowercase pronoun i', () => {
    expect(detectPatternIssues('Yesterday i went home.')).toEqual([
      {
        rule: 'lowercase-i',
        message: 'The pronoun "I" is always capitalized.',
        original: 'i',
        suggestion: 'I',
        startIndex: 10,
        endIndex: 11,
      },
    ]);
  });

  it('should flag a subordinate clause standing alone', () => {
    const issues = detectPatternIssues('Because it rained.');

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({
      rule: 'sentence-fragment',
      original: 'Because it rained.',
      startIndex: 0,
      endIndex: 18,
    });
    expect(detectPatternIssues('Because it rained, we stayed home.')).toEqual([]);
  });

  it('should flag a missing space after sentence punctuation', () => {
    const issues = detectPatternIssues('I went home.Then I slept.');

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({ rule: 'missing-space', startIndex: 11, endIndex: 12 });
  });

  it('should return no findings for malformed input instead of throwing', () => {
    expect(detectPatternIssues('')).toEqual([]);
    expect(detectPatternIssues(undefined as unknown as string)).toEqual([]);
  });
});
