export {
  tokenize,
  tokenizeWords,
  wordCount,
  splitSentences,
  sentenceCount,
  lexicalDiversity,
  vocabularyProfile,
  type WordToken,
  type SentenceSpan,
  type VocabularyProfile,
} from './text-metrics';
export { detectPatternIssues, type PatternIssue, type PatternRule } from './pattern-issues';
