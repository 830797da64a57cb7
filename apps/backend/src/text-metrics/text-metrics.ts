import { readFileSync } from 'fs';
import { resolveAssetPath } from '../common/utils/asset-path';

export type WordToken = {
  word: string;
  start: number;
  end: number;
};

export type SentenceSpan = {
  text: string;
  start: number;
  end: number;
  words: WordToken[];
};

export type VocabularyProfile = {
  wordCount: number;
  uniqueWords: number;
  lexicalDiversity: number;
  advancedRatio: number;
  commonWords: Array<{ word: string; count: number }>;
};

// Letter/digit runs; inner apostrophes and hyphens keep "don't" and "well-known" whole.
const WORD_PATTERN = /[\p{L}\p{N}]+(?:['’-][\p{L}\p{N}]+)*/gu;
const SENTENCE_PATTERN = /[^.!?]+[.!?]*/g;

let basicWords: ReadonlySet<string> | null = null;

const loadBasicWords = (): ReadonlySet<string> => {
  if (!basicWords) {
    const raw = readFileSync(resolveAssetPath('text-metrics/data/basic-words.json'), 'utf-8');
    basicWords = new Set((JSON.parse(raw) as string[]).map((word) => word.toLowerCase()));
  }
  return basicWords;
};

export const tokenize = (text: string): WordToken[] => {
  if (typeof text !== 'string' || !text) {
    return [];
  }
  return Array.from(text.matchAll(WORD_PATTERN), (match) => {
    const start = match.index ?? 0;
    return { word: match[0], start, end: start + match[0].length };
  });
};

export const tokenizeWords = (text: string): string[] => tokenize(text).map((token) => token.word);

export const wordCount = (text: string): number => tokenize(text).length;

export const splitSentences = (text: string): SentenceSpan[] => {
  if (typeof text !== 'string' || !text) {
    return [];
  }

  const sentences: SentenceSpan[] = [];
  for (const match of text.matchAll(SENTENCE_PATTERN)) {
    const raw = match[0];
    const leading = raw.length - raw.trimStart().length;
    const body = raw.trim();
    const words = tokenize(body);
    if (!words.length) {
      continue;
    }
    const start = (match.index ?? 0) + leading;
    sentences.push({
      text: body,
      start,
      end: start + body.length,
      words: words.map((token) => ({ ...token, start: token.start + start, end: token.end + start })),
    });
  }
  return sentences;
};

export const sentenceCount = (text: string): number => splitSentences(text).length;

export const lexicalDiversity = (text: string): number => {
  const words = tokenizeWords(text).map((word) => word.toLowerCase());
  if (!words.length) {
    return 0;
  }
  return new Set(words).size / words.length;
};

export const vocabularyProfile = (text: string): VocabularyProfile => {
  const words = tokenizeWords(text).map((word) => word.toLowerCase());
  if (!words.length) {
    return { wordCount: 0, uniqueWords: 0, lexicalDiversity: 0, advancedRatio: 0, commonWords: [] };
  }

  const frequencies = new Map<string, number>();
  for (const word of words) {
    frequencies.set(word, (frequencies.get(word) ?? 0) + 1);
  }

  const basic = loadBasicWords();
  const unique = Array.from(frequencies.keys());
  const advanced = unique.filter((word) => !basic.has(word));

  const commonWords = Array.from(frequencies, ([word, count]) => ({ word, count }))
    .sort((a, b) => b.count - a.count || (a.word < b.word ? -1 : a.word > b.word ? 1 : 0))
    .slice(0, 5);

  return {
    wordCount: words.length,
    uniqueWords: unique.length,
    lexicalDiversity: unique.length / words.length,
    advancedRatio: advanced.length / unique.length,
    commonWords,
  };
};
