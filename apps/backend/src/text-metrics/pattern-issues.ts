import { splitSentences, tokenize, type SentenceSpan, type WordToken } from './text-metrics';

export type PatternRule =
  | 'repeated-word'
  | 'article'
  | 'lowercase-i'
  | 'subject-verb-agreement'
  | 'sentence-case'
  | 'sentence-fragment'
  | 'missing-space';

export type PatternIssue = {
  rule: PatternRule;
  message: string;
  original: string;
  suggestion: string;
  startIndex: number;
  endIndex: number;
};

type ScanInput = {
  text: string;
  tokens: WordToken[];
  sentences: SentenceSpan[];
};

type RuleScanner = (input: ScanInput) => PatternIssue[];

const ALLOWED_REPEATS = new Set(['had', 'that']);

// "a university", "an hour": spelling and sound disagree.
const CONSONANT_SOUND_VOWEL_PREFIXES = ['uni', 'use', 'usu', 'uti', 'eu', 'one', 'once'];
const VOWEL_SOUND_H_PREFIXES = ['hour', 'honest', 'honor', 'honour', 'heir'];

const SINGULAR_FIXES: Record<string, string> = {
  do: 'does',
  have: 'has',
  are: 'is',
  were: 'was',
  "don't": "doesn't",
};
const PLURAL_FIXES: Record<string, string> = {
  is: 'are',
  was: 'were',
  has: 'have',
  does: 'do',
  "doesn't": "don't",
};
const FIRST_PERSON_FIXES: Record<string, string> = {
  is: 'am',
  are: 'am',
  has: 'have',
};
const SINGULAR_SUBJECTS = new Set(['he', 'she', 'it']);
const PLURAL_SUBJECTS = new Set(['they', 'we', 'you']);

// After these words a bare verb is correct: "does she have", "let it do".
const AUXILIARIES = new Set([
  'do', 'does', 'did', 'can', 'could', 'will', 'would', 'shall', 'should',
  'may', 'might', 'must', 'let', 'make', 'makes', 'made', 'to',
]);

const SUBORDINATORS = new Set(['because', 'although', 'though', 'whereas', 'unless']);

const adjacent = (text: string, left: WordToken, right: WordToken): boolean =>
  /^\s+$/.test(text.slice(left.end, right.start));

const matchCase = (source: string, replacement: string): string =>
  source[0] === source[0].toUpperCase()
    ? replacement[0].toUpperCase() + replacement.slice(1)
    : replacement;

const span = (text: string, start: number, end: number) => ({
  original: text.slice(start, end),
  startIndex: start,
  endIndex: end,
});

const scanRepeatedWords: RuleScanner = ({ text, tokens }) => {
  const issues: PatternIssue[] = [];
  for (let i = 1; i < tokens.length; i += 1) {
    const previous = tokens[i - 1];
    const current = tokens[i];
    const word = current.word.toLowerCase();
    if (word !== previous.word.toLowerCase() || ALLOWED_REPEATS.has(word)) {
      continue;
    }
    if (!adjacent(text, previous, current)) {
      continue;
    }
    issues.push({
      rule: 'repeated-word',
      message: `Repeated word "${current.word}".`,
      suggestion: previous.word,
      ...span(text, previous.start, current.end),
    });
  }
  return issues;
};

const scanArticles: RuleScanner = ({ text, tokens }) => {
  const issues: PatternIssue[] = [];
  for (let i = 0; i < tokens.length - 1; i += 1) {
    const article = tokens[i];
    const next = tokens[i + 1];
    const lowered = article.word.toLowerCase();
    if ((lowered !== 'a' && lowered !== 'an') || !adjacent(text, article, next)) {
      continue;
    }
    const following = next.word.toLowerCase();
    if (!/^\p{L}/u.test(following)) {
      continue;
    }

    const startsWithVowel = /^[aeiou]/.test(following);
    const vowelSound = startsWithVowel
      ? !CONSONANT_SOUND_VOWEL_PREFIXES.some((prefix) => following.startsWith(prefix))
      : VOWEL_SOUND_H_PREFIXES.some((prefix) => following.startsWith(prefix));

    const expected = vowelSound ? 'an' : 'a';
    if (lowered === expected) {
      continue;
    }
    const fixed = matchCase(article.word, expected);
    issues.push({
      rule: 'article',
      message: `Use "${fixed}" before "${next.word}".`,
      suggestion: `${fixed} ${next.word}`,
      ...span(text, article.start, next.end),
    });
  }
  return issues;
};

const scanLowercasePronoun: RuleScanner = ({ text, tokens }) =>
  tokens
    .filter((token) => token.word === 'i' || /^i['’](m|ve|ll|d)$/.test(token.word))
    .map((token) => ({
      rule: 'lowercase-i' as const,
      message: 'The pronoun "I" is always capitalized.',
      suggestion: `I${token.word.slice(1)}`,
      ...span(text, token.start, token.end),
    }));

const scanAgreement: RuleScanner = ({ text, tokens }) => {
  const issues: PatternIssue[] = [];
  for (let i = 0; i < tokens.length - 1; i += 1) {
    const subject = tokens[i];
    const verb = tokens[i + 1];
    if (!adjacent(text, subject, verb)) {
      continue;
    }
    const before = i > 0 ? tokens[i - 1].word.toLowerCase() : '';
    if (AUXILIARIES.has(before)) {
      continue;
    }

    const subjectWord = subject.word.toLowerCase();
    const verbWord = verb.word.toLowerCase().replace('’', "'");
    let fix: string | undefined;
    if (SINGULAR_SUBJECTS.has(subjectWord)) {
      fix = SINGULAR_FIXES[verbWord];
    } else if (PLURAL_SUBJECTS.has(subjectWord)) {
      fix = PLURAL_FIXES[verbWord];
    } else if (subjectWord === 'i') {
      fix = FIRST_PERSON_FIXES[verbWord];
    }
    if (!fix) {
      continue;
    }

    issues.push({
      rule: 'subject-verb-agreement',
      message: `"${subject.word} ${verb.word}" does not agree; use "${subject.word} ${fix}".`,
      suggestion: `${subject.word} ${fix}`,
      ...span(text, subject.start, verb.end),
    });
  }
  return issues;
};

const scanSentenceCase: RuleScanner = ({ text, sentences }) =>
  sentences
    .filter((sentence) => /^\p{Ll}/u.test(sentence.text))
    .map((sentence) => {
      const first = sentence.words[0];
      return {
        rule: 'sentence-case' as const,
        message: 'Start each sentence with a capital letter.',
        suggestion: first.word[0].toUpperCase() + first.word.slice(1),
        ...span(text, first.start, first.end),
      };
    });

const scanFragments: RuleScanner = ({ text, sentences }) => {
  const issues: PatternIssue[] = [];
  for (const sentence of sentences) {
    const opener = sentence.words[0].word.toLowerCase();
    if (sentence.words.length < 2) {
      issues.push({
        rule: 'sentence-fragment',
        message: 'This sentence looks incomplete.',
        suggestion: 'Add a subject and a verb, or join it to a neighbouring sentence.',
        ...span(text, sentence.start, sentence.end),
      });
    } else if (SUBORDINATORS.has(opener) && !sentence.text.includes(',')) {
      issues.push({
        rule: 'sentence-fragment',
        message: `A sentence starting with "${sentence.words[0].word}" needs a main clause.`,
        suggestion: 'Join this clause to the sentence before it, or add a main clause after a comma.',
        ...span(text, sentence.start, sentence.end),
      });
    }
  }
  return issues;
};

const scanMissingSpaces: RuleScanner = ({ text }) => {
  const issues: PatternIssue[] = [];
  for (const match of text.matchAll(/(?<=\p{Ll})[.!?](?=\p{Lu})|,(?=\p{L})/gu)) {
    const start = match.index ?? 0;
    issues.push({
      rule: 'missing-space',
      message: `Add a space after "${match[0]}".`,
      suggestion: `${match[0]} `,
      ...span(text, start, start + 1),
    });
  }
  return issues;
};

const SCANNERS: RuleScanner[] = [
  scanRepeatedWords,
  scanArticles,
  scanLowercasePronoun,
  scanAgreement,
  scanSentenceCase,
  scanFragments,
  scanMissingSpaces,
];

/**
 * Rule-based scan for common learner errors. Best effort: it is not a grammar
 * checker, and on odd input it returns fewer findings rather than throwing.
 * Issues come back in text order.
 */
export const detectPatternIssues = (text: string): PatternIssue[] => {
  if (typeof text !== 'string' || !text.trim()) {
    return [];
  }

  const input: ScanInput = { text, tokens: tokenize(text), sentences: splitSentences(text) };
  return SCANNERS.flatMap((scan) => scan(input)).sort(
    (a, b) => a.startIndex - b.startIndex || a.endIndex - b.endIndex,
  );
};
