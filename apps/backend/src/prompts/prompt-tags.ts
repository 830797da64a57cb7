import { normalizeKey } from './grade-tiers';

export const ESSAY_GENRES = [
  'narrative',
  'descriptive',
  'argumentative',
  'letter',
  'opinion',
  'expository',
  'diary',
  'story',
  'report',
  'email',
] as const;

export const ESSAY_TOPICS = [
  'family',
  'school',
  'friend',
  'hobby',
  'travel',
  'environment',
  'technology',
  'sport',
  'food',
  'festival',
  'animal',
  'book',
  'movie',
  'music',
  'dream',
] as const;

const GENRE_ALIASES = new Map<string, string>([
  ...ESSAY_GENRES.map((genre): [string, string] => [genre, genre]),
  ['记叙文', 'narrative'],
  ['描写文', 'descriptive'],
  ['议论文', 'argumentative'],
  ['书信', 'letter'],
  ['观点文', 'opinion'],
  ['说明文', 'expository'],
  ['日记', 'diary'],
  ['故事', 'story'],
  ['报告', 'report'],
  ['邮件', 'email'],
  ['e_mail', 'email'],
  ['narration', 'narrative'],
  ['description', 'descriptive'],
  ['argument', 'argumentative'],
]);

const TOPIC_ALIASES = new Map<string, string>([
  ...ESSAY_TOPICS.map((topic): [string, string] => [topic, topic]),
  ['家庭', 'family'],
  ['学校', 'school'],
  ['朋友', 'friend'],
  ['爱好', 'hobby'],
  ['旅行', 'travel'],
  ['环境', 'environment'],
  ['科技', 'technology'],
  ['运动', 'sport'],
  ['食物', 'food'],
  ['节日', 'festival'],
  ['动物', 'animal'],
  ['书籍', 'book'],
  ['电影', 'movie'],
  ['音乐', 'music'],
  ['梦想', 'dream'],
  ['friends', 'friend'],
  ['friendship', 'friend'],
  ['hobbies', 'hobby'],
  ['sports', 'sport'],
  ['festivals', 'festival'],
  ['animals', 'animal'],
  ['pets', 'animal'],
  ['books', 'book'],
  ['reading', 'book'],
  ['movies', 'movie'],
  ['films', 'movie'],
  ['dreams', 'dream'],
]);

// Shorter fragments match too many labels to be useful.
const minFragmentLength = (key: string) => (/^[\x20-\x7e]+$/.test(key) ? 3 : 2);

const resolveTag = (value: string | undefined, aliases: Map<string, string>): string | undefined => {
  const trimmed = value?.trim().toLowerCase();
  if (!trimmed) {
    return undefined;
  }

  const key = normalizeKey(trimmed);
  const exact = aliases.get(key);
  if (exact) {
    return exact;
  }

  if (key.length >= minFragmentLength(key)) {
    const matches = new Set<string>();
    for (const [alias, canonical] of aliases) {
      if (alias.includes(key)) {
        matches.add(canonical);
      }
    }
    if (matches.size === 1) {
      const [only] = matches;
      return only;
    }
  }

  // Labels outside the vocabulary stay usable as exact tags.
  return trimmed;
};

/**
 * Maps a genre label to its canonical tag: English or Chinese names, and a
 * fragment that identifies exactly one genre (`argu`, `记叙`).
 */
export const normalizeGenre = (value: string | undefined) => resolveTag(value, GENRE_ALIASES);

/** Same as {@link normalizeGenre} for topics; common plurals resolve too. */
export const normalizeTopic = (value: string | undefined) => resolveTag(value, TOPIC_ALIASES);
