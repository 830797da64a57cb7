export const GRADE_TIERS = ['primary', 'middle', 'high'] as const;
export type GradeTier = (typeof GRADE_TIERS)[number];

export const PROFICIENCY_LEVELS = ['beginner', 'intermediate', 'advanced'] as const;
export type ProficiencyLevel = (typeof PROFICIENCY_LEVELS)[number];

export type WordBounds = {
  minWords: number;
  maxWords: number;
};

export const GRADE_TIER_WORD_BOUNDS: Record<GradeTier, WordBounds> = {
  primary: { minWords: 30, maxWords: 100 },
  middle: { minWords: 80, maxWords: 180 },
  high: { minWords: 150, maxWords: 300 },
};

const TIER_ALIASES = new Map<string, GradeTier>([
  ['primary', 'primary'],
  ['primary_school', 'primary'],
  ['elementary', 'primary'],
  ['elementary_school', 'primary'],
  ['小学', 'primary'],
  ['middle', 'middle'],
  ['middle_school', 'middle'],
  ['junior_high', 'middle'],
  ['junior_high_school', 'middle'],
  ['初中', 'middle'],
  ['high', 'high'],
  ['high_school', 'high'],
  ['senior_high', 'high'],
  ['senior_high_school', 'high'],
  ['高中', 'high'],
]);

const LEVEL_ALIASES = new Map<string, ProficiencyLevel>([
  ['beginner', 'beginner'],
  ['basic', 'beginner'],
  ['elementary', 'beginner'],
  ['初级', 'beginner'],
  ['基础', 'beginner'],
  ['intermediate', 'intermediate'],
  ['medium', 'intermediate'],
  ['中级', 'intermediate'],
  ['中等', 'intermediate'],
  ['advanced', 'advanced'],
  ['高级', 'advanced'],
  ['进阶', 'advanced'],
]);

export const normalizeKey = (value: string) =>
  value.trim().toLowerCase().replace(/[\s-]+/g, '_');

/**
 * Maps a grade label to its tier. Year suffixes are dropped, so
 * `middle_school_2` and `High School 1` resolve like their school names.
 */
export const normalizeGradeTier = (value: string): GradeTier | null => {
  const key = normalizeKey(value);
  return TIER_ALIASES.get(key) ?? TIER_ALIASES.get(key.replace(/_?\d+$/, '')) ?? null;
};

export const normalizeProficiencyLevel = (value: string): ProficiencyLevel | null =>
  LEVEL_ALIASES.get(normalizeKey(value)) ?? null;

export const wordBoundsFor = (tier: GradeTier): WordBounds => GRADE_TIER_WORD_BOUNDS[tier];
