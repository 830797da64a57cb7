import type { GradeTier, ProficiencyLevel } from '../prompts/grade-tiers';
import type { Dimension } from './dimensions';

export const JUDGMENT_CLIENT = Symbol('JUDGMENT_CLIENT');

export type JudgmentPromptContext = {
  title: string;
  prompt: string;
  gradeTier: GradeTier;
  level: ProficiencyLevel;
  requirements: readonly string[];
  keywords: readonly string[];
};

export type JudgmentRequest = {
  dimension: Dimension;
  essayText: string;
  prompt: JudgmentPromptContext;
  /** Extra, dimension-specific notes for the judge (checker findings, metrics). */
  rubricGuidance?: string;
};

export type Judgment = {
  score: number;
  feedback: string;
  issues: string[];
  suggestions: string[];
};

export type JudgeOptions = {
  signal?: AbortSignal;
};

export interface JudgmentClient {
  /** Resolves with a score in `[0, ceiling]` or rejects with `JudgmentUnavailableError`. */
  judge(request: JudgmentRequest, options?: JudgeOptions): Promise<Judgment>;
  isConfigured(): boolean;
}
