import type { Dimension } from '../judgment/dimensions';
import type { PromptRecord } from '../prompts/prompt.types';
import type { PatternIssue } from '../text-metrics';

export type DimensionStatus = 'judged' | 'degraded' | 'unavailable';

export type DimensionScore = Readonly<{
  dimension: Dimension;
  status: DimensionStatus;
  /** null only when the dimension is unavailable. */
  score: number | null;
  ceiling: number;
  feedback: string;
  issues: readonly string[];
  suggestions: readonly string[];
}>;

export type NoteSource = Dimension | 'length';

export type TaggedNote = Readonly<{
  source: NoteSource;
  text: string;
}>;

/** What the pipeline needs from a prompt; corpus records and inline prompts both fit. */
export type EssayPrompt = Pick<
  PromptRecord,
  'title' | 'prompt' | 'gradeTier' | 'level' | 'requirements' | 'keywords'
> & {
  id?: string;
};

export type GradingResult = Readonly<{
  overallScore: number;
  dimensions: Readonly<Record<Dimension, DimensionScore>>;
  grammarErrors: readonly PatternIssue[];
  issues: readonly TaggedNote[];
  suggestions: readonly TaggedNote[];
  overallFeedback: string;
  wordCount: number;
  sentenceCount: number;
  characterCount: number;
  lexicalDiversity: number;
  lengthCompliant: boolean;
  degraded: boolean;
  degradedDimensions: readonly Dimension[];
  unavailableDimensions: readonly Dimension[];
  promptId: string | null;
}>;

export type EvaluateOptions = {
  signal?: AbortSignal;
};
