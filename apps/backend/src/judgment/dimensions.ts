export const DIMENSIONS = ['grammar', 'vocabulary', 'content'] as const;
export type Dimension = (typeof DIMENSIONS)[number];

/** Maximum points per dimension; the three add up to 100. */
export const DIMENSION_CEILINGS: Readonly<Record<Dimension, number>> = Object.freeze({
  grammar: 30,
  vocabulary: 30,
  content: 40,
});
