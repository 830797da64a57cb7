export const cosineSimilarity = (a: readonly number[], b: readonly number[]): number => {
  if (a.length !== b.length || a.length === 0) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator === 0 ? 0 : dot / denominator;
};

/**
 * Identifier order used for tie-breaks: all-digit ids compare numerically,
 * everything else by code unit, so the order does not depend on locale.
 */
export const compareIds = (a: string, b: string): number => {
  if (/^\d+$/.test(a) && /^\d+$/.test(b)) {
    const diff = Number(a) - Number(b);
    if (diff !== 0) {
      return diff;
    }
  }
  return a < b ? -1 : a > b ? 1 : 0;
};
