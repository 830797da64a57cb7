import { existsSync } from 'fs';
import { resolve } from 'path';

/**
 * Locates a file shipped beside the sources (prompt texts, JSON schemas, word
 * lists). Works from the repo root, from `apps/backend`, and from compiled output.
 */
export const resolveAssetPath = (relativePath: string): string => {
  const candidates = [
    resolve(process.cwd(), 'apps', 'backend', 'src', relativePath),
    resolve(process.cwd(), 'src', relativePath),
    resolve(__dirname, '..', '..', relativePath),
  ];

  for (const candidate of candidates) {
    if (existsSync(candidate)) {
      return candidate;
    }
  }

  throw new Error(`Missing asset: ${relativePath}`);
};

/** Same lookup for files under `apps/backend/data`; returns null when absent. */
export const findDataFile = (relativePath: string): string | null => {
  const candidates = [
    resolve(process.cwd(), 'apps', 'backend', 'data', relativePath),
    resolve(process.cwd(), 'data', relativePath),
    resolve(__dirname, '..', '..', '..', 'data', relativePath),
  ];
  return candidates.find((candidate) => existsSync(candidate)) ?? null;
};
