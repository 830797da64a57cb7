import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigurationError, type ValidationField } from '../common/errors';
import { compileSchemaValidator } from '../common/utils/schema-validate';
import { EMBEDDING_PROVIDER, type EmbeddingProvider } from '../embeddings';
import { wordBoundsFor } from './grade-tiers';
import { normalizeGenre, normalizeTopic } from './prompt-tags';
import {
  RELAXATION_CHAIN,
  createCriteria,
  type CorpusSearchResult,
  type EvaluationCriteria,
  type PromptDraft,
  type PromptRecord,
  type RelaxationTier,
  type SearchHit,
} from './prompt.types';
import { DuplicateIdError, MalformedImportError } from './prompts.errors';
import { compareIds, cosineSimilarity } from './similarity';

type PromptRecordJson = PromptDraft & {
  requirements: string[];
  keywords: string[];
  embedding: number[];
  minWords?: number;
  maxWords?: number;
};

export type SearchOptions = {
  /** When false, only the exact filter stage runs. */
  relax?: boolean;
  signal?: AbortSignal;
};

export type ImportOptions = {
  /** Replace the whole corpus instead of appending. */
  replace?: boolean;
};

const validateRecordJson = compileSchemaValidator<PromptRecordJson>(
  'prompts/schemas/prompt-record.schema.json',
);

/** Text embedded for a record: every field a learner-facing query might touch. */
export const buildPromptDocument = (draft: PromptDraft): string => {
  const lines = [
    `Title: ${draft.title}`,
    `Prompt: ${draft.prompt}`,
    `Grade: ${draft.gradeTier}`,
    `Level: ${draft.level}`,
    `Genre: ${draft.genre}`,
    `Topic: ${draft.topic}`,
  ];
  if (draft.requirements?.length) {
    lines.push('Requirements:', ...draft.requirements.map((requirement) => `- ${requirement}`));
  }
  if (draft.keywords?.length) {
    lines.push(`Keywords: ${draft.keywords.join(', ')}`);
  }
  return lines.join('\n');
};

const matchesStage = (
  record: PromptRecord,
  criteria: EvaluationCriteria,
  stage: RelaxationTier,
): boolean => {
  switch (stage) {
    case 'exact':
      return (
        record.gradeTier === criteria.gradeTier &&
        record.level === criteria.level &&
        (!criteria.genre || record.genre === criteria.genre) &&
        (!criteria.topic || record.topic === criteria.topic)
      );
    case 'genre-topic':
      return record.gradeTier === criteria.gradeTier && record.level === criteria.level;
    case 'level':
      return record.gradeTier === criteria.gradeTier;
    case 'tier':
      return true;
  }
};

/**
 * In-memory prompt store.
 *
 * Storage is copy-on-write: every mutation builds a new frozen array and swaps
 * it in with a single assignment after its last `await`, so readers holding a
 * snapshot never see a half-applied insert or import. The embedding dimension
 * is the provider's and is fixed for the lifetime of the instance.
 */
@Injectable()
export class PromptCorpusService {
  private readonly logger = new Logger(PromptCorpusService.name);
  private readonly dimension: number;
  private records: readonly PromptRecord[] = Object.freeze([]);

  constructor(@Inject(EMBEDDING_PROVIDER) private readonly embeddings: EmbeddingProvider) {
    this.dimension = embeddings.getDimensions();
  }

  async insert(draft: PromptDraft): Promise<PromptRecord> {
    if (this.findById(draft.id)) {
      throw new DuplicateIdError(draft.id);
    }

    const embedding = draft.embedding
      ? [...draft.embedding]
      : await this.embeddings.embed(buildPromptDocument(draft));
    this.assertDimension(embedding, 'embedding');
    const record = this.freezeRecord({ ...draft, embedding });

    // Re-check against the current snapshot: another insert may have landed while embedding.
    const snapshot = this.records;
    if (snapshot.some((existing) => existing.id === record.id)) {
      throw new DuplicateIdError(record.id);
    }
    this.records = Object.freeze([...snapshot, record]);
    this.logger.debug(`Inserted prompt ${record.id} (${this.records.length} total)`);
    return record;
  }

  async search(
    criteria: EvaluationCriteria,
    queryText?: string,
    k = 1,
    options: SearchOptions = {},
  ): Promise<CorpusSearchResult> {
    const snapshot = this.records;
    if (!snapshot.length) {
      return { hits: [], relaxation: null };
    }

    const filter = createCriteria(criteria);
    const stages = options.relax === false ? RELAXATION_CHAIN.slice(0, 1) : RELAXATION_CHAIN;
    let survivors: PromptRecord[] = [];
    let relaxation: RelaxationTier | null = null;
    for (const stage of stages) {
      survivors = snapshot.filter((record) => matchesStage(record, filter, stage));
      if (survivors.length) {
        relaxation = stage;
        break;
      }
    }
    if (!survivors.length) {
      return { hits: [], relaxation: null };
    }

    const query = queryText?.trim();
    let queryEmbedding: number[] | null = null;
    if (query) {
      queryEmbedding = await this.embeddings.embed(query, options.signal);
      this.assertDimension(queryEmbedding, 'query');
    }

    const hits: SearchHit[] = survivors
      .map((record) => ({
        record,
        similarity: queryEmbedding ? cosineSimilarity(queryEmbedding, record.embedding) : null,
      }))
      .sort(
        (a, b) => (b.similarity ?? 0) - (a.similarity ?? 0) || compareIds(a.record.id, b.record.id),
      );

    const limit = Number.isFinite(k) ? Math.max(1, Math.floor(k)) : 1;
    return { hits: hits.slice(0, limit), relaxation };
  }

  getAll(): readonly PromptRecord[] {
    return this.records;
  }

  findById(id: string): PromptRecord | undefined {
    return this.records.find((record) => record.id === id);
  }

  count(): number {
    return this.records.length;
  }

  clear(): void {
    this.records = Object.freeze([]);
  }

  exportJson(): string {
    return JSON.stringify(this.records, null, 2);
  }

  /**
   * Loads records carrying their embeddings. Every record is checked before
   * anything is stored; on any failure the corpus keeps its previous contents.
   */
  importJson(data: unknown, options: ImportOptions = {}): number {
    let payload = data;
    if (typeof data === 'string') {
      try {
        payload = JSON.parse(data);
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Invalid JSON';
        throw new MalformedImportError('Import payload is not valid JSON', [{ field: '/', message }]);
      }
    }
    if (!Array.isArray(payload)) {
      throw new MalformedImportError('Import payload must be an array of prompt records', [
        { field: '/', message: 'must be array' },
      ]);
    }

    const existing = options.replace ? [] : this.records;
    const seen = new Set(existing.map((record) => record.id));
    const fields: ValidationField[] = [];
    const incoming: PromptRecord[] = [];

    payload.forEach((item: unknown, index) => {
      const result = validateRecordJson(item);
      if (!result.valid) {
        fields.push(
          ...result.fields.map((field) => ({
            field: `/${index}${field.field === '/' ? '' : field.field}`,
            message: field.message,
          })),
        );
        return;
      }

      const record = result.value;
      if (seen.has(record.id)) {
        fields.push({ field: `/${index}/id`, message: `duplicate id "${record.id}"` });
        return;
      }
      if (record.embedding.length !== this.dimension) {
        fields.push({
          field: `/${index}/embedding`,
          message: `must have ${this.dimension} dimensions, got ${record.embedding.length}`,
        });
        return;
      }
      seen.add(record.id);
      incoming.push(this.freezeRecord(record));
    });

    if (fields.length) {
      throw new MalformedImportError(
        `Import rejected: ${fields.length} problem(s) in ${payload.length} record(s)`,
        fields,
      );
    }

    this.records = Object.freeze([...(options.replace ? [] : this.records), ...incoming]);
    this.logger.log(`Imported ${incoming.length} prompt(s) (${this.records.length} total)`);
    return incoming.length;
  }

  private assertDimension(embedding: readonly number[], field: string): void {
    if (embedding.length !== this.dimension || !embedding.every(Number.isFinite)) {
      throw new ConfigurationError(
        `Embedding must be ${this.dimension} finite numbers, got ${embedding.length} values`,
        [{ field, message: `expected ${this.dimension} dimensions` }],
      );
    }
  }

  private freezeRecord(draft: PromptDraft & { embedding: readonly number[] }): PromptRecord {
    const bounds = wordBoundsFor(draft.gradeTier);
    return Object.freeze({
      id: draft.id,
      title: draft.title,
      prompt: draft.prompt,
      gradeTier: draft.gradeTier,
      level: draft.level,
      genre: normalizeGenre(draft.genre) ?? draft.genre,
      topic: normalizeTopic(draft.topic) ?? draft.topic,
      requirements: Object.freeze([...(draft.requirements ?? [])]),
      keywords: Object.freeze([...(draft.keywords ?? [])]),
      embedding: Object.freeze([...draft.embedding]),
      minWords: bounds.minWords,
      maxWords: bounds.maxWords,
    });
  }
}
