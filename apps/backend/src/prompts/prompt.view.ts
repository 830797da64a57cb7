import type { PromptRecord } from './prompt.types';

export type PromptView = Omit<PromptRecord, 'embedding'>;

/** Records as clients see them: embeddings stay inside the corpus. */
export const toPromptView = ({ embedding: _embedding, ...rest }: PromptRecord): PromptView => rest;
