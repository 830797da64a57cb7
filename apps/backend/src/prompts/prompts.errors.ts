import { ConflictError, NotFoundError, ValidationError, type ValidationField } from '../common/errors';
import type { EvaluationCriteria } from './prompt.types';

export class DuplicateIdError extends ConflictError {
  constructor(public readonly promptId: string) {
    super(`Prompt "${promptId}" already exists`, 'DUPLICATE_ID');
  }
}

export class NoMatchError extends NotFoundError {
  constructor(public readonly criteria: EvaluationCriteria) {
    super(
      `No prompt matches grade tier "${criteria.gradeTier}" even after relaxing every filter`,
      'NO_MATCH',
    );
  }
}

export class PromptNotFoundError extends NotFoundError {
  constructor(promptId: string) {
    super(`Prompt "${promptId}" does not exist`, 'PROMPT_NOT_FOUND');
  }
}

/** The corpus is untouched when this is thrown. */
export class MalformedImportError extends ValidationError {
  constructor(message: string, fields: ValidationField[]) {
    super(message, fields, 'MALFORMED_IMPORT');
  }
}
