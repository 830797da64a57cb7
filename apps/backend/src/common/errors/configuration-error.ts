import { ValidationError, type ValidationField } from './validation-error';

/**
 * Malformed configuration: rubric weights that do not sum to 1, word bounds
 * out of order, embeddings of the wrong dimension. Raised where the value is
 * constructed, never where it is consumed.
 */
export class ConfigurationError extends ValidationError {
  constructor(message: string, fields?: ValidationField[]) {
    super(message, fields, 'CONFIGURATION_ERROR');
  }
}
