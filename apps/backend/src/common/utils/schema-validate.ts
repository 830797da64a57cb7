import { readFileSync } from 'fs';
import Ajv, { type ErrorObject } from 'ajv';
import type { ValidationField } from '../errors';
import { resolveAssetPath } from './asset-path';

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });

export type SchemaValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; errors: string; fields: ValidationField[] };

export type SchemaValidator<T> = (data: unknown) => SchemaValidationResult<T>;

const toField = (error: ErrorObject): ValidationField => {
  const missing =
    error.keyword === 'required' && typeof error.params.missingProperty === 'string'
      ? `/${error.params.missingProperty}`
      : '';
  return {
    field: `${error.instancePath}${missing}` || '/',
    message: error.message || error.keyword,
  };
};

/**
 * Compiles the JSON schema at `schemaPath` (relative to `src/`) once. The
 * returned validator narrows `data` to `T` on success and reports per-field
 * errors otherwise.
 */
export const compileSchemaValidator = <T>(schemaPath: string): SchemaValidator<T> => {
  const schema = JSON.parse(readFileSync(resolveAssetPath(schemaPath), 'utf-8')) as object;
  const validate = ajv.compile<T>(schema);

  return (data: unknown) => {
    if (validate(data)) {
      return { valid: true, value: data };
    }
    const errors = validate.errors ?? [];
    return {
      valid: false,
      errors: errors.length ? ajv.errorsText(errors, { separator: '; ' }) : 'Invalid schema',
      fields: errors.map(toField),
    };
  };
};
