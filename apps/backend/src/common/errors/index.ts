export { BaseAppError } from './base-app-error';
export { BadRequestError, NotFoundError, ConflictError } from './http-errors';
export { ValidationError, type ValidationField } from './validation-error';
export { ConfigurationError } from './configuration-error';
