export { TabulaError, InvalidInputError, TaskAbortedError } from './tabula-error.js';
export { TableValidationError, TABLE_ERROR_TYPES } from './table-validation-error.js';
export type { TableErrorType, TableErrorLocation } from './table-validation-error.js';
export { CompilationError } from './compilation-error.js';
export type { CompilationIssue } from './compilation-error.js';
export { EvaluationError, UnknownRuleSetError } from './evaluation-error.js';
export type { EvaluationErrorDetails } from './evaluation-error.js';
