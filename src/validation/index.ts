export { MetadataValidator } from './validator.js';
export { coerce, isBlankCell, rawToText } from './coerce.js';
export type { Coercion } from './coerce.js';
export { IssueKind } from './types.js';
export type {
  TypedValue,
  ValidationIssue,
  ValidatedRecord,
  ValidationResult,
  ValidateOptions,
} from './types.js';
