/**
 * Failure taxonomy for payload normalization.
 *
 * - EmptyInput / ContentTypeMismatch: request preconditions (fail-fast)
 * - BodyParseError / SchemaViolation / EmptyEventBatch: structural (fail-fast)
 * - FieldTypeError: per-field, accumulated across a whole batch
 * - CoercionFailure: per-field, dropped unless the adapter opts into failing
 * - UnsupportedAdapter: no adapter registered for the vendor/version
 */
export type ErrorKind =
  | 'EmptyInput'
  | 'ContentTypeMismatch'
  | 'BodyParseError'
  | 'SchemaViolation'
  | 'FieldTypeError'
  | 'EmptyEventBatch'
  | 'CoercionFailure'
  | 'UnsupportedAdapter';

export interface NormalizationError {
  readonly kind: ErrorKind;
  readonly message: string;
}

export function normalizationError(kind: ErrorKind, message: string): NormalizationError {
  return { kind, message };
}
