export type {
  PayloadApi,
  QuerystringPair,
  PayloadSource,
  PayloadContext,
  PayloadEnvelope,
  ParameterMap,
  RawEvent,
} from './payload.js';
export { toRawEvent } from './payload.js';
export type { NonEmptyArray } from './non-empty.js';
export { isNonEmpty, one, fromArray, mapNonEmpty } from './non-empty.js';
export type { ErrorKind, NormalizationError } from './errors.js';
export { normalizationError } from './errors.js';
export type { ValidationOutcome, Partitioned } from './validation.js';
export {
  valid,
  invalid,
  fail,
  andThen,
  map,
  partition,
  errorMessages,
} from './validation.js';
