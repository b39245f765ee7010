import type {
  NonEmptyArray,
  NormalizationError,
  ParameterMap,
  PayloadEnvelope,
  ValidationOutcome,
} from '../domain/index.js';
import {
  andThen,
  fail,
  fromArray,
  invalid,
  normalizationError,
  one,
  partition,
  valid,
} from '../domain/index.js';
import type { SchemaKey } from './schema-key.js';
import type { SchemaValidator } from './schema-validator.js';
import { mergeParameters, toParameterMap } from './querystring.js';

/** Per-adapter configuration of the body parser. */
export interface BodyParserOptions {
  readonly bodySchema: SchemaKey;
  readonly allowedContentTypes: readonly string[];
}

/** Parses a JSON body, failing with the parser's reason. */
export function extractJson(field: string, text: string): ValidationOutcome<unknown> {
  try {
    return valid(JSON.parse(text));
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    return fail('BodyParseError', `Field [${field}]: invalid JSON [${text}] with parsing error: ${reason}`);
  }
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Reads one field of a body event as a string parameter. */
function toParameter(key: string, value: unknown): ValidationOutcome<readonly [string, string]> {
  if (typeof value === 'string') {
    return valid([key, value] as const);
  }
  return fail('FieldTypeError', `Value for key ${key} is not a string`);
}

/**
 * Turns a validated body document into one parameter map per event,
 * each with the querystring parameters merged over it.
 *
 * Field errors are accumulated across all events; any error rejects the
 * whole batch.
 */
export function toParameterMaps(
  document: unknown,
  mergeWith: ParameterMap,
): ValidationOutcome<NonEmptyArray<ParameterMap>> {
  if (!Array.isArray(document)) {
    return fail('SchemaViolation', 'Body is not an array of events');
  }

  const maps: ParameterMap[] = [];
  const failures: NormalizationError[] = [];

  document.forEach((event: unknown, index) => {
    if (!isJsonObject(event)) {
      failures.push(normalizationError('FieldTypeError', `Event at index ${index} is not an object`));
      return;
    }

    const fields = partition(Object.entries(event).map(([key, value]) => toParameter(key, value)));
    failures.push(...fields.failures);
    maps.push(mergeParameters(Object.fromEntries(fields.successes), mergeWith));
  });

  const errors = fromArray(failures);
  if (errors) {
    return invalid(errors);
  }

  const events = fromArray(maps);
  if (!events) {
    return fail('EmptyEventBatch', 'List of events is empty, which indicates a schema contract change');
  }
  return valid(events);
}

/**
 * Converts an envelope into one or more parameter maps.
 *
 * Order:
 * 1) Flatten the querystring (later keys win)
 * 2) Check body / content type preconditions, first violation wins
 * 3) Parse the body as JSON
 * 4) Validate against the body schema
 * 5) Read every event's fields, accumulating type errors
 * 6) Merge the querystring over each event
 */
export function parseEnvelope(
  envelope: PayloadEnvelope,
  validator: SchemaValidator,
  options: BodyParserOptions,
): ValidationOutcome<NonEmptyArray<ParameterMap>> {
  const qsParams = toParameterMap(envelope.querystring);
  const allowed = options.allowedContentTypes.join(', ');
  const { body, contentType } = envelope;

  if (body === undefined && Object.keys(qsParams).length === 0) {
    return fail('EmptyInput', 'Request body and querystring parameters empty, expected at least one populated');
  }
  if (contentType !== undefined && !options.allowedContentTypes.includes(contentType)) {
    return fail('ContentTypeMismatch', `Content type of ${contentType} provided, expected one of: ${allowed}`);
  }
  if (body !== undefined && contentType === undefined) {
    return fail('ContentTypeMismatch', `Request body provided but content type empty, expected one of: ${allowed}`);
  }
  if (body === undefined && contentType !== undefined) {
    return fail('ContentTypeMismatch', `Content type of ${contentType} provided but request body empty`);
  }
  if (body === undefined) {
    return valid(one(qsParams));
  }

  return andThen(
    andThen(extractJson('Body', body), (json) => validator.validate(json, options.bodySchema)),
    (document) => toParameterMaps(document, qsParams),
  );
}
