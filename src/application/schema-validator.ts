import type { ZodIssue, ZodTypeAny } from 'zod';
import type { NormalizationError, ValidationOutcome } from '../domain/index.js';
import { errorMessages, fail, fromArray, invalid, normalizationError, valid } from '../domain/index.js';
import type { SchemaKey } from './schema-key.js';
import { parseSchemaUri, toSchemaUri } from './schema-key.js';

/**
 * Checks a JSON document against a declared schema.
 *
 * Passed explicitly into every normalization call so callers (and tests)
 * choose the implementation. Must not throw.
 */
export interface SchemaValidator {
  validate(document: unknown, schema: SchemaKey): ValidationOutcome<unknown>;
}

/** `$[0].payload.url` style path for a zod issue. */
function formatPath(path: ZodIssue['path']): string {
  return path.reduce<string>(
    (acc, segment) => (typeof segment === 'number' ? `${acc}[${segment}]` : `${acc}.${segment}`),
    '$',
  );
}

/**
 * In-process schema registry backed by zod schemas, keyed by schema URI.
 */
export class SchemaRegistry implements SchemaValidator {
  private readonly schemas: Map<string, ZodTypeAny> = new Map();

  /** Throws when the key does not form a well-formed schema URI. */
  register(key: SchemaKey, schema: ZodTypeAny): this {
    const uri = toSchemaUri(key);
    const parsed = parseSchemaUri(uri);
    if (!parsed.valid) {
      throw new Error(errorMessages(parsed).join('; '));
    }
    this.schemas.set(uri, schema);
    return this;
  }

  validate(document: unknown, key: SchemaKey): ValidationOutcome<unknown> {
    const uri = toSchemaUri(key);
    const schema = this.schemas.get(uri);

    if (schema === undefined) {
      return fail('SchemaViolation', `Could not find schema ${uri} in registry`);
    }

    const parsed = schema.safeParse(document);
    if (parsed.success) {
      return valid(parsed.data);
    }

    const errors: NormalizationError[] = parsed.error.issues.map((issue) =>
      normalizationError('SchemaViolation', `${uri} ${formatPath(issue.path)}: ${issue.message}`),
    );
    const nonEmpty = fromArray(errors);
    return nonEmpty
      ? invalid(nonEmpty)
      : fail('SchemaViolation', `${uri}: document rejected`);
  }
}
