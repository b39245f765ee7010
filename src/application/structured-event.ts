import type { ParameterMap, ValidationOutcome } from '../domain/index.js';
import { fromArray, invalid, valid } from '../domain/index.js';
import type { CoercionFormatter } from './parameter-coercion.js';
import type { SchemaKey } from './schema-key.js';
import { toSchemaUri } from './schema-key.js';
import { UNSTRUCT_EVENT_SCHEMA } from './schemas.js';

/** Tracker keys copied from the raw parameters onto the event as-is. */
const PASS_THROUGH_KEYS = ['nuid', 'aid', 'cv', 'eid', 'ttm', 'url'] as const;

/** Identity of the structured event an adapter reconstructs. */
export interface StructuredEventTarget {
  /** Tracker tag recorded as `tv`, e.g. `com.callrail-v1`. */
  readonly trackerVersion: string;
  readonly schema: SchemaKey;
  /** Platform recorded as `p` when the raw parameters carry none. */
  readonly platform: string;
}

/**
 * Repackages raw webhook parameters as a self-describing structured event.
 *
 * The coerced fields go into `ue_pr` as typed JSON, wrapped twice: the
 * outer schema is the unstructured-event envelope, the inner one the
 * adapter's own event schema.
 */
export function toStructuredEventParameters(
  target: StructuredEventTarget,
  raw: ParameterMap,
  formatter: CoercionFormatter,
): ValidationOutcome<ParameterMap> {
  const { parameters, failures } = formatter.format(raw);

  const errors = formatter.policy === 'fail' ? fromArray(failures) : undefined;
  if (errors) {
    return invalid(errors);
  }

  const ue_pr = JSON.stringify({
    schema: toSchemaUri(UNSTRUCT_EVENT_SCHEMA),
    data: {
      schema: toSchemaUri(target.schema),
      data: formatter.toTypedFields(parameters),
    },
  });

  const passThrough: Record<string, string> = {};
  for (const key of PASS_THROUGH_KEYS) {
    const value = raw[key];
    if (value !== undefined) {
      passThrough[key] = value;
    }
  }

  return valid({
    tv: target.trackerVersion,
    e: 'ue',
    p: raw['p'] ?? target.platform,
    ue_pr,
    ...passThrough,
  });
}
