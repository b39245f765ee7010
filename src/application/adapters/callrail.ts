import type { PayloadEnvelope } from '../../domain/index.js';
import { fail, map, one, toRawEvent } from '../../domain/index.js';
import type { FieldTypePlan } from '../parameter-coercion.js';
import { createCoercionFormatter } from '../parameter-coercion.js';
import { toParameterMap } from '../querystring.js';
import { CALLRAIL_CALL_COMPLETE_SCHEMA } from '../schemas.js';
import type { StructuredEventTarget } from '../structured-event.js';
import { toStructuredEventParameters } from '../structured-event.js';
import type { Adapter, RawEventsOutcome } from './types.js';

const TARGET: StructuredEventTarget = {
  trackerVersion: 'com.callrail-v1',
  schema: CALLRAIL_CALL_COMPLETE_SCHEMA,
  platform: 'srv',
};

/**
 * CallRail sends everything as strings. Values that fail to coerce are
 * dropped: the format is not contractually fixed and a partial call
 * record is still useful downstream.
 */
export const CALLRAIL_FIELD_PLAN: FieldTypePlan = {
  booleans: ['first_call', 'answered'],
  integers: ['duration'],
  datetimes: { fields: ['datetime'], pattern: 'yyyy-MM-dd HH:mm:ss' },
  onFailure: 'drop',
};

/**
 * CallRail call-complete webhook. One event per request, on the
 * querystring; reconstructed as a structured event.
 */
export function createCallrailAdapter(plan: FieldTypePlan = CALLRAIL_FIELD_PLAN): Adapter {
  const formatter = createCoercionFormatter(plan);

  return {
    vendor: 'com.callrail',
    version: 'v1',

    toRawEvents(envelope: PayloadEnvelope): RawEventsOutcome {
      const params = toParameterMap(envelope.querystring);
      if (Object.keys(params).length === 0) {
        return fail('EmptyInput', 'Querystring is empty: no CallRail event to process');
      }

      return map(toStructuredEventParameters(TARGET, params, formatter), (parameters) =>
        one(toRawEvent(envelope, parameters)),
      );
    },
  };
}
