import type { PayloadEnvelope } from '../../domain/index.js';
import { fail, one, toRawEvent, valid } from '../../domain/index.js';
import { toParameterMap } from '../querystring.js';
import { PIPELINE_VENDOR } from '../schemas.js';
import type { Adapter, RawEventsOutcome } from './types.js';

/** Tracker protocol v1: exactly one event, carried on the querystring. */
export function createTrackerProtocolV1Adapter(): Adapter {
  return {
    vendor: PIPELINE_VENDOR,
    version: 'tp1',

    toRawEvents(envelope: PayloadEnvelope): RawEventsOutcome {
      const params = toParameterMap(envelope.querystring);
      if (Object.keys(params).length === 0) {
        return fail('EmptyInput', 'Querystring is empty: no raw event to process');
      }
      return valid(one(toRawEvent(envelope, params)));
    },
  };
}
