import type { PayloadEnvelope } from '../../domain/index.js';
import { map, mapNonEmpty, toRawEvent } from '../../domain/index.js';
import type { BodyParserOptions } from '../schema-validating-parser.js';
import { parseEnvelope } from '../schema-validating-parser.js';
import type { SchemaValidator } from '../schema-validator.js';
import { PAYLOAD_DATA_SCHEMA, PIPELINE_VENDOR } from '../schemas.js';
import type { Adapter, RawEventsOutcome } from './types.js';

export const JSON_CONTENT_TYPES: readonly string[] = [
  'application/json',
  'application/json; charset=utf-8',
  'application/json; charset=UTF-8',
];

const BODY_OPTIONS: BodyParserOptions = {
  bodySchema: PAYLOAD_DATA_SCHEMA,
  allowedContentTypes: JSON_CONTENT_TYPES,
};

/**
 * Tracker protocol v2: GET with a querystring, or POST with a JSON array
 * of events (querystring parameters may still be present and win on
 * collision).
 */
export function createTrackerProtocolV2Adapter(options: BodyParserOptions = BODY_OPTIONS): Adapter {
  return {
    vendor: PIPELINE_VENDOR,
    version: 'tp2',

    toRawEvents(envelope: PayloadEnvelope, validator: SchemaValidator): RawEventsOutcome {
      return map(parseEnvelope(envelope, validator, options), (paramsList) =>
        mapNonEmpty(paramsList, (params) => toRawEvent(envelope, params)),
      );
    },
  };
}
