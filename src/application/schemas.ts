import { z } from 'zod';
import type { SchemaKey } from './schema-key.js';
import { SchemaRegistry } from './schema-validator.js';

/** Vendor of the schemas this pipeline owns. */
export const PIPELINE_VENDOR = 'dev.hookline';

/** Body of a tracker-protocol v2 POST: one object of string fields per event. */
export const PAYLOAD_DATA_SCHEMA: SchemaKey = {
  vendor: PIPELINE_VENDOR,
  name: 'payload_data',
  format: 'jsonschema',
  version: '1-0-4',
};

/** Self-describing wrapper around a reconstructed structured event. */
export const UNSTRUCT_EVENT_SCHEMA: SchemaKey = {
  vendor: PIPELINE_VENDOR,
  name: 'unstruct_event',
  format: 'jsonschema',
  version: '1-0-0',
};

export const CALLRAIL_CALL_COMPLETE_SCHEMA: SchemaKey = {
  vendor: 'com.callrail',
  name: 'call_complete',
  format: 'jsonschema',
  version: '1-0-2',
};

export const payloadDataSchema = z
  .array(z.record(z.string(), z.string()))
  .min(1, 'Must contain at least one event');

export const unstructEventSchema = z.object({
  schema: z.string().startsWith('iglu:'),
  data: z.object({
    schema: z.string().startsWith('iglu:'),
    data: z.record(z.string(), z.unknown()),
  }),
});

const optionalText = z.string().nullable().optional();

/**
 * CallRail call-complete webhook after coercion.
 *
 * Only the typed fields are constrained; CallRail adds fields over time,
 * so anything else passes through.
 */
export const callCompleteSchema = z
  .object({
    id: optionalText,
    answered: z.boolean().nullable().optional(),
    first_call: z.boolean().nullable().optional(),
    duration: z.number().int().nullable().optional(),
    datetime: z.string().datetime().nullable().optional(),
    callernum: optionalText,
    callername: optionalText,
    callercity: optionalText,
    callerstate: optionalText,
    callercountry: optionalText,
    trackingnum: optionalText,
    destinationnum: optionalText,
    recording: optionalText,
    referrer: optionalText,
    landingpage: optionalText,
  })
  .passthrough();

/** Registry holding every schema the built-in adapters refer to. */
export function createDefaultSchemaRegistry(): SchemaRegistry {
  return new SchemaRegistry()
    .register(PAYLOAD_DATA_SCHEMA, payloadDataSchema)
    .register(UNSTRUCT_EVENT_SCHEMA, unstructEventSchema)
    .register(CALLRAIL_CALL_COMPLETE_SCHEMA, callCompleteSchema);
}
