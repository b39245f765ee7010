export type { SchemaKey } from './schema-key.js';
export { toSchemaUri, parseSchemaUri } from './schema-key.js';
export type { SchemaValidator } from './schema-validator.js';
export { SchemaRegistry } from './schema-validator.js';
export {
  PIPELINE_VENDOR,
  PAYLOAD_DATA_SCHEMA,
  UNSTRUCT_EVENT_SCHEMA,
  CALLRAIL_CALL_COMPLETE_SCHEMA,
  createDefaultSchemaRegistry,
} from './schemas.js';
export { toParameterMap, parseQuerystring, mergeParameters } from './querystring.js';
export type { BodyParserOptions } from './schema-validating-parser.js';
export { parseEnvelope, extractJson, toParameterMaps } from './schema-validating-parser.js';
export type { DatetimePattern } from './datetime-pattern.js';
export { compileDatetimePattern, isCanonicalTimestamp } from './datetime-pattern.js';
export type {
  FieldTypePlan,
  DatetimeFields,
  CoercionPolicy,
  CoercionResult,
  CoercionFormatter,
  TypedValue,
} from './parameter-coercion.js';
export { createCoercionFormatter, coerceBoolean, coerceInteger, coerceDatetime } from './parameter-coercion.js';
export type { StructuredEventTarget } from './structured-event.js';
export { toStructuredEventParameters } from './structured-event.js';
export * from './adapters/index.js';
