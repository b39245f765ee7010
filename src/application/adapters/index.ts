export type { Adapter, RawEventsOutcome } from './types.js';
export { createTrackerProtocolV1Adapter } from './tracker-protocol-v1.js';
export { createTrackerProtocolV2Adapter, JSON_CONTENT_TYPES } from './tracker-protocol-v2.js';
export { createCallrailAdapter, CALLRAIL_FIELD_PLAN } from './callrail.js';
export { createAdapterRegistry, createDefaultAdapterRegistry } from './registry.js';
export type { AdapterRegistry } from './registry.js';
