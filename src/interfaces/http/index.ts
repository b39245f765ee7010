export { default as collectorRoutes } from './collector-routes.js';
export type { CollectorRoutesOptions } from './collector-routes.js';
export { envelopeFromRequest, COLLECTOR_SOURCE_NAME } from './envelope.js';
export type { CollectorRequest } from './envelope.js';
