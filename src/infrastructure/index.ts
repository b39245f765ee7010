export { redisPlugin, enqueueRawEvent, DEFAULT_STREAM_KEY } from './redis/index.js';
export type { RedisPluginOptions, StreamWriter } from './redis/index.js';
export { loadCollectorConfig } from './config.js';
export type { CollectorConfig } from './config.js';
