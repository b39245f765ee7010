export { default as redisPlugin } from './redis-plugin.js';
export type { RedisPluginOptions } from './redis-plugin.js';
export { enqueueRawEvent, DEFAULT_STREAM_KEY } from './raw-event-producer.js';
export type { StreamWriter } from './raw-event-producer.js';
