import type { Redis } from 'ioredis';
import type { RawEvent } from '../../domain/index.js';

export const DEFAULT_STREAM_KEY = 'raw_events_stream';

/** Redis stream client surface the producer needs. */
export type StreamWriter = Pick<Redis, 'xadd'>;

/**
 * Appends a raw event to the Redis Stream read by the enrichment pipeline.
 *
 * Uses `XADD` with auto-generated stream IDs (`*`). Redis Streams require
 * string values, so parameters, source and context are JSON-serialized
 * and an absent content type is written as the empty string.
 *
 * @returns The stream entry ID assigned by Redis.
 */
export async function enqueueRawEvent(
  redis: StreamWriter,
  streamKey: string,
  event: RawEvent,
): Promise<string | null> {
  return redis.xadd(
    streamKey,
    '*',
    'vendor', event.api.vendor,
    'version', event.api.version,
    'parameters', JSON.stringify(event.parameters),
    'content_type', event.contentType ?? '',
    'source', JSON.stringify(event.source),
    'context', JSON.stringify(event.context),
  );
}
