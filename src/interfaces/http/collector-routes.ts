import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { AdapterRegistry, SchemaValidator } from '../../application/index.js';
import { errorMessages } from '../../domain/index.js';
import { enqueueRawEvent } from '../../infrastructure/index.js';
import type { CollectorRequest } from './envelope.js';
import { envelopeFromRequest } from './envelope.js';

export interface CollectorRoutesOptions {
  registry: AdapterRegistry;
  validator: SchemaValidator;
  streamKey: string;
}

/**
 * Registers the collector routes.
 *
 * GET  /:vendor/:version : querystring-only payloads
 * POST /:vendor/:version : body (and optional querystring) payloads
 * GET  /health           : Redis connectivity check
 *
 * Request bodies are kept as raw text whatever their content type; the
 * adapter decides whether the content type is acceptable.
 */
async function collectorRoutes(fastify: FastifyInstance, opts: CollectorRoutesOptions): Promise<void> {
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  /**
   * Normalizes → enqueues every raw event → returns 200.
   * Any failure rejects the whole payload; nothing is enqueued.
   */
  const collect = async (request: CollectorRequest, reply: FastifyReply) => {
    const envelope = envelopeFromRequest(request);
    const outcome = opts.registry.toRawEvents(envelope, opts.validator);

    if (!outcome.valid) {
      const issues = errorMessages(outcome);
      request.log.warn({ api: envelope.api, issues }, 'Payload rejected');

      const unsupported = outcome.errors.some((e) => e.kind === 'UnsupportedAdapter');
      return reply.status(unsupported ? 404 : 400).send({
        error: 'Normalization failed',
        issues,
      });
    }

    const events = outcome.value;

    // Fire-and-forget: errors are logged but do not block the response.
    const enqueueAll = events.map((event) =>
      enqueueRawEvent(fastify.redis, opts.streamKey, event).catch((err: unknown) => {
        request.log.error({ err, api: event.api }, 'Failed to enqueue raw event');
      }),
    );
    void Promise.all(enqueueAll);

    return reply.status(200).send({ status: 'ok', count: events.length });
  };

  fastify.get('/:vendor/:version', collect);
  fastify.post('/:vendor/:version', collect);

  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    try {
      const pong = await fastify.redis.ping();
      return reply.status(200).send({ status: 'ok', redis: pong });
    } catch (err: unknown) {
      fastify.log.error({ err }, 'Redis health check failed');
      return reply.status(503).send({ status: 'degraded', redis: 'unreachable' });
    }
  });
}

export default fp(collectorRoutes, {
  name: 'collector-routes',
  dependencies: ['redis'],
  fastify: '5.x',
});
