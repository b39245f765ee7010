import type { FastifyRequest } from 'fastify';
import type { PayloadContext, PayloadEnvelope } from '../../domain/index.js';
import { parseQuerystring } from '../../application/index.js';

export const COLLECTOR_SOURCE_NAME = 'hookline-collector';

export type CollectorRequest = FastifyRequest<{
  Params: { vendor: string; version: string };
}>;

function headerText(value: string | string[] | undefined): string | undefined {
  if (value === undefined) return undefined;
  return Array.isArray(value) ? value.join(', ') : value;
}

/**
 * Builds the immutable envelope for one collector request.
 *
 * The querystring is taken from the raw URL so repeated keys keep their
 * order; a blank body counts as no body.
 */
export function envelopeFromRequest(
  request: CollectorRequest,
  receivedAt: Date = new Date(),
): PayloadEnvelope {
  const queryStart = request.url.indexOf('?');
  const querystring = queryStart === -1 ? [] : parseQuerystring(request.url.slice(queryStart + 1));

  const body = typeof request.body === 'string' && request.body.trim() !== '' ? request.body : undefined;
  const contentType = headerText(request.headers['content-type']);

  const headers: string[] = [];
  for (const [name, value] of Object.entries(request.headers)) {
    const text = headerText(value);
    if (text !== undefined) {
      headers.push(`${name}: ${text}`);
    }
  }

  const useragent = headerText(request.headers['user-agent']);
  const refererUri = headerText(request.headers['referer']);

  const context: PayloadContext = {
    timestamp: receivedAt.toISOString(),
    ipAddress: request.ip,
    ...(useragent !== undefined ? { useragent } : {}),
    ...(refererUri !== undefined ? { refererUri } : {}),
    headers,
  };

  return {
    api: { vendor: request.params.vendor, version: request.params.version },
    ...(body !== undefined ? { body } : {}),
    ...(contentType !== undefined ? { contentType } : {}),
    querystring,
    source: { name: COLLECTOR_SOURCE_NAME, encoding: 'UTF-8', hostname: request.hostname },
    context,
  };
}
