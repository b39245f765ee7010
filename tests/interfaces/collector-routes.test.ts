import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import type { Redis } from 'ioredis';
import { collectorRoutes } from '../../src/interfaces/http/index.js';
import {
  createDefaultAdapterRegistry,
  createDefaultSchemaRegistry,
} from '../../src/application/index.js';

const ALLOWED = 'application/json, application/json; charset=utf-8, application/json; charset=UTF-8';

const xadd = vi.fn();
const ping = vi.fn();

/** Stands in for the real redis plugin; same name so route dependencies resolve. */
const fakeRedisPlugin = fp(
  async (instance: FastifyInstance) => {
    instance.decorate('redis', { xadd, ping } as unknown as Redis);
  },
  { name: 'redis' },
);

describe('collector routes', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    xadd.mockReset().mockResolvedValue('1-0');
    ping.mockReset().mockResolvedValue('PONG');

    app = Fastify();
    await app.register(fakeRedisPlugin);
    await app.register(collectorRoutes, {
      registry: createDefaultAdapterRegistry(),
      validator: createDefaultSchemaRegistry(),
      streamKey: 'test_stream',
    });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('accepts a CallRail GET and enqueues one event', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/com.callrail/v1?first_call=true&duration=42',
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok', count: 1 });
    expect(xadd).toHaveBeenCalledTimes(1);
    expect(xadd.mock.calls[0]?.[0]).toBe('test_stream');
  });

  it('accepts a JSON batch POST and enqueues every event', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/dev.hookline/tp2?aid=server',
      headers: { 'content-type': 'application/json' },
      payload: '[{"e":"pv"},{"e":"se"}]',
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok', count: 2 });
    expect(xadd).toHaveBeenCalledTimes(2);

    const params = xadd.mock.calls.map((args: unknown[]) => args[args.indexOf('parameters') + 1]);
    expect(params).toEqual(['{"e":"pv","aid":"server"}', '{"e":"se","aid":"server"}']);
  });

  it('rejects a body with an unexpected content type', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/dev.hookline/tp2',
      headers: { 'content-type': 'text/plain' },
      payload: '[{"e":"pv"}]',
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: 'Normalization failed',
      issues: [`Content type of text/plain provided, expected one of: ${ALLOWED}`],
    });
    expect(xadd).not.toHaveBeenCalled();
  });

  it('rejects a batch that fails schema validation', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/dev.hookline/tp2',
      headers: { 'content-type': 'application/json' },
      payload: '[{"e":1}]',
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: 'Normalization failed',
      issues: ['iglu:dev.hookline/payload_data/jsonschema/1-0-4 $[0].e: Expected string, received number'],
    });
  });

  it('rejects an empty request', async () => {
    const res = await app.inject({ method: 'GET', url: '/dev.hookline/tp2' });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: 'Normalization failed',
      issues: ['Request body and querystring parameters empty, expected at least one populated'],
    });
  });

  it('returns 404 for an unknown adapter', async () => {
    const res = await app.inject({ method: 'GET', url: '/com.acme/v9?x=1' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({
      error: 'Normalization failed',
      issues: ['Payload with vendor com.acme and version v9 not supported'],
    });
  });

  it('still answers 200 when enqueueing fails', async () => {
    xadd.mockRejectedValue(new Error('connection lost'));

    const res = await app.inject({ method: 'GET', url: '/dev.hookline/tp1?e=pv' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok', count: 1 });
  });

  it('reports Redis health', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok', redis: 'PONG' });
  });

  it('reports degraded health when Redis is unreachable', async () => {
    ping.mockRejectedValue(new Error('ECONNREFUSED'));

    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({ status: 'degraded', redis: 'unreachable' });
  });
});
