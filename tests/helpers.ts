import type { PayloadEnvelope, QuerystringPair } from '../src/domain/index.js';
import { fail, valid } from '../src/domain/index.js';
import type { SchemaValidator } from '../src/application/index.js';

/**
 * Factory for creating test envelopes with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeEnvelope(overrides: Partial<PayloadEnvelope> = {}): PayloadEnvelope {
  return {
    api: { vendor: 'dev.hookline', version: 'tp2' },
    querystring: [],
    source: { name: 'test-collector', encoding: 'UTF-8', hostname: 'collector.test' },
    context: { timestamp: '2026-02-18T12:00:00.000Z', ipAddress: '203.0.113.9', headers: [] },
    ...overrides,
  };
}

/** Builds ordered querystring pairs from `[name, value]` tuples. */
export function qs(...pairs: Array<[string, string]>): QuerystringPair[] {
  return pairs.map(([name, value]) => ({ name, value }));
}

/** Validator that accepts any document unchanged. */
export const acceptAll: SchemaValidator = {
  validate: (document) => valid(document),
};

/** Validator that rejects every document with one message. */
export function rejectAll(message = 'document rejected'): SchemaValidator {
  return {
    validate: () => fail('SchemaViolation', message),
  };
}
