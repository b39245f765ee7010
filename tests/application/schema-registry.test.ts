import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  CALLRAIL_CALL_COMPLETE_SCHEMA,
  PAYLOAD_DATA_SCHEMA,
  SchemaRegistry,
  createDefaultSchemaRegistry,
  parseSchemaUri,
  toSchemaUri,
} from '../../src/application/index.js';
import type { SchemaKey } from '../../src/application/index.js';
import { errorMessages } from '../../src/domain/index.js';

const TEST_SCHEMA: SchemaKey = { vendor: 'com.acme', name: 'ping', format: 'jsonschema', version: '1-0-0' };

describe('schema URIs', () => {
  it('renders a schema key', () => {
    expect(toSchemaUri(TEST_SCHEMA)).toBe('iglu:com.acme/ping/jsonschema/1-0-0');
  });

  it('parses a well-formed URI back into a key', () => {
    expect(parseSchemaUri('iglu:com.acme/ping/jsonschema/1-0-0')).toEqual({ valid: true, value: TEST_SCHEMA });
  });

  it('rejects a URI without a full version', () => {
    const result = parseSchemaUri('iglu:com.acme/ping/jsonschema/1-0');
    expect(errorMessages(result)).toEqual(['Invalid schema URI [iglu:com.acme/ping/jsonschema/1-0]']);
  });
});

describe('SchemaRegistry', () => {
  const registry = new SchemaRegistry().register(TEST_SCHEMA, z.object({ id: z.string() }));

  it('returns the parsed document when it conforms', () => {
    expect(registry.validate({ id: 'x' }, TEST_SCHEMA)).toEqual({ valid: true, value: { id: 'x' } });
  });

  it('reports one message per zod issue with its path', () => {
    const result = registry.validate({ id: 7 }, TEST_SCHEMA);
    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toEqual({
        kind: 'SchemaViolation',
        message: 'iglu:com.acme/ping/jsonschema/1-0-0 $.id: Expected string, received number',
      });
    }
  });

  it('fails for a schema it does not hold', () => {
    const result = registry.validate({}, CALLRAIL_CALL_COMPLETE_SCHEMA);
    expect(errorMessages(result)).toEqual([
      'Could not find schema iglu:com.callrail/call_complete/jsonschema/1-0-2 in registry',
    ]);
  });

  it('refuses to register a key that is not a valid schema URI', () => {
    const bad = { ...TEST_SCHEMA, version: '1-0' };
    expect(() => new SchemaRegistry().register(bad, z.string())).toThrow(
      'Invalid schema URI [iglu:com.acme/ping/jsonschema/1-0]',
    );
  });
});

describe('default registry', () => {
  const registry = createDefaultSchemaRegistry();

  it('accepts a payload_data batch of string fields', () => {
    expect(registry.validate([{ e: 'pv' }], PAYLOAD_DATA_SCHEMA).valid).toBe(true);
  });

  it('rejects an empty payload_data batch', () => {
    expect(errorMessages(registry.validate([], PAYLOAD_DATA_SCHEMA))).toEqual([
      'iglu:dev.hookline/payload_data/jsonschema/1-0-4 $: Must contain at least one event',
    ]);
  });

  it('reports array indexes in the path', () => {
    expect(errorMessages(registry.validate([{ e: 'pv' }, { e: 1 }], PAYLOAD_DATA_SCHEMA))).toEqual([
      'iglu:dev.hookline/payload_data/jsonschema/1-0-4 $[1].e: Expected string, received number',
    ]);
  });
});
