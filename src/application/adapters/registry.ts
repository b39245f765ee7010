import type { PayloadEnvelope } from '../../domain/index.js';
import { fail } from '../../domain/index.js';
import type { SchemaValidator } from '../schema-validator.js';
import { createCallrailAdapter } from './callrail.js';
import { createTrackerProtocolV1Adapter } from './tracker-protocol-v1.js';
import { createTrackerProtocolV2Adapter } from './tracker-protocol-v2.js';
import type { Adapter, RawEventsOutcome } from './types.js';

/** Looks up the adapter for an envelope's vendor and version. */
export interface AdapterRegistry {
  readonly adapters: readonly Adapter[];
  find(vendor: string, version: string): Adapter | undefined;
  toRawEvents(envelope: PayloadEnvelope, validator: SchemaValidator): RawEventsOutcome;
}

function registryKey(vendor: string, version: string): string {
  return `${vendor}/${version}`;
}

export function createAdapterRegistry(adapters: readonly Adapter[]): AdapterRegistry {
  const byKey = new Map<string, Adapter>();

  for (const adapter of adapters) {
    const key = registryKey(adapter.vendor, adapter.version);
    if (byKey.has(key)) {
      throw new Error(`Adapter for ${key} registered twice`);
    }
    byKey.set(key, adapter);
  }

  const find = (vendor: string, version: string): Adapter | undefined => byKey.get(registryKey(vendor, version));

  return {
    adapters,
    find,

    toRawEvents(envelope: PayloadEnvelope, validator: SchemaValidator): RawEventsOutcome {
      const { vendor, version } = envelope.api;
      const adapter = find(vendor, version);

      if (adapter === undefined) {
        return fail('UnsupportedAdapter', `Payload with vendor ${vendor} and version ${version} not supported`);
      }
      return adapter.toRawEvents(envelope, validator);
    },
  };
}

/** Registry of every built-in adapter. */
export function createDefaultAdapterRegistry(): AdapterRegistry {
  return createAdapterRegistry([
    createTrackerProtocolV1Adapter(),
    createTrackerProtocolV2Adapter(),
    createCallrailAdapter(),
  ]);
}
