import type {
  NonEmptyArray,
  PayloadEnvelope,
  RawEvent,
  ValidationOutcome,
} from '../../domain/index.js';
import type { SchemaValidator } from '../schema-validator.js';

/**
 * Converts one third-party source's payloads into raw events.
 *
 * One implementation per (vendor, version). Implementations are pure:
 * the only collaborator is the validator passed in, and each adapter
 * holds its schema, content types and field plan as data.
 */
export interface Adapter {
  readonly vendor: string;
  readonly version: string;
  toRawEvents(
    envelope: PayloadEnvelope,
    validator: SchemaValidator,
  ): ValidationOutcome<NonEmptyArray<RawEvent>>;
}

export type RawEventsOutcome = ValidationOutcome<NonEmptyArray<RawEvent>>;
