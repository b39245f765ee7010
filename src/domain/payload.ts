/**
 * Core domain types for inbound payloads and the raw events they
 * normalize into.
 *
 * These types carry no framework dependencies. Everything is readonly:
 * an envelope is built once by the transport and never mutated.
 */

/** Logical endpoint a payload was sent to, e.g. `com.callrail` / `v1`. */
export interface PayloadApi {
  readonly vendor: string;
  readonly version: string;
}

/** One querystring pair as received. Names may repeat. */
export interface QuerystringPair {
  readonly name: string;
  readonly value?: string;
}

/** Where the payload was collected. */
export interface PayloadSource {
  readonly name: string;
  readonly encoding: string;
  readonly hostname?: string;
}

/** Request metadata carried through to every raw event untouched. */
export interface PayloadContext {
  readonly timestamp?: string; // ISO-8601
  readonly ipAddress?: string;
  readonly useragent?: string;
  readonly refererUri?: string;
  readonly headers: readonly string[];
  readonly userId?: string;
}

/** One inbound request, exactly as the transport received it. */
export interface PayloadEnvelope {
  readonly api: PayloadApi;
  readonly body?: string;
  readonly contentType?: string;
  readonly querystring: readonly QuerystringPair[];
  readonly source: PayloadSource;
  readonly context: PayloadContext;
}

/** One logical event's fields. Keys are unique. */
export type ParameterMap = Readonly<Record<string, string>>;

/** Canonical output unit handed to the enrichment pipeline. */
export interface RawEvent {
  readonly api: PayloadApi;
  readonly parameters: ParameterMap;
  readonly contentType?: string;
  readonly source: PayloadSource;
  readonly context: PayloadContext;
}

/** Builds a raw event that shares the envelope's api, content type, source and context. */
export function toRawEvent(envelope: PayloadEnvelope, parameters: ParameterMap): RawEvent {
  return {
    api: envelope.api,
    parameters,
    ...(envelope.contentType !== undefined ? { contentType: envelope.contentType } : {}),
    source: envelope.source,
    context: envelope.context,
  };
}
