import type { ValidationOutcome } from '../domain/index.js';
import { fail, valid } from '../domain/index.js';

/** Identifier + version naming a structural contract a JSON document must satisfy. */
export interface SchemaKey {
  readonly vendor: string;
  readonly name: string;
  readonly format: string;
  readonly version: string; // model-revision-addition, e.g. 1-0-2
}

const SCHEMA_URI = /^iglu:([a-zA-Z0-9_.-]+)\/([a-zA-Z0-9_-]+)\/([a-zA-Z0-9_-]+)\/(\d+-\d+-\d+)$/;

export function toSchemaUri(key: SchemaKey): string {
  return `iglu:${key.vendor}/${key.name}/${key.format}/${key.version}`;
}

export function parseSchemaUri(uri: string): ValidationOutcome<SchemaKey> {
  const match = SCHEMA_URI.exec(uri);
  if (match === null) {
    return fail('SchemaViolation', `Invalid schema URI [${uri}]`);
  }

  const [, vendor = '', name = '', format = '', version = ''] = match;
  return valid({ vendor, name, format, version });
}
