import type { ParameterMap, QuerystringPair } from '../domain/index.js';

/**
 * Flattens ordered querystring pairs into a parameter map.
 *
 * A later pair overwrites an earlier one with the same name; a pair
 * without a value flattens to the empty string.
 */
export function toParameterMap(pairs: readonly QuerystringPair[]): ParameterMap {
  return Object.fromEntries(pairs.map((pair): [string, string] => [pair.name, pair.value ?? '']));
}

/** Splits a raw query (with or without a leading `?`) into ordered pairs. */
export function parseQuerystring(raw: string): QuerystringPair[] {
  const query = raw.startsWith('?') ? raw.slice(1) : raw;
  if (query === '') {
    return [];
  }

  const pairs: QuerystringPair[] = [];
  for (const [name, value] of new URLSearchParams(query)) {
    pairs.push({ name, value });
  }
  return pairs;
}

/** Merges `overrides` over `base`; overrides win on key collision. */
export function mergeParameters(base: ParameterMap, overrides: ParameterMap): ParameterMap {
  return Object.fromEntries([...Object.entries(base), ...Object.entries(overrides)]);
}
