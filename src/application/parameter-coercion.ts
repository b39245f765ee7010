import type { NonEmptyArray, NormalizationError, ParameterMap } from '../domain/index.js';
import { normalizationError } from '../domain/index.js';
import type { DatetimePattern } from './datetime-pattern.js';
import { compileDatetimePattern, isCanonicalTimestamp } from './datetime-pattern.js';

/** A group of datetime fields sharing one textual pattern. */
export interface DatetimeFields {
  readonly fields: NonEmptyArray<string>;
  readonly pattern: string;
}

/**
 * What happens to a declared field whose value cannot be coerced.
 *
 * - `drop`: the field is omitted and the event goes through
 * - `fail`: the whole event is rejected with the coercion errors
 */
export type CoercionPolicy = 'drop' | 'fail';

/** Which raw fields must be reinterpreted as booleans, integers or datetimes. */
export interface FieldTypePlan {
  readonly booleans: readonly string[];
  readonly integers: readonly string[];
  readonly datetimes?: DatetimeFields;
  readonly onFailure?: CoercionPolicy;
}

export interface CoercionResult {
  /** Coerced fields; listed fields that failed are absent. */
  readonly parameters: ParameterMap;
  readonly failures: NormalizationError[];
}

export type TypedValue = string | number | boolean;

export interface CoercionFormatter {
  readonly policy: CoercionPolicy;
  format(raw: ParameterMap): CoercionResult;
  /** JSON-typed view of already-formatted parameters. */
  toTypedFields(formatted: ParameterMap): Record<string, TypedValue>;
}

const TRUTHY = new Set(['true', '1', 'yes', 'y', 't', 'on']);
const FALSY = new Set(['false', '0', 'no', 'n', 'f', 'off']);
const INTEGER = /^[+-]?\d+$/;

export function coerceBoolean(value: string): '1' | '0' | undefined {
  const text = value.trim().toLowerCase();
  if (TRUTHY.has(text)) return '1';
  if (FALSY.has(text)) return '0';
  return undefined;
}

export function coerceInteger(value: string): string | undefined {
  const text = value.trim();
  if (!INTEGER.test(text)) return undefined;
  const n = Number(text);
  return Number.isSafeInteger(n) ? String(n) : undefined;
}

export function coerceDatetime(value: string, pattern: DatetimePattern): string | undefined {
  if (isCanonicalTimestamp(value)) {
    return value;
  }
  return pattern.parse(value)?.toISOString();
}

type FieldKind = 'boolean' | 'integer' | 'datetime';

const EXPECTED: Record<FieldKind, string> = {
  boolean: 'a boolean',
  integer: 'an integer',
  datetime: 'a datetime',
};

/**
 * Builds a formatter for one field-type plan.
 *
 * Throws if a field is declared under more than one type or the datetime
 * pattern is unusable; both are configuration errors caught at start-up.
 */
export function createCoercionFormatter(plan: FieldTypePlan): CoercionFormatter {
  const kinds = new Map<string, FieldKind>();
  const assign = (fields: readonly string[], kind: FieldKind): void => {
    for (const field of fields) {
      const existing = kinds.get(field);
      if (existing !== undefined) {
        throw new Error(`Field "${field}" declared as both ${existing} and ${kind}`);
      }
      kinds.set(field, kind);
    }
  };

  assign(plan.booleans, 'boolean');
  assign(plan.integers, 'integer');
  assign(plan.datetimes?.fields ?? [], 'datetime');

  const pattern = plan.datetimes ? compileDatetimePattern(plan.datetimes.pattern) : undefined;

  const coerce = (kind: FieldKind, value: string): string | undefined => {
    switch (kind) {
      case 'boolean':
        return coerceBoolean(value);
      case 'integer':
        return coerceInteger(value);
      case 'datetime':
        return pattern ? coerceDatetime(value, pattern) : undefined;
    }
  };

  return {
    policy: plan.onFailure ?? 'drop',

    format(raw: ParameterMap): CoercionResult {
      const parameters: Array<[string, string]> = [];
      const failures: NormalizationError[] = [];

      for (const [key, value] of Object.entries(raw)) {
        const kind = kinds.get(key);
        if (kind === undefined) {
          parameters.push([key, value]);
          continue;
        }

        const coerced = coerce(kind, value);
        if (coerced === undefined) {
          const expected = EXPECTED[kind] + (kind === 'datetime' ? ` matching ${pattern?.pattern ?? ''}` : '');
          failures.push(
            normalizationError('CoercionFailure', `Value [${value}] for key ${key} is not ${expected}`),
          );
        } else {
          parameters.push([key, coerced]);
        }
      }

      return { parameters: Object.fromEntries(parameters), failures };
    },

    toTypedFields(formatted: ParameterMap): Record<string, TypedValue> {
      return Object.fromEntries(
        Object.entries(formatted).map(([key, value]): [string, TypedValue] => {
          const kind = kinds.get(key);
          if (kind === 'boolean') return [key, value === '1'];
          if (kind === 'integer') return [key, Number(value)];
          return [key, value];
        }),
      );
    },
  };
}
