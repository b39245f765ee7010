import type { NonEmptyArray } from './non-empty.js';
import type { ErrorKind, NormalizationError } from './errors.js';
import { normalizationError } from './errors.js';

/**
 * Result of a normalization step.
 *
 * `valid === false` always carries at least one error, in encounter order.
 */
export type ValidationOutcome<T> =
  | { readonly valid: true; readonly value: T }
  | { readonly valid: false; readonly errors: NonEmptyArray<NormalizationError> };

export function valid<T>(value: T): ValidationOutcome<T> {
  return { valid: true, value };
}

export function invalid<T>(
  errors: NonEmptyArray<NormalizationError>,
): ValidationOutcome<T> {
  return { valid: false, errors };
}

/** Shorthand for a failure holding one error. */
export function fail<T>(kind: ErrorKind, message: string): ValidationOutcome<T> {
  return invalid([normalizationError(kind, message)]);
}

// --------------------------------------------------
// Fail-fast discipline
// --------------------------------------------------

/** Runs `next` only when `outcome` succeeded; the first failure wins. */
export function andThen<T, U>(
  outcome: ValidationOutcome<T>,
  next: (value: T) => ValidationOutcome<U>,
): ValidationOutcome<U> {
  return outcome.valid ? next(outcome.value) : outcome;
}

export function map<T, U>(
  outcome: ValidationOutcome<T>,
  fn: (value: T) => U,
): ValidationOutcome<U> {
  return outcome.valid ? valid(fn(outcome.value)) : outcome;
}

// --------------------------------------------------
// Accumulating discipline
// --------------------------------------------------

export interface Partitioned<T> {
  readonly successes: T[];
  readonly failures: NormalizationError[];
}

/**
 * Splits outcomes into every success and every failure, preserving order.
 * Nothing short-circuits: the caller decides once all items are seen.
 */
export function partition<T>(outcomes: Iterable<ValidationOutcome<T>>): Partitioned<T> {
  const successes: T[] = [];
  const failures: NormalizationError[] = [];

  for (const outcome of outcomes) {
    if (outcome.valid) {
      successes.push(outcome.value);
    } else {
      failures.push(...outcome.errors);
    }
  }

  return { successes, failures };
}

/** Human-readable messages of a failed outcome; empty on success. */
export function errorMessages<T>(outcome: ValidationOutcome<T>): string[] {
  return outcome.valid ? [] : outcome.errors.map((e) => e.message);
}
