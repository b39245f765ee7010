/**
 * An array statically guaranteed to hold at least one element.
 *
 * Adapters return their events in this shape, so an empty successful
 * batch cannot be constructed.
 */
export type NonEmptyArray<T> = readonly [T, ...T[]];

export function isNonEmpty<T>(items: readonly T[]): items is NonEmptyArray<T> {
  return items.length > 0;
}

export function one<T>(item: T): NonEmptyArray<T> {
  return [item];
}

/** Returns undefined for an empty input. */
export function fromArray<T>(items: readonly T[]): NonEmptyArray<T> | undefined {
  return isNonEmpty(items) ? items : undefined;
}

export function mapNonEmpty<T, U>(
  items: NonEmptyArray<T>,
  fn: (item: T, index: number) => U,
): NonEmptyArray<U> {
  const [head, ...tail] = items;
  return [fn(head, 0), ...tail.map((item, i) => fn(item, i + 1))];
}
