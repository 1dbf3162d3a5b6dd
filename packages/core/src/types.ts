/**
 * Shared type primitives for @argot/core
 */

/** A list with at least one element */
export type NonEmptyArray<T> = readonly [T, ...T[]];

/**
 * One command-line slot. A matcher that claims a token replaces it with
 * `undefined` so that the positions of the remaining tokens stay aligned.
 */
export type Token = string | undefined;

export function isNonEmpty<T>(items: readonly T[]): items is NonEmptyArray<T> {
  return items.length > 0;
}

export function mapNonEmpty<T, U>(items: NonEmptyArray<T>, f: (item: T) => U): NonEmptyArray<U> {
  const [first, ...rest] = items;
  return [f(first), ...rest.map(f)];
}

export function concatNonEmpty<T>(head: NonEmptyArray<T>, tail: readonly T[]): NonEmptyArray<T> {
  const [first, ...rest] = head;
  return [first, ...rest, ...tail];
}
