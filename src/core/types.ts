/** Shared core types used by module contracts. */

/**
 * Identity of an element for counting purposes.
 * Keys compare with SameValueZero (Map semantics), so objects compare by reference.
 */
export type ElementKey = string | number | bigint | boolean | symbol | null | undefined | object | {};

/** Maps an element to the key it is counted under. */
export type KeyFn<T> = (element: T) => ElementKey;

/**
 * A sequence that can be read more than once: either retained as an array,
 * or re-read through a factory that yields the same elements on every call.
 */
export type Replayable<T> = ReadonlyArray<T> | (() => Iterable<T>);

/** A summary's lower-bound count for a tracked element. */
export interface CandidateEstimate<T> {
  element: T;
  count: number;
}

/** An element confirmed by the exact counting pass. */
export interface FrequentItem<T> {
  element: T;
  /** exact number of occurrences in the verified sequence */
  count: number;
}

export function identityKey<T>(element: T): ElementKey {
  return element;
}
