/**
 * Fixed-capacity element -> count table addressed by slot.
 *
 * Contract notes:
 * - storage for `capacity` slots is allocated up front and never grows
 * - a slot is free, live (count > 0) or parked (count 0, key still indexed)
 * - parked slots are not live: they are skipped by `entries()` and `liveSize()`
 *   and can be taken over by `claim()`
 */
export interface CounterTable<T> {
  readonly capacity: number;

  /** Slot tracking the element's key (live or parked), or -1. */
  slotOf(element: T): number;
  countAt(slot: number): number;
  elementAt(slot: number): T | undefined;

  /** Adds `by` (default 1) to a tracked slot; a parked slot becomes live again. */
  bump(slot: number, by?: number): void;
  /**
   * Places an untracked element with count 1. Takes a free slot first, then the
   * first parked one. Returns -1 when every slot is live.
   */
  claim(element: T): number;
  /** Decrements every live slot; returns the slots that reached zero, in slot order. */
  decrementAll(): number[];
  release(slot: number): void;
  park(slot: number): void;

  liveSize(): number;
  /** Live `[element, count]` pairs in slot order. */
  entries(): Array<[T, number]>;
  clear(): void;
}
