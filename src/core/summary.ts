import type { CandidateEstimate, KeyFn } from "./types.js";

/**
 * What happens to exhausted counters after a fight.
 *
 * - `group-decrement`: every counter that reached zero is evicted immediately.
 * - `single-evict`: only the first counter found at zero is evicted; the rest stay
 *   parked and are reclaimed lazily by later inserts.
 *
 * Both remove k distinct occurrences per fight, so the set of guaranteed
 * candidates is the same; slot reuse (and therefore candidate order) differs.
 */
export type EvictionPolicy = "group-decrement" | "single-evict";

export const EVICTION_POLICIES: readonly EvictionPolicy[] = ["group-decrement", "single-evict"];

export interface SummaryOptions<T> {
  policy?: EvictionPolicy;
  /** Counting identity; defaults to the element itself. */
  key?: KeyFn<T>;
}

/**
 * Bounded frequent-elements sketch (Misra-Gries).
 *
 * Contract notes:
 * - holds at most k-1 live candidates at any time
 * - every element occurring more than floor(n/k) times in the observed stream is
 *   among `candidates()` once the stream has been fully observed
 * - candidates may be false positives; run an exact verification pass
 * - reading candidates mid-stream gives intermediate state, not a result
 */
export interface FrequencySummary<T> {
  readonly k: number;
  readonly policy: EvictionPolicy;
  /** Number of elements observed so far. */
  readonly observed: number;
  /** Number of live candidates. */
  readonly size: number;

  observe(element: T): void;
  observeAll(elements: Iterable<T>): this;

  candidates(): T[];
  estimates(): CandidateEstimate<T>[];
  /** Lower-bound count for the element; 0 when it is not a live candidate. */
  estimate(element: T): number;
  /** Maximum undercount of any estimate: floor(observed / k). */
  errorBound(): number;
}
