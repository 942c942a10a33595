import type { CounterTable } from "../counterTable.js";
import { InvalidArgumentError } from "../errors.js";
import { EVICTION_POLICIES, type EvictionPolicy, type FrequencySummary, type SummaryOptions } from "../summary.js";
import type { CandidateEstimate } from "../types.js";
import { MAX_SLOTS, SlotCounterTable } from "./slotCounterTable.js";

/** Largest accepted k: the summary preallocates k-1 slots. */
export const MAX_SUMMARY_K = MAX_SLOTS + 1;

export function assertCapacity(k: number): void {
  if (!Number.isInteger(k) || k < 1 || k > MAX_SUMMARY_K) {
    throw new InvalidArgumentError(`k must be an integer in [1, ${MAX_SUMMARY_K}], got ${k}`);
  }
}

function assertPolicy(policy: string): asserts policy is EvictionPolicy {
  if (!EVICTION_POLICIES.some((p) => p === policy)) {
    throw new InvalidArgumentError(`unknown eviction policy: ${policy}`);
  }
}

/**
 * Misra-Gries summary over a table of k-1 slots.
 *
 * observe():
 * - tracked element => count + 1
 * - free capacity  => insert with count 1
 * - otherwise      => fight: every live count drops by one and the newcomer is discarded,
 *                     so each fight cancels k distinct occurrences
 *
 * k = 1 leaves no slots; nothing is ever retained.
 */
export class MisraGriesSummary<T> implements FrequencySummary<T> {
  readonly policy: EvictionPolicy;
  private readonly table: CounterTable<T>;
  private count = 0;

  constructor(
    readonly k: number,
    options?: SummaryOptions<T>,
  ) {
    assertCapacity(k);
    const policy = options?.policy ?? "group-decrement";
    assertPolicy(policy);
    this.policy = policy;
    this.table = new SlotCounterTable<T>(k - 1, options?.key);
  }

  static fromSequence<T>(elements: Iterable<T>, k: number, options?: SummaryOptions<T>): MisraGriesSummary<T> {
    return new MisraGriesSummary<T>(k, options).observeAll(elements);
  }

  get observed(): number {
    return this.count;
  }

  get size(): number {
    return this.table.liveSize();
  }

  observe(element: T): void {
    this.count++;
    const t = this.table;

    const slot = t.slotOf(element);
    if (slot >= 0) {
      t.bump(slot);
      return;
    }

    if (t.liveSize() < t.capacity) {
      t.claim(element);
      return;
    }

    const exhausted = t.decrementAll();
    if (this.policy === "group-decrement") {
      for (const s of exhausted) t.release(s);
      return;
    }

    const [first, ...rest] = exhausted;
    if (first !== undefined) t.release(first);
    for (const s of rest) t.park(s);
  }

  observeAll(elements: Iterable<T>): this {
    for (const el of elements) this.observe(el);
    return this;
  }

  candidates(): T[] {
    return this.table.entries().map(([el]) => el);
  }

  estimates(): CandidateEstimate<T>[] {
    return this.table.entries().map(([element, count]) => ({ element, count }));
  }

  estimate(element: T): number {
    const slot = this.table.slotOf(element);
    return slot >= 0 ? this.table.countAt(slot) : 0;
  }

  errorBound(): number {
    return Math.floor(this.count / this.k);
  }
}
