import type { CounterTable } from "../counterTable.js";
import { InvalidArgumentError } from "../errors.js";
import { identityKey, type ElementKey, type KeyFn } from "../types.js";

type Resident<T> = { element: T; key: ElementKey };

/** Largest slot count a table will preallocate. */
export const MAX_SLOTS = 2 ** 24;

/**
 * Arena-backed counter table.
 *
 * Layout:
 * - `counts`: one Float64 per slot, allocated once (exact up to 2^53)
 * - `residents`: element + key per occupied slot (undefined when free)
 * - `index`: key -> slot for O(1) lookup
 * - `free`: stack of free slots; lowest slots are handed out first on a fresh table
 */
export class SlotCounterTable<T> implements CounterTable<T> {
  private readonly counts: Float64Array;
  private readonly residents: Array<Resident<T> | undefined>;
  private readonly index = new Map<ElementKey, number>();
  private readonly free: number[] = [];
  private live = 0;

  constructor(
    readonly capacity: number,
    private readonly key: KeyFn<T> = identityKey,
  ) {
    if (!Number.isInteger(capacity) || capacity < 0 || capacity > MAX_SLOTS) {
      throw new InvalidArgumentError(`capacity must be an integer in [0, ${MAX_SLOTS}], got ${capacity}`);
    }
    this.counts = new Float64Array(capacity);
    this.residents = new Array<Resident<T> | undefined>(capacity).fill(undefined);
    this.resetFreeList();
  }

  slotOf(element: T): number {
    return this.index.get(this.key(element)) ?? -1;
  }

  countAt(slot: number): number {
    return this.counts[slot] ?? 0;
  }

  elementAt(slot: number): T | undefined {
    return this.residents[slot]?.element;
  }

  bump(slot: number, by: number = 1): void {
    if (!Number.isInteger(by) || by < 1) {
      throw new InvalidArgumentError(`increment must be a positive integer, got ${by}`);
    }
    this.occupant(slot);
    const c = this.countAt(slot);
    if (c === 0) this.live++;
    this.counts[slot] = c + by;
  }

  claim(element: T): number {
    const key = this.key(element);
    const tracked = this.index.get(key);
    if (tracked !== undefined) {
      this.bump(tracked);
      return tracked;
    }

    const slot = this.free.pop() ?? this.firstParked();
    if (slot < 0) return -1;

    // taking over a parked slot drops its old key
    const previous = this.residents[slot];
    if (previous) this.index.delete(previous.key);

    this.residents[slot] = { element, key };
    this.index.set(key, slot);
    this.counts[slot] = 1;
    this.live++;
    return slot;
  }

  decrementAll(): number[] {
    const exhausted: number[] = [];
    for (let s = 0; s < this.capacity; s++) {
      const c = this.countAt(s);
      if (c === 0) continue;
      this.counts[s] = c - 1;
      if (c === 1) {
        this.live--;
        exhausted.push(s);
      }
    }
    return exhausted;
  }

  release(slot: number): void {
    const resident = this.residents[slot];
    if (!resident) return;
    if (this.countAt(slot) > 0) this.live--;
    this.index.delete(resident.key);
    this.residents[slot] = undefined;
    this.counts[slot] = 0;
    this.free.push(slot);
  }

  park(slot: number): void {
    this.occupant(slot);
    if (this.countAt(slot) > 0) this.live--;
    this.counts[slot] = 0;
  }

  liveSize(): number {
    return this.live;
  }

  entries(): Array<[T, number]> {
    const out: Array<[T, number]> = [];
    for (let s = 0; s < this.capacity; s++) {
      const resident = this.residents[s];
      const c = this.countAt(s);
      if (resident && c > 0) out.push([resident.element, c]);
    }
    return out;
  }

  clear(): void {
    this.counts.fill(0);
    this.residents.fill(undefined);
    this.index.clear();
    this.live = 0;
    this.resetFreeList();
  }

  private resetFreeList(): void {
    this.free.length = 0;
    // pushed in reverse so pop() yields slot 0 first
    for (let s = this.capacity - 1; s >= 0; s--) this.free.push(s);
  }

  private firstParked(): number {
    for (let s = 0; s < this.capacity; s++) {
      if (this.residents[s] && this.countAt(s) === 0) return s;
    }
    return -1;
  }

  private occupant(slot: number): Resident<T> {
    const resident = this.residents[slot];
    if (!resident) throw new InvalidArgumentError(`slot ${slot} is not occupied`);
    return resident;
  }
}
