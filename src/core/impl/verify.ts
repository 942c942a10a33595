import { EmptyInputError } from "../errors.js";
import { identityKey, type ElementKey, type KeyFn } from "../types.js";
import { assertCapacity } from "./misraGriesSummary.js";

export interface VerifyOptions<T> {
  /** Counting identity; must match the one the summary used. */
  key?: KeyFn<T>;
}

/** Exact counts above `threshold`, plus the sequence length the threshold was taken from. */
export interface VerifyResult<T> {
  n: number;
  threshold: number;
  counts: Map<T, number>;
}

/** Generalized filter: more than floor(n / (k + 1)) occurrences. */
export function frequencyThreshold(n: number, k: number): number {
  return Math.floor(n / (k + 1));
}

/** Majority filter: more than floor(n / 2) occurrences. */
export function majorityThreshold(n: number): number {
  return Math.floor(n / 2);
}

/**
 * Counting phase: one pass over `sequence`, counting only candidates.
 * Elements outside the candidate set are skipped, so the pass stays O(n).
 */
export function countCandidates<T>(
  sequence: Iterable<T>,
  candidates: Iterable<T>,
  threshold: (n: number) => number,
  options?: VerifyOptions<T>,
): VerifyResult<T> {
  if (Array.isArray(sequence) && sequence.length === 0) throw new EmptyInputError();

  const key = options?.key ?? identityKey;
  const slots = new Map<ElementKey, { element: T; count: number }>();
  for (const c of candidates) {
    const k = key(c);
    if (!slots.has(k)) slots.set(k, { element: c, count: 0 });
  }

  let n = 0;
  for (const el of sequence) {
    n++;
    const slot = slots.get(key(el));
    if (slot) slot.count++;
  }
  if (n === 0) throw new EmptyInputError();

  const t = threshold(n);
  const counts = new Map<T, number>();
  for (const { element, count } of slots.values()) {
    if (count > t) counts.set(element, count);
  }
  return { n, threshold: t, counts };
}

/**
 * Keeps the candidates whose exact count in `sequence` exceeds floor(n / (k + 1)).
 * Pure: the same inputs always give the same map.
 */
export function verify<T>(
  sequence: Iterable<T>,
  candidates: Iterable<T>,
  k: number,
  options?: VerifyOptions<T>,
): Map<T, number> {
  assertCapacity(k);
  return countCandidates(sequence, candidates, (n) => frequencyThreshold(n, k), options).counts;
}

/** Keeps the candidates occurring more than floor(n / 2) times. */
export function verifyMajority<T>(
  sequence: Iterable<T>,
  candidates: Iterable<T>,
  options?: VerifyOptions<T>,
): Map<T, number> {
  return countCandidates(sequence, candidates, majorityThreshold, options).counts;
}
