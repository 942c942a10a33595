import { EmptyInputError, NoFrequentElementsError, NoMajorityElementError } from "../errors.js";
import type { SummaryOptions } from "../summary.js";
import { identityKey, type ElementKey, type FrequentItem, type KeyFn, type Replayable } from "../types.js";
import { assertCapacity, MisraGriesSummary } from "./misraGriesSummary.js";
import { countCandidates, frequencyThreshold, majorityThreshold } from "./verify.js";

export interface FrequentOptions<T> extends SummaryOptions<T> {
  /** Throw NoFrequentElementsError instead of returning an empty result. */
  requireResult?: boolean;
}

export interface FrequentReport<T> {
  n: number;
  k: number;
  threshold: number;
  /** verified elements, highest count first */
  items: FrequentItem<T>[];
}

export interface MajorityResult<T> extends FrequentItem<T> {
  n: number;
  threshold: number;
}

function open<T>(source: Replayable<T>): Iterable<T> {
  return typeof source === "function" ? source() : source;
}

function rejectEmpty<T>(source: Replayable<T>): void {
  // factories are only known to be empty after the first pass
  if (typeof source !== "function" && source.length === 0) throw new EmptyInputError();
}

function distinct<T>(elements: Iterable<T>, key: KeyFn<T>): T[] {
  const seen = new Set<ElementKey>();
  const out: T[] = [];
  for (const el of elements) {
    const k = key(el);
    if (seen.has(k)) continue;
    seen.add(k);
    out.push(el);
  }
  return out;
}

/**
 * Summary pass + verification pass.
 *
 * When an array holds fewer than k elements the summary could never fight, so its
 * candidates would be exactly the distinct elements: collect those directly.
 */
export function analyzeFrequent<T>(source: Replayable<T>, k: number, options?: FrequentOptions<T>): FrequentReport<T> {
  assertCapacity(k);
  rejectEmpty(source);

  const key = options?.key ?? identityKey;
  const candidates =
    typeof source !== "function" && k > source.length
      ? distinct(source, key)
      : MisraGriesSummary.fromSequence(open(source), k, options).candidates();

  const { n, threshold, counts } = countCandidates(open(source), candidates, (len) => frequencyThreshold(len, k), { key });
  if (counts.size === 0 && options?.requireResult) {
    throw new NoFrequentElementsError(n, threshold);
  }

  const items = Array.from(counts, ([element, count]) => ({ element, count }));
  items.sort((a, b) => b.count - a.count);
  return { n, k, threshold, items };
}

/** Elements occurring more than floor(n / (k + 1)) times. */
export function mostFrequent<T>(source: Replayable<T>, k: number, options?: FrequentOptions<T>): Set<T> {
  return new Set(analyzeFrequent(source, k, options).items.map((i) => i.element));
}

export function mostFrequentCounts<T>(source: Replayable<T>, k: number, options?: FrequentOptions<T>): FrequentItem<T>[] {
  return analyzeFrequent(source, k, options).items;
}

/** Boyer-Moore vote: a one-slot summary, then an exact count against floor(n / 2). */
export function majority<T>(source: Replayable<T>, options?: SummaryOptions<T>): MajorityResult<T> {
  rejectEmpty(source);

  const summary = MisraGriesSummary.fromSequence(open(source), 2, options);
  const { n, threshold, counts } = countCandidates(open(source), summary.candidates(), majorityThreshold, {
    key: options?.key,
  });

  const first = counts.entries().next();
  if (first.done) throw new NoMajorityElementError(n);
  const [element, count] = first.value;
  return { element, count, n, threshold };
}

export function majorityElement<T>(source: Replayable<T>, options?: SummaryOptions<T>): T {
  return majority(source, options).element;
}
