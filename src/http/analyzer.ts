import { analyzeFrequent, majority, type EvictionPolicy } from "../core/index.js";

/** JSON-friendly element type accepted over HTTP. */
export type Item = string | number;

export interface FrequentQuery {
  items: Item[];
  k: number;
  policy: EvictionPolicy;
  requireResult: boolean;
}

export interface CountedItem {
  value: Item;
  count: number;
}

export interface FrequentResponse {
  n: number;
  k: number;
  threshold: number;
  items: CountedItem[];
}

export interface MajorityResponse extends CountedItem {
  n: number;
  threshold: number;
}

/**
 * HTTP-facing wrapper around the frequent-elements pipeline.
 * Core errors propagate unchanged; the server maps them to problem documents.
 */
export interface Analyzer {
  frequent(q: FrequentQuery): FrequentResponse;
  majority(items: Item[]): MajorityResponse;
}

export function createAnalyzer(): Analyzer {
  return {
    frequent(q) {
      const report = analyzeFrequent(q.items, q.k, { policy: q.policy, requireResult: q.requireResult });
      return {
        n: report.n,
        k: report.k,
        threshold: report.threshold,
        items: report.items.map((i) => ({ value: i.element, count: i.count })),
      };
    },
    majority(items) {
      const r = majority(items);
      return { value: r.element, count: r.count, n: r.n, threshold: r.threshold };
    },
  };
}
