import type { FieldError } from "./problem.js";
import { EVICTION_POLICIES, type EvictionPolicy } from "../core/index.js";
import type { Item } from "./analyzer.js";

export const MAX_ITEM_LENGTH = 1024;
/** stop collecting per-item errors after this many */
const MAX_ITEM_ERRORS = 20;

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function asInt(v: unknown): number | undefined {
  return typeof v === "number" && Number.isInteger(v) ? v : undefined;
}

export function asBoolean(v: unknown): boolean | undefined {
  return typeof v === "boolean" ? v : undefined;
}

export function asPolicy(v: unknown): EvictionPolicy | undefined {
  return EVICTION_POLICIES.find((p) => p === v);
}

export function pushErr(errors: FieldError[], path: string, message: string): void {
  errors.push({ path, message });
}

/** Validates `$.items`; returns the items when every entry is usable. */
export function readItems(v: unknown, maxItems: number, errors: FieldError[]): Item[] | undefined {
  if (!Array.isArray(v)) {
    pushErr(errors, "$.items", "must be an array");
    return undefined;
  }
  // an empty array is left to the core, which answers EMPTY_INPUT
  if (v.length > maxItems) pushErr(errors, "$.items", `must contain at most ${maxItems} items`);

  const items: Item[] = [];
  let bad = 0;
  for (let i = 0; i < v.length && bad < MAX_ITEM_ERRORS; i++) {
    const el: unknown = v[i];
    if (typeof el === "number" && Number.isFinite(el)) {
      items.push(el);
    } else if (typeof el === "string" && el.length <= MAX_ITEM_LENGTH) {
      items.push(el);
    } else {
      bad++;
      pushErr(errors, `$.items[${i}]`, `must be a finite number or a string of at most ${MAX_ITEM_LENGTH} chars`);
    }
  }
  return bad === 0 ? items : undefined;
}
