export * from "./types.js";
export * from "./errors.js";
export type { CounterTable } from "./counterTable.js";
export { EVICTION_POLICIES, type EvictionPolicy, type FrequencySummary, type SummaryOptions } from "./summary.js";
export * from "./impl/index.js";
