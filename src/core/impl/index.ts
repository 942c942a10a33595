export { SlotCounterTable, MAX_SLOTS } from "./slotCounterTable.js";
export { MisraGriesSummary, MAX_SUMMARY_K, assertCapacity } from "./misraGriesSummary.js";
export {
  verify,
  verifyMajority,
  countCandidates,
  frequencyThreshold,
  majorityThreshold,
  type VerifyOptions,
  type VerifyResult,
} from "./verify.js";
export {
  analyzeFrequent,
  mostFrequent,
  mostFrequentCounts,
  majority,
  majorityElement,
  type FrequentOptions,
  type FrequentReport,
  type MajorityResult,
} from "./frequent.js";
