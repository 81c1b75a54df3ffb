export {
  LegislativeClient,
  LegislativeApiError,
  DEFAULT_LEGISLATIVE_BASE_URL,
  checkEnvelope,
  type LegislativeClientConfig,
} from './client.js';
export {
  discoverCandidates,
  matchesKeywords,
  type BillCandidate,
  type DiscoveryOptions,
  type DiscoveryResult,
} from './discovery.js';
export { createBillCollection, billEntityKey, type BillCollection, type BillCollectionOptions } from './collector.js';
export { flattenNumberedEntries } from './numbered.js';
export { normalizeBill, billStatusLabel, parseBillDate, type NormalizedBill, type NormalizedBillEvent } from './normalize.js';
export * from './types.js';
