export { default as HttpCache } from "./HttpCache.js";
export type { HttpCacheOptions } from "./HttpCache.js";
export { default as MemoryStore } from "./stores/MemoryStore/MemoryStore.js";
export type {
  MemoryStoreOptions,
  MemoryStoreStats,
  VariantPolicy,
} from "./stores/MemoryStore/MemoryStore.js";
export { default as PostgresStore } from "./stores/PostgresStore/PostgresStore.js";
export type { PostgresStoreCallOptions } from "./stores/PostgresStore/PostgresStore.js";
export * from "./types/index.js";
export * from "./errors.js";

// Diagnostics channel for resolution events
export {
  RESOLVE_CHANNEL_NAME,
  type ResolveMessage,
  type ResolveOutcome,
} from "./diagnostics.js";

export {
  eligibleCandidates,
  longestFreshnessFirst,
  newestFirst,
  rankCandidates,
  resolveCandidate,
  varyMatches,
} from "./utils/candidateSelection.js";
export type {
  CandidateComparator,
  Resolution,
  ResolvedResponse,
  ResolveOptions,
  ResolveRequest,
  UsableFreshness,
} from "./utils/candidateSelection.js";
export {
  contentRangeOf,
  isPartial,
  rangeCovers,
  resolveByteRange,
} from "./utils/byteRanges.js";
export type { ByteRangeRequest } from "./utils/byteRanges.js";
export {
  classifyFreshness,
  Freshness,
  isUsable,
  remainingFreshness,
} from "./utils/freshness.js";
export {
  InvalidationCoordinator,
  sumInvalidationResults,
} from "./utils/invalidation.js";
export { assertValidMetadata, metadataIssues } from "./utils/metadata.js";
