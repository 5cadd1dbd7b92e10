import type { ResponseMetadata, Timestamp } from "../types/index.js";

// This was originally going to be a numeric enum, but strings make for way
// better logs.
export const Freshness = {
  Fresh: "fresh",
  Stale: "stale",
  Expired: "expired",
} as const;

export type Freshness = (typeof Freshness)[keyof typeof Freshness];

type FreshnessTimes = Pick<ResponseMetadata, "expires" | "grace">;

/**
 * Classifies a stored response at a given moment:
 *
 * - `fresh` until `expires`;
 * - `stale` from `expires` until `grace`. A stale response can still be
 *   served, but the caller should revalidate it (typically in the background);
 * - `expired` from `grace` onward. An expired response is never selected.
 *
 * Only the timestamps matter. In particular, `ttlSetBy` has no effect.
 */
export function classifyFreshness(
  metadata: FreshnessTimes,
  now: Timestamp,
): Freshness {
  if (now < metadata.expires) {
    return Freshness.Fresh;
  }

  return now < metadata.grace ? Freshness.Stale : Freshness.Expired;
}

export function isUsable(metadata: FreshnessTimes, now: Timestamp) {
  return classifyFreshness(metadata, now) !== Freshness.Expired;
}

/**
 * Seconds left until the response becomes stale (0 if it already is).
 */
export function remainingFreshness(metadata: FreshnessTimes, now: Timestamp) {
  return Math.max(0, metadata.expires - now);
}
