import { partition } from "es-toolkit";

import { callStore } from "../errors.js";
import type {
  Candidate,
  Logger,
  RequestKey,
  RequestVaryValues,
  Store,
  StoredResponse,
  Timestamp,
  VaryHeaders,
} from "../types/index.js";
import {
  contentRangeOf,
  isPartial,
  rangeCovers,
  type ByteRangeRequest,
} from "./byteRanges.js";
import { classifyFreshness, Freshness } from "./freshness.js";
import { defaultLoggersByComponent } from "./utils.js";

/**
 * What the cache needs to know about a request to pick a stored response for
 * it: its key, the normalized values of its headers, and the byte range it
 * asked for, if any.
 */
export type ResolveRequest = {
  key: RequestKey;
  varyValues: RequestVaryValues;
  range?: ByteRangeRequest | undefined;
};

export type ResolvedResponse<Ref> = {
  ref: Ref;
  response: StoredResponse;
  candidate: Candidate<Ref>;
  freshness: UsableFreshness;
};

export type UsableFreshness = Exclude<Freshness, "expired">;

/**
 * Orders two usable candidates: negative if `a` should be preferred. Candidates
 * the comparator considers equal keep the order the store listed them in.
 */
export type CandidateComparator = (
  a: Candidate<unknown>,
  b: Candidate<unknown>,
) => number;

/**
 * Prefers the most recently created (i.e., stored or revalidated) response,
 * then the one that stays fresh the longest. This is the default.
 */
export const newestFirst: CandidateComparator = (a, b) =>
  b.metadata.created - a.metadata.created ||
  b.metadata.expires - a.metadata.expires;

/**
 * Prefers the response that stays fresh the longest, then the newest one.
 */
export const longestFreshnessFirst: CandidateComparator = (a, b) =>
  b.metadata.expires - a.metadata.expires ||
  b.metadata.created - a.metadata.created;

/**
 * Whether a stored response's vary headers are satisfied by a request. Every
 * header the response varies on must have the same value in the request, and
 * a header the response was produced without (null) must be absent from the
 * request. Other request headers are ignored.
 */
export function varyMatches(
  varyHeaders: VaryHeaders,
  varyValues: RequestVaryValues,
) {
  return Object.entries(varyHeaders).every(([name, storedValue]) => {
    const requestValue = Object.hasOwn(varyValues, name)
      ? (varyValues[name] ?? null)
      : null;
    return requestValue === storedValue;
  });
}

/**
 * Filters candidates down to those whose vary headers match the request and
 * whose content can serve the requested range. A full response can serve any
 * range; a partial one only a range it covers. Without a range request, only
 * full responses are eligible, unless there are none, in which case the
 * partial ones are.
 */
export function eligibleCandidates<Ref>(
  candidates: readonly Candidate<Ref>[],
  request: Pick<ResolveRequest, "varyValues" | "range">,
): Candidate<Ref>[] {
  const matching = candidates.filter((it) =>
    varyMatches(it.varyHeaders, request.varyValues),
  );

  const { range } = request;
  if (range !== undefined) {
    return matching.filter((it) => {
      const contentRange = contentRangeOf(it.metadata);
      return contentRange === undefined || rangeCovers(contentRange, range);
    });
  }

  const [partial, full] = partition(matching, (it) => isPartial(it.metadata));
  return full.length > 0 ? full : partial;
}

/**
 * Drops expired candidates and sorts the rest from most to least preferred.
 */
export function rankCandidates<Ref>(
  candidates: readonly Candidate<Ref>[],
  now: Timestamp,
  compare: CandidateComparator = newestFirst,
): { candidate: Candidate<Ref>; freshness: UsableFreshness }[] {
  const usable: {
    candidate: Candidate<Ref>;
    freshness: UsableFreshness;
    index: number;
  }[] = [];

  candidates.forEach((candidate, index) => {
    const freshness = classifyFreshness(candidate.metadata, now);
    if (freshness !== Freshness.Expired) {
      usable.push({ candidate, freshness, index });
    }
  });

  return usable
    .sort((a, b) => compare(a.candidate, b.candidate) || a.index - b.index)
    .map(({ candidate, freshness }) => ({ candidate, freshness }));
}

export type ResolveOptions<Opts> = {
  now: Timestamp;
  compare?: CandidateComparator | undefined;
  opts?: Opts | undefined;
  logger?: Logger | undefined;
};

export type Resolution<Ref> = {
  resolved: ResolvedResponse<Ref> | undefined;
  candidateCount: number;
  evictedCount: number;
};

/**
 * Finds the stored response that best satisfies a request: lists the
 * candidates stored under its key, keeps the ones that match its vary headers
 * and range and that haven't expired, and fetches the preferred one. If that
 * response was evicted after being listed, the next one is tried, and so on.
 *
 * Resolves `resolved: undefined` when no stored response is usable. Failures
 * of the store reject with a BackendFailureError.
 */
export async function resolveCandidate<Ref, Opts>(
  store: Store<Ref, Opts>,
  request: ResolveRequest,
  options: ResolveOptions<Opts>,
): Promise<Resolution<Ref>> {
  const logger = options.logger ?? defaultLoggersByComponent.selector;
  const { key } = request;

  const candidates = await callStore("listCandidates", async () =>
    store.listCandidates(key, options.opts),
  );

  const ranked = rankCandidates(
    eligibleCandidates(candidates, request),
    options.now,
    options.compare,
  );

  logger("selector", "trace", "ranked candidates for request", {
    key,
    candidateCount: candidates.length,
    ranked: ranked.map(({ candidate, freshness }) => ({
      ref: candidate.ref,
      freshness,
      created: candidate.metadata.created,
    })),
  });

  let evictedCount = 0;
  for (const { candidate, freshness } of ranked) {
    const response = await callStore("getResponse", async () =>
      store.getResponse(candidate.ref, options.opts),
    );

    if (response === undefined) {
      evictedCount++;
      logger("selector", "debug", "candidate disappeared before its fetch", {
        key,
        ref: candidate.ref,
      });
      continue;
    }

    return {
      resolved: { ref: candidate.ref, response, candidate, freshness },
      candidateCount: candidates.length,
      evictedCount,
    };
  }

  return {
    resolved: undefined,
    candidateCount: candidates.length,
    evictedCount,
  };
}
