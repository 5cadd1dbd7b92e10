import pLimit from "p-limit";

import { callStore, UnsupportedCapabilityError } from "../errors.js";
import {
  canInvalidateByAlternateKey,
  type AlternateKey,
  type InvalidationResult,
  type Logger,
  type Store,
  type UrlDigest,
} from "../types/index.js";
import type { Bind2 } from "../types/utils.js";
import { defaultLoggersByComponent } from "./utils.js";

/**
 * Adds up invalidation counts. The total is unknown if any part of it is.
 */
export function sumInvalidationResults(
  results: readonly InvalidationResult[],
): InvalidationResult {
  return {
    invalidatedCount: results.reduce<number | undefined>(
      (total, { invalidatedCount }) =>
        total === undefined || invalidatedCount === undefined
          ? undefined
          : total + invalidatedCount,
      0,
    ),
  };
}

/**
 * Gives callers one way to invalidate responses, whatever the store supports.
 * Store failures reject with a BackendFailureError, and asking a store without
 * alternate key support to invalidate by alternate key rejects with an
 * UnsupportedCapabilityError (without calling the store).
 */
export class InvalidationCoordinator<Ref, Opts = undefined> {
  readonly #store: Store<Ref, Opts>;
  readonly #maxConcurrency: number;
  readonly #logDebug: Bind2<Logger, "invalidation", "debug">;

  constructor(
    store: Store<Ref, Opts>,
    options: { logger?: Logger; maxConcurrency?: number } = {},
  ) {
    const unboundLogger =
      options.logger ?? defaultLoggersByComponent.invalidation;
    this.#logDebug = unboundLogger.bind(null, "invalidation", "debug");
    this.#store = store;
    this.#maxConcurrency = options.maxConcurrency ?? 10;
  }

  get supportsAlternateKeys() {
    return canInvalidateByAlternateKey(this.#store);
  }

  async invalidateUrl(
    urlDigest: UrlDigest,
    opts?: Opts,
  ): Promise<InvalidationResult> {
    const result = await callStore("invalidateUrl", async () =>
      this.#store.invalidateUrl(urlDigest, opts),
    );
    this.#logDebug("invalidated url", { urlDigest, ...result });
    return result;
  }

  /**
   * Invalidates several URLs, with at most `maxConcurrency` store calls in
   * flight. Rejects with the first failure.
   */
  async invalidateUrls(
    urlDigests: readonly UrlDigest[],
    opts?: Opts,
  ): Promise<InvalidationResult> {
    const limit = pLimit(this.#maxConcurrency);
    const results = await Promise.all(
      urlDigests.map(async (urlDigest) =>
        limit(async () => this.invalidateUrl(urlDigest, opts)),
      ),
    );
    return sumInvalidationResults(results);
  }

  async invalidateByAlternateKey(
    keys: readonly AlternateKey[],
    opts?: Opts,
  ): Promise<InvalidationResult> {
    const store = this.#store;
    if (!canInvalidateByAlternateKey(store)) {
      throw new UnsupportedCapabilityError("alternateKeyInvalidation");
    }

    if (keys.length === 0) {
      return { invalidatedCount: 0 };
    }

    const result = await callStore("invalidateByAlternateKey", async () =>
      store.invalidateByAlternateKey(keys, opts),
    );
    this.#logDebug("invalidated alternate keys", { keys, ...result });
    return result;
  }
}
