import { EventEmitter } from "events";
import pLimit from "p-limit";

import { publishResolveResult } from "./diagnostics.js";
import { callStore, StoreClosedError } from "./errors.js";
import type {
  AlternateKey,
  HttpResponse,
  InvalidationResult,
  Logger,
  RequestKey,
  ResponseMetadata,
  Store,
  Timestamp,
  UrlDigest,
  VaryHeaders,
} from "./types/index.js";
import type { Bind1 } from "./types/utils.js";
import {
  newestFirst,
  resolveCandidate,
  type CandidateComparator,
  type ResolvedResponse,
  type ResolveRequest,
} from "./utils/candidateSelection.js";
import { InvalidationCoordinator } from "./utils/invalidation.js";
import { assertValidMetadata } from "./utils/metadata.js";
import { defaultLoggersByComponent, nowInSeconds } from "./utils/utils.js";

type OnRequestAfterClose = "throw" | "return-nothing";

export type HttpCacheOptions = {
  logger?: Logger;
  /**
   * The clock used to classify stored responses, as a UNIX timestamp in
   * seconds. Defaults to the system clock.
   */
  now?: () => Timestamp;
  /**
   * The preference between several usable responses. Defaults to
   * {@link newestFirst}.
   */
  compareCandidates?: CandidateComparator;
  /**
   * A name for this cache, used for identifying it in diagnostics/monitoring.
   */
  cacheName?: string;
  /**
   * The maximum number of store calls that `getMany` and `invalidateUrls`
   * keep in flight. Defaults to 10.
   */
  maxConcurrency?: number;
  onGetAfterClose?: OnRequestAfterClose;
  onStoreAfterClose?: OnRequestAfterClose;
};

/**
 * An HTTP response cache on top of a pluggable {@link Store}.
 *
 * The store keeps, for each request key, every response stored for it. For a
 * new request, this class picks the one response whose vary headers match the
 * request's headers, whose content covers the requested byte range, and that
 * hasn't expired, preferring the newest. It doesn't parse headers or derive
 * keys: callers hand it the request key, url digest and normalized header
 * values they computed.
 *
 * Errors thrown by the store are rethrown as BackendFailureErrors; a failure is
 * never reported as a miss.
 */
export default class HttpCache<Ref, Opts = undefined> {
  readonly #logger: Bind1<Logger, "cache">;
  readonly #customLogger: Logger | undefined;
  readonly #store: Store<Ref, Opts>;
  readonly #invalidation: InvalidationCoordinator<Ref, Opts>;
  readonly #now: () => Timestamp;
  readonly #compareCandidates: CandidateComparator;
  readonly #cacheName: string | undefined;
  readonly #maxConcurrency: number;
  readonly #onGetAfterClose: OnRequestAfterClose;
  readonly #onStoreAfterClose: OnRequestAfterClose;
  #closed = false;

  /**
   * Emits `store` (key, metadata) once the store has accepted a response,
   * `hit` (key, resolved), `miss` (key) after each lookup, and `invalidate`
   * (kind, target, result) after each invalidation.
   */
  public readonly emitter = new EventEmitter();

  /**
   * @param store The backing store that will actually hold the responses.
   */
  constructor(store: Store<Ref, Opts>, options: HttpCacheOptions = {}) {
    const unboundLogger = options.logger ?? defaultLoggersByComponent.cache;
    this.#logger = unboundLogger.bind(null, "cache");
    this.#customLogger = options.logger;
    this.#store = store;
    this.#now = options.now ?? nowInSeconds;
    this.#compareCandidates = options.compareCandidates ?? newestFirst;
    this.#cacheName = options.cacheName;
    this.#maxConcurrency = options.maxConcurrency ?? 10;
    this.#onGetAfterClose = options.onGetAfterClose ?? "throw";
    this.#onStoreAfterClose = options.onStoreAfterClose ?? "throw";
    this.#invalidation = new InvalidationCoordinator(store, {
      logger: options.logger,
      maxConcurrency: this.#maxConcurrency,
    });
  }

  get supportsAlternateKeys() {
    return this.#invalidation.supportsAlternateKeys;
  }

  /**
   * Returns the stored response that best satisfies the request, along with
   * whether it's fresh or stale (in which case the caller should revalidate
   * it), or undefined if no stored response is usable.
   *
   * Once the response has been served, the caller may call `notifyUsed` with
   * its `ref`.
   */
  public async get(
    request: ResolveRequest,
    opts?: Opts,
  ): Promise<ResolvedResponse<Ref> | undefined> {
    if (this.#checkClosed(this.#onGetAfterClose, "get")) {
      return undefined;
    }

    const now = this.#now();
    this.#logger("trace", "received request", { ...request, now });

    const { resolved, candidateCount, evictedCount } = await resolveCandidate(
      this.#store,
      request,
      {
        now,
        compare: this.#compareCandidates,
        opts,
        logger: this.#customLogger,
      },
    );

    publishResolveResult({
      cacheName: this.#cacheName,
      requestKey: request.key,
      outcome: resolved?.freshness ?? "miss",
      candidateCount,
      evictedCount,
    });

    if (resolved) {
      this.#logger("trace", "chose/returned this response for request", {
        key: request.key,
        ref: resolved.ref,
        freshness: resolved.freshness,
      });
      this.emitter.emit("hit", request.key, resolved);
    } else {
      this.#logger("trace", "no usable response for request", {
        key: request.key,
        candidateCount,
      });
      this.emitter.emit("miss", request.key);
    }

    return resolved;
  }

  /**
   * Resolves several requests. This is equivalent to calling `get()` for each
   * one, but keeps at most `maxConcurrency` lookups in flight. Results are in
   * the same order as the requests.
   */
  public async getMany(
    requests: readonly ResolveRequest[],
    opts?: Opts,
  ): Promise<(ResolvedResponse<Ref> | undefined)[]> {
    if (requests.length === 0) {
      return [];
    }

    const limit = pLimit(this.#maxConcurrency);
    return Promise.all(
      requests.map(async (request) => limit(async () => this.get(request, opts))),
    );
  }

  /**
   * Stores a response. Its metadata is validated first: metadata breaking its
   * invariants is rejected with an InvariantViolationError and never reaches
   * the store.
   */
  public async put(
    key: RequestKey,
    urlDigest: UrlDigest,
    varyHeaders: VaryHeaders,
    response: HttpResponse,
    metadata: ResponseMetadata,
    opts?: Opts,
  ): Promise<void> {
    if (this.#checkClosed(this.#onStoreAfterClose, "put")) {
      return;
    }

    assertValidMetadata(metadata);

    this.#logger("trace", "storing response", {
      key,
      urlDigest,
      varyHeaders,
      status: response.status,
      metadata,
    });
    await callStore("put", async () =>
      this.#store.put(key, urlDigest, varyHeaders, response, metadata, opts),
    );
    this.emitter.emit("store", key, metadata);
  }

  /**
   * Tells the store a response was used. Callers that don't want to wait for
   * this can skip awaiting it, but should still handle its rejection.
   */
  public async notifyUsed(ref: Ref, opts?: Opts): Promise<void> {
    if (this.#checkClosed(this.#onStoreAfterClose, "notifyUsed")) {
      return;
    }

    await callStore("notifyUsed", async () =>
      this.#store.notifyUsed(ref, opts),
    );
  }

  public async invalidateUrl(
    urlDigest: UrlDigest,
    opts?: Opts,
  ): Promise<InvalidationResult> {
    this.#checkClosed("throw", "invalidateUrl");
    const result = await this.#invalidation.invalidateUrl(urlDigest, opts);
    this.emitter.emit("invalidate", "url", urlDigest, result);
    return result;
  }

  public async invalidateUrls(
    urlDigests: readonly UrlDigest[],
    opts?: Opts,
  ): Promise<InvalidationResult> {
    this.#checkClosed("throw", "invalidateUrls");
    const result = await this.#invalidation.invalidateUrls(urlDigests, opts);
    this.emitter.emit("invalidate", "urls", urlDigests, result);
    return result;
  }

  /**
   * Invalidates every response tagged with one of the keys. Rejects with an
   * UnsupportedCapabilityError if the store can't do that, so that callers
   * can fall back to invalidating by URL.
   */
  public async invalidateByAlternateKey(
    keys: readonly AlternateKey[],
    opts?: Opts,
  ): Promise<InvalidationResult> {
    this.#checkClosed("throw", "invalidateByAlternateKey");
    const result = await this.#invalidation.invalidateByAlternateKey(
      keys,
      opts,
    );
    this.emitter.emit("invalidate", "alternate-keys", keys, result);
    return result;
  }

  public async close(timeout?: number) {
    this.#closed = true;
    return this.#store.close(timeout);
  }

  /**
   * Returns whether the operation should be skipped because the cache is
   * closed, or throws if the policy is to throw.
   */
  #checkClosed(policy: OnRequestAfterClose, operation: string) {
    if (!this.#closed) {
      return false;
    }

    if (policy === "throw") {
      this.#logger("trace", "received request when closed and throwing", {
        operation,
      });
      throw new StoreClosedError();
    }

    this.#logger("trace", "received request when closed, so doing nothing", {
      operation,
    });
    return true;
  }
}
