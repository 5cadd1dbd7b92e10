import type { AlternateKey, RequestKey, UrlDigest } from "./01_Keys.js";
import type { ResponseMetadata } from "./02_Metadata.js";
import type {
  Candidate,
  HttpResponse,
  StoredResponse,
  VaryHeaders,
} from "./03_Response.js";

/**
 * The result of an invalidation. `invalidatedCount` is undefined when the
 * backend can't tell how many responses it invalidated.
 */
export type InvalidationResult = {
  invalidatedCount: number | undefined;
};

export type StoreCapabilities = {
  readonly alternateKeyInvalidation: boolean;
};

/**
 * The contract between the cache and a backend that persists responses.
 *
 * `Ref` is the backend's handle for one stored response. The cache gets refs
 * from `listCandidates` and hands them back to `getResponse` and `notifyUsed`;
 * it never constructs or inspects one. A ref may stop resolving at any moment
 * (e.g., if the response is evicted), which is not an error.
 *
 * `Opts` holds backend-specific per-call options (e.g., an abort signal). The
 * cache passes them through untouched.
 *
 * Every method other than `getResponse` (which resolves to undefined for an
 * unknown ref) and `listCandidates` (which resolves to [] for an unknown key)
 * reports failures by rejecting.
 */
export interface Store<Ref, Opts = undefined> {
  readonly capabilities: StoreCapabilities;

  /**
   * Returns every response stored under the key, including stale and expired
   * ones: deciding which of them is usable is the cache's job. Must not return
   * partially-written candidates, but may miss responses stored, or include
   * ones invalidated, concurrently.
   */
  listCandidates(key: RequestKey, opts?: Opts): Promise<Candidate<Ref>[]>;

  /**
   * Returns the full response for a ref previously returned from
   * `listCandidates`, or undefined if it's no longer stored.
   */
  getResponse(ref: Ref, opts?: Opts): Promise<StoredResponse | undefined>;

  /**
   * Stores a response as an additional candidate for the key, indexed by the
   * url digest and by each of `metadata.alternateKeys`. Whether a response
   * with the same vary headers replaces an older one is up to the backend,
   * but the choice must be deterministic.
   */
  put(
    key: RequestKey,
    urlDigest: UrlDigest,
    varyHeaders: VaryHeaders,
    response: HttpResponse,
    metadata: ResponseMetadata,
    opts?: Opts,
  ): Promise<void>;

  /**
   * A hint that the response was just served (e.g., for LRU bookkeeping).
   * Backends may drop or coalesce these.
   */
  notifyUsed(ref: Ref, opts?: Opts): Promise<void>;

  /**
   * Makes every response stored for the URL unselectable by any
   * `listCandidates` call that starts after the returned promise settles.
   */
  invalidateUrl(urlDigest: UrlDigest, opts?: Opts): Promise<InvalidationResult>;

  close(timeout?: number): Promise<void>;
}

/**
 * A store that can also invalidate responses by the alternate keys they were
 * tagged with.
 */
export interface AlternateKeyInvalidatingStore<Ref, Opts = undefined>
  extends Store<Ref, Opts> {
  readonly capabilities: StoreCapabilities & {
    readonly alternateKeyInvalidation: true;
  };

  /**
   * Makes every response tagged with at least one of the keys unselectable.
   */
  invalidateByAlternateKey(
    keys: readonly AlternateKey[],
    opts?: Opts,
  ): Promise<InvalidationResult>;
}

export function canInvalidateByAlternateKey<Ref, Opts>(
  store: Store<Ref, Opts>,
): store is AlternateKeyInvalidatingStore<Ref, Opts> {
  return store.capabilities.alternateKeyInvalidation;
}
