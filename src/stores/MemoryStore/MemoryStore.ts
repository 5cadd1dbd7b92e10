import type {
  AlternateKey,
  AlternateKeyInvalidatingStore,
  Candidate,
  HttpResponse,
  InvalidationResult,
  Logger,
  RequestKey,
  ResponseMetadata,
  StoredResponse,
  Timestamp,
  UrlDigest,
  VaryHeaders,
} from "../../types/index.js";
import type { Bind2 } from "../../types/utils.js";
import { contentRangeOf } from "../../utils/byteRanges.js";
import {
  defaultLoggersByComponent,
  nowInSeconds,
  stableJsonStringify,
} from "../../utils/utils.js";

/**
 * What happens when a response is stored with the same vary headers and
 * content range as a response already stored under its key:
 *
 * - `append`: both are kept, as separate candidates.
 * - `replace-older`: only the one with the latest `created` is kept. When both
 *   have the same `created`, the new one wins.
 */
export type VariantPolicy = "append" | "replace-older";

export type MemoryStoreOptions = {
  /** Maximum number of responses held. Default: 1000 */
  maxEntries?: number;
  /**
   * Maximum total size of the held responses, in bytes. A response larger
   * than this on its own is not stored: `put` resolves without storing it and
   * logs a warning. Default: 100MB
   */
  maxSizeBytes?: number;
  /** Default: "append" */
  variants?: VariantPolicy;
  /**
   * If set, responses past their grace time are removed on this interval.
   * The timer doesn't keep the process alive.
   */
  sweepIntervalMs?: number;
  logger?: Logger;
};

export type MemoryStoreStats = {
  entries: number;
  sizeBytes: number;
  maxEntries: number;
  maxSizeBytes: number;
};

type MemoryEntry = {
  key: RequestKey;
  urlDigest: UrlDigest;
  variantKey: string;
  varyHeaders: VaryHeaders;
  status: number;
  headers: HttpResponse["headers"];
  body: Buffer;
  metadata: ResponseMetadata;
  // Fixed at put time, so removing the entry unindexes exactly what was indexed.
  alternateKeyIds: string[];
  size: number;
};

/**
 * A store that keeps responses in memory, evicting the least recently used
 * (or stored) ones when it grows past its limits. Refs are integers that are
 * never reused, so a ref to an evicted response simply stops resolving.
 *
 * Besides the entries themselves, it keeps indexes from request key, url
 * digest and alternate key to refs. Every write updates the entry and its
 * indexes synchronously, so no reader can see a half-stored or half-removed
 * response.
 */
export default class MemoryStore
  implements AlternateKeyInvalidatingStore<number>
{
  readonly capabilities = { alternateKeyInvalidation: true } as const;

  // Iteration order is recency order: least recently used first.
  readonly #entries = new Map<number, MemoryEntry>();
  readonly #refsByKey = new Map<RequestKey, Set<number>>();
  readonly #refsByUrl = new Map<UrlDigest, Set<number>>();
  readonly #refsByAlternateKey = new Map<string, Set<number>>();
  #nextRef = 1;
  #currentSize = 0;
  #sweepInterval: ReturnType<typeof setInterval> | undefined;

  readonly #maxEntries: number;
  readonly #maxSizeBytes: number;
  readonly #variants: VariantPolicy;

  readonly #logTrace: Bind2<Logger, "memory-store", "trace">;
  readonly #logDebug: Bind2<Logger, "memory-store", "debug">;
  readonly #logWarn: Bind2<Logger, "memory-store", "warn">;

  constructor(options: MemoryStoreOptions = {}) {
    const unboundLogger =
      options.logger ?? defaultLoggersByComponent["memory-store"];
    this.#logTrace = unboundLogger.bind(null, "memory-store", "trace");
    this.#logDebug = unboundLogger.bind(null, "memory-store", "debug");
    this.#logWarn = unboundLogger.bind(null, "memory-store", "warn");

    this.#maxEntries = options.maxEntries ?? 1000;
    this.#maxSizeBytes = options.maxSizeBytes ?? 100 * 1024 * 1024;
    this.#variants = options.variants ?? "append";

    if (options.sweepIntervalMs !== undefined) {
      this.#sweepInterval = setInterval(() => {
        this.sweepExpired();
      }, options.sweepIntervalMs);
      this.#sweepInterval.unref();
    }
  }

  async listCandidates(key: RequestKey): Promise<Candidate<number>[]> {
    const refs = this.#refsByKey.get(key) ?? new Set<number>();
    const candidates = [...refs].flatMap((ref) => {
      const entry = this.#entries.get(ref);
      return entry
        ? [
            {
              ref,
              status: entry.status,
              headers: structuredClone(entry.headers),
              varyHeaders: structuredClone(entry.varyHeaders),
              metadata: structuredClone(entry.metadata),
            },
          ]
        : [];
    });

    this.#logTrace("listed candidates", { key, count: candidates.length });
    return candidates;
  }

  async getResponse(ref: number): Promise<StoredResponse | undefined> {
    const entry = this.#entries.get(ref);
    if (!entry) {
      this.#logTrace("no response for ref", { ref });
      return undefined;
    }

    // Callers get copies: changing what they were served mustn't change what
    // is stored.
    return {
      status: entry.status,
      headers: structuredClone(entry.headers),
      body: Buffer.from(entry.body),
      metadata: structuredClone(entry.metadata),
    };
  }

  async put(
    key: RequestKey,
    urlDigest: UrlDigest,
    varyHeaders: VaryHeaders,
    response: HttpResponse,
    metadata: ResponseMetadata,
  ): Promise<void> {
    const entry: MemoryEntry = {
      key,
      urlDigest,
      variantKey: variantKey(varyHeaders, metadata),
      varyHeaders: structuredClone(varyHeaders),
      status: response.status,
      headers: structuredClone(response.headers),
      body: Buffer.from(response.body),
      metadata: structuredClone(metadata),
      alternateKeyIds: [...new Set(metadata.alternateKeys.map(alternateKeyId))],
      size: 0,
    };
    entry.size = entrySize(entry);

    if (entry.size > this.#maxSizeBytes) {
      this.#logWarn("response larger than the store, not storing it", {
        key,
        size: entry.size,
      });
      return;
    }

    if (this.#variants === "replace-older") {
      const existing = this.#findVariant(key, entry.variantKey);
      if (existing) {
        const [existingRef, existingEntry] = existing;
        if (existingEntry.metadata.created > metadata.created) {
          this.#logTrace("kept newer stored variant, dropping put", {
            key,
            ref: existingRef,
          });
          return;
        }
        this.#logTrace("replacing older variant", { key, ref: existingRef });
        this.#deleteEntry(existingRef);
      }
    }

    this.#evictFor(entry.size);

    const ref = this.#nextRef++;
    this.#entries.set(ref, entry);
    this.#currentSize += entry.size;
    addToIndex(this.#refsByKey, key, ref);
    addToIndex(this.#refsByUrl, urlDigest, ref);
    for (const id of entry.alternateKeyIds) {
      addToIndex(this.#refsByAlternateKey, id, ref);
    }

    this.#logTrace("stored response", { key, ref, size: entry.size });
  }

  async notifyUsed(ref: number): Promise<void> {
    const entry = this.#entries.get(ref);
    if (entry) {
      this.#entries.delete(ref);
      this.#entries.set(ref, entry);
    }
  }

  async invalidateUrl(urlDigest: UrlDigest): Promise<InvalidationResult> {
    const refs = [...(this.#refsByUrl.get(urlDigest) ?? [])];
    refs.forEach((ref) => this.#deleteEntry(ref));
    this.#logTrace("invalidated url", { urlDigest, count: refs.length });
    return { invalidatedCount: refs.length };
  }

  async invalidateByAlternateKey(
    keys: readonly AlternateKey[],
  ): Promise<InvalidationResult> {
    const refs = new Set(
      keys.flatMap((it) => [
        ...(this.#refsByAlternateKey.get(alternateKeyId(it)) ?? []),
      ]),
    );
    refs.forEach((ref) => this.#deleteEntry(ref));
    this.#logTrace("invalidated alternate keys", { keys, count: refs.size });
    return { invalidatedCount: refs.size };
  }

  /**
   * Removes every response whose grace time has passed, returning how many
   * were removed.
   */
  sweepExpired(now: Timestamp = nowInSeconds()) {
    const expiredRefs = [...this.#entries]
      .filter(([, entry]) => now >= entry.metadata.grace)
      .map(([ref]) => ref);

    expiredRefs.forEach((ref) => this.#deleteEntry(ref));
    if (expiredRefs.length > 0) {
      this.#logDebug("swept expired responses", { count: expiredRefs.length });
    }
    return expiredRefs.length;
  }

  getStats(): MemoryStoreStats {
    return {
      entries: this.#entries.size,
      sizeBytes: this.#currentSize,
      maxEntries: this.#maxEntries,
      maxSizeBytes: this.#maxSizeBytes,
    };
  }

  async close() {
    if (this.#sweepInterval) {
      clearInterval(this.#sweepInterval);
      this.#sweepInterval = undefined;
    }
    this.#entries.clear();
    this.#refsByKey.clear();
    this.#refsByUrl.clear();
    this.#refsByAlternateKey.clear();
    this.#currentSize = 0;
  }

  #findVariant(
    key: RequestKey,
    variant: string,
  ): [number, MemoryEntry] | undefined {
    for (const ref of this.#refsByKey.get(key) ?? []) {
      const entry = this.#entries.get(ref);
      if (entry?.variantKey === variant) {
        return [ref, entry];
      }
    }
    return undefined;
  }

  #evictFor(requiredSize: number) {
    for (const ref of this.#entries.keys()) {
      if (
        this.#entries.size < this.#maxEntries &&
        this.#currentSize + requiredSize <= this.#maxSizeBytes
      ) {
        return;
      }
      this.#logTrace("evicting least recently used response", { ref });
      this.#deleteEntry(ref);
    }
  }

  #deleteEntry(ref: number) {
    const entry = this.#entries.get(ref);
    if (!entry) {
      return;
    }

    this.#entries.delete(ref);
    this.#currentSize -= entry.size;
    removeFromIndex(this.#refsByKey, entry.key, ref);
    removeFromIndex(this.#refsByUrl, entry.urlDigest, ref);
    for (const id of entry.alternateKeyIds) {
      removeFromIndex(this.#refsByAlternateKey, id, ref);
    }
  }
}

/**
 * Identifies the variant a response represents: the vary headers it was
 * stored with and, for a partial response, the range it holds.
 */
function variantKey(varyHeaders: VaryHeaders, metadata: ResponseMetadata) {
  return stableJsonStringify([varyHeaders, contentRangeOf(metadata) ?? null]);
}

// Keeps 1 and "1" apart.
function alternateKeyId(key: AlternateKey) {
  return stableJsonStringify(key);
}

function entrySize(entry: MemoryEntry) {
  return (
    entry.body.length +
    stableJsonStringify([entry.headers, entry.varyHeaders, entry.metadata])
      .length
  );
}

function addToIndex<K>(index: Map<K, Set<number>>, key: K, ref: number) {
  const refs = index.get(key);
  if (refs) {
    refs.add(ref);
  } else {
    index.set(key, new Set([ref]));
  }
}

function removeFromIndex<K>(index: Map<K, Set<number>>, key: K, ref: number) {
  const refs = index.get(key);
  refs?.delete(ref);
  if (refs?.size === 0) {
    index.delete(key);
  }
}
