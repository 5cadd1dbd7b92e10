import pg from "pg";

import type { StoreOperation } from "../src/errors.js";
import PostgresStore from "../src/stores/PostgresStore/PostgresStore.js";
import type {
  AlternateKey,
  Candidate,
  HttpResponse,
  InvalidationResult,
  RequestKey,
  ResponseMetadata,
  Store,
  StoredResponse,
  UrlDigest,
  VaryHeaders,
} from "../src/types/index.js";

export function dummyMetadata(
  overrides: Partial<ResponseMetadata> = {},
): ResponseMetadata {
  return {
    created: 1000,
    expires: 2000,
    grace: 3000,
    ttlSetBy: "header",
    parsedHeaders: {},
    alternateKeys: [],
    ...overrides,
  };
}

export function dummyResponse(body = "Dummy content!"): HttpResponse {
  return {
    status: 200,
    headers: [
      ["content-type", "text/plain"],
      ["cache-control", "max-age=60"],
    ],
    body: Buffer.from(body),
  };
}

export function dummyCandidate<Ref>(
  ref: Ref,
  opts: { varyHeaders?: VaryHeaders; metadata?: Partial<ResponseMetadata> } = {},
): Candidate<Ref> {
  return {
    ref,
    status: 200,
    headers: dummyResponse().headers,
    varyHeaders: opts.varyHeaders ?? {},
    metadata: dummyMetadata(opts.metadata),
  };
}

export const randomKey = (prefix = "key") =>
  `${prefix}-${String(Date.now() * Math.random())}`;

export type FakeStoreOpts = { tag: string };

/**
 * An in-process store whose candidates, responses and failures are set by the
 * test. Every call is recorded. It has no alternate key support.
 */
export class FakeStore implements Store<string, FakeStoreOpts> {
  readonly capabilities = { alternateKeyInvalidation: false };
  readonly calls: { method: StoreOperation | "close"; args: unknown[] }[] =
    [];
  readonly failing = new Set<StoreOperation>();
  readonly responses = new Map<string, StoredResponse>();
  candidates: Candidate<string>[] = [];
  invalidatedCount: number | undefined = 0;

  /**
   * Adds a candidate and, unless `evicted` is set, a response for it.
   */
  add(
    candidate: Candidate<string>,
    opts: { body?: string; evicted?: boolean } = {},
  ) {
    this.candidates.push(candidate);
    if (!opts.evicted) {
      this.responses.set(candidate.ref, {
        status: candidate.status,
        headers: candidate.headers,
        body: Buffer.from(opts.body ?? candidate.ref),
        metadata: candidate.metadata,
      });
    }
    return this;
  }

  callsTo(method: StoreOperation) {
    return this.calls.filter((it) => it.method === method);
  }

  async listCandidates(key: RequestKey, opts?: FakeStoreOpts) {
    this.#record("listCandidates", [key, opts]);
    return [...this.candidates];
  }

  async getResponse(ref: string, opts?: FakeStoreOpts) {
    this.#record("getResponse", [ref, opts]);
    return this.responses.get(ref);
  }

  async put(
    key: RequestKey,
    urlDigest: UrlDigest,
    varyHeaders: VaryHeaders,
    response: HttpResponse,
    metadata: ResponseMetadata,
    opts?: FakeStoreOpts,
  ) {
    this.#record("put", [key, urlDigest, varyHeaders, response, metadata, opts]);
  }

  async notifyUsed(ref: string, opts?: FakeStoreOpts) {
    this.#record("notifyUsed", [ref, opts]);
  }

  async invalidateUrl(
    urlDigest: UrlDigest,
    opts?: FakeStoreOpts,
  ): Promise<InvalidationResult> {
    this.#record("invalidateUrl", [urlDigest, opts]);
    return { invalidatedCount: this.invalidatedCount };
  }

  async close() {
    this.calls.push({ method: "close", args: [] });
  }

  #record(method: StoreOperation, args: unknown[]) {
    this.calls.push({ method, args });
    if (this.failing.has(method)) {
      throw new Error(`${method} failed`);
    }
  }
}

/**
 * A FakeStore that can also invalidate by alternate key.
 */
export class FakeAlternateKeyStore extends FakeStore {
  override readonly capabilities = { alternateKeyInvalidation: true } as const;

  async invalidateByAlternateKey(
    keys: readonly AlternateKey[],
    opts?: FakeStoreOpts,
  ): Promise<InvalidationResult> {
    this.calls.push({ method: "invalidateByAlternateKey", args: [keys, opts] });
    if (this.failing.has("invalidateByAlternateKey")) {
      throw new Error("invalidateByAlternateKey failed");
    }
    return { invalidatedCount: this.invalidatedCount };
  }
}

export const postgresIsConfigured = process.env["DATABASE_HOST"] !== undefined;

export function postgresStoreFixture() {
  const postgres = new pg.Pool({
    host: process.env["DATABASE_HOST"],
    port: Number(process.env["DATABASE_PORT"] ?? 5432),
    database: process.env["DATABASE_NAME"],
    user: process.env["DATABASE_USER"],
    password: process.env["DATABASE_PASSWORD"],
  });
  // Use a new table for each store instance so that tests can run in
  // parallel without interfering with each other.
  const tableName = `cache_test_${Math.random()}`.replace(/\./g, "_");
  const postgresStore = new PostgresStore(postgres, {
    schemaName: "http_cache",
    tableName,
  });

  return {
    postgres,
    postgresStore,
    async cleanup() {
      await postgresStore.close();
      await postgres.query(`drop table if exists http_cache."${tableName}"`);
      await postgres.end();
    },
  };
}
