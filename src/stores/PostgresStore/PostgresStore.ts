import type { ColumnType, Generated } from "kysely";
import { Kysely, PostgresDialect, sql } from "kysely";
import type { Pool } from "pg";
import type { Tagged } from "type-fest";

import type {
  AlternateKey,
  AlternateKeyInvalidatingStore,
  Candidate,
  Headers,
  HttpResponse,
  InvalidationResult,
  Logger,
  RequestKey,
  ResponseMetadata,
  StoredResponse,
  UrlDigest,
  VaryHeaders,
} from "../../types/index.js";
import type { Bind2 } from "../../types/utils.js";
import { contentRangeOf } from "../../utils/byteRanges.js";
import {
  defaultLoggersByComponent,
  stableJsonStringify,
} from "../../utils/utils.js";

/**
 * Type representing the qualified name of the cache table.
 */
type CacheTableName = Tagged<string, "CacheTableName">;

/**
 * Responses are stored one per row. JSON columns are written as serialized
 * strings and come back parsed.
 */
type ResponseRow = {
  // int8, which pg hands back as a string.
  id: Generated<string>;
  request_key: ColumnType<string, string, never>;
  variant_key: ColumnType<string, string, never>;
  url_digest: string;
  vary_headers: ColumnType<VaryHeaders, string, string>;
  status: number;
  headers: ColumnType<Headers, string, string>;
  body: Buffer;
  metadata: ColumnType<ResponseMetadata, string, string>;
  alternate_keys: ColumnType<AlternateKey[], string, string>;
  // Copy of metadata.created, used to pick between two puts of one variant.
  created: ColumnType<string, number, number>;
  last_used_at: ColumnType<Date | null, never, Date>;
};

type CacheTables = {
  [key in CacheTableName]: ResponseRow;
};

/**
 * Per-call options. A call whose signal is already aborted rejects with the
 * signal's reason before touching the database.
 */
export type PostgresStoreCallOptions = {
  signal?: AbortSignal;
};

/**
 * This class implements a store for HTTP responses, backed by Postgres. For
 * details on each method, see the Store interface. Refs are the rows' ids.
 *
 * Each row holds one response, and is uniquely identified by its request key
 * and variant (i.e., its vary headers and, for partial responses, its content
 * range). Storing a response for an existing variant replaces the stored one
 * if the new one was created at the same time or later; otherwise the put is a
 * no-op. The row keeps its id when replaced, so refs to it stay valid.
 *
 * `listCandidates` doesn't read bodies; only `getResponse` does.
 */
export default class PostgresStore
  implements AlternateKeyInvalidatingStore<string, PostgresStoreCallOptions>
{
  readonly capabilities = { alternateKeyInvalidation: true } as const;

  /** Object containing info about the schema and table name */
  private readonly tableNameData: {
    schemaName: string;
    tableName: string;
    qualifiedName: CacheTableName;
  };
  private readonly db: Kysely<CacheTables>;
  private readonly assumeIsInitialized: boolean;
  /**
   * Promise that resolves when the required tables are initialized. Created on
   * first use, and cleared if initialization fails so the next call retries.
   */
  private ensureInitializedPromise: Promise<void> | undefined;

  private readonly logInfo: Bind2<Logger, "postgres-store", "info">;
  private readonly logTrace: Bind2<Logger, "postgres-store", "trace">;
  private readonly logError: Bind2<Logger, "postgres-store", "error">;

  /**
   * @param pool - The postgres pool to use
   * @param opts.schemaName - The name of the schema to use
   * @param opts.tableName - The name of the table to use
   * @param opts.logger - Optional custom logger to use. Defaults to using
   *  the debug module with the http-cache-store:postgres-store namespace
   * @param opts.assumeIsInitialized - Skip creating the schema, table and
   *  indexes (e.g., when they're managed by migrations)
   */
  constructor(
    pool: Pool,
    opts: {
      schemaName: string;
      tableName: string;
      logger?: Logger;
      assumeIsInitialized?: boolean;
    },
  ) {
    const unboundLogger =
      opts.logger ?? defaultLoggersByComponent["postgres-store"];

    this.logInfo = unboundLogger.bind(null, "postgres-store", "info");
    this.logTrace = unboundLogger.bind(null, "postgres-store", "trace");
    this.logError = unboundLogger.bind(null, "postgres-store", "error");

    this.tableNameData = this.getTableNameData(opts.schemaName, opts.tableName);
    this.db = new Kysely({ dialect: new PostgresDialect({ pool }) });
    this.assumeIsInitialized = opts.assumeIsInitialized ?? false;
  }

  async listCandidates(
    key: RequestKey,
    opts?: PostgresStoreCallOptions,
  ): Promise<Candidate<string>[]> {
    this.logTrace("querying for candidates", { key });
    await this.ready(opts);

    const rows = await this.db
      .selectFrom(this.tableName)
      .select(["id", "status", "headers", "vary_headers", "metadata"])
      .where("request_key", "=", key)
      .orderBy("id")
      .execute();

    this.logTrace("returning candidates from postgres query", {
      key,
      count: rows.length,
    });
    return rows.map((row) => ({
      ref: row.id,
      status: row.status,
      headers: row.headers,
      varyHeaders: row.vary_headers,
      metadata: row.metadata,
    }));
  }

  async getResponse(
    ref: string,
    opts?: PostgresStoreCallOptions,
  ): Promise<StoredResponse | undefined> {
    // Refs only come from listCandidates, but a malformed one must not turn
    // into a query error.
    if (!/^\d+$/.test(ref)) {
      return undefined;
    }
    await this.ready(opts);

    const row = await this.db
      .selectFrom(this.tableName)
      .select(["status", "headers", "body", "metadata"])
      .where("id", "=", ref)
      .executeTakeFirst();

    if (!row) {
      this.logTrace("no response for ref", { ref });
      return undefined;
    }

    return {
      status: row.status,
      headers: row.headers,
      body: row.body,
      metadata: row.metadata,
    };
  }

  async put(
    key: RequestKey,
    urlDigest: UrlDigest,
    varyHeaders: VaryHeaders,
    response: HttpResponse,
    metadata: ResponseMetadata,
    opts?: PostgresStoreCallOptions,
  ): Promise<void> {
    this.logTrace("storing response", { key, urlDigest, varyHeaders });
    await this.ready(opts);

    try {
      await this.db
        .insertInto(this.tableName)
        .values({
          request_key: key,
          variant_key: stableJsonStringify([
            varyHeaders,
            contentRangeOf(metadata) ?? null,
          ]),
          url_digest: urlDigest,
          vary_headers: stableJsonStringify(varyHeaders),
          status: response.status,
          headers: stableJsonStringify(response.headers),
          body: response.body,
          metadata: stableJsonStringify(metadata),
          alternate_keys: stableJsonStringify(metadata.alternateKeys),
          created: metadata.created,
        })
        .onConflict((oc) =>
          oc
            .columns(["request_key", "variant_key"])
            .doUpdateSet((eb) => ({
              url_digest: eb.ref("excluded.url_digest"),
              vary_headers: eb.ref("excluded.vary_headers"),
              status: eb.ref("excluded.status"),
              headers: eb.ref("excluded.headers"),
              body: eb.ref("excluded.body"),
              metadata: eb.ref("excluded.metadata"),
              alternate_keys: eb.ref("excluded.alternate_keys"),
              created: eb.ref("excluded.created"),
            }))
            .where(
              sql<boolean>`excluded.created >= ${sql.ref(
                `${this.tableNameData.tableName}.created`,
              )}`,
            ),
        )
        .execute();
      this.logTrace("stored response successfully", { key });
    } catch (error) {
      this.logError("failed to store response", { key, error });
      throw error;
    }
  }

  async notifyUsed(
    ref: string,
    opts?: PostgresStoreCallOptions,
  ): Promise<void> {
    if (!/^\d+$/.test(ref)) {
      return;
    }
    await this.ready(opts);

    await this.db
      .updateTable(this.tableName)
      .set({ last_used_at: sql<Date>`now()` })
      .where("id", "=", ref)
      .execute();
  }

  async invalidateUrl(
    urlDigest: UrlDigest,
    opts?: PostgresStoreCallOptions,
  ): Promise<InvalidationResult> {
    this.logTrace("deleting responses for url", { urlDigest });
    await this.ready(opts);

    try {
      const result = await this.db
        .deleteFrom(this.tableName)
        .where("url_digest", "=", urlDigest)
        .executeTakeFirst();
      const invalidatedCount = Number(result.numDeletedRows);
      this.logTrace("deleted responses for url", {
        urlDigest,
        invalidatedCount,
      });
      return { invalidatedCount };
    } catch (error) {
      this.logError("failed to delete responses for url", {
        urlDigest,
        error,
      });
      throw error;
    }
  }

  async invalidateByAlternateKey(
    keys: readonly AlternateKey[],
    opts?: PostgresStoreCallOptions,
  ): Promise<InvalidationResult> {
    if (keys.length === 0) {
      return { invalidatedCount: 0 };
    }

    this.logTrace("deleting responses for alternate keys", { keys });
    await this.ready(opts);

    try {
      const result = await this.db
        .deleteFrom(this.tableName)
        .where((eb) =>
          eb.or(
            // `@>` on a one-element array asks whether the key is one of the
            // row's alternate keys. Keys are primitives, so containment is
            // equality here.
            keys.map((it) =>
              eb(
                "alternate_keys",
                "@>",
                sql<AlternateKey[]>`${stableJsonStringify([it])}::jsonb`,
              ),
            ),
          ),
        )
        .executeTakeFirst();
      const invalidatedCount = Number(result.numDeletedRows);
      this.logTrace("deleted responses for alternate keys", {
        keys,
        invalidatedCount,
      });
      return { invalidatedCount };
    } catch (error) {
      this.logError("failed to delete responses for alternate keys", {
        keys,
        error,
      });
      throw error;
    }
  }

  async close() {
    // we don't need to do anything here, the caller should handle closing db connection
    this.logInfo("close called, but no action needed for postgres store");
  }

  private async ready(opts: PostgresStoreCallOptions | undefined) {
    opts?.signal?.throwIfAborted();
    if (this.assumeIsInitialized) {
      return;
    }

    this.ensureInitializedPromise ??= this.ensureInitialized().catch(
      (error: unknown) => {
        this.ensureInitializedPromise = undefined;
        throw error;
      },
    );
    await this.ensureInitializedPromise;
  }

  private getTableNameData(schemaName: string, tableName: string) {
    if (schemaName.includes(".") || tableName.includes(".")) {
      // kysely gets really confused if we allow dots to be there, it doesn't know how to properly escape them
      throw new Error("schema name and table name cannot include dots");
    }
    return {
      schemaName,
      tableName,
      qualifiedName: `${schemaName}.${tableName}` as CacheTableName,
    };
  }

  // just a convenience getter for qualified cache table name
  private get tableName() {
    return this.tableNameData.qualifiedName;
  }

  /**
   * Initialize the database schema, table and indexes if they don't exist.
   * This is called automatically before the first query.
   */
  private async ensureInitialized() {
    this.logTrace("initializing database schema and table");
    const { schemaName, tableName } = this.tableNameData;

    try {
      await this.db.transaction().execute(async (tx) => {
        await tx.schema.createSchema(schemaName).ifNotExists().execute();

        await tx.schema
          .createTable(this.tableName)
          .ifNotExists()
          .addColumn("id", "bigserial", (col) => col.primaryKey())
          .addColumn("request_key", "text", (col) => col.notNull())
          .addColumn("variant_key", "text", (col) => col.notNull())
          .addColumn("url_digest", "text", (col) => col.notNull())
          .addColumn("vary_headers", "jsonb", (col) => col.notNull())
          .addColumn("status", "integer", (col) => col.notNull())
          .addColumn("headers", "jsonb", (col) => col.notNull())
          .addColumn("body", "bytea", (col) => col.notNull())
          .addColumn("metadata", "jsonb", (col) => col.notNull())
          .addColumn("alternate_keys", "jsonb", (col) => col.notNull())
          .addColumn("created", "bigint", (col) => col.notNull())
          .addColumn("last_used_at", "timestamptz")
          .addUniqueConstraint(`${tableName}_variant_key`, [
            "request_key",
            "variant_key",
          ])
          .execute();

        await tx.schema
          .createIndex(`${tableName}_url_digest_idx`)
          .ifNotExists()
          .on(this.tableName)
          .column("url_digest")
          .execute();

        await tx.schema
          .createIndex(`${tableName}_alternate_keys_idx`)
          .ifNotExists()
          .on(this.tableName)
          .using("gin")
          .column("alternate_keys")
          .execute();
      });
      this.logInfo("database schema and table initialized successfully");
    } catch (error) {
      this.logError("failed to initialize database schema and table", error);
      throw error;
    }
  }
}
