import { expect } from "chai";
import { subscribe, unsubscribe } from "node:diagnostics_channel";
import { after, before, describe, it } from "node:test";

import {
  dummyCandidate,
  dummyMetadata,
  dummyResponse,
  FakeStore,
  postgresIsConfigured,
  postgresStoreFixture,
  randomKey,
} from "../test/fixtures.js";
import { RESOLVE_CHANNEL_NAME, type ResolveMessage } from "./diagnostics.js";
import {
  BackendFailureError,
  InvariantViolationError,
  StoreClosedError,
  UnsupportedCapabilityError,
} from "./errors.js";
import HttpCache from "./HttpCache.js";
import MemoryStore from "./stores/MemoryStore/MemoryStore.js";
import type {
  ContentRange,
  Logger,
  ResponseMetadata,
  Store,
  VaryHeaders,
} from "./types/index.js";
import { longestFreshnessFirst } from "./utils/candidateSelection.js";

type StoreUnderTest = {
  store: Store<unknown, unknown>;
  cleanup: () => Promise<void>;
};

const storeFactories: Record<string, () => StoreUnderTest> = {
  memory: () => {
    const store = new MemoryStore();
    return { store, cleanup: async () => store.close() };
  },
  ...(postgresIsConfigured
    ? {
        postgres: () => {
          const { postgresStore, cleanup } = postgresStoreFixture();
          return { store: postgresStore, cleanup };
        },
      }
    : {}),
};

const putResponse = async <Ref, Opts>(
  cache: HttpCache<Ref, Opts>,
  key: string,
  body: string,
  metadata: Partial<ResponseMetadata> = {},
  varyHeaders: VaryHeaders = {},
) =>
  cache.put(
    key,
    `url:${key}`,
    varyHeaders,
    dummyResponse(body),
    dummyMetadata(metadata),
  );

describe("HttpCache", () => {
  Object.entries(storeFactories).forEach(([storeName, makeStore]) => {
    describe(`getting/storing from ${storeName} store`, () => {
      let storeUnderTest: StoreUnderTest;

      before(() => {
        storeUnderTest = makeStore();
      });

      after(async () => {
        await storeUnderTest.cleanup();
      });

      // Every test uses its own keys, so they can share the store.
      const makeCache = (now: () => number = () => 1500) =>
        new HttpCache(storeUnderTest.store, { now });

      it("should return undefined for a key with no stored responses", async () => {
        const cache = makeCache();
        expect(await cache.get({ key: randomKey(), varyValues: {} })).to.eq(
          undefined,
        );
      });

      it("should return the stored response with its metadata intact", async () => {
        const cache = makeCache();
        const key = randomKey();
        const metadata = dummyMetadata({ alternateKeys: ["product:1", 7] });
        await cache.put(key, `url:${key}`, {}, dummyResponse("hello"), metadata);

        const resolved = await cache.get({ key, varyValues: {} });
        expect(resolved?.freshness).to.eq("fresh");
        expect(resolved?.response).to.deep.eq({
          status: 200,
          headers: dummyResponse().headers,
          body: Buffer.from("hello"),
          metadata,
        });
        expect(resolved?.candidate.ref).to.deep.eq(resolved?.ref);
      });

      it("should classify responses by their expires and grace times", async () => {
        const T = 1_000_000;
        let now = T - 1;
        const cache = makeCache(() => now);
        const key = randomKey();
        await putResponse(cache, key, "body", {
          created: T - 100,
          expires: T,
          grace: T + 60,
        });

        expect((await cache.get({ key, varyValues: {} }))?.freshness).to.eq(
          "fresh",
        );
        now = T + 30;
        expect((await cache.get({ key, varyValues: {} }))?.freshness).to.eq(
          "stale",
        );
        now = T + 61;
        expect(await cache.get({ key, varyValues: {} })).to.eq(undefined);
      });

      it("should consistently prefer the most recently created response", async () => {
        const cache = makeCache();
        const times = { expires: 5000, grace: 6000 };
        const [k1, k2] = [randomKey(), randomKey()];
        await putResponse(cache, k1, "100", { ...times, created: 100 });
        await putResponse(cache, k1, "200", { ...times, created: 200 });
        await putResponse(cache, k2, "200", { ...times, created: 200 });
        await putResponse(cache, k2, "100", { ...times, created: 100 });

        for (const key of [k1, k2, k1, k2, k1]) {
          const resolved = await cache.get({ key, varyValues: {} });
          expect(resolved?.response.body).to.deep.eq(Buffer.from("200"));
        }
      });

      it("should select the variant matching the request's headers", async () => {
        const cache = makeCache();
        const key = randomKey();
        await putResponse(cache, key, "gzip", {}, { "accept-encoding": "gzip" });
        await putResponse(cache, key, "identity", {}, { "accept-encoding": null });

        const bodyFor = async (varyValues: Record<string, string | null>) =>
          (await cache.get({ key, varyValues }))?.response.body;

        expect(await bodyFor({ "accept-encoding": "gzip" })).to.deep.eq(
          Buffer.from("gzip"),
        );
        expect(await bodyFor({})).to.deep.eq(Buffer.from("identity"));
        expect(await bodyFor({ "accept-encoding": "br" })).to.eq(undefined);
      });

      it("should only serve a range request from a response covering it", async () => {
        const cache = makeCache();
        const key = randomKey();
        const contentRange: ContentRange = {
          unit: "bytes",
          start: 0,
          end: 999,
          size: 2000,
        };
        await putResponse(cache, key, "first-half", {
          parsedHeaders: { "content-range": contentRange },
        });

        const covered = await cache.get({
          key,
          varyValues: {},
          range: { start: 0, end: 499 },
        });
        expect(covered?.response.body).to.deep.eq(Buffer.from("first-half"));
        expect(
          await cache.get({
            key,
            varyValues: {},
            range: { start: 500, end: 1999 },
          }),
        ).to.eq(undefined);
      });

      it("should not return responses for an invalidated url", async () => {
        const cache = makeCache();
        const [k1, k2] = [randomKey(), randomKey()];
        await putResponse(cache, k1, "one");
        await putResponse(cache, k1, "one-gzip", {}, { "accept-encoding": "gzip" });
        await putResponse(cache, k2, "two");

        expect(await cache.invalidateUrl(`url:${k1}`)).to.deep.eq({
          invalidatedCount: 2,
        });
        expect(await cache.get({ key: k1, varyValues: {} })).to.eq(undefined);
        expect(
          (await cache.get({ key: k2, varyValues: {} }))?.response.body,
        ).to.deep.eq(Buffer.from("two"));
      });

      it("should not return responses for an invalidated alternate key", async () => {
        const cache = makeCache();
        const [k1, k2] = [randomKey(), randomKey()];
        const tag = randomKey("tag");
        await putResponse(cache, k1, "one", { alternateKeys: [tag] });
        await putResponse(cache, k2, "two", { alternateKeys: ["other"] });

        expect(cache.supportsAlternateKeys).to.eq(true);
        expect(await cache.invalidateByAlternateKey([tag])).to.deep.eq({
          invalidatedCount: 1,
        });
        expect(await cache.get({ key: k1, varyValues: {} })).to.eq(undefined);
        expect(await cache.get({ key: k2, varyValues: {} })).to.not.eq(
          undefined,
        );
      });

      it("should resolve many requests, in order", async () => {
        const cache = makeCache();
        const [k1, k2, k3] = [randomKey(), randomKey(), randomKey()];
        await putResponse(cache, k1, "one");
        await putResponse(cache, k3, "three");

        const results = await cache.getMany([
          { key: k1, varyValues: {} },
          { key: k2, varyValues: {} },
          { key: k3, varyValues: {} },
        ]);
        expect(results.map((it) => it?.response.body)).to.deep.eq([
          Buffer.from("one"),
          undefined,
          Buffer.from("three"),
        ]);
      });
    });
  });

  describe("with a stand-in store", () => {
    const request = { key: "https://example.com/a", varyValues: {} };

    it("should fall back to the next candidate when the preferred one was evicted", async () => {
      const store = new FakeStore()
        .add(dummyCandidate("c1", { metadata: { created: 300 } }), {
          evicted: true,
        })
        .add(dummyCandidate("c2", { metadata: { created: 200 } }));
      const cache = new HttpCache(store, { now: () => 1500 });

      expect((await cache.get(request))?.ref).to.eq("c2");
    });

    it("should pass per-call options through to the store", async () => {
      const store = new FakeStore().add(dummyCandidate("c1"));
      const cache = new HttpCache(store, { now: () => 1500 });
      const opts = { tag: "request-1" };

      await cache.get(request, opts);
      await cache.notifyUsed("c1", opts);

      expect(store.calls.map((it) => [it.method, it.args.at(-1)])).to.deep.eq([
        ["listCandidates", opts],
        ["getResponse", opts],
        ["notifyUsed", opts],
      ]);
    });

    it("should use the configured comparator", async () => {
      const store = new FakeStore()
        .add(dummyCandidate("newer", { metadata: { created: 200 } }))
        .add(
          dummyCandidate("longer", { metadata: { created: 100, expires: 2500 } }),
        );

      expect(
        (await new HttpCache(store, { now: () => 1500 }).get(request))?.ref,
      ).to.eq("newer");
      expect(
        (
          await new HttpCache(store, {
            now: () => 1500,
            compareCandidates: longestFreshnessFirst,
          }).get(request)
        )?.ref,
      ).to.eq("longer");
    });

    it("should reject store failures rather than report a miss", async () => {
      const store = new FakeStore().add(dummyCandidate("c1"));
      store.failing.add("listCandidates");
      store.failing.add("notifyUsed");
      const cache = new HttpCache(store, { now: () => 1500 });
      const misses: unknown[] = [];
      cache.emitter.on("miss", (key: unknown) => misses.push(key));

      const getError = await cache.get(request).catch((e: unknown) => e);
      expect(getError).to.be.instanceOf(BackendFailureError);
      expect(getError).to.have.property("operation", "listCandidates");
      expect(misses).to.deep.eq([]);

      const notifyError = await cache
        .notifyUsed("c1")
        .catch((e: unknown) => e);
      expect(notifyError).to.be.instanceOf(BackendFailureError);
      expect(notifyError).to.have.property("operation", "notifyUsed");
    });

    it("should reject invalid metadata without calling the store", async () => {
      const store = new FakeStore();
      const cache = new HttpCache(store);

      const error = await cache
        .put(
          "k",
          "url",
          {},
          dummyResponse(),
          dummyMetadata({ created: 2500, expires: 2000 }),
        )
        .catch((e: unknown) => e);

      expect(error).to.be.instanceOf(InvariantViolationError);
      expect(error).to.have.deep.property("issues", [
        "created (2500) is after expires (2000)",
      ]);
      expect(store.callsTo("put")).to.have.length(0);
    });

    it("should reject alternate key invalidation when the store can't do it", async () => {
      const store = new FakeStore();
      const cache = new HttpCache(store);

      expect(cache.supportsAlternateKeys).to.eq(false);
      const error = await cache
        .invalidateByAlternateKey(["product:1"])
        .catch((e: unknown) => e);
      expect(error).to.be.instanceOf(UnsupportedCapabilityError);
      expect(store.calls).to.have.length(0);

      // Invalidating by url still works.
      store.invalidatedCount = undefined;
      expect(await cache.invalidateUrl("url")).to.deep.eq({
        invalidatedCount: undefined,
      });
    });

    it("should emit events for stores, hits, misses and invalidations", async () => {
      const store = new FakeStore().add(dummyCandidate("c1"));
      const cache = new HttpCache(store, { now: () => 1500 });
      const events: unknown[][] = [];
      for (const name of ["store", "hit", "miss", "invalidate"]) {
        cache.emitter.on(name, (...args: unknown[]) => {
          events.push([name, args[0]]);
        });
      }

      await cache.put("k", "url-1", {}, dummyResponse(), dummyMetadata());
      await cache.get(request);
      await cache.get({ key: "other", varyValues: { accept: "x" } });
      store.candidates = [];
      await cache.get({ key: "other", varyValues: {} });
      await cache.invalidateUrl("url-1");

      expect(events).to.deep.eq([
        ["store", "k"],
        ["hit", request.key],
        ["hit", "other"],
        ["miss", "other"],
        ["invalidate", "url"],
      ]);
    });

    it("should not emit a store event when the store fails to store", async () => {
      const store = new FakeStore();
      store.failing.add("put");
      const cache = new HttpCache(store);
      const stored: unknown[] = [];
      cache.emitter.on("store", (key: unknown) => stored.push(key));

      const error = await cache
        .put("k", "url", {}, dummyResponse(), dummyMetadata())
        .catch((e: unknown) => e);

      expect(error).to.be.instanceOf(BackendFailureError);
      expect(error).to.have.property("operation", "put");
      expect(stored).to.deep.eq([]);
    });

    it("should publish resolution results to the diagnostics channel", async () => {
      const cacheName = randomKey("cache");
      const messages: unknown[] = [];
      const onMessage = (message: unknown) => {
        if (
          typeof message === "object" &&
          message !== null &&
          "cacheName" in message &&
          message.cacheName === cacheName
        ) {
          messages.push(message);
        }
      };
      subscribe(RESOLVE_CHANNEL_NAME, onMessage);

      try {
        const store = new FakeStore()
          .add(dummyCandidate("c1", { metadata: { created: 300 } }), {
            evicted: true,
          })
          .add(dummyCandidate("c2", { metadata: { created: 200 } }));
        const cache = new HttpCache(store, { now: () => 1500, cacheName });

        await cache.get(request);
        store.candidates = [];
        await cache.get(request);
      } finally {
        unsubscribe(RESOLVE_CHANNEL_NAME, onMessage);
      }

      const expected: ResolveMessage[] = [
        {
          cacheName,
          requestKey: request.key,
          outcome: "fresh",
          candidateCount: 2,
          evictedCount: 1,
        },
        {
          cacheName,
          requestKey: request.key,
          outcome: "miss",
          candidateCount: 0,
          evictedCount: 0,
        },
      ];
      expect(messages).to.deep.eq(expected);
    });

    it("should log through a custom logger", async () => {
      const entries: [string, string, string][] = [];
      const logger: Logger = (component, level, message) => {
        entries.push([component, level, message]);
      };
      const cache = new HttpCache(new FakeStore(), { now: () => 1500, logger });

      await cache.get(request);

      expect(entries).to.deep.include(["cache", "trace", "received request"]);
      expect(entries).to.deep.include([
        "selector",
        "trace",
        "ranked candidates for request",
      ]);
    });

    describe("after closing", () => {
      it("should throw by default", async () => {
        const store = new FakeStore();
        const cache = new HttpCache(store);
        await cache.close();

        for (const call of [
          async () => cache.get(request),
          async () => cache.put("k", "url", {}, dummyResponse(), dummyMetadata()),
          async () => cache.notifyUsed("c1"),
          async () => cache.invalidateUrl("url"),
        ]) {
          const error = await call().catch((e: unknown) => e);
          expect(error).to.be.instanceOf(StoreClosedError);
        }
        expect(store.calls.map((it) => it.method)).to.deep.eq(["close"]);
      });

      it("should do nothing when configured to", async () => {
        const store = new FakeStore().add(dummyCandidate("c1"));
        const cache = new HttpCache(store, {
          onGetAfterClose: "return-nothing",
          onStoreAfterClose: "return-nothing",
        });
        await cache.close();

        expect(await cache.get(request)).to.eq(undefined);
        await cache.put("k", "url", {}, dummyResponse(), dummyMetadata());
        expect(store.calls.map((it) => it.method)).to.deep.eq(["close"]);
      });
    });
  });
});
