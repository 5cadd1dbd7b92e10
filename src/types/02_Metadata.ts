import type { AlternateKey } from "./01_Keys.js";
import type { JSON } from "./utils.js";

/**
 * UNIX timestamp, in seconds.
 */
export type Timestamp = number;

/**
 * Whether a response's freshness lifetime came from an explicit header
 * (`cache-control`, `expires`) or was computed heuristically. Recorded for
 * observability only; it never affects whether a response is selectable.
 */
export type TtlSetBy = "header" | "heuristics";

/**
 * A parsed `content-range` header, as recorded in the metadata of a
 * `206 Partial Content` response. `start` and `end` are inclusive byte
 * positions; `size` is the complete length of the representation, or `"*"`
 * when the origin didn't know it.
 */
export type ContentRange = {
  unit: "bytes";
  start: number;
  end: number;
  size: number | "*";
};

/**
 * Headers parsed by the caller when the response was stored. Values must be
 * JSON-serializable so that every backend can round-trip them. A partial
 * response carries its {@link ContentRange} under `"content-range"`.
 */
export type ParsedHeaders = {
  readonly [name: string]: JSON | undefined;
  readonly "content-range"?: ContentRange;
};

/**
 * Metadata stored alongside each response. For any metadata accepted by the
 * cache, `created <= expires <= grace`.
 *
 * - `created`: when the response was stored or last revalidated.
 * - `expires`: the end of the response's freshness lifetime.
 * - `grace`: the moment after which the response can no longer be served, even
 *   stale.
 */
export type ResponseMetadata = {
  created: Timestamp;
  expires: Timestamp;
  grace: Timestamp;
  ttlSetBy: TtlSetBy;
  parsedHeaders: ParsedHeaders;
  alternateKeys: readonly AlternateKey[];
};
