import type { ContentRange, ResponseMetadata } from "../types/index.js";

/**
 * A single byte range requested by a client, already parsed from its `range`
 * header:
 *
 * - `{ start, end }` for `bytes=start-end` (`end` is inclusive);
 * - `{ start }` for the open-ended `bytes=start-`;
 * - `{ suffixLength }` for `bytes=-suffixLength` (the last N bytes).
 */
export type ByteRangeRequest =
  | { start: number; end?: number | undefined }
  | { suffixLength: number };

/**
 * Returns the content range recorded for a partial response, or undefined for
 * a full one.
 */
export function contentRangeOf(
  metadata: Pick<ResponseMetadata, "parsedHeaders">,
): ContentRange | undefined {
  return metadata.parsedHeaders["content-range"];
}

export function isPartial(metadata: Pick<ResponseMetadata, "parsedHeaders">) {
  return contentRangeOf(metadata) !== undefined;
}

/**
 * Turns a requested range into inclusive first and last byte positions, using
 * the complete length of the representation where the request is relative to
 * it. As in HTTP, a last position past the end of the representation is
 * clamped to it. Returns undefined when the positions can't be known (the
 * complete length is needed but unknown) or when the range is unsatisfiable.
 */
export function resolveByteRange(
  range: ByteRangeRequest,
  size: number | "*",
): { first: number; last: number } | undefined {
  const knownSize = size === "*" ? undefined : size;
  let first: number, last: number;

  if ("suffixLength" in range) {
    if (knownSize === undefined || range.suffixLength <= 0) {
      return undefined;
    }
    first = Math.max(0, knownSize - range.suffixLength);
    last = knownSize - 1;
  } else {
    first = range.start;
    if (range.end === undefined) {
      if (knownSize === undefined) {
        return undefined;
      }
      last = knownSize - 1;
    } else {
      last =
        knownSize === undefined ? range.end : Math.min(range.end, knownSize - 1);
    }
  }

  return first >= 0 && first <= last ? { first, last } : undefined;
}

/**
 * Whether the bytes held by a partial response (described by its content
 * range) include every byte of the requested range.
 */
export function rangeCovers(stored: ContentRange, requested: ByteRangeRequest) {
  const resolved = resolveByteRange(requested, stored.size);
  return (
    resolved !== undefined &&
    stored.start <= resolved.first &&
    resolved.last <= stored.end
  );
}
