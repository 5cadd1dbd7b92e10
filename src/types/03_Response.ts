import type { ResponseMetadata } from "./02_Metadata.js";

/**
 * Response headers, in the order they were received. Names may repeat.
 */
export type Headers = ReadonlyArray<readonly [name: string, value: string]>;

/**
 * The normalized request headers that a stored response varies on, with the
 * values they had when the response was stored. A null value means the
 * response was produced for a request that did _not_ carry the header, which is
 * different from the header being present with an empty value. Headers that
 * aren't listed don't affect whether the response can be selected.
 */
export type VaryHeaders = Readonly<Record<string, string | null>>;

/**
 * The normalized values of a new request's headers. A missing key, an
 * undefined value and null all mean that the request doesn't have the header.
 */
export type RequestVaryValues = Readonly<
  Record<string, string | null | undefined>
>;

/**
 * An HTTP response, as handed to a store to be saved.
 */
export type HttpResponse = {
  status: number;
  headers: Headers;
  body: Buffer;
};

/**
 * A reference to a body that a backend keeps outside of memory.
 */
export type FileBody = { file: string };

/**
 * A stored response, with its metadata. Backends that keep bodies on disk can
 * return a {@link FileBody} instead of the bytes.
 */
export type StoredResponse = {
  status: number;
  headers: Headers;
  body: Buffer | FileBody;
  metadata: ResponseMetadata;
};

/**
 * A lightweight projection of a stored response: everything needed to decide
 * whether it satisfies a request, without its body. `ref` is the backend's
 * opaque handle for fetching the full response afterwards.
 */
export type Candidate<Ref> = {
  ref: Ref;
  status: number;
  headers: Headers;
  varyHeaders: VaryHeaders;
  metadata: ResponseMetadata;
};
