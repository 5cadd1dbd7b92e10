/**
 * A unique, opaque key for a request, derived by the caller from the request's
 * method, URL, body and (optional) bucket. It does _not_ encode the headers the
 * response varies on, nor the requested byte range, so several stored
 * responses (the key's "candidates") can share one request key.
 */
export type RequestKey = string;

/**
 * An opaque digest of the request URL alone (no method or body), used to
 * invalidate every response stored for a URL.
 */
export type UrlDigest = string;

/**
 * An application-defined tag attached to a response when it's stored (e.g., a
 * product id). Many responses can share an alternate key, which allows them to
 * be invalidated together regardless of their URL.
 */
export type AlternateKey = string | number | boolean;
