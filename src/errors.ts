export type HttpCacheErrorCode =
  | "BACKEND_FAILURE"
  | "UNSUPPORTED_CAPABILITY"
  | "INVARIANT_VIOLATION"
  | "STORE_CLOSED";

/**
 * Base class for every error thrown by the cache itself. Errors thrown by a
 * store are never rethrown as-is: they're wrapped in a
 * {@link BackendFailureError}, with the original as its `cause`.
 */
export abstract class HttpCacheError extends Error {
  abstract readonly code: HttpCacheErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The store names of the operations that can fail.
 */
export type StoreOperation =
  | "listCandidates"
  | "getResponse"
  | "put"
  | "notifyUsed"
  | "invalidateUrl"
  | "invalidateByAlternateKey";

/**
 * A store operation rejected (I/O error, backend unavailable, ...). The cache
 * never retries these, and never reports them as a cache miss.
 */
export class BackendFailureError extends HttpCacheError {
  readonly code = "BACKEND_FAILURE";

  constructor(
    readonly operation: StoreOperation,
    cause: unknown,
  ) {
    super(`Store operation "${operation}" failed`, { cause });
  }
}

/**
 * The store doesn't implement an optional operation. Callers can catch this to
 * fall back (e.g., to invalidating by URL).
 */
export class UnsupportedCapabilityError extends HttpCacheError {
  readonly code = "UNSUPPORTED_CAPABILITY";

  constructor(readonly capability: "alternateKeyInvalidation") {
    super(`Store does not support the "${capability}" capability`);
  }
}

/**
 * The caller passed metadata that breaks one of its invariants. Nothing was
 * stored.
 */
export class InvariantViolationError extends HttpCacheError {
  readonly code = "INVARIANT_VIOLATION";

  constructor(readonly issues: readonly string[]) {
    super(`Invalid response metadata: ${issues.join("; ")}`);
  }
}

export class StoreClosedError extends HttpCacheError {
  readonly code = "STORE_CLOSED";

  constructor() {
    super("Store has been closed");
  }
}

/**
 * Runs a store operation, wrapping whatever it throws in a
 * {@link BackendFailureError}.
 */
export async function callStore<T>(
  operation: StoreOperation,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw new BackendFailureError(operation, error);
  }
}
