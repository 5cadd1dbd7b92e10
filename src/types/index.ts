// The files in this directory hold types defining the contract between the
// cache, its callers, and the backends that persist responses.
//
// Those that are meant to be public are re-exported below.
export type { AlternateKey, RequestKey, UrlDigest } from "./01_Keys.js";
export type {
  ContentRange,
  ParsedHeaders,
  ResponseMetadata,
  Timestamp,
  TtlSetBy,
} from "./02_Metadata.js";
export type {
  Candidate,
  FileBody,
  Headers,
  HttpResponse,
  RequestVaryValues,
  StoredResponse,
  VaryHeaders,
} from "./03_Response.js";
export {
  canInvalidateByAlternateKey,
  type AlternateKeyInvalidatingStore,
  type InvalidationResult,
  type Store,
  type StoreCapabilities,
} from "./04_Store.js";
export {
  components,
  type Component,
  type Logger,
  type LogLevel,
} from "./05_Logger.js";
