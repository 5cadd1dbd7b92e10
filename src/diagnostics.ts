import type { Channel } from "node:diagnostics_channel";
import * as diagnosticsChannel from "node:diagnostics_channel";

import type { RequestKey } from "./types/index.js";

/**
 * The name of the diagnostics channel used for resolution events.
 * Subscribe to this channel to receive cache hit/miss notifications.
 *
 * @example
 * ```ts
 * import { subscribe } from "node:diagnostics_channel";
 * import { RESOLVE_CHANNEL_NAME, type ResolveMessage } from "http-cache-store";
 *
 * subscribe(RESOLVE_CHANNEL_NAME, (message: ResolveMessage) => {
 *   console.log(`Cache ${message.cacheName}: ${message.outcome} for ${message.requestKey}`);
 * });
 * ```
 */
export const RESOLVE_CHANNEL_NAME = "http-cache-store:resolve";

/**
 * The outcome of resolving a request against the store: a fresh or stale
 * response was found, or none was usable.
 */
export type ResolveOutcome = "fresh" | "stale" | "miss";

/**
 * The message type published to the resolve diagnostics channel.
 */
export type ResolveMessage = {
  /** The name of the cache (passed via the `cacheName` option to HttpCache) */
  cacheName: string | undefined;
  requestKey: RequestKey;
  outcome: ResolveOutcome;
  /** How many responses the store listed for the key */
  candidateCount: number;
  /** How many of the preferred candidates were gone when fetched */
  evictedCount: number;
};

/**
 * The diagnostics channel for resolution events.
 * @internal
 */
export const resolveChannel = diagnosticsChannel.channel(
  RESOLVE_CHANNEL_NAME,
) as TypedChannel<ResolveMessage, typeof RESOLVE_CHANNEL_NAME>;

/**
 * Publishes a resolution event to the diagnostics channel.
 * @internal
 */
export function publishResolveResult(message: ResolveMessage): void {
  if (resolveChannel.hasSubscribers) {
    resolveChannel.publish(message);
  }
}

type TypedChannel<T, Name extends string> = Omit<
  Channel,
  "publish" | "subscribe"
> & {
  publish(message: T): void;
  subscribe(callback: (message: T, name: Name) => void): void;
};
