import { default as debug } from "debug";
import stableStringify from "safe-stable-stringify";

import { components, type Logger } from "../types/index.js";

export const defaultLoggersByComponent = Object.fromEntries(
  components.map(
    (name) =>
      [
        name,
        (() => {
          const debugLogger = debug(`http-cache-store:${name}`);
          return (_, level, message, data) => {
            debugLogger(`(${level}) ${message} %O`, data);
          };
        })(),
      ] as const,
  ),
) satisfies Record<string, Logger> as {
  [K in (typeof components)[number]]: Logger;
};

/**
 * Serializes a JSON value with its object keys sorted, so that equal values
 * always produce the same string. Used to build lookup keys from vary headers,
 * content ranges and alternate keys.
 */
export function stableJsonStringify(value: unknown): string {
  const result = stableStringify(value);
  if (result === undefined) {
    throw new Error("Value cannot be serialized to JSON");
  }
  return result;
}

/**
 * The current time as a UNIX timestamp in seconds.
 */
export function nowInSeconds() {
  return Math.floor(Date.now() / 1000);
}
