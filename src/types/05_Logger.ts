/**
 * The parts of the package that log. Each one gets its own `debug` namespace
 * when the default logger is used.
 */
export const components = [
  "cache",
  "selector",
  "invalidation",
  "memory-store",
  "postgres-store",
] as const;

export type Component = (typeof components)[number];

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

export type Logger = (
  component: Component,
  level: LogLevel,
  message: string,
  data?: unknown,
) => void;
