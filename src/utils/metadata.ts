import { InvariantViolationError } from "../errors.js";
import type { ResponseMetadata } from "../types/index.js";
import { contentRangeOf } from "./byteRanges.js";

/**
 * Lists the ways in which metadata breaks its invariants; an empty list means
 * it's valid. Checks that the timestamps are non-negative integers with
 * `created <= expires <= grace`, and that a recorded content range is a
 * sensible inclusive byte range.
 */
export function metadataIssues(metadata: ResponseMetadata): string[] {
  const issues: string[] = [];
  const { created, expires, grace } = metadata;

  for (const [name, value] of Object.entries({ created, expires, grace })) {
    if (!Number.isSafeInteger(value) || value < 0) {
      issues.push(`${name} must be a non-negative integer (got ${value})`);
    }
  }

  if (created > expires) {
    issues.push(`created (${created}) is after expires (${expires})`);
  }

  if (expires > grace) {
    issues.push(`expires (${expires}) is after grace (${grace})`);
  }

  const contentRange = contentRangeOf(metadata);
  if (contentRange !== undefined) {
    const { start, end, size } = contentRange;
    if (
      !Number.isSafeInteger(start) ||
      !Number.isSafeInteger(end) ||
      start < 0 ||
      start > end
    ) {
      issues.push(`content-range ${start}-${end} is not a valid byte range`);
    } else if (size !== "*" && (!Number.isSafeInteger(size) || end >= size)) {
      issues.push(`content-range ${start}-${end} doesn't fit in size ${size}`);
    }
  }

  return issues;
}

/**
 * Throws an InvariantViolationError if the metadata is invalid.
 */
export function assertValidMetadata(metadata: ResponseMetadata) {
  const issues = metadataIssues(metadata);
  if (issues.length > 0) {
    throw new InvariantViolationError(issues);
  }
}
