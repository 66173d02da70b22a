/**
 * Archive error values and store-level conflict errors
 *
 * Services return `T | ArchiveError`; only infrastructure failures and
 * revision conflicts are thrown.
 */

import { type ArchiveErrorCode, ERROR_STATUS } from "@dandiset/protocol";

export type ArchiveError = {
  code: ArchiveErrorCode;
  status: number;
  message: string;
  details?: Record<string, unknown>;
};

export const archiveError = (
  code: ArchiveErrorCode,
  message: string,
  details?: Record<string, unknown>
): ArchiveError => ({
  code,
  status: ERROR_STATUS[code],
  message,
  ...(details ? { details } : {}),
});

export const isArchiveError = (value: unknown): value is ArchiveError =>
  typeof value === "object" &&
  value !== null &&
  "code" in value &&
  "status" in value &&
  "message" in value &&
  typeof value.code === "string" &&
  typeof value.status === "number";

/**
 * Thrown by a store when a compare-and-swap write finds a different
 * revision than the caller read.
 */
export class ConcurrentModificationError extends Error {
  readonly resource: string;
  readonly expected: number | null;
  readonly actual: number | null;

  constructor(resource: string, expected: number | null, actual: number | null) {
    super(
      `Concurrent modification of ${resource}: expected revision ${expected ?? "(none)"}, got ${actual ?? "(unknown)"}`
    );
    this.name = "ConcurrentModificationError";
    this.resource = resource;
    this.expected = expected;
    this.actual = actual;
  }
}

export const isConcurrentModification = (error: unknown): error is ConcurrentModificationError =>
  error instanceof ConcurrentModificationError;
