/**
 * Error codes for the archive boundary
 *
 * Codes are machine-readable; each carries a default HTTP status for
 * whichever transport sits in front of the services.
 */

import { z } from "zod";

export const ArchiveErrorCodeSchema = z.enum([
  "VersionImmutable",
  "DuplicatePath",
  "InvalidPath",
  "ContentRefConflict",
  "CrossDandisetZarr",
  "ContentNotFound",
  "NotFound",
  "AssetNotFound",
  "InvalidRequest",
  "InvalidDigest",
  "ObjectNotFound",
  "ValidationInProgress",
  "ValidationNotFound",
  "ConcurrentModification",
]);

export type ArchiveErrorCode = z.infer<typeof ArchiveErrorCodeSchema>;

export const ERROR_STATUS: Record<ArchiveErrorCode, number> = {
  VersionImmutable: 405,
  DuplicatePath: 409,
  InvalidPath: 400,
  ContentRefConflict: 400,
  CrossDandisetZarr: 400,
  ContentNotFound: 404,
  NotFound: 404,
  AssetNotFound: 404,
  InvalidRequest: 400,
  InvalidDigest: 400,
  ObjectNotFound: 400,
  ValidationInProgress: 400,
  ValidationNotFound: 400,
  ConcurrentModification: 409,
};

/**
 * One schema violation: dotted field path ("" for the document) and message
 */
export const FieldErrorSchema = z.object({
  field: z.string(),
  message: z.string(),
});

export type FieldError = z.infer<typeof FieldErrorSchema>;
