/**
 * Common schema definitions and ID format patterns
 */

import { z } from "zod";

// ============================================================================
// ID Format Patterns
// ============================================================================

/** RFC 4122 UUID (asset, blob and zarr ids) */
export const UUID_REGEX = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

/** Dandiset identifier: six digits, zero padded */
export const DANDISET_ID_REGEX = /^\d{6}$/;

/** Lowercase SHA-256 hex digest */
export const SHA256_REGEX = /^[0-9a-f]{64}$/;

/** S3-style etag: md5 hex, optionally followed by a multipart part count */
export const ETAG_REGEX = /^[0-9a-f]{32}(-[1-9][0-9]*)?$/;

/**
 * Asset path: forward-slash separated, no leading or trailing slash,
 * no empty, "." or ".." segments, no control characters.
 */
export const ASSET_PATH_REGEX =
  // biome-ignore lint/suspicious/noControlCharactersInRegex: control characters are what it rejects
  /^(?!\/)(?!.*\/$)(?!.*\/\/)(?!(?:.*\/)?\.\.?(?:\/|$))[^\x00-\x1f\x7f]+$/;

/** Segments an asset path may have: a draft commit writes one node per ancestor */
export const MAX_ASSET_PATH_DEPTH = 32;

/** UTF-8 bytes an asset path may have: paths are stored as sort keys */
export const MAX_ASSET_PATH_BYTES = 512;

const utf8 = new TextEncoder();

/**
 * Check an asset path against the pattern and the depth and size limits
 */
export const isAssetPath = (path: string): boolean =>
  ASSET_PATH_REGEX.test(path) &&
  path.split("/").length <= MAX_ASSET_PATH_DEPTH &&
  utf8.encode(path).length <= MAX_ASSET_PATH_BYTES;

/** Literal marker of the mutable version of a dandiset */
export const DRAFT_VERSION = "draft";

// ============================================================================
// ID Schemas
// ============================================================================

export const UuidSchema = z.string().regex(UUID_REGEX, "Invalid UUID format");
export const DandisetIdSchema = z.string().regex(DANDISET_ID_REGEX, "Invalid dandiset identifier");
export const AssetPathSchema = z.string().refine(isAssetPath, "Invalid path.");

// ============================================================================
// Enum Schemas
// ============================================================================

export const ValidationStatusSchema = z.enum(["PENDING", "VALID", "INVALID"]);
export type ValidationStatus = z.infer<typeof ValidationStatusSchema>;

export const EmbargoStatusSchema = z.enum(["OPEN", "EMBARGOED", "UNEMBARGOING"]);
export type EmbargoStatus = z.infer<typeof EmbargoStatusSchema>;

export const ZarrStatusSchema = z.enum(["PENDING", "UPLOADED", "INGESTING", "COMPLETE"]);
export type ZarrStatus = z.infer<typeof ZarrStatusSchema>;

export const UploadValidationStateSchema = z.enum(["IN_PROGRESS", "SUCCEEDED", "FAILED"]);
export type UploadValidationState = z.infer<typeof UploadValidationStateSchema>;

// ============================================================================
// Pagination
// ============================================================================

export const PaginationQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional().default(100),
  cursor: z.string().optional(),
});
export type PaginationQuery = z.infer<typeof PaginationQuerySchema>;

/**
 * Check that a path is a directory prefix: the root ("") or ending in "/"
 */
export const isDirectoryPrefix = (path: string): boolean => path === "" || path.endsWith("/");
