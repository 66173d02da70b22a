/**
 * Asset schemas
 */

import { z } from "zod";
import { isDirectoryPrefix, PaginationQuerySchema, UuidSchema } from "./common.ts";

// ============================================================================
// Asset Schemas
// ============================================================================

/**
 * Body of asset create / update.
 * The asset path travels inside the metadata ("path"); exactly one of
 * blobId / zarrId names the content. Both rules are enforced by the
 * service so they surface as their own error codes.
 */
export const AssetRequestSchema = z.object({
  /** Metadata draft; must carry a non-empty "path" */
  metadata: z.record(z.unknown()),
  /** Blob (or embargoed blob) id */
  blobId: UuidSchema.optional(),
  /** Zarr archive id */
  zarrId: UuidSchema.optional(),
});

export type AssetRequest = z.infer<typeof AssetRequestSchema>;

// ============================================================================
// Asset Query Schemas
// ============================================================================

export const AssetListQuerySchema = PaginationQuerySchema.extend({
  /** Case-sensitive path prefix filter */
  path: z.string().optional(),
  /** Glob over the full path; "*" matches any run of characters */
  glob: z.string().min(1).optional(),
  /** Include metadata in list items */
  metadata: z
    .union([z.boolean(), z.enum(["true", "false", "1", "0"])])
    .optional()
    .transform((v) => v === true || v === "true" || v === "1"),
});

export type AssetListQuery = z.infer<typeof AssetListQuerySchema>;

export const AssetPathsQuerySchema = PaginationQuerySchema.extend({
  /** Directory prefix: "" for the root, otherwise ending in "/" */
  pathPrefix: z
    .string()
    .optional()
    .default("")
    .refine(isDirectoryPrefix, { message: "Path prefix must be empty or end with '/'" }),
});

export type AssetPathsQuery = z.infer<typeof AssetPathsQuerySchema>;
