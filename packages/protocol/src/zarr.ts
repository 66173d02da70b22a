/**
 * Zarr archive schemas
 */

import { z } from "zod";
import { AssetPathSchema, DandisetIdSchema, ETAG_REGEX } from "./common.ts";

/** Maximum zarr name length in characters */
export const MAX_ZARR_NAME_LENGTH = 512;

export const ZarrCreateSchema = z.object({
  name: z.string().min(1).max(MAX_ZARR_NAME_LENGTH),
  dandisetId: DandisetIdSchema,
});

export type ZarrCreate = z.infer<typeof ZarrCreateSchema>;

/**
 * One uploaded object inside a zarr archive
 */
export const ZarrFileSchema = z.object({
  path: AssetPathSchema,
  etag: z.string().regex(ETAG_REGEX, "Invalid etag"),
  size: z.number().int().nonnegative(),
});

export type ZarrFile = z.infer<typeof ZarrFileSchema>;
