/**
 * Upload schemas
 */

import { z } from "zod";
import { DandisetIdSchema, ETAG_REGEX } from "./common.ts";

/**
 * Body of upload validation.
 * The digest format is checked by the service (InvalidDigest).
 */
export const UploadValidateSchema = z.object({
  /** Object key of the upload; omitted to re-validate a known digest */
  objectKey: z.string().min(1).optional(),
  /** Claimed SHA-256 of the object */
  sha256: z.string(),
});

export type UploadValidate = z.infer<typeof UploadValidateSchema>;

/**
 * Registration of a finished single-object upload.
 */
export const BlobRegisterSchema = z.object({
  objectKey: z.string().min(1),
  size: z.number().int().nonnegative(),
  etag: z.string().regex(ETAG_REGEX, "Invalid etag"),
  /** Owning dandiset when the blob is embargoed */
  embargoedDandisetId: DandisetIdSchema.optional(),
});

export type BlobRegister = z.infer<typeof BlobRegisterSchema>;
