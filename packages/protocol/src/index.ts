/**
 * Dandiset Archive Protocol - Shared schemas and types for the service boundary
 *
 * @packageDocumentation
 */

export type { AssetListQuery, AssetPathsQuery, AssetRequest } from "./asset.ts";
export { AssetListQuerySchema, AssetPathsQuerySchema, AssetRequestSchema } from "./asset.ts";
export type {
  EmbargoStatus,
  PaginationQuery,
  UploadValidationState,
  ValidationStatus,
  ZarrStatus,
} from "./common.ts";
export {
  ASSET_PATH_REGEX,
  AssetPathSchema,
  DANDISET_ID_REGEX,
  DandisetIdSchema,
  DRAFT_VERSION,
  ETAG_REGEX,
  EmbargoStatusSchema,
  isAssetPath,
  isDirectoryPrefix,
  MAX_ASSET_PATH_BYTES,
  MAX_ASSET_PATH_DEPTH,
  PaginationQuerySchema,
  SHA256_REGEX,
  UploadValidationStateSchema,
  UUID_REGEX,
  UuidSchema,
  ValidationStatusSchema,
  ZarrStatusSchema,
} from "./common.ts";
export type { CreateDandiset } from "./dandiset.ts";
export { CreateDandisetSchema } from "./dandiset.ts";
export type { ArchiveErrorCode, FieldError } from "./errors.ts";
export { ArchiveErrorCodeSchema, ERROR_STATUS, FieldErrorSchema } from "./errors.ts";
export type { BlobRegister, UploadValidate } from "./upload.ts";
export { BlobRegisterSchema, UploadValidateSchema } from "./upload.ts";
export type { ZarrCreate, ZarrFile } from "./zarr.ts";
export { MAX_ZARR_NAME_LENGTH, ZarrCreateSchema, ZarrFileSchema } from "./zarr.ts";
