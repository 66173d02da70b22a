/**
 * Blob Storage S3
 *
 * S3 blob store for archive uploads and zarr objects.
 */

export { createS3BlobStore, type S3BlobStoreConfig } from "./s3-storage.ts";
