/**
 * Blob Storage Core
 *
 * Object storage contract shared by the memory and S3 stores.
 */

// Digest encoding
export { bytesToHex } from "./key.ts";
// Types
export type { BlobHead, BlobStore, HashProvider } from "./types.ts";
