/**
 * Blob Store interface
 *
 * Object storage consumed by the archive: single-object blobs and the many
 * small objects that make up a zarr archive. Keys are object keys, not
 * digests; content addressing happens one level up (ContentBlob records).
 */
export type BlobStore = {
  /**
   * Check if an object exists
   */
  has: (key: string) => Promise<boolean>;

  /**
   * Object size and etag, or null if the object does not exist
   */
  head: (key: string) => Promise<BlobHead | null>;

  /**
   * Get object content by key
   * Returns null if not found
   */
  get: (key: string) => Promise<Uint8Array | null>;

  /**
   * Store object content
   */
  put: (key: string, value: Uint8Array) => Promise<void>;

  /**
   * Delete an object; no-op when missing
   */
  del: (key: string) => Promise<void>;
};

export type BlobHead = {
  size: number;
  /** MD5-based object etag as reported by the store (no quotes) */
  etag: string;
};

/**
 * Hash Provider interface
 */
export type HashProvider = {
  /**
   * Compute SHA-256 hash of data (used for blob digests)
   */
  sha256: (data: Uint8Array) => Promise<Uint8Array>;

  /**
   * Compute MD5 hash of data (used for object etags and zarr checksums)
   */
  md5: (data: Uint8Array) => Promise<Uint8Array>;
};
