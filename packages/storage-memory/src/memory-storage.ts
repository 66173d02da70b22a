/**
 * In-Memory Blob Store
 *
 * Useful for testing and local development.
 */

import { createHash } from "node:crypto";
import type { BlobStore } from "@dandiset/storage-core";

/**
 * Memory Blob Store configuration
 */
export type MemoryBlobStoreConfig = {
  /** Optional initial data */
  initialData?: Map<string, Uint8Array>;
};

const md5Hex = (value: Uint8Array): string => createHash("md5").update(value).digest("hex");

const createStore = (data: Map<string, Uint8Array>): BlobStore => ({
  has: async (key) => data.has(key),
  head: async (key) => {
    const value = data.get(key);
    if (!value) return null;
    return { size: value.length, etag: md5Hex(value) };
  },
  get: async (key) => data.get(key) ?? null,
  put: async (key, value) => {
    data.set(key, value);
  },
  del: async (key) => {
    data.delete(key);
  },
});

/**
 * Create an in-memory blob store
 */
export const createMemoryBlobStore = (config: MemoryBlobStoreConfig = {}): BlobStore => {
  return createStore(config.initialData ?? new Map<string, Uint8Array>());
};
