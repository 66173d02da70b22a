/**
 * Cached ArchiveStore wrapper: read-through Redis caching of records that
 * are immutable or change rarely.
 *
 * Cached methods:
 *   getAsset(assetId)  → `ast:{assetId}` (TTL from config), once validated
 *   getBlob(blobId)    → `blb:{blobId}`, only once its sha256 is known
 *
 * Invalidation (DEL after mutation):
 *   setAssetValidation → DEL `ast:{assetId}`
 *
 * Versions, path nodes and zarr archives are never cached: their writes
 * are revision-guarded and must see the current record.
 */

import type Redis from "ioredis";
import type { z } from "zod";
import { cacheDel, cacheGet, cacheSet } from "./cache.ts";
import { AssetRecord, BlobRecord } from "./records.ts";
import type { ArchiveStore } from "./store.ts";

const DEFAULT_TTL = 30; // seconds

export const withArchiveCache = (
  store: ArchiveStore,
  redis: Redis | null,
  prefix: string,
  ttl = DEFAULT_TTL
): ArchiveStore => {
  if (!redis) return store;

  const assetKey = (assetId: string) => `${prefix}ast:${assetId}`;
  const blobKey = (blobId: string) => `${prefix}blb:${blobId}`;

  /** A cached record, or null on a miss or an entry that no longer parses */
  const readCached = async <T>(schema: z.ZodType<T>, key: string): Promise<T | null> => {
    const cached = await cacheGet(redis, key);
    if (!cached) return null;
    try {
      const parsed = schema.safeParse(JSON.parse(cached));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  };

  return {
    ...store,

    getAsset: async (assetId) => {
      const key = assetKey(assetId);
      const cached = await readCached(AssetRecord, key);
      if (cached) return cached;

      const result = await store.getAsset(assetId);
      // A pending asset is still going to change
      if (result && result.status !== "PENDING") {
        await cacheSet(redis, key, JSON.stringify(result), ttl);
      }
      return result;
    },

    setAssetValidation: async (assetId, status, errors) => {
      await store.setAssetValidation(assetId, status, errors);
      await cacheDel(redis, assetKey(assetId));
    },

    getBlob: async (blobId) => {
      const key = blobKey(blobId);
      const cached = await readCached(BlobRecord, key);
      if (cached) return cached;

      const result = await store.getBlob(blobId);
      // A blob without its digest is still going to change
      if (result?.sha256) await cacheSet(redis, key, JSON.stringify(result), ttl);
      return result;
    },
  };
};
