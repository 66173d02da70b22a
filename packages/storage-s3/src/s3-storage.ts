/**
 * S3 Blob Store
 *
 * Objects live under an optional key prefix. Positive existence checks are
 * remembered in an LRU; absence never is, since objects arrive by upload.
 */

import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import type { BlobHead, BlobStore } from "@dandiset/storage-core";
import QuickLRU from "quick-lru";

/**
 * S3 Blob Store configuration
 */
export type S3BlobStoreConfig = {
  /** S3 bucket name */
  bucket: string;
  /** AWS region for the S3 bucket (e.g. "us-east-2") */
  region?: string;
  /** Optional S3 client (for testing or custom config) */
  client?: S3Client;
  /** Number of keys remembered as existing (default: 10000) */
  cacheSize?: number;
  /** Key prefix in S3, prepended to every object key (default: "") */
  prefix?: string;
};

const DEFAULT_EXISTS_CACHE_SIZE = 10000;

const isNotFound = (error: unknown): boolean => {
  if (typeof error !== "object" || error === null) return false;
  if ("name" in error && (error.name === "NotFound" || error.name === "NoSuchKey")) return true;
  if ("$metadata" in error && typeof error.$metadata === "object" && error.$metadata !== null) {
    return "httpStatusCode" in error.$metadata && error.$metadata.httpStatusCode === 404;
  }
  return false;
};

/**
 * Create an S3-backed blob store
 */
export const createS3BlobStore = (config: S3BlobStoreConfig): BlobStore => {
  const client = config.client ?? new S3Client(config.region ? { region: config.region } : {});
  const bucket = config.bucket;
  const prefix = config.prefix ?? "";
  const existsCache = new QuickLRU<string, true>({
    maxSize: config.cacheSize ?? DEFAULT_EXISTS_CACHE_SIZE,
  });

  const toS3Key = (key: string): string => `${prefix}${key}`;

  const head = async (key: string): Promise<BlobHead | null> => {
    try {
      const result = await client.send(
        new HeadObjectCommand({
          Bucket: bucket,
          Key: toS3Key(key),
        })
      );
      existsCache.set(key, true);
      return {
        size: result.ContentLength ?? 0,
        etag: (result.ETag ?? "").replace(/"/g, ""),
      };
    } catch (error: unknown) {
      if (isNotFound(error)) return null;
      throw error;
    }
  };

  const has = async (key: string): Promise<boolean> => {
    if (existsCache.has(key)) return true;
    return (await head(key)) !== null;
  };

  const get = async (key: string): Promise<Uint8Array | null> => {
    try {
      const result = await client.send(
        new GetObjectCommand({
          Bucket: bucket,
          Key: toS3Key(key),
        })
      );
      if (!result.Body) return null;

      const bytes = await result.Body.transformToByteArray();
      existsCache.set(key, true);
      return new Uint8Array(bytes);
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  };

  const put = async (key: string, value: Uint8Array): Promise<void> => {
    await client.send(
      new PutObjectCommand({
        Bucket: bucket,
        Key: toS3Key(key),
        Body: value,
        ContentType: "application/octet-stream",
      })
    );
    existsCache.set(key, true);
  };

  const del = async (key: string): Promise<void> => {
    await client.send(
      new DeleteObjectCommand({
        Bucket: bucket,
        Key: toS3Key(key),
      })
    );
    existsCache.delete(key);
  };

  return { has, head, get, put, del };
};
