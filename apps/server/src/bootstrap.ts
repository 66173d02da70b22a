/**
 * Dandiset Archive - Bootstrap
 *
 * Builds the store, object storage, services and task queue from an
 * AppConfig. Tests and embedders may pass their own store or blob store.
 */

import type { BlobStore } from "@dandiset/storage-core";
import { createMemoryBlobStore } from "@dandiset/storage-memory";
import { createS3BlobStore } from "@dandiset/storage-s3";
import type Redis from "ioredis";
import type { AppConfig } from "./config.ts";
import { withArchiveCache } from "./db/cached-store.ts";
import { createDocClient } from "./db/client.ts";
import { createDynamoArchiveStore } from "./db/dynamo-store.ts";
import { createMemoryArchiveStore } from "./db/memory-store.ts";
import { createRedisClient } from "./db/redis-client.ts";
import type { ArchiveStore } from "./db/store.ts";
import { type AssetChain, createAssetChain } from "./services/asset-chain.ts";
import { createZodSchemaValidator, type SchemaValidator } from "./services/metadata-validator.ts";
import { createVersionOrchestrator, type VersionOrchestrator } from "./services/orchestrator.ts";
import { createPathIndex, type PathIndex } from "./services/path-index.ts";
import { createUploadService, type UploadService } from "./services/uploads.ts";
import { createValidationEngine, type ValidationEngine } from "./services/validation.ts";
import { createZarrService, type ZarrService } from "./services/zarr.ts";
import { createZarrChecksumCalculator } from "./services/zarr-checksum.ts";
import { createTaskHandlers } from "./tasks/handlers.ts";
import { createInProcessTaskQueue, type InProcessTaskQueue } from "./tasks/queue.ts";
import { createScheduledJobs, type ScheduledJobs } from "./tasks/scheduled.ts";
import type { Logger } from "./types.ts";
import { createNodeHashProvider } from "./util/hash-provider.ts";

// ============================================================================
// Types
// ============================================================================

export type Archive = {
  store: ArchiveStore;
  blobs: BlobStore;
  redis: Redis | null;
  queue: InProcessTaskQueue;
  pathIndex: PathIndex;
  assetChain: AssetChain;
  validation: ValidationEngine;
  orchestrator: VersionOrchestrator;
  uploads: UploadService;
  zarrs: ZarrService;
  scheduled: ScheduledJobs;
};

export type ArchiveOverrides = {
  store?: ArchiveStore;
  blobs?: BlobStore;
  validator?: SchemaValidator;
  logger?: Logger;
};

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create the archive store selected by config, wrapped with the Redis
 * cache when one is available.
 */
export const createArchiveStore = (config: AppConfig, redis: Redis | null): ArchiveStore => {
  const raw =
    config.db.type === "memory"
      ? createMemoryArchiveStore()
      : createDynamoArchiveStore({
          tableName: config.db.tableName,
          client: createDocClient(config.db),
        });
  return withArchiveCache(raw, redis, config.redis.keyPrefix, config.redis.assetTtlSeconds);
};

export const createBlobStore = (config: AppConfig): BlobStore =>
  config.storage.type === "memory"
    ? createMemoryBlobStore()
    : createS3BlobStore({
        bucket: config.storage.bucket,
        region: config.storage.region,
        prefix: config.storage.prefix,
      });

/**
 * Wire every service together. Task handlers are bound last, once the
 * services they call exist.
 */
export const createArchive = (config: AppConfig, overrides: ArchiveOverrides = {}): Archive => {
  const logger = overrides.logger ?? console;
  const { archive } = config;

  const redis = createRedisClient(config.redis, logger);
  const store = overrides.store ?? createArchiveStore(config, redis);
  const blobs = overrides.blobs ?? createBlobStore(config);
  const hash = createNodeHashProvider();

  const queue = createInProcessTaskQueue({
    concurrency: archive.worker.concurrency,
    softTimeLimitMs: archive.validation.softTimeLimitMs,
    logger,
  });

  const pathIndex = createPathIndex({ store });
  const assetChain = createAssetChain({
    store,
    pathIndex,
    maxRetries: archive.mutation.maxRetries,
    logger,
  });
  const validation = createValidationEngine({
    store,
    validator:
      overrides.validator ??
      createZodSchemaValidator({ allowedSchemaVersions: archive.allowedSchemaVersions }),
    schemaVersion: archive.schemaVersion,
    aggregation: archive.aggregation,
    logger,
  });
  const orchestrator = createVersionOrchestrator({
    store,
    assetChain,
    pathIndex,
    validation,
    queue,
    schemaVersion: archive.schemaVersion,
    logger,
  });
  const uploads = createUploadService({ store, blobs, hash, queue, logger });
  const zarrs = createZarrService({
    store,
    checksum: createZarrChecksumCalculator(hash),
    assetChain,
    queue,
    maxRetries: archive.mutation.maxRetries,
    logger,
  });
  const scheduled = createScheduledJobs({
    store,
    validation,
    queue,
    dispatchMaxPerSecond: archive.validation.dispatchMaxPerSecond,
    // Twice the time a verification may run before it is reported
    uploadStaleAfterMs: 2 * archive.validation.softTimeLimitMs["verify-upload"],
    logger,
  });

  queue.bind(createTaskHandlers({ validation, uploads, zarrs, queue, logger }));

  return {
    store,
    blobs,
    redis,
    queue,
    pathIndex,
    assetChain,
    validation,
    orchestrator,
    uploads,
    zarrs,
    scheduled,
  };
};
