/**
 * Dandiset Archive - Configuration
 *
 * Environment is read once by loadConfig() at bootstrap; everything below it
 * receives the resulting AppConfig explicitly.
 */

import type { TaskType } from "./types.ts";

// ============================================================================
// Helpers
// ============================================================================

const intEnv = (name: string, fallback: number): number => {
  const raw = process.env[name];
  if (raw === undefined || raw === "") return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const listEnv = (name: string): string[] | undefined => {
  const raw = process.env[name];
  if (!raw) return undefined;
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
};

// ============================================================================
// Archive Config
// ============================================================================

export const DEFAULT_SCHEMA_VERSION = "0.6.4";

export const DEFAULT_ALLOWED_SCHEMA_VERSIONS = [
  "0.4.4",
  "0.5.1",
  "0.5.2",
  "0.6.0",
  "0.6.1",
  "0.6.2",
  "0.6.3",
  "0.6.4",
];

export type ArchiveConfig = {
  /** Schema version stamped on metadata that carries none */
  schemaVersion: string;
  /** Schema versions the validator accepts */
  allowedSchemaVersions: string[];
  validation: {
    /** Interval of the periodic sweeps */
    jobIntervalSeconds: number;
    /** Rate at which sweeps dispatch work into the queue */
    dispatchMaxPerSecond: number;
    /** Soft time budget per task type */
    softTimeLimitMs: Record<TaskType, number>;
  };
  aggregation: {
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  mutation: {
    /** Re-runs of a draft commit that lost a revision race */
    maxRetries: number;
  };
  worker: {
    concurrency: number;
  };
};

export const loadArchiveConfig = (): ArchiveConfig => {
  const schemaVersion = process.env.DANDI_SCHEMA_VERSION || DEFAULT_SCHEMA_VERSION;
  const allowed = listEnv("DANDI_ALLOWED_SCHEMA_VERSIONS") ?? DEFAULT_ALLOWED_SCHEMA_VERSIONS;

  return {
    schemaVersion,
    allowedSchemaVersions: allowed.includes(schemaVersion) ? allowed : [...allowed, schemaVersion],
    validation: {
      jobIntervalSeconds: intEnv("VALIDATION_JOB_INTERVAL", 60),
      dispatchMaxPerSecond: intEnv("VALIDATION_DISPATCH_MAX_PER_SECOND", 100),
      softTimeLimitMs: {
        "validate-asset": intEnv("VALIDATE_ASSET_TIME_LIMIT_MS", 30_000),
        "validate-version": intEnv("VALIDATE_VERSION_TIME_LIMIT_MS", 30_000),
        "aggregate-summary": intEnv("AGGREGATE_SUMMARY_TIME_LIMIT_MS", 60_000),
        "calculate-sha256": intEnv("CALCULATE_SHA256_TIME_LIMIT_MS", 300_000),
        "verify-upload": intEnv("VERIFY_UPLOAD_TIME_LIMIT_MS", 300_000),
        "complete-zarr": intEnv("COMPLETE_ZARR_TIME_LIMIT_MS", 600_000),
      },
    },
    aggregation: {
      maxRetries: intEnv("AGGREGATION_MAX_RETRIES", 5),
      baseDelayMs: intEnv("AGGREGATION_BASE_DELAY_MS", 100),
      maxDelayMs: intEnv("AGGREGATION_MAX_DELAY_MS", 5_000),
    },
    mutation: {
      maxRetries: intEnv("MUTATION_MAX_RETRIES", 5),
    },
    worker: {
      concurrency: intEnv("WORKER_CONCURRENCY", 4),
    },
  };
};

// ============================================================================
// Database Config
// ============================================================================

export type DbConfig = {
  /** "memory" keeps everything in process */
  type: "memory" | "dynamodb";
  tableName: string;
  dynamoEndpoint?: string;
  region?: string;
};

export const loadDbConfig = (): DbConfig => ({
  type: process.env.ARCHIVE_DB === "memory" ? "memory" : "dynamodb",
  tableName: process.env.ARCHIVE_TABLE ?? "dandiset-archive",
  dynamoEndpoint: process.env.DYNAMODB_ENDPOINT,
  region: process.env.AWS_REGION,
});

// ============================================================================
// Storage Config
// ============================================================================

export type StorageConfig = {
  type: "memory" | "s3";
  bucket: string;
  prefix: string;
  region?: string;
};

export const loadStorageConfig = (): StorageConfig => ({
  type: process.env.STORAGE_TYPE === "memory" ? "memory" : "s3",
  bucket: process.env.ARCHIVE_BUCKET ?? "dandiset-archive",
  prefix: process.env.ARCHIVE_PREFIX ?? "",
  region: process.env.AWS_REGION,
});

// ============================================================================
// Redis Config
// ============================================================================

export type RedisConfig = {
  enabled: boolean;
  url: string;
  keyPrefix: string;
  connectTimeoutMs: number;
  commandTimeoutMs: number;
  /** TTL of cached asset records */
  assetTtlSeconds: number;
};

export const loadRedisConfig = (): RedisConfig => ({
  enabled: process.env.REDIS_ENABLED === "true",
  url: process.env.REDIS_URL ?? "redis://localhost:6379",
  keyPrefix: process.env.REDIS_KEY_PREFIX ?? "dandi:",
  connectTimeoutMs: intEnv("REDIS_CONNECT_TIMEOUT_MS", 2_000),
  commandTimeoutMs: intEnv("REDIS_COMMAND_TIMEOUT_MS", 500),
  assetTtlSeconds: intEnv("REDIS_ASSET_TTL_SECONDS", 30),
});

// ============================================================================
// App Config (combined)
// ============================================================================

export type AppConfig = {
  archive: ArchiveConfig;
  db: DbConfig;
  storage: StorageConfig;
  redis: RedisConfig;
};

export const loadConfig = (): AppConfig => ({
  archive: loadArchiveConfig(),
  db: loadDbConfig(),
  storage: loadStorageConfig(),
  redis: loadRedisConfig(),
});
