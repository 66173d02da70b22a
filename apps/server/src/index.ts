/**
 * Dandiset Archive - versioned asset storage and validation
 *
 * @packageDocumentation
 */

export { type Archive, type ArchiveOverrides, createArchive } from "./bootstrap.ts";
export { type AppConfig, loadConfig } from "./config.ts";
export { createMemoryArchiveStore } from "./db/memory-store.ts";
export type { ArchiveStore, DraftChange, ZarrLink } from "./db/store.ts";
export {
  type ArchiveError,
  ConcurrentModificationError,
  isArchiveError,
} from "./errors.ts";
export type { AssetsSummary } from "./services/asset-summary.ts";
export type { SchemaValidator } from "./services/metadata-validator.ts";
export type { AssetListItem, VersionOrchestrator } from "./services/orchestrator.ts";
export {
  createIntervalScheduler,
  registerScheduledTasks,
  type Scheduler,
} from "./tasks/scheduled.ts";
export type {
  Asset,
  ContentBlob,
  ContentRef,
  Dandiset,
  LiveAsset,
  Metadata,
  PaginatedResult,
  PathNode,
  UploadValidation,
  Version,
  ZarrArchive,
  ZarrUploadFile,
} from "./types.ts";
