/**
 * Periodic sweeps
 *
 * Safety net for tasks that were lost or deferred: every interval, PENDING
 * assets whose content is ready and PENDING drafts are pushed back into the
 * queue at a throttled rate. The same holds for outstanding work of the
 * upload path: blobs without a digest, uploads verifying for longer than
 * a task may run, and zarr archives waiting on ingestion.
 */

import type { ArchiveStore } from "../db/store.ts";
import type { ValidationEngine } from "../services/validation.ts";
import type { ListOptions, Logger, PaginatedResult, TaskQueue } from "../types.ts";
import type { Sleep } from "../util/retry.ts";
import { createThrottle } from "../util/throttle.ts";

// ============================================================================
// Types
// ============================================================================

export type ScheduledJobs = {
  validatePendingAssetMetadata: () => Promise<number>;
  validateDraftVersionMetadata: () => Promise<number>;
  calculatePendingDigests: () => Promise<number>;
  resumeStalledUploads: () => Promise<number>;
  resumeIngestingZarrs: () => Promise<number>;
};

/** Anything that can run a job on a fixed interval */
export type Scheduler = {
  every: (intervalSeconds: number, name: string, job: () => Promise<unknown>) => void;
};

type ScheduledJobDeps = {
  store: ArchiveStore;
  validation: ValidationEngine;
  queue: TaskQueue;
  dispatchMaxPerSecond: number;
  /** An IN_PROGRESS upload older than this has lost its task */
  uploadStaleAfterMs: number;
  logger?: Logger;
  sleep?: Sleep;
  now?: () => number;
};

const SCAN_PAGE_SIZE = 1000;

/**
 * Collect every item of a paginated listing
 */
const collectAll = async <T>(
  list: (options: ListOptions) => Promise<PaginatedResult<T>>
): Promise<T[]> => {
  const items: T[] = [];
  let cursor: string | undefined;
  do {
    const page = await list({ limit: SCAN_PAGE_SIZE, cursor });
    items.push(...page.items);
    cursor = page.hasMore ? page.nextCursor : undefined;
  } while (cursor);
  return items;
};

// ============================================================================
// Factory
// ============================================================================

export const createScheduledJobs = (deps: ScheduledJobDeps): ScheduledJobs => {
  const { store, validation, queue } = deps;
  const logger = deps.logger ?? console;
  const now = deps.now ?? Date.now;

  const dispatch = async <T>(
    items: T[],
    label: string,
    send: (item: T) => void
  ): Promise<number> => {
    if (items.length === 0) return 0;
    logger.info(`[scheduled] Found ${items.length} ${label}`);
    const throttle = createThrottle(deps.dispatchMaxPerSecond, deps.sleep);
    for (const item of items) {
      send(item);
      await throttle();
    }
    return items.length;
  };

  const validatePendingAssetMetadata: ScheduledJobs["validatePendingAssetMetadata"] = async () => {
    const pending = await collectAll((options) => store.listPendingAssets(options));
    const ready: string[] = [];
    for (const asset of pending) {
      if ((await validation.contentFields(asset)) !== null) ready.push(asset.assetId);
    }
    return dispatch(ready, "assets to validate", (assetId) =>
      queue.enqueue("validate-asset", { assetId })
    );
  };

  const validateDraftVersionMetadata: ScheduledJobs["validateDraftVersionMetadata"] = async () => {
    const drafts = await collectAll((options) => store.listPendingDraftVersions(options));
    if (drafts.length === 0) return 0;

    logger.info(`[scheduled] Found ${drafts.length} versions to validate`);
    for (const { versionId } of drafts) {
      queue.enqueue("validate-version", { versionId });
      queue.enqueue("aggregate-summary", { versionId });
    }
    return drafts.length;
  };

  const calculatePendingDigests: ScheduledJobs["calculatePendingDigests"] = async () => {
    const blobs = await collectAll((options) => store.listUndigestedBlobs(options));
    return dispatch(blobs, "blobs without a digest", ({ blobId }) =>
      queue.enqueue("calculate-sha256", { blobId })
    );
  };

  const resumeStalledUploads: ScheduledJobs["resumeStalledUploads"] = async () => {
    const cutoff = now() - deps.uploadStaleAfterMs;
    const uploads = await collectAll((options) => store.listInProgressUploads(options));
    const stalled = uploads.filter((record) => record.modifiedAt < cutoff);
    return dispatch(stalled, "stalled upload validations", ({ sha256 }) =>
      queue.enqueue("verify-upload", { sha256 })
    );
  };

  const resumeIngestingZarrs: ScheduledJobs["resumeIngestingZarrs"] = async () => {
    const zarrs = await collectAll((options) => store.listIngestingZarrs(options));
    return dispatch(zarrs, "zarr archives to ingest", ({ zarrId }) =>
      queue.enqueue("complete-zarr", { zarrId })
    );
  };

  return {
    validatePendingAssetMetadata,
    validateDraftVersionMetadata,
    calculatePendingDigests,
    resumeStalledUploads,
    resumeIngestingZarrs,
  };
};

/**
 * Register every sweep on a scheduler at the configured interval
 */
export const registerScheduledTasks = (
  scheduler: Scheduler,
  jobs: ScheduledJobs,
  intervalSeconds: number
): void => {
  scheduler.every(
    intervalSeconds,
    "validate-pending-asset-metadata",
    jobs.validatePendingAssetMetadata
  );
  scheduler.every(
    intervalSeconds,
    "validate-draft-version-metadata",
    jobs.validateDraftVersionMetadata
  );
  scheduler.every(intervalSeconds, "calculate-pending-digests", jobs.calculatePendingDigests);
  scheduler.every(intervalSeconds, "resume-stalled-uploads", jobs.resumeStalledUploads);
  scheduler.every(intervalSeconds, "resume-ingesting-zarrs", jobs.resumeIngestingZarrs);
};

/**
 * Scheduler on plain timers. Runs of the same job never overlap; a failed
 * run is logged and the next one goes ahead.
 */
export const createIntervalScheduler = (logger: Logger = console) => {
  const timers: Array<ReturnType<typeof setInterval>> = [];

  const every: Scheduler["every"] = (intervalSeconds, name, job) => {
    let busy = false;
    const timer = setInterval(() => {
      if (busy) return;
      busy = true;
      void job()
        .catch((error: unknown) => logger.error(`[scheduled] ${name} failed:`, error))
        .finally(() => {
          busy = false;
        });
    }, intervalSeconds * 1000);
    timers.push(timer);
  };

  const stop = () => {
    for (const timer of timers.splice(0)) clearInterval(timer);
  };

  return { every, stop };
};
