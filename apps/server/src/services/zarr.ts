/**
 * ZarrAggregate - a multi-object logical blob
 *
 * Totals move by commutative increments, each guarded by a compare-and-swap
 * on the previous file record. Any change sends the archive back to
 * PENDING. Completion runs as a task: UPLOADED -> INGESTING -> COMPLETE,
 * each step guarded by the archive revision. A failed ingestion falls back
 * to UPLOADED; archives left UPLOADED or INGESTING are picked up again by
 * completeUpload and the periodic sweep.
 */

import { ZarrCreateSchema, ZarrFileSchema } from "@dandiset/protocol";
import type { ArchiveStore } from "../db/store.ts";
import {
  type ArchiveError,
  archiveError,
  isArchiveError,
  isConcurrentModification,
} from "../errors.ts";
import type { Logger, TaskQueue, ZarrArchive, ZarrUploadFile } from "../types.ts";
import { generateId } from "../util/id.ts";
import type { AssetChain } from "./asset-chain.ts";
import type { ZarrChecksumCalculator } from "./zarr-checksum.ts";

// ============================================================================
// Types
// ============================================================================

export type ZarrService = {
  createZarr: (request: unknown) => Promise<ZarrArchive | ArchiveError>;
  getZarr: (zarrId: string) => Promise<ZarrArchive | ArchiveError>;
  /** Add or overwrite one uploaded object ({path, etag, size}) */
  registerFile: (zarrId: string, file: unknown) => Promise<ZarrArchive | ArchiveError>;
  removeFile: (zarrId: string, path: string) => Promise<ZarrArchive | ArchiveError>;
  /** No uploads remain outstanding: mark UPLOADED and schedule ingestion */
  completeUpload: (zarrId: string) => Promise<ZarrArchive | ArchiveError>;
  /** Compute the checksum and move to COMPLETE (the complete-zarr task) */
  ingest: (zarrId: string) => Promise<ZarrArchive | ArchiveError>;
};

type ZarrServiceDeps = {
  store: ArchiveStore;
  checksum: ZarrChecksumCalculator;
  assetChain: AssetChain;
  queue: TaskQueue;
  maxRetries: number;
  logger?: Logger;
};

const LIST_PAGE_SIZE = 1000;

const notFound = (zarrId: string) => archiveError("NotFound", `Zarr ${zarrId} not found.`);

const conflict = (zarrId: string) =>
  archiveError("ConcurrentModification", `Zarr ${zarrId} was modified concurrently; try again.`);

// ============================================================================
// Factory
// ============================================================================

export const createZarrService = (deps: ZarrServiceDeps): ZarrService => {
  const { store, queue, maxRetries } = deps;
  const logger = deps.logger ?? console;

  const loadZarr = async (zarrId: string): Promise<ZarrArchive | ArchiveError> =>
    (await store.getZarr(zarrId)) ?? notFound(zarrId);

  /**
   * Run a compare-and-swap file write until it lands
   */
  const withFileRetry = async (
    zarrId: string,
    write: () => Promise<ArchiveError | undefined>
  ): Promise<ZarrArchive | ArchiveError> => {
    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        const failure = await write();
        if (failure) return failure;
        return loadZarr(zarrId);
      } catch (error) {
        if (!isConcurrentModification(error)) throw error;
      }
    }
    return conflict(zarrId);
  };

  const createZarr: ZarrService["createZarr"] = async (request) => {
    const parsed = ZarrCreateSchema.safeParse(request);
    if (!parsed.success) {
      return archiveError("InvalidRequest", "Invalid zarr request.", {
        issues: parsed.error.issues,
      });
    }
    const { dandisetId, name } = parsed.data;
    if (!(await store.getDandiset(dandisetId))) {
      return archiveError("NotFound", `Dandiset ${dandisetId} not found.`);
    }

    const now = Date.now();
    const zarr: ZarrArchive = {
      zarrId: generateId(),
      name,
      dandisetId,
      fileCount: 0,
      size: 0,
      checksum: null,
      status: "PENDING",
      revision: 0,
      createdAt: now,
      modifiedAt: now,
    };
    await store.createZarr(zarr);
    return zarr;
  };

  const registerFile: ZarrService["registerFile"] = async (zarrId, input) => {
    const parsed = ZarrFileSchema.safeParse(input);
    if (!parsed.success) {
      return archiveError("InvalidRequest", "Invalid zarr file.", { issues: parsed.error.issues });
    }
    const zarr = await loadZarr(zarrId);
    if (isArchiveError(zarr)) return zarr;

    const file: ZarrUploadFile = { zarrId, ...parsed.data };
    return withFileRetry(zarrId, async () => {
      const previous = await store.getZarrFile(zarrId, file.path);
      await store.putZarrFile(file, previous);
      return undefined;
    });
  };

  const removeFile: ZarrService["removeFile"] = async (zarrId, path) => {
    const zarr = await loadZarr(zarrId);
    if (isArchiveError(zarr)) return zarr;

    return withFileRetry(zarrId, async () => {
      const file = await store.getZarrFile(zarrId, path);
      if (!file) return archiveError("NotFound", `File ${path} not found in zarr ${zarrId}.`);
      await store.deleteZarrFile(file);
      return undefined;
    });
  };

  const completeUpload: ZarrService["completeUpload"] = async (zarrId) => {
    const zarr = await loadZarr(zarrId);
    if (isArchiveError(zarr) || zarr.status === "COMPLETE") return zarr;
    if (zarr.status !== "PENDING") {
      // Already waiting on ingestion; the task may have been lost
      queue.enqueue("complete-zarr", { zarrId });
      return zarr;
    }

    if (!(await store.setZarrStatus(zarrId, zarr.revision, "UPLOADED"))) return conflict(zarrId);
    queue.enqueue("complete-zarr", { zarrId });
    return loadZarr(zarrId);
  };

  const listAllFiles = async (zarrId: string): Promise<ZarrUploadFile[]> => {
    const files: ZarrUploadFile[] = [];
    let cursor: string | undefined;
    do {
      const page = await store.listZarrFiles(zarrId, { limit: LIST_PAGE_SIZE, cursor });
      files.push(...page.items);
      cursor = page.hasMore ? page.nextCursor : undefined;
    } while (cursor);
    return files;
  };

  /**
   * Re-size live draft leaves that reference the archive and schedule
   * validation of those assets and their versions
   */
  const reconcileLinks = async (zarr: ZarrArchive): Promise<void> => {
    const touched = new Set<string>();
    for (const link of await store.listZarrLinks(zarr.zarrId)) {
      const live = await store.findLiveAsset(link.versionId, link.path);
      if (!live || live.asset.assetId !== link.assetId) continue;

      const version = await store.getVersion(link.versionId);
      if (version?.version === "draft") {
        const resized = await deps.assetChain.resize(live.asset, link.versionId, zarr.size);
        if (isArchiveError(resized)) {
          logger.warn(
            `[zarr] Could not resize ${link.path} in ${link.versionId}: ${resized.message}`
          );
        } else if (resized) {
          touched.add(link.versionId);
        }
      }
      queue.enqueue("validate-asset", { assetId: link.assetId });
    }
    for (const versionId of touched) {
      queue.enqueue("validate-version", { versionId });
      queue.enqueue("aggregate-summary", { versionId });
    }
  };

  const ingest: ZarrService["ingest"] = async (zarrId) => {
    const zarr = await loadZarr(zarrId);
    if (isArchiveError(zarr)) return zarr;
    if (zarr.status === "COMPLETE" || zarr.status === "PENDING") {
      logger.info(`[zarr] ${zarrId} is ${zarr.status}; nothing to ingest`);
      return zarr;
    }

    if (!(await store.setZarrStatus(zarrId, zarr.revision, "INGESTING"))) return conflict(zarrId);

    let checksum: string;
    try {
      checksum = await deps.checksum.compute(await listAllFiles(zarrId));
    } catch (error) {
      // Back to UPLOADED so completion or the sweep can start over
      await store.setZarrStatus(zarrId, zarr.revision, "UPLOADED");
      throw error;
    }
    if (!(await store.completeZarr(zarrId, zarr.revision, checksum))) {
      logger.warn(`[zarr] ${zarrId} changed during ingestion; left for the next upload completion`);
      return conflict(zarrId);
    }

    const completed: ZarrArchive = { ...zarr, status: "COMPLETE", checksum };
    logger.info(`[zarr] ${zarrId} complete: ${zarr.fileCount} files, ${zarr.size} bytes`);
    await reconcileLinks(completed);
    return completed;
  };

  return {
    createZarr,
    getZarr: loadZarr,
    registerFile,
    removeFile,
    completeUpload,
    ingest,
  };
};
