/**
 * Task handlers - bind queued task types to services
 */

import { isArchiveError } from "../errors.ts";
import type { UploadService } from "../services/uploads.ts";
import type { ValidationEngine } from "../services/validation.ts";
import type { ZarrService } from "../services/zarr.ts";
import type { Logger, TaskQueue } from "../types.ts";
import type { TaskHandlers } from "./queue.ts";

type TaskHandlerDeps = {
  validation: ValidationEngine;
  uploads: UploadService;
  zarrs: ZarrService;
  queue: TaskQueue;
  logger?: Logger;
};

export const createTaskHandlers = (deps: TaskHandlerDeps): TaskHandlers => {
  const { validation, uploads, zarrs, queue } = deps;
  const logger = deps.logger ?? console;

  const report = (task: string, result: unknown) => {
    if (isArchiveError(result)) {
      logger.warn(`[tasks] ${task}: ${result.code} ${result.message}`);
    }
  };

  return {
    "validate-asset": async ({ assetId }) => {
      await validation.validateAsset(assetId);
    },
    "validate-version": async ({ versionId }) => {
      await validation.validateVersion(versionId);
    },
    "aggregate-summary": async ({ versionId }) => {
      const outcome = await validation.aggregateWithRetry(versionId);
      // A new summary changes the metadata, which needs validating again
      if (outcome?.written) queue.enqueue("validate-version", { versionId });
    },
    "calculate-sha256": async ({ blobId }) => {
      report(`calculate-sha256 ${blobId}`, await uploads.calculateSha256(blobId));
    },
    "verify-upload": async ({ sha256 }) => {
      report(`verify-upload ${sha256}`, await uploads.verifyUpload(sha256));
    },
    "complete-zarr": async ({ zarrId }) => {
      report(`complete-zarr ${zarrId}`, await zarrs.ingest(zarrId));
    },
  };
};
