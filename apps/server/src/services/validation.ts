/**
 * ValidationEngine - PENDING -> VALID | INVALID for assets and versions,
 * plus assetsSummary aggregation for drafts.
 *
 * Nothing here is linearized with draft mutations. Version writes are
 * guarded by the revision read at the start; a stale validation result is
 * dropped and a stale aggregation is retried with backoff.
 */

import { isDeepStrictEqual } from "node:util";
import type { ArchiveStore } from "../db/store.ts";
import { isConcurrentModification } from "../errors.ts";
import type {
  Asset,
  FieldError,
  LiveAsset,
  Logger,
  Metadata,
  ValidationStatus,
} from "../types.ts";
import { splitVersionId } from "../util/db-keys.ts";
import { type BackoffOptions, retryWithBackoff, type Sleep } from "../util/retry.ts";
import { type AssetsSummary, summarizeAssets } from "./asset-summary.ts";
import type { SchemaValidator } from "./metadata-validator.ts";

// ============================================================================
// Types
// ============================================================================

export type ValidationResult = {
  state: "validated";
  status: Exclude<ValidationStatus, "PENDING">;
  errors: FieldError[];
};

export type AssetValidationOutcome =
  | { state: "deferred" }
  | { state: "missing" }
  | ValidationResult;

/** "stale": the version moved while validating; the result was dropped */
export type VersionValidationOutcome = { state: "missing" } | { state: "stale" } | ValidationResult;

export type AggregationOutcome = {
  summary: AssetsSummary;
  /** False when the stored summary was already up to date */
  written: boolean;
};

export type ValidationEngine = {
  validateAsset: (assetId: string) => Promise<AssetValidationOutcome>;
  validateVersion: (versionId: string) => Promise<VersionValidationOutcome>;
  /**
   * One aggregation pass. Throws ConcurrentModificationError when the
   * version changed between the scan and the write.
   */
  aggregateAssetsSummary: (versionId: string) => Promise<AggregationOutcome | null>;
  /** aggregateAssetsSummary with bounded exponential backoff on staleness */
  aggregateWithRetry: (versionId: string) => Promise<AggregationOutcome | null>;
  /** Content-derived fields, or null while the content is not ready */
  contentFields: (asset: Asset) => Promise<Metadata | null>;
};

type ValidationEngineDeps = {
  store: ArchiveStore;
  validator: SchemaValidator;
  /** Stamped on asset metadata that carries no schemaVersion */
  schemaVersion: string;
  aggregation: Omit<BackoffOptions, "sleep">;
  logger?: Logger;
  sleep?: Sleep;
};

const SCAN_PAGE_SIZE = 1000;
const ZARR_ENCODING_FORMAT = "application/x-zarr";

// ============================================================================
// Factory
// ============================================================================

export const createValidationEngine = (deps: ValidationEngineDeps): ValidationEngine => {
  const { store, validator } = deps;
  const logger = deps.logger ?? console;

  const contentFields: ValidationEngine["contentFields"] = async (asset) => {
    const base = {
      id: `dandiasset:${asset.assetId}`,
      identifier: asset.assetId,
      path: asset.path,
    };

    if (asset.content.kind === "zarr") {
      const zarr = await store.getZarr(asset.content.zarrId);
      if (!zarr || zarr.status !== "COMPLETE" || zarr.checksum === null) return null;
      return {
        ...base,
        contentSize: zarr.size,
        digest: { "dandi:dandi-zarr-checksum": zarr.checksum },
        encodingFormat: asset.metadata.encodingFormat ?? ZARR_ENCODING_FORMAT,
      };
    }

    const blob = await store.getBlob(asset.content.blobId);
    if (!blob || blob.sha256 === null) return null;
    return {
      ...base,
      contentSize: blob.size,
      digest: { "dandi:dandi-etag": blob.etag, "dandi:sha2-256": blob.sha256 },
    };
  };

  const validateAsset: ValidationEngine["validateAsset"] = async (assetId) => {
    const asset = await store.getAsset(assetId);
    if (!asset) {
      logger.warn(`[validation] Asset ${assetId} not found`);
      return { state: "missing" };
    }

    const derived = await contentFields(asset);
    if (!derived) return { state: "deferred" };

    const document: Metadata = {
      ...asset.metadata,
      schemaVersion: asset.metadata.schemaVersion ?? deps.schemaVersion,
      ...derived,
    };
    const errors = validator.validate(document, document.schemaVersion, "asset");
    const status = errors.length === 0 ? "VALID" : "INVALID";
    await store.setAssetValidation(assetId, status, errors);
    return { state: "validated", status, errors };
  };

  const validateVersion: ValidationEngine["validateVersion"] = async (versionId) => {
    const version = await store.getVersion(versionId);
    if (!version) {
      logger.warn(`[validation] Version ${versionId} not found`);
      return { state: "missing" };
    }

    const [dandisetId] = splitVersionId(versionId);
    const document: Metadata = {
      ...version.metadata,
      id: `DANDI:${versionId}`,
      identifier: `DANDI:${dandisetId}`,
      version: version.version,
    };
    const errors = validator.validate(document, document.schemaVersion, "dandiset");
    const status = errors.length === 0 ? "VALID" : "INVALID";

    const written = await store.setVersionValidation(versionId, version.revision, status, errors);
    if (!written) {
      logger.info(`[validation] ${versionId} changed while validating; left PENDING`);
      return { state: "stale" };
    }
    return { state: "validated", status, errors };
  };

  const aggregateAssetsSummary: ValidationEngine["aggregateAssetsSummary"] = async (versionId) => {
    const version = await store.getVersion(versionId);
    if (!version) return null;

    const assets: LiveAsset[] = [];
    let cursor: string | undefined;
    do {
      const page = await store.listVersionAssets(versionId, { limit: SCAN_PAGE_SIZE, cursor });
      assets.push(...page.items);
      cursor = page.hasMore ? page.nextCursor : undefined;
    } while (cursor);

    const summary = summarizeAssets(assets);
    if (isDeepStrictEqual(version.metadata.assetsSummary, summary)) {
      return { summary, written: false };
    }

    await store.writeVersionMetadata(versionId, version.revision, {
      ...version.metadata,
      assetsSummary: summary,
    });
    return { summary, written: true };
  };

  const aggregateWithRetry: ValidationEngine["aggregateWithRetry"] = async (versionId) => {
    try {
      return await retryWithBackoff(
        () => aggregateAssetsSummary(versionId),
        isConcurrentModification,
        { ...deps.aggregation, sleep: deps.sleep }
      );
    } catch (error) {
      if (isConcurrentModification(error)) {
        logger.error(
          `[validation] Gave up aggregating ${versionId} after ${deps.aggregation.maxRetries} retries:`,
          error.message
        );
      }
      throw error;
    }
  };

  return {
    validateAsset,
    validateVersion,
    aggregateAssetsSummary,
    aggregateWithRetry,
    contentFields,
  };
};
