/**
 * VersionOrchestrator - boundary operations on dandisets, versions and assets
 *
 * Transport-agnostic: request bodies arrive as unknown values and are parsed
 * with the protocol schemas. Structural failures come back as ArchiveError
 * values. After every successful change the version is PENDING (set by the
 * commit), version validation and aggregation are queued, and the asset is
 * validated inline when its content is ready.
 */

import {
  AssetListQuerySchema,
  AssetPathsQuerySchema,
  AssetRequestSchema,
  CreateDandisetSchema,
  DRAFT_VERSION,
} from "@dandiset/protocol";
import type { z } from "zod";
import type { ArchiveStore } from "../db/store.ts";
import { type ArchiveError, archiveError, isArchiveError } from "../errors.ts";
import type {
  Asset,
  ContentRef,
  Dandiset,
  FieldError,
  LiveAsset,
  Logger,
  PaginatedResult,
  PathNode,
  TaskQueue,
  ValidationStatus,
  Version,
} from "../types.ts";
import { toVersionId } from "../util/db-keys.ts";
import { globToRegExp } from "../util/path.ts";
import { err, ok, type Result } from "../util/result.ts";
import type { AssetChain, AssetDraft } from "./asset-chain.ts";
import type { PathIndex } from "./path-index.ts";
import type { ValidationEngine } from "./validation.ts";

// ============================================================================
// Types
// ============================================================================

export type AssetListItem = {
  assetId: string;
  path: string;
  size: number;
  status: ValidationStatus;
  createdAt: number;
  modifiedAt: number;
  metadata?: Asset["metadata"];
};

export type AssetValidationView = {
  status: ValidationStatus;
  validationErrors: FieldError[];
};

export type VersionOrchestrator = {
  createDandiset: (
    request: unknown
  ) => Promise<{ dandiset: Dandiset; draft: Version } | ArchiveError>;
  createAsset: (
    dandisetId: string,
    version: string,
    request: unknown
  ) => Promise<Asset | ArchiveError>;
  updateAsset: (
    dandisetId: string,
    version: string,
    assetId: string,
    request: unknown
  ) => Promise<Asset | ArchiveError>;
  deleteAsset: (
    dandisetId: string,
    version: string,
    assetId: string
  ) => Promise<true | ArchiveError>;
  getAsset: (assetId: string) => Promise<Asset | ArchiveError>;
  listAssets: (
    dandisetId: string,
    version: string,
    query?: unknown
  ) => Promise<PaginatedResult<AssetListItem> | ArchiveError>;
  listPaths: (
    dandisetId: string,
    version: string,
    query?: unknown
  ) => Promise<PaginatedResult<PathNode> | ArchiveError>;
  /** Newest first, ending at the first record of the chain */
  getAssetHistory: (assetId: string) => Promise<Asset[] | ArchiveError>;
  getAssetValidation: (assetId: string) => Promise<AssetValidationView | ArchiveError>;
};

type OrchestratorDeps = {
  store: ArchiveStore;
  assetChain: AssetChain;
  pathIndex: PathIndex;
  validation: ValidationEngine;
  queue: TaskQueue;
  /** Default schemaVersion for incoming metadata */
  schemaVersion: string;
  logger?: Logger;
};

// ============================================================================
// Helpers
// ============================================================================

const parseRequest = <T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown
): Result<T, ArchiveError> => {
  const parsed = schema.safeParse(input);
  if (parsed.success) return ok(parsed.data);
  return err(
    archiveError("InvalidRequest", "Invalid request.", {
      issues: parsed.error.issues.map((issue) => ({
        field: issue.path.join("."),
        message: issue.message,
      })),
    })
  );
};

const assetNotFound = (assetId: string) =>
  archiveError("AssetNotFound", `Asset ${assetId} not found.`, { assetId });

// ============================================================================
// Factory
// ============================================================================

export const createVersionOrchestrator = (deps: OrchestratorDeps): VersionOrchestrator => {
  const { store, assetChain, pathIndex, validation, queue } = deps;
  const logger = deps.logger ?? console;

  const loadVersion = async (
    dandisetId: string,
    version: string
  ): Promise<Version | ArchiveError> =>
    (await store.getVersion(toVersionId(dandisetId, version))) ??
    archiveError("NotFound", `Version ${dandisetId}/${version} not found.`);

  const loadDraft = async (
    dandisetId: string,
    version: string
  ): Promise<Version | ArchiveError> => {
    const found = await loadVersion(dandisetId, version);
    if (isArchiveError(found) || found.version === DRAFT_VERSION) return found;
    return archiveError("VersionImmutable", "Only draft versions can be modified.");
  };

  /**
   * Resolve a blob id (plain or embargoed) or a zarr id into a content reference
   */
  const resolveContent = async (
    blobId: string | undefined,
    zarrId: string | undefined
  ): Promise<ContentRef | ArchiveError> => {
    if ((blobId === undefined) === (zarrId === undefined)) {
      return archiveError("ContentRefConflict", "Exactly one of blobId and zarrId is required.");
    }
    if (blobId !== undefined) {
      const blob = await store.getBlob(blobId);
      if (!blob) return archiveError("ContentNotFound", `Blob ${blobId} does not exist.`);
      return blob.embargoedDandisetId
        ? { kind: "embargoedBlob", blobId }
        : { kind: "blob", blobId };
    }
    if (zarrId !== undefined && (await store.getZarr(zarrId))) return { kind: "zarr", zarrId };
    return archiveError("ContentNotFound", `Zarr ${zarrId} does not exist.`);
  };

  /**
   * Parse an asset request into a draft: path from the metadata, the
   * default schemaVersion filled in, content resolved
   */
  const toDraft = async (request: unknown): Promise<AssetDraft | ArchiveError> => {
    const parsed = parseRequest(AssetRequestSchema, request);
    if (!parsed.ok) return parsed.error;
    const { metadata, blobId, zarrId } = parsed.value;

    const path = metadata.path;
    if (typeof path !== "string" || path.length === 0) {
      return archiveError("InvalidRequest", "Metadata must contain a non-empty path.");
    }
    const content = await resolveContent(blobId, zarrId);
    if (isArchiveError(content)) return content;

    return {
      path,
      metadata: { ...metadata, schemaVersion: metadata.schemaVersion ?? deps.schemaVersion },
      content,
    };
  };

  const afterChange = async (versionId: string, asset: Asset | null): Promise<void> => {
    queue.enqueue("validate-version", { versionId });
    queue.enqueue("aggregate-summary", { versionId });
    if (!asset) return;
    try {
      await validation.validateAsset(asset.assetId);
    } catch (error) {
      // The periodic sweep picks the asset up again
      logger.warn(`[assets] Inline validation of ${asset.assetId} failed:`, error);
    }
  };

  const reload = async (asset: Asset): Promise<Asset> =>
    (await store.getAsset(asset.assetId)) ?? asset;

  // --------------------------------------------------------------------------
  // Mutations
  // --------------------------------------------------------------------------

  const createDandiset: VersionOrchestrator["createDandiset"] = async (request) => {
    const parsed = parseRequest(CreateDandisetSchema, request);
    if (!parsed.ok) return parsed.error;

    const now = Date.now();
    const dandisetId = await store.allocateDandisetId();
    const dandiset: Dandiset = {
      dandisetId,
      embargoStatus: parsed.value.embargoStatus,
      createdAt: now,
      modifiedAt: now,
    };
    const draft: Version = {
      versionId: toVersionId(dandisetId, DRAFT_VERSION),
      dandisetId,
      version: DRAFT_VERSION,
      metadata: {
        ...parsed.value.metadata,
        schemaVersion: parsed.value.metadata.schemaVersion ?? deps.schemaVersion,
      },
      status: "PENDING",
      validationErrors: [],
      revision: 0,
      createdAt: now,
      modifiedAt: now,
    };
    await store.createDandiset(dandiset, draft);
    queue.enqueue("validate-version", { versionId: draft.versionId });
    logger.info(`[dandisets] Created ${dandisetId}`);
    return { dandiset, draft };
  };

  const createAsset: VersionOrchestrator["createAsset"] = async (dandisetId, version, request) => {
    const draftVersion = await loadDraft(dandisetId, version);
    if (isArchiveError(draftVersion)) return draftVersion;
    const draft = await toDraft(request);
    if (isArchiveError(draft)) return draft;

    const asset = await assetChain.attach(draftVersion.versionId, draft);
    if (isArchiveError(asset)) return asset;
    await afterChange(draftVersion.versionId, asset);
    return reload(asset);
  };

  const updateAsset: VersionOrchestrator["updateAsset"] = async (
    dandisetId,
    version,
    assetId,
    request
  ) => {
    const draftVersion = await loadDraft(dandisetId, version);
    if (isArchiveError(draftVersion)) return draftVersion;
    const oldAsset = await store.getAsset(assetId);
    if (!oldAsset) return assetNotFound(assetId);
    const draft = await toDraft(request);
    if (isArchiveError(draft)) return draft;

    const asset = await assetChain.replace(oldAsset, draftVersion.versionId, draft);
    if (isArchiveError(asset) || asset.assetId === oldAsset.assetId) return asset;
    await afterChange(draftVersion.versionId, asset);
    return reload(asset);
  };

  const deleteAsset: VersionOrchestrator["deleteAsset"] = async (dandisetId, version, assetId) => {
    const draftVersion = await loadDraft(dandisetId, version);
    if (isArchiveError(draftVersion)) return draftVersion;
    const asset = await store.getAsset(assetId);
    if (!asset) return assetNotFound(assetId);

    const result = await assetChain.detach(asset, draftVersion.versionId);
    if (isArchiveError(result)) return result;
    await afterChange(draftVersion.versionId, null);
    return result;
  };

  // --------------------------------------------------------------------------
  // Reads
  // --------------------------------------------------------------------------

  const getAsset: VersionOrchestrator["getAsset"] = async (assetId) =>
    (await store.getAsset(assetId)) ?? assetNotFound(assetId);

  const listAssets: VersionOrchestrator["listAssets"] = async (dandisetId, version, query) => {
    const parsed = parseRequest(AssetListQuerySchema, query ?? {});
    if (!parsed.ok) return parsed.error;
    const found = await loadVersion(dandisetId, version);
    if (isArchiveError(found)) return found;

    const { limit, path, glob, metadata } = parsed.value;
    const pattern = glob ? globToRegExp(glob) : null;

    // The glob is applied after the store's paging, so keep reading pages
    // until one is full or the listing ends
    const matched: LiveAsset[] = [];
    let cursor = parsed.value.cursor;
    let hasMore = false;
    do {
      const page = await store.listVersionAssets(found.versionId, {
        limit: limit - matched.length,
        cursor,
        pathPrefix: path,
      });
      matched.push(...page.items.filter(({ asset }) => !pattern || pattern.test(asset.path)));
      cursor = page.nextCursor;
      hasMore = page.hasMore;
    } while (hasMore && matched.length < limit);

    return {
      nextCursor: hasMore ? cursor : undefined,
      hasMore,
      items: matched.map(({ asset, size }) => ({
          assetId: asset.assetId,
          path: asset.path,
          size,
          status: asset.status,
          createdAt: asset.createdAt,
          modifiedAt: asset.modifiedAt,
          ...(metadata ? { metadata: asset.metadata } : {}),
        })),
    };
  };

  const listPaths: VersionOrchestrator["listPaths"] = async (dandisetId, version, query) => {
    const parsed = parseRequest(AssetPathsQuerySchema, query ?? {});
    if (!parsed.ok) return parsed.error;
    const found = await loadVersion(dandisetId, version);
    if (isArchiveError(found)) return found;

    const { pathPrefix, limit, cursor } = parsed.value;
    const page = await pathIndex.childrenOf(found.versionId, pathPrefix, { limit, cursor });
    return page ?? archiveError("NotFound", `Directory "${pathPrefix}" not found.`);
  };

  const getAssetHistory: VersionOrchestrator["getAssetHistory"] = async (assetId) => {
    const history: Asset[] = [];
    let current = await store.getAsset(assetId);
    if (!current) return assetNotFound(assetId);
    while (current) {
      history.push(current);
      current = current.previousId ? await store.getAsset(current.previousId) : null;
    }
    return history;
  };

  const getAssetValidation: VersionOrchestrator["getAssetValidation"] = async (assetId) => {
    const asset = await store.getAsset(assetId);
    if (!asset) return assetNotFound(assetId);
    return { status: asset.status, validationErrors: asset.validationErrors };
  };

  return {
    createDandiset,
    createAsset,
    updateAsset,
    deleteAsset,
    getAsset,
    listAssets,
    listPaths,
    getAssetHistory,
    getAssetValidation,
  };
};
