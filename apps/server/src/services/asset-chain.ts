/**
 * AssetChain - asset identity and immutable replacement
 *
 * Assets are never edited. A change creates a successor that points back
 * through `previousId` and keeps the `lineageId` of the first record. The
 * asset records, the live membership and the path index change together in
 * one revision-guarded draft commit; a commit that loses the race re-reads
 * the draft and re-runs its preconditions.
 */

import { isDeepStrictEqual } from "node:util";
import { DRAFT_VERSION } from "@dandiset/protocol";
import type { ArchiveStore, DraftChange } from "../db/store.ts";
import {
  type ArchiveError,
  archiveError,
  isArchiveError,
  isConcurrentModification,
} from "../errors.ts";
import type { Asset, ContentRef, Logger, Metadata, Version } from "../types.ts";
import { generateId } from "../util/id.ts";
import { isValidAssetPath } from "../util/path.ts";
import type { PathIndex } from "./path-index.ts";

// ============================================================================
// Types
// ============================================================================

export type AssetDraft = {
  path: string;
  metadata: Metadata;
  content: ContentRef;
};

export type AssetChain = {
  /** Create an asset at a free path of the draft */
  attach: (versionId: string, draft: AssetDraft) => Promise<Asset | ArchiveError>;
  /**
   * Replace a live asset with a successor. An identical draft returns
   * `oldAsset` and writes nothing.
   */
  replace: (
    oldAsset: Asset,
    versionId: string,
    draft: AssetDraft
  ) => Promise<Asset | ArchiveError>;
  /** Unlink a live asset; the record is retained */
  detach: (asset: Asset, versionId: string) => Promise<true | ArchiveError>;
  /**
   * Update the size a live asset's leaf carries. Resolves false when the
   * leaf already has that size.
   */
  resize: (asset: Asset, versionId: string, size: number) => Promise<boolean | ArchiveError>;
};

type AssetChainDeps = {
  store: ArchiveStore;
  pathIndex: PathIndex;
  /** Re-runs of a commit that lost a revision race */
  maxRetries: number;
  logger?: Logger;
  newId?: () => string;
};

type Planned<T> = {
  result: T;
  /** Omitted when there is nothing to write */
  change?: Omit<DraftChange, "versionId" | "expectedRevision">;
};

// ============================================================================
// Helpers
// ============================================================================

export const sameContent = (a: ContentRef, b: ContentRef): boolean => {
  if (a.kind === "zarr" || b.kind === "zarr") {
    return a.kind === "zarr" && b.kind === "zarr" && a.zarrId === b.zarrId;
  }
  return a.kind === b.kind && a.blobId === b.blobId;
};

const invalidPath = (path: string) => archiveError("InvalidPath", `Invalid path "${path}".`);

const duplicatePath = (path: string) =>
  archiveError("DuplicatePath", `An asset already exists at path "${path}".`, { path });

const assetNotFound = (assetId: string) =>
  archiveError("AssetNotFound", `Asset ${assetId} is not part of this version.`, { assetId });

// ============================================================================
// Factory
// ============================================================================

export const createAssetChain = (deps: AssetChainDeps): AssetChain => {
  const { store, pathIndex, maxRetries } = deps;
  const logger = deps.logger ?? console;
  const newId = deps.newId ?? generateId;

  /**
   * Size of the content, after checking it exists and may join this version
   */
  const resolveContentSize = async (
    version: Version,
    content: ContentRef
  ): Promise<number | ArchiveError> => {
    if (content.kind === "zarr") {
      const zarr = await store.getZarr(content.zarrId);
      if (!zarr) return archiveError("ContentNotFound", `Zarr ${content.zarrId} does not exist.`);
      if (zarr.dandisetId !== version.dandisetId) {
        return archiveError(
          "CrossDandisetZarr",
          "The zarr archive belongs to a different dandiset.",
          { zarrId: zarr.zarrId, dandisetId: zarr.dandisetId }
        );
      }
      return zarr.size;
    }
    const blob = await store.getBlob(content.blobId);
    if (!blob) return archiveError("ContentNotFound", `Blob ${content.blobId} does not exist.`);
    return blob.size;
  };

  const buildAsset = (draft: AssetDraft, previous: Asset | null): Asset => {
    const now = Date.now();
    const assetId = newId();
    return {
      assetId,
      lineageId: previous?.lineageId ?? assetId,
      path: draft.path,
      metadata: structuredClone(draft.metadata),
      content: { ...draft.content },
      previousId: previous?.assetId ?? null,
      status: "PENDING",
      validationErrors: [],
      createdAt: now,
      modifiedAt: now,
    };
  };

  /**
   * Read the draft, plan against it and commit, retrying lost races
   */
  const mutate = async <T>(
    versionId: string,
    plan: (version: Version) => Promise<Planned<T> | ArchiveError>
  ): Promise<T | ArchiveError> => {
    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      const version = await store.getVersion(versionId);
      if (!version) return archiveError("NotFound", `Version ${versionId} not found.`);
      if (version.version !== DRAFT_VERSION) {
        return archiveError("VersionImmutable", "Only draft versions can be modified.");
      }

      const planned = await plan(version);
      if (isArchiveError(planned)) return planned;
      if (!planned.change) return planned.result;

      try {
        await store.commitDraftChange({
          ...planned.change,
          versionId,
          expectedRevision: version.revision,
        });
        return planned.result;
      } catch (error) {
        if (!isConcurrentModification(error)) throw error;
        logger.warn(`[assets] ${versionId} changed during commit (attempt ${attempt + 1})`);
      }
    }
    return archiveError(
      "ConcurrentModification",
      `Version ${versionId} is being modified concurrently; try again.`
    );
  };

  const attach: AssetChain["attach"] = (versionId, draft) =>
    mutate(versionId, async (version) => {
      if (!isValidAssetPath(draft.path)) return invalidPath(draft.path);
      const size = await resolveContentSize(version, draft.content);
      if (isArchiveError(size)) return size;
      if (await store.findLiveAsset(versionId, draft.path)) return duplicatePath(draft.path);

      const asset = buildAsset(draft, null);
      const writes = await pathIndex.prepareChange(versionId, null, {
        path: asset.path,
        assetId: asset.assetId,
        size,
      });
      return { result: asset, change: { newAssets: [asset], ...writes } };
    });

  const replace: AssetChain["replace"] = (oldAsset, versionId, draft) =>
    mutate(versionId, async (version) => {
      if (
        draft.path === oldAsset.path &&
        sameContent(draft.content, oldAsset.content) &&
        isDeepStrictEqual(draft.metadata, oldAsset.metadata)
      ) {
        const current = await store.findLiveAsset(versionId, oldAsset.path);
        if (current?.asset.assetId === oldAsset.assetId) return { result: oldAsset };
      }

      if (!isValidAssetPath(draft.path)) return invalidPath(draft.path);
      const size = await resolveContentSize(version, draft.content);
      if (isArchiveError(size)) return size;

      const occupant = await store.findLiveAsset(versionId, draft.path);
      if (occupant && occupant.asset.assetId !== oldAsset.assetId) {
        return duplicatePath(draft.path);
      }
      const live =
        draft.path === oldAsset.path
          ? occupant
          : await store.findLiveAsset(versionId, oldAsset.path);
      if (!live || live.asset.assetId !== oldAsset.assetId) return assetNotFound(oldAsset.assetId);

      const successor = buildAsset(draft, oldAsset);
      const writes = await pathIndex.prepareChange(
        versionId,
        { path: oldAsset.path, assetId: oldAsset.assetId, size: live.size },
        { path: successor.path, assetId: successor.assetId, size }
      );
      return { result: successor, change: { newAssets: [successor], ...writes } };
    });

  const detach: AssetChain["detach"] = (asset, versionId) =>
    mutate(versionId, async () => {
      const live = await store.findLiveAsset(versionId, asset.path);
      if (!live || live.asset.assetId !== asset.assetId) return assetNotFound(asset.assetId);

      const writes = await pathIndex.prepareChange(
        versionId,
        { path: asset.path, assetId: asset.assetId, size: live.size },
        null
      );
      return { result: true as const, change: { newAssets: [], ...writes } };
    });

  const resize: AssetChain["resize"] = (asset, versionId, size) =>
    mutate(versionId, async () => {
      const live = await store.findLiveAsset(versionId, asset.path);
      if (!live || live.asset.assetId !== asset.assetId) return assetNotFound(asset.assetId);
      if (live.size === size) return { result: false };

      const writes = await pathIndex.prepareChange(
        versionId,
        { path: asset.path, assetId: asset.assetId, size: live.size },
        { path: asset.path, assetId: asset.assetId, size }
      );
      return { result: true, change: { newAssets: [], ...writes } };
    });

  return { attach, replace, detach, resize };
};
