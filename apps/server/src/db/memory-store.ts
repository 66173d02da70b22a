/**
 * In-memory ArchiveStore for tests and local use.
 *
 * Records are cloned on the way in and out. Compare-and-swap writes check and
 * apply without awaiting in between, which makes them atomic on the event loop.
 */

import { ConcurrentModificationError } from "../errors.ts";
import type {
  Asset,
  ContentBlob,
  Dandiset,
  ListOptions,
  LiveAsset,
  PaginatedResult,
  PathNode,
  UploadValidation,
  Version,
  ZarrArchive,
  ZarrUploadFile,
} from "../types.ts";
import { decodeCursor, encodeCursor } from "../util/db-keys.ts";
import { formatDandisetId } from "../util/id.ts";
import { parentOf } from "../util/path.ts";
import type { ArchiveStore, ZarrLink } from "./store.ts";

const DEFAULT_LIMIT = 100;

type Membership = { assetId: string; size: number };

const byKey = <T>([a]: [string, T], [b]: [string, T]): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Page through entries sorted by key; the cursor remembers the last key
 */
const paginate = <T>(entries: [string, T][], options: ListOptions = {}): PaginatedResult<T> => {
  const limit = options.limit ?? DEFAULT_LIMIT;
  const after = options.cursor ? decodeCursor(options.cursor)?.after : undefined;
  const sorted = [...entries].sort(byKey);
  const remaining = typeof after === "string" ? sorted.filter(([key]) => key > after) : sorted;
  const page = remaining.slice(0, limit);
  const hasMore = remaining.length > limit;
  const last = page[page.length - 1];
  return {
    items: page.map(([, value]) => value),
    nextCursor: hasMore && last ? encodeCursor({ after: last[0] }) : undefined,
    hasMore,
  };
};

const isLeafPath = (path: string): boolean => path !== "" && !path.endsWith("/");

export function createMemoryArchiveStore(): ArchiveStore {
  let counter = 0;
  const dandisets = new Map<string, Dandiset>();
  const versions = new Map<string, Version>();
  const assets = new Map<string, Asset>();
  /** versionId -> path -> live membership */
  const members = new Map<string, Map<string, Membership>>();
  /** versionId -> node path -> node */
  const nodes = new Map<string, Map<string, PathNode>>();
  const blobs = new Map<string, ContentBlob>();
  const digests = new Map<string, string>();
  const uploads = new Map<string, UploadValidation>();
  const zarrs = new Map<string, ZarrArchive>();
  const zarrFiles = new Map<string, Map<string, ZarrUploadFile>>();
  const zarrLinks = new Map<string, Map<string, ZarrLink>>();

  const nested = <V>(outer: Map<string, Map<string, V>>, key: string): Map<string, V> => {
    let inner = outer.get(key);
    if (!inner) {
      inner = new Map<string, V>();
      outer.set(key, inner);
    }
    return inner;
  };

  const toLive = (member: Membership): LiveAsset | null => {
    const asset = assets.get(member.assetId);
    return asset ? { asset: structuredClone(asset), size: member.size } : null;
  };

  const requireZarr = (zarrId: string): ZarrArchive => {
    const zarr = zarrs.get(zarrId);
    if (!zarr) throw new Error(`Zarr archive not found: ${zarrId}`);
    return zarr;
  };

  const adjustZarr = (zarr: ZarrArchive, fileDelta: number, sizeDelta: number): void => {
    zarrs.set(zarr.zarrId, {
      ...zarr,
      fileCount: zarr.fileCount + fileDelta,
      size: zarr.size + sizeDelta,
      status: "PENDING",
      checksum: null,
      revision: zarr.revision + 1,
      modifiedAt: Date.now(),
    });
  };

  const sameFile = (a: ZarrUploadFile | undefined, b: ZarrUploadFile | null): boolean =>
    a === undefined ? b === null : b !== null && a.etag === b.etag && a.size === b.size;

  return {
    // ------------------------------------------------------------------------
    // Dandisets & versions
    // ------------------------------------------------------------------------

    async allocateDandisetId() {
      counter += 1;
      return formatDandisetId(counter);
    },

    async createDandiset(dandiset, draft) {
      if (dandisets.has(dandiset.dandisetId)) {
        throw new Error(`Dandiset already exists: ${dandiset.dandisetId}`);
      }
      dandisets.set(dandiset.dandisetId, structuredClone(dandiset));
      versions.set(draft.versionId, structuredClone(draft));
    },

    async getDandiset(dandisetId) {
      const dandiset = dandisets.get(dandisetId);
      return dandiset ? structuredClone(dandiset) : null;
    },

    async getVersion(versionId) {
      const version = versions.get(versionId);
      return version ? structuredClone(version) : null;
    },

    async listPendingDraftVersions(options) {
      const entries: [string, Version][] = [];
      for (const version of versions.values()) {
        if (version.status === "PENDING" && version.version === "draft") {
          entries.push([version.versionId, structuredClone(version)]);
        }
      }
      return paginate(entries, options);
    },

    async setVersionValidation(versionId, expectedRevision, status, errors) {
      const version = versions.get(versionId);
      if (!version || version.revision !== expectedRevision) return false;
      versions.set(versionId, {
        ...version,
        status,
        validationErrors: structuredClone(errors),
      });
      return true;
    },

    async writeVersionMetadata(versionId, expectedRevision, metadata) {
      const version = versions.get(versionId);
      if (!version || version.revision !== expectedRevision) {
        throw new ConcurrentModificationError(
          `version ${versionId}`,
          expectedRevision,
          version?.revision ?? null
        );
      }
      const updated: Version = {
        ...version,
        metadata: structuredClone(metadata),
        status: "PENDING",
        revision: version.revision + 1,
        modifiedAt: Date.now(),
      };
      versions.set(versionId, updated);
      return structuredClone(updated);
    },

    // ------------------------------------------------------------------------
    // Assets
    // ------------------------------------------------------------------------

    async getAsset(assetId) {
      const asset = assets.get(assetId);
      return asset ? structuredClone(asset) : null;
    },

    async findLiveAsset(versionId, path) {
      const member = members.get(versionId)?.get(path);
      return member ? toLive(member) : null;
    },

    async listVersionAssets(versionId, options = {}) {
      const prefix = options.pathPrefix ?? "";
      const entries: [string, LiveAsset][] = [];
      for (const [path, member] of members.get(versionId) ?? []) {
        if (!path.startsWith(prefix)) continue;
        const live = toLive(member);
        if (live) entries.push([path, live]);
      }
      return paginate(entries, options);
    },

    async listPendingAssets(options) {
      const entries: [string, Asset][] = [];
      for (const asset of assets.values()) {
        if (asset.status === "PENDING") entries.push([asset.assetId, structuredClone(asset)]);
      }
      return paginate(entries, options);
    },

    async setAssetValidation(assetId, status, errors) {
      const asset = assets.get(assetId);
      if (!asset) return;
      assets.set(assetId, {
        ...asset,
        status,
        validationErrors: structuredClone(errors),
        modifiedAt: Date.now(),
      });
    },

    async commitDraftChange(change) {
      const version = versions.get(change.versionId);
      if (!version || version.revision !== change.expectedRevision) {
        throw new ConcurrentModificationError(
          `version ${change.versionId}`,
          change.expectedRevision,
          version?.revision ?? null
        );
      }

      for (const asset of change.newAssets) {
        assets.set(asset.assetId, structuredClone(asset));
        if (asset.content.kind === "zarr") {
          nested(zarrLinks, asset.content.zarrId).set(asset.assetId, {
            zarrId: asset.content.zarrId,
            assetId: asset.assetId,
            versionId: change.versionId,
            path: asset.path,
          });
        }
      }

      const versionNodes = nested(nodes, change.versionId);
      const versionMembers = nested(members, change.versionId);
      for (const path of change.nodeDeletes) {
        versionNodes.delete(path);
        if (isLeafPath(path)) versionMembers.delete(path);
      }
      for (const node of change.nodePuts) {
        versionNodes.set(node.path, structuredClone(node));
        if (node.isLeaf && node.assetId) {
          versionMembers.set(node.path, { assetId: node.assetId, size: node.totalSize });
        }
      }

      const updated: Version = {
        ...version,
        status: "PENDING",
        revision: version.revision + 1,
        modifiedAt: Date.now(),
      };
      versions.set(change.versionId, updated);
      return structuredClone(updated);
    },

    // ------------------------------------------------------------------------
    // Path index
    // ------------------------------------------------------------------------

    async getPathNode(versionId, path) {
      const node = nodes.get(versionId)?.get(path);
      return node ? structuredClone(node) : null;
    },

    async listPathChildren(versionId, dirPath, options) {
      const entries: [string, PathNode][] = [];
      for (const node of nodes.get(versionId)?.values() ?? []) {
        if (node.path !== "" && parentOf(node.path) === dirPath) {
          entries.push([node.name, structuredClone(node)]);
        }
      }
      return paginate(entries, options);
    },

    // ------------------------------------------------------------------------
    // Blobs & uploads
    // ------------------------------------------------------------------------

    async getBlob(blobId) {
      const blob = blobs.get(blobId);
      return blob ? structuredClone(blob) : null;
    },

    async findBlobByDigest(sha256) {
      const blobId = digests.get(sha256);
      const blob = blobId ? blobs.get(blobId) : undefined;
      return blob ? structuredClone(blob) : null;
    },

    async putBlob(blob) {
      if (blobs.has(blob.blobId)) throw new Error(`Blob already exists: ${blob.blobId}`);
      blobs.set(blob.blobId, structuredClone(blob));
      if (blob.sha256 && !digests.has(blob.sha256)) digests.set(blob.sha256, blob.blobId);
    },

    async setBlobDigest(blobId, sha256) {
      const blob = blobs.get(blobId);
      if (!blob) return null;
      if (blob.sha256 !== null) return structuredClone(blob);
      const updated = { ...blob, sha256 };
      blobs.set(blobId, updated);
      if (!digests.has(sha256)) digests.set(sha256, blobId);
      return structuredClone(updated);
    },

    async listUndigestedBlobs(options) {
      const entries: [string, ContentBlob][] = [];
      for (const blob of blobs.values()) {
        if (blob.sha256 === null) entries.push([blob.blobId, structuredClone(blob)]);
      }
      return paginate(entries, options);
    },

    async getUploadValidation(sha256) {
      const record = uploads.get(sha256);
      return record ? structuredClone(record) : null;
    },

    async putUploadValidation(record) {
      uploads.set(record.sha256, structuredClone(record));
    },

    async listInProgressUploads(options) {
      const entries: [string, UploadValidation][] = [];
      for (const record of uploads.values()) {
        if (record.state === "IN_PROGRESS") entries.push([record.sha256, structuredClone(record)]);
      }
      return paginate(entries, options);
    },

    // ------------------------------------------------------------------------
    // Zarr archives
    // ------------------------------------------------------------------------

    async createZarr(zarr) {
      if (zarrs.has(zarr.zarrId)) throw new Error(`Zarr archive already exists: ${zarr.zarrId}`);
      zarrs.set(zarr.zarrId, structuredClone(zarr));
    },

    async getZarr(zarrId) {
      const zarr = zarrs.get(zarrId);
      return zarr ? structuredClone(zarr) : null;
    },

    async getZarrFile(zarrId, path) {
      const file = zarrFiles.get(zarrId)?.get(path);
      return file ? structuredClone(file) : null;
    },

    async putZarrFile(file, previous) {
      const zarr = requireZarr(file.zarrId);
      const files = nested(zarrFiles, file.zarrId);
      const stored = files.get(file.path);
      if (!sameFile(stored, previous)) {
        throw new ConcurrentModificationError(`zarr file ${file.zarrId}/${file.path}`, null, null);
      }
      files.set(file.path, structuredClone(file));
      adjustZarr(zarr, previous ? 0 : 1, file.size - (previous?.size ?? 0));
    },

    async deleteZarrFile(file) {
      const zarr = requireZarr(file.zarrId);
      const files = nested(zarrFiles, file.zarrId);
      if (!sameFile(files.get(file.path), file)) {
        throw new ConcurrentModificationError(`zarr file ${file.zarrId}/${file.path}`, null, null);
      }
      files.delete(file.path);
      adjustZarr(zarr, -1, -file.size);
    },

    async listZarrFiles(zarrId, options) {
      const entries: [string, ZarrUploadFile][] = [];
      for (const file of zarrFiles.get(zarrId)?.values() ?? []) {
        entries.push([file.path, structuredClone(file)]);
      }
      return paginate(entries, options);
    },

    async setZarrStatus(zarrId, expectedRevision, status) {
      const zarr = zarrs.get(zarrId);
      if (!zarr || zarr.revision !== expectedRevision) return false;
      zarrs.set(zarrId, { ...zarr, status, modifiedAt: Date.now() });
      return true;
    },

    async completeZarr(zarrId, expectedRevision, checksum) {
      const zarr = zarrs.get(zarrId);
      if (!zarr || zarr.revision !== expectedRevision) return false;
      zarrs.set(zarrId, { ...zarr, status: "COMPLETE", checksum, modifiedAt: Date.now() });
      return true;
    },

    async listIngestingZarrs(options) {
      const entries: [string, ZarrArchive][] = [];
      for (const zarr of zarrs.values()) {
        if (zarr.status === "UPLOADED" || zarr.status === "INGESTING") {
          entries.push([zarr.zarrId, structuredClone(zarr)]);
        }
      }
      return paginate(entries, options);
    },

    async listZarrLinks(zarrId) {
      return [...(zarrLinks.get(zarrId)?.values() ?? [])]
        .map((link) => ({ ...link }))
        .sort((a, b) => (a.assetId < b.assetId ? -1 : a.assetId > b.assetId ? 1 : 0));
    },
  };
}

