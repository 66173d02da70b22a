/**
 * ArchiveStore - repository interface over all archive records
 *
 * Relationships are never traversed implicitly: every lookup is an explicit
 * call, and every change to a draft's live asset set goes through one
 * atomic, revision-guarded commitDraftChange().
 */

import type {
  Asset,
  ContentBlob,
  Dandiset,
  FieldError,
  ListOptions,
  LiveAsset,
  Metadata,
  PaginatedResult,
  PathNode,
  UploadValidation,
  ValidationStatus,
  Version,
  ZarrArchive,
  ZarrStatus,
  ZarrUploadFile,
} from "../types.ts";

// ============================================================================
// Types
// ============================================================================

/**
 * One atomic change to the live asset set of a draft version.
 *
 * Applied only when the version's revision still equals `expectedRevision`;
 * otherwise the store throws ConcurrentModificationError and writes nothing.
 * On success the revision is bumped and the version is marked PENDING.
 */
export type DraftChange = {
  versionId: string;
  expectedRevision: number;
  /** Asset records created by this change */
  newAssets: Asset[];
  /** Path index nodes to write, in their final state. Leaves imply live membership. */
  nodePuts: PathNode[];
  /** Paths of path index nodes to remove. Leaf paths imply unlinking. */
  nodeDeletes: string[];
};

/**
 * Association of an asset with the zarr it references, recorded at attach
 */
export type ZarrLink = {
  zarrId: string;
  assetId: string;
  versionId: string;
  path: string;
};

export type VersionAssetListOptions = ListOptions & {
  /** Only paths starting with this prefix */
  pathPrefix?: string;
};

export type ArchiveStore = {
  // --------------------------------------------------------------------------
  // Dandisets & versions
  // --------------------------------------------------------------------------

  /** Reserve the next dandiset identifier */
  allocateDandisetId: () => Promise<string>;
  /** Create a dandiset together with its draft version */
  createDandiset: (dandiset: Dandiset, draft: Version) => Promise<void>;
  getDandiset: (dandisetId: string) => Promise<Dandiset | null>;
  getVersion: (versionId: string) => Promise<Version | null>;
  listPendingDraftVersions: (options?: ListOptions) => Promise<PaginatedResult<Version>>;

  /**
   * Record a validation result. Returns false, writing nothing, when the
   * revision moved since the validator read the version.
   */
  setVersionValidation: (
    versionId: string,
    expectedRevision: number,
    status: ValidationStatus,
    errors: FieldError[]
  ) => Promise<boolean>;

  /**
   * Replace the version metadata, bumping the revision and marking it PENDING.
   * Throws ConcurrentModificationError when the revision moved.
   */
  writeVersionMetadata: (
    versionId: string,
    expectedRevision: number,
    metadata: Metadata
  ) => Promise<Version>;

  // --------------------------------------------------------------------------
  // Assets
  // --------------------------------------------------------------------------

  getAsset: (assetId: string) => Promise<Asset | null>;
  /** Live asset at a path of a version */
  findLiveAsset: (versionId: string, path: string) => Promise<LiveAsset | null>;
  /** Live assets of a version ordered by path */
  listVersionAssets: (
    versionId: string,
    options?: VersionAssetListOptions
  ) => Promise<PaginatedResult<LiveAsset>>;
  listPendingAssets: (options?: ListOptions) => Promise<PaginatedResult<Asset>>;
  setAssetValidation: (
    assetId: string,
    status: ValidationStatus,
    errors: FieldError[]
  ) => Promise<void>;

  /** Apply a draft change atomically; see DraftChange */
  commitDraftChange: (change: DraftChange) => Promise<Version>;

  // --------------------------------------------------------------------------
  // Path index
  // --------------------------------------------------------------------------

  getPathNode: (versionId: string, path: string) => Promise<PathNode | null>;
  /** Immediate children of a directory node ordered by name */
  listPathChildren: (
    versionId: string,
    dirPath: string,
    options?: ListOptions
  ) => Promise<PaginatedResult<PathNode>>;

  // --------------------------------------------------------------------------
  // Blobs & uploads
  // --------------------------------------------------------------------------

  getBlob: (blobId: string) => Promise<ContentBlob | null>;
  findBlobByDigest: (sha256: string) => Promise<ContentBlob | null>;
  putBlob: (blob: ContentBlob) => Promise<void>;
  /**
   * Set the digest of a blob once. A blob that already has a digest keeps it;
   * the stored blob is returned either way (null when missing).
   */
  setBlobDigest: (blobId: string, sha256: string) => Promise<ContentBlob | null>;
  /** Blobs still waiting for their digest */
  listUndigestedBlobs: (options?: ListOptions) => Promise<PaginatedResult<ContentBlob>>;
  getUploadValidation: (sha256: string) => Promise<UploadValidation | null>;
  putUploadValidation: (record: UploadValidation) => Promise<void>;
  listInProgressUploads: (options?: ListOptions) => Promise<PaginatedResult<UploadValidation>>;

  // --------------------------------------------------------------------------
  // Zarr archives
  // --------------------------------------------------------------------------

  createZarr: (zarr: ZarrArchive) => Promise<void>;
  getZarr: (zarrId: string) => Promise<ZarrArchive | null>;
  getZarrFile: (zarrId: string, path: string) => Promise<ZarrUploadFile | null>;
  /**
   * Add or overwrite a file and adjust the totals by the difference to
   * `previous`. Throws ConcurrentModificationError when the stored file is
   * not `previous`. Moves the archive to PENDING and clears its checksum.
   */
  putZarrFile: (file: ZarrUploadFile, previous: ZarrUploadFile | null) => Promise<void>;
  /** Symmetric to putZarrFile; `file` is the record being removed */
  deleteZarrFile: (file: ZarrUploadFile) => Promise<void>;
  listZarrFiles: (zarrId: string, options?: ListOptions) => Promise<PaginatedResult<ZarrUploadFile>>;
  /** Status transition guarded by the archive revision */
  setZarrStatus: (zarrId: string, expectedRevision: number, status: ZarrStatus) => Promise<boolean>;
  /** COMPLETE with checksum, guarded by the archive revision */
  completeZarr: (zarrId: string, expectedRevision: number, checksum: string) => Promise<boolean>;
  /** Archives UPLOADED or INGESTING, i.e. waiting on the complete-zarr task */
  listIngestingZarrs: (options?: ListOptions) => Promise<PaginatedResult<ZarrArchive>>;
  listZarrLinks: (zarrId: string) => Promise<ZarrLink[]>;
};
