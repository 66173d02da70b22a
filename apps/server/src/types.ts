/**
 * Dandiset Archive - Domain types
 */

import type {
  EmbargoStatus,
  FieldError,
  UploadValidationState,
  ValidationStatus,
  ZarrStatus,
} from "@dandiset/protocol";

export type { EmbargoStatus, FieldError, UploadValidationState, ValidationStatus, ZarrStatus };

/** Free-form JSON metadata document */
export type Metadata = Record<string, unknown>;

/**
 * Console-compatible logger. Messages carry a bracketed component tag.
 */
export type Logger = Pick<Console, "info" | "warn" | "error">;

// ============================================================================
// Dandisets & Versions
// ============================================================================

export type Dandiset = {
  /** Six-digit zero-padded identifier */
  dandisetId: string;
  embargoStatus: EmbargoStatus;
  createdAt: number;
  modifiedAt: number;
};

export type Version = {
  /** `{dandisetId}/{version}` */
  versionId: string;
  dandisetId: string;
  /** "draft" or a published version string */
  version: string;
  metadata: Metadata;
  status: ValidationStatus;
  validationErrors: FieldError[];
  /**
   * Sequence token bumped by every write to the asset set or the metadata.
   * Writers compare-and-swap on it; validators use it to detect staleness.
   */
  revision: number;
  createdAt: number;
  modifiedAt: number;
};

// ============================================================================
// Content
// ============================================================================

/**
 * Backing content of an asset. Exactly one case by construction.
 */
export type ContentRef =
  | { kind: "blob"; blobId: string }
  | { kind: "embargoedBlob"; blobId: string }
  | { kind: "zarr"; zarrId: string };

export type ContentBlob = {
  blobId: string;
  objectKey: string;
  /** Lowercase hex SHA-256; null until computed, then never changed */
  sha256: string | null;
  etag: string;
  size: number;
  /** Owning dandiset of an embargoed blob */
  embargoedDandisetId: string | null;
  createdAt: number;
};

export type ZarrArchive = {
  zarrId: string;
  name: string;
  dandisetId: string;
  fileCount: number;
  size: number;
  checksum: string | null;
  status: ZarrStatus;
  /** Bumped by every file registration or removal */
  revision: number;
  createdAt: number;
  modifiedAt: number;
};

export type ZarrUploadFile = {
  zarrId: string;
  path: string;
  etag: string;
  size: number;
};

// ============================================================================
// Assets
// ============================================================================

export type Asset = {
  /** Id of this immutable record */
  assetId: string;
  /** Id of the first record of the replacement chain */
  lineageId: string;
  path: string;
  metadata: Metadata;
  content: ContentRef;
  /** Record this one replaced */
  previousId: string | null;
  status: ValidationStatus;
  validationErrors: FieldError[];
  createdAt: number;
  modifiedAt: number;
};

/**
 * A live asset of a version together with the size its path leaf carries
 */
export type LiveAsset = {
  asset: Asset;
  size: number;
};

// ============================================================================
// Path Index
// ============================================================================

export type PathNode = {
  /** Directories end in "/"; the root is "" */
  path: string;
  parentPath: string;
  name: string;
  isLeaf: boolean;
  fileCount: number;
  totalSize: number;
  /** Set on leaves only */
  assetId: string | null;
};

// ============================================================================
// Uploads
// ============================================================================

export type UploadValidation = {
  sha256: string;
  objectKey: string;
  state: UploadValidationState;
  error: string | null;
  createdAt: number;
  modifiedAt: number;
};

// ============================================================================
// Pagination
// ============================================================================

export type ListOptions = {
  limit?: number;
  cursor?: string;
};

export type PaginatedResult<T> = {
  items: T[];
  nextCursor?: string;
  hasMore: boolean;
};

// ============================================================================
// Tasks
// ============================================================================

export type TaskPayloads = {
  "validate-asset": { assetId: string };
  "validate-version": { versionId: string };
  "aggregate-summary": { versionId: string };
  "calculate-sha256": { blobId: string };
  "verify-upload": { sha256: string };
  "complete-zarr": { zarrId: string };
};

export type TaskType = keyof TaskPayloads;

/**
 * Producer side of the work queue, as seen by services
 */
export type TaskQueue = {
  enqueue: <K extends TaskType>(type: K, payload: TaskPayloads[K]) => void;
};
