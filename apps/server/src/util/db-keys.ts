/**
 * DynamoDB key builders for the single-table archive layout
 *
 * | item            | pk                             | sk               |
 * |-----------------|--------------------------------|------------------|
 * | dandiset        | DANDISET#{id}                  | META             |
 * | version         | DANDISET#{id}                  | VERSION#{ver}    |
 * | id counter      | COUNTER                        | DANDISET         |
 * | asset           | ASSET#{assetId}                | META             |
 * | live membership | VASSET#{versionId}             | {path}           |
 * | path node       | VPATH#{versionId}#{parentPath} | {name}           |
 * | root path node  | VPATH#{versionId}              | /                |
 * | blob            | BLOB#{blobId}                  | META             |
 * | digest pointer  | DIGEST#{sha256}                | BLOB             |
 * | upload check    | UPLOAD#{sha256}                | META             |
 * | zarr            | ZARR#{zarrId}                  | META             |
 * | zarr file       | ZARR#{zarrId}                  | FILE#{path}      |
 * | zarr link       | ZARR#{zarrId}                  | LINK#{assetId}   |
 *
 * GSI1 is sparse and holds outstanding work only: PENDING assets and draft
 * versions, blobs without a digest, IN_PROGRESS upload checks and zarr
 * archives waiting on ingestion.
 */

import { nameOf, parentOf } from "./path.ts";

export type ItemKey = { pk: string; sk: string };

// ============================================================================
// Dandisets & Versions
// ============================================================================

export const toDandisetPk = (dandisetId: string): string => `DANDISET#${dandisetId}`;
export const toDandisetKey = (dandisetId: string): ItemKey => ({
  pk: toDandisetPk(dandisetId),
  sk: "META",
});

export const toVersionKey = (versionId: string): ItemKey => {
  const [dandisetId, version] = splitVersionId(versionId);
  return { pk: toDandisetPk(dandisetId), sk: `VERSION#${version}` };
};

export const COUNTER_KEY: ItemKey = { pk: "COUNTER", sk: "DANDISET" };

/** Build a version id from its parts */
export const toVersionId = (dandisetId: string, version: string): string =>
  `${dandisetId}/${version}`;

/** Split a version id into dandiset id and version string */
export const splitVersionId = (versionId: string): [string, string] => {
  const index = versionId.indexOf("/");
  if (index < 0) return [versionId, ""];
  return [versionId.slice(0, index), versionId.slice(index + 1)];
};

// ============================================================================
// Assets & Path Index
// ============================================================================

export const toAssetKey = (assetId: string): ItemKey => ({ pk: `ASSET#${assetId}`, sk: "META" });

export const toMembershipPk = (versionId: string): string => `VASSET#${versionId}`;
export const toMembershipKey = (versionId: string, path: string): ItemKey => ({
  pk: toMembershipPk(versionId),
  sk: path,
});

export const ROOT_NODE_SK = "/";

/** Partition holding the children of a directory */
export const toPathChildrenPk = (versionId: string, dirPath: string): string =>
  `VPATH#${versionId}#${dirPath}`;

export const toPathNodeKey = (versionId: string, path: string): ItemKey => {
  if (path === "") return { pk: `VPATH#${versionId}`, sk: ROOT_NODE_SK };
  return { pk: toPathChildrenPk(versionId, parentOf(path)), sk: nameOf(path) };
};

// ============================================================================
// Blobs & Uploads
// ============================================================================

export const toBlobKey = (blobId: string): ItemKey => ({ pk: `BLOB#${blobId}`, sk: "META" });
export const toDigestKey = (sha256: string): ItemKey => ({ pk: `DIGEST#${sha256}`, sk: "BLOB" });
export const toUploadKey = (sha256: string): ItemKey => ({ pk: `UPLOAD#${sha256}`, sk: "META" });

// ============================================================================
// Zarr
// ============================================================================

export const toZarrPk = (zarrId: string): string => `ZARR#${zarrId}`;
export const toZarrKey = (zarrId: string): ItemKey => ({ pk: toZarrPk(zarrId), sk: "META" });
export const ZARR_FILE_PREFIX = "FILE#";
export const ZARR_LINK_PREFIX = "LINK#";
export const toZarrFileKey = (zarrId: string, path: string): ItemKey => ({
  pk: toZarrPk(zarrId),
  sk: `${ZARR_FILE_PREFIX}${path}`,
});
export const toZarrLinkKey = (zarrId: string, assetId: string): ItemKey => ({
  pk: toZarrPk(zarrId),
  sk: `${ZARR_LINK_PREFIX}${assetId}`,
});

// ============================================================================
// GSI Keys
// ============================================================================

/** GSI1: outstanding work, queried by the periodic sweeps */
export const PENDING_ASSETS_GSI1PK = "PENDING#ASSET";
export const PENDING_DRAFTS_GSI1PK = "PENDING#DRAFT";
export const PENDING_BLOBS_GSI1PK = "PENDING#BLOB";
export const PENDING_UPLOADS_GSI1PK = "PENDING#UPLOAD";
export const PENDING_ZARRS_GSI1PK = "PENDING#ZARR";

// ============================================================================
// Cursor Encoding
// ============================================================================

/** Encode a cursor */
export const encodeCursor = (lastEvaluatedKey: Record<string, unknown>): string => {
  return Buffer.from(JSON.stringify(lastEvaluatedKey)).toString("base64");
};

/** Decode a cursor; malformed input yields undefined (start from the beginning) */
export const decodeCursor = (cursor: string): Record<string, unknown> | undefined => {
  try {
    const parsed: unknown = JSON.parse(Buffer.from(cursor, "base64").toString());
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) return undefined;
    return Object.fromEntries(Object.entries(parsed));
  } catch {
    return undefined;
  }
};
