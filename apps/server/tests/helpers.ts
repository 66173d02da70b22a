/**
 * Shared fixtures for service and store tests
 */

import { vi } from "vitest";
import type { ArchiveStore } from "../src/db/store.ts";
import { type ArchiveError, isArchiveError } from "../src/errors.ts";
import type {
  ContentBlob,
  Dandiset,
  Logger,
  Metadata,
  TaskPayloads,
  TaskQueue,
  TaskType,
  Version,
  ZarrArchive,
} from "../src/types.ts";

export const DANDISET_ID = "000001";
export const DRAFT_ID = "000001/draft";
export const SHA_A = "a".repeat(64);
export const SHA_B = "b".repeat(64);
export const ETAG = "0123456789abcdef0123456789abcdef";

export const createSilentLogger = () => ({
  info: vi.fn<Logger["info"]>(),
  warn: vi.fn<Logger["warn"]>(),
  error: vi.fn<Logger["error"]>(),
});

export type RecordedTask = { type: TaskType; payload: TaskPayloads[TaskType] };

/** TaskQueue that only records what was enqueued */
export const createRecordingQueue = () => {
  const tasks: RecordedTask[] = [];
  const queue: TaskQueue = {
    enqueue: (type, payload) => {
      tasks.push({ type, payload });
    },
  };
  return { queue, tasks, ofType: (type: TaskType) => tasks.filter((t) => t.type === type) };
};

export const makeDandiset = (dandisetId = DANDISET_ID): Dandiset => ({
  dandisetId,
  embargoStatus: "OPEN",
  createdAt: 1,
  modifiedAt: 1,
});

export const makeDraft = (dandisetId = DANDISET_ID, metadata: Metadata = {}): Version => ({
  versionId: `${dandisetId}/draft`,
  dandisetId,
  version: "draft",
  metadata,
  status: "PENDING",
  validationErrors: [],
  revision: 0,
  createdAt: 1,
  modifiedAt: 1,
});

export const makeBlob = (blobId: string, overrides: Partial<ContentBlob> = {}): ContentBlob => ({
  blobId,
  objectKey: `blobs/${blobId}`,
  sha256: SHA_A,
  etag: ETAG,
  size: 100,
  embargoedDandisetId: null,
  createdAt: 1,
  ...overrides,
});

export const makeZarr = (zarrId: string, overrides: Partial<ZarrArchive> = {}): ZarrArchive => ({
  zarrId,
  name: "sample.zarr",
  dandisetId: DANDISET_ID,
  fileCount: 0,
  size: 0,
  checksum: null,
  status: "PENDING",
  revision: 0,
  createdAt: 1,
  modifiedAt: 1,
  ...overrides,
});

/** A dandiset with an empty draft */
export const seedDraft = async (store: ArchiveStore, dandisetId = DANDISET_ID) => {
  await store.createDandiset(makeDandiset(dandisetId), makeDraft(dandisetId));
};

/** Deterministic id source: id-1, id-2, ... */
export const createIdSequence = (prefix = "id") => {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
};

/** Unwrap a service result, failing the test on an ArchiveError */
export const ok = <T>(value: T | ArchiveError): T => {
  if (isArchiveError(value)) throw new Error(`Unexpected ${value.code}: ${value.message}`);
  return value;
};
