/**
 * Upload services
 *
 * - validateUpload / verifyUpload: check a finished upload against a
 *   claimed SHA-256 and turn it into a ContentBlob
 * - registerBlob / calculateSha256: register an upload first and fill in
 *   its digest asynchronously
 *
 * A verification that fails to read its object ends FAILED, so the upload
 * can be validated again.
 */

import { BlobRegisterSchema, SHA256_REGEX, UploadValidateSchema } from "@dandiset/protocol";
import { type BlobStore, bytesToHex, type HashProvider } from "@dandiset/storage-core";
import type { ArchiveStore } from "../db/store.ts";
import { type ArchiveError, archiveError } from "../errors.ts";
import type { ContentBlob, Logger, TaskQueue, UploadValidation } from "../types.ts";
import { generateId } from "../util/id.ts";

// ============================================================================
// Types
// ============================================================================

export type UploadService = {
  validateUpload: (request: unknown) => Promise<UploadValidation | ArchiveError>;
  /** Hash the object of a validation record (the verify-upload task) */
  verifyUpload: (sha256: string) => Promise<UploadValidation | ArchiveError>;
  registerBlob: (request: unknown) => Promise<ContentBlob | ArchiveError>;
  /** Hash a registered blob and set its digest once (the calculate-sha256 task) */
  calculateSha256: (blobId: string) => Promise<ContentBlob | ArchiveError>;
  getUploadValidation: (sha256: string) => Promise<UploadValidation | ArchiveError>;
};

type UploadServiceDeps = {
  store: ArchiveStore;
  blobs: BlobStore;
  hash: HashProvider;
  queue: TaskQueue;
  logger?: Logger;
};

export const VALIDATION_IN_PROGRESS = "Validation already in progress.";
export const OBJECT_NOT_FOUND = "Object does not exist.";
export const VALIDATION_NOT_FOUND = "A validation for an object with that checksum does not exist.";

const invalidRequest = (issues: unknown) =>
  archiveError("InvalidRequest", "Invalid upload request.", { issues });

// ============================================================================
// Factory
// ============================================================================

export const createUploadService = (deps: UploadServiceDeps): UploadService => {
  const { store, blobs, queue } = deps;
  const logger = deps.logger ?? console;

  const sha256Hex = async (data: Uint8Array): Promise<string> =>
    bytesToHex(await deps.hash.sha256(data));

  const validateUpload: UploadService["validateUpload"] = async (request) => {
    const parsed = UploadValidateSchema.safeParse(request);
    if (!parsed.success) return invalidRequest(parsed.error.issues);
    const { sha256 } = parsed.data;

    if (!SHA256_REGEX.test(sha256)) {
      return archiveError("InvalidDigest", `Invalid sha256 digest "${sha256}".`);
    }

    const existing = await store.getUploadValidation(sha256);
    if (existing?.state === "IN_PROGRESS") {
      return archiveError("ValidationInProgress", VALIDATION_IN_PROGRESS);
    }

    let objectKey = parsed.data.objectKey;
    if (objectKey) {
      if (!(await blobs.has(objectKey))) return archiveError("ObjectNotFound", OBJECT_NOT_FOUND);
    } else {
      if (!existing) return archiveError("ValidationNotFound", VALIDATION_NOT_FOUND);
      objectKey = existing.objectKey;
    }

    const now = Date.now();
    const record: UploadValidation = {
      sha256,
      objectKey,
      state: "IN_PROGRESS",
      error: null,
      createdAt: existing?.createdAt ?? now,
      modifiedAt: now,
    };
    await store.putUploadValidation(record);
    queue.enqueue("verify-upload", { sha256 });
    return record;
  };

  const finish = async (
    record: UploadValidation,
    state: "SUCCEEDED" | "FAILED",
    error: string | null
  ): Promise<UploadValidation> => {
    const updated: UploadValidation = { ...record, state, error, modifiedAt: Date.now() };
    await store.putUploadValidation(updated);
    return updated;
  };

  const verifyUpload: UploadService["verifyUpload"] = async (sha256) => {
    const record = await store.getUploadValidation(sha256);
    if (!record) return archiveError("ValidationNotFound", VALIDATION_NOT_FOUND);

    let data: Uint8Array;
    let calculated: string;
    try {
      const read = await blobs.get(record.objectKey);
      if (!read) return finish(record, "FAILED", OBJECT_NOT_FOUND);
      data = read;
      calculated = await sha256Hex(data);
    } catch (error) {
      // Not left IN_PROGRESS: that state refuses a new validation
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`[uploads] Could not hash ${record.objectKey}: ${message}`);
      await finish(record, "FAILED", `Could not read the object: ${message}`);
      throw error;
    }

    if (calculated !== sha256) {
      logger.warn(`[uploads] Checksum mismatch for ${record.objectKey}`);
      return finish(
        record,
        "FAILED",
        `Given checksum ${sha256} did not match calculated checksum ${calculated}.`
      );
    }

    if (!(await store.findBlobByDigest(sha256))) {
      const head = await blobs.head(record.objectKey);
      await store.putBlob({
        blobId: generateId(),
        objectKey: record.objectKey,
        sha256,
        etag: head?.etag ?? bytesToHex(await deps.hash.md5(data)),
        size: head?.size ?? data.length,
        embargoedDandisetId: null,
        createdAt: Date.now(),
      });
    }
    return finish(record, "SUCCEEDED", null);
  };

  const registerBlob: UploadService["registerBlob"] = async (request) => {
    const parsed = BlobRegisterSchema.safeParse(request);
    if (!parsed.success) return invalidRequest(parsed.error.issues);
    const { objectKey, size, etag, embargoedDandisetId } = parsed.data;

    if (!(await blobs.head(objectKey))) return archiveError("ObjectNotFound", OBJECT_NOT_FOUND);

    const blob: ContentBlob = {
      blobId: generateId(),
      objectKey,
      sha256: null,
      etag,
      size,
      embargoedDandisetId: embargoedDandisetId ?? null,
      createdAt: Date.now(),
    };
    await store.putBlob(blob);
    queue.enqueue("calculate-sha256", { blobId: blob.blobId });
    return blob;
  };

  const calculateSha256: UploadService["calculateSha256"] = async (blobId) => {
    const blob = await store.getBlob(blobId);
    if (!blob) return archiveError("NotFound", `Blob ${blobId} not found.`);
    if (blob.sha256 !== null) return blob;

    const data = await blobs.get(blob.objectKey);
    if (!data) return archiveError("ObjectNotFound", OBJECT_NOT_FOUND);

    const updated = await store.setBlobDigest(blobId, await sha256Hex(data));
    if (!updated) return archiveError("NotFound", `Blob ${blobId} not found.`);
    logger.info(`[uploads] Computed sha256 for blob ${blobId}`);
    return updated;
  };

  const getUploadValidation: UploadService["getUploadValidation"] = async (sha256) =>
    (await store.getUploadValidation(sha256)) ??
    archiveError("ValidationNotFound", VALIDATION_NOT_FOUND);

  return { validateUpload, verifyUpload, registerBlob, calculateSha256, getUploadValidation };
};
