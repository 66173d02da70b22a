/**
 * Unit tests for the periodic sweeps and their scheduler
 */

import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from "vitest";
import { createMemoryArchiveStore } from "../../src/db/memory-store.ts";
import type { ArchiveStore } from "../../src/db/store.ts";
import { createAssetChain } from "../../src/services/asset-chain.ts";
import { createZodSchemaValidator } from "../../src/services/metadata-validator.ts";
import { createPathIndex } from "../../src/services/path-index.ts";
import { createValidationEngine } from "../../src/services/validation.ts";
import {
  createIntervalScheduler,
  createScheduledJobs,
  registerScheduledTasks,
  type ScheduledJobs,
  type Scheduler,
} from "../../src/tasks/scheduled.ts";
import {
  createIdSequence,
  createRecordingQueue,
  createSilentLogger,
  DRAFT_ID,
  makeBlob,
  makeZarr,
  ok,
  seedDraft,
} from "../helpers.ts";

describe("createScheduledJobs", () => {
  let store: ArchiveStore;
  let jobs: ScheduledJobs;
  let recording: ReturnType<typeof createRecordingQueue>;
  let logger: ReturnType<typeof createSilentLogger>;
  let sleep: Mock<(ms: number) => Promise<void>>;

  beforeEach(async () => {
    store = createMemoryArchiveStore();
    recording = createRecordingQueue();
    logger = createSilentLogger();
    sleep = vi.fn(async (_ms: number) => {});
    const validation = createValidationEngine({
      store,
      validator: createZodSchemaValidator({ allowedSchemaVersions: ["0.6.4"] }),
      schemaVersion: "0.6.4",
      aggregation: { maxRetries: 0, baseDelayMs: 1, maxDelayMs: 1 },
      logger,
    });
    jobs = createScheduledJobs({
      store,
      validation,
      queue: recording.queue,
      dispatchMaxPerSecond: 4,
      uploadStaleAfterMs: 1_000,
      logger,
      sleep,
      now: () => 10_000,
    });

    await seedDraft(store);
    await store.putBlob(makeBlob("ready-1"));
    await store.putBlob(makeBlob("ready-2", { sha256: "c".repeat(64) }));
    await store.putBlob(makeBlob("hashing", { sha256: null }));
    const chain = createAssetChain({
      store,
      pathIndex: createPathIndex({ store }),
      maxRetries: 0,
      logger,
      newId: createIdSequence("asset"),
    });
    for (const [path, blobId] of [
      ["a.nwb", "ready-1"],
      ["b.nwb", "ready-2"],
      ["c.nwb", "hashing"],
    ]) {
      ok(await chain.attach(DRAFT_ID, { path, metadata: { path }, content: { kind: "blob", blobId } }));
    }
  });

  it("dispatches PENDING assets whose content is ready, throttled", async () => {
    expect(await jobs.validatePendingAssetMetadata()).toBe(2);

    expect(recording.tasks).toEqual([
      { type: "validate-asset", payload: { assetId: "asset-1" } },
      { type: "validate-asset", payload: { assetId: "asset-2" } },
    ]);
    expect(sleep.mock.calls).toEqual([[250], [250]]);
    expect(logger.info).toHaveBeenCalledWith("[scheduled] Found 2 assets to validate");
  });

  it("dispatches PENDING drafts for validation and aggregation", async () => {
    expect(await jobs.validateDraftVersionMetadata()).toBe(1);

    expect(recording.tasks).toEqual([
      { type: "validate-version", payload: { versionId: DRAFT_ID } },
      { type: "aggregate-summary", payload: { versionId: DRAFT_ID } },
    ]);
    expect(logger.info).toHaveBeenCalledWith("[scheduled] Found 1 versions to validate");
  });

  it("does nothing when no draft is PENDING", async () => {
    const draft = await store.getVersion(DRAFT_ID);
    await store.setVersionValidation(DRAFT_ID, draft?.revision ?? 0, "VALID", []);

    expect(await jobs.validateDraftVersionMetadata()).toBe(0);
    expect(recording.tasks).toEqual([]);
  });

  it("dispatches digest calculation for blobs still without one", async () => {
    expect(await jobs.calculatePendingDigests()).toBe(1);

    expect(recording.tasks).toEqual([
      { type: "calculate-sha256", payload: { blobId: "hashing" } },
    ]);
    expect(sleep.mock.calls).toEqual([[250]]);
  });

  it("stops dispatching a blob once its digest is set", async () => {
    await store.setBlobDigest("hashing", "d".repeat(64));

    expect(await jobs.calculatePendingDigests()).toBe(0);
    expect(recording.tasks).toEqual([]);
  });

  it("re-dispatches only upload verifications that outlived their task", async () => {
    const record = {
      objectKey: "uploads/u",
      state: "IN_PROGRESS" as const,
      error: null,
      createdAt: 1,
    };
    await store.putUploadValidation({ ...record, sha256: "1".repeat(64), modifiedAt: 8_000 });
    await store.putUploadValidation({ ...record, sha256: "2".repeat(64), modifiedAt: 9_500 });
    await store.putUploadValidation({
      ...record,
      sha256: "3".repeat(64),
      state: "FAILED",
      error: "mismatch",
      modifiedAt: 1,
    });

    expect(await jobs.resumeStalledUploads()).toBe(1);
    expect(recording.tasks).toEqual([
      { type: "verify-upload", payload: { sha256: "1".repeat(64) } },
    ]);
  });

  it("re-dispatches zarr archives waiting on ingestion", async () => {
    await store.createZarr(makeZarr("zarr-pending"));
    await store.createZarr(makeZarr("zarr-uploaded", { status: "UPLOADED" }));
    await store.createZarr(makeZarr("zarr-ingesting", { status: "INGESTING" }));
    await store.createZarr(makeZarr("zarr-complete", { status: "COMPLETE", checksum: "x" }));

    expect(await jobs.resumeIngestingZarrs()).toBe(2);
    expect(recording.ofType("complete-zarr").map((t) => t.payload)).toEqual(
      expect.arrayContaining([{ zarrId: "zarr-uploaded" }, { zarrId: "zarr-ingesting" }])
    );
    expect(logger.info).toHaveBeenCalledWith("[scheduled] Found 2 zarr archives to ingest");
  });
});

describe("registerScheduledTasks", () => {
  it("registers every sweep at the interval", () => {
    const every = vi.fn<Scheduler["every"]>();
    const jobs: ScheduledJobs = {
      validatePendingAssetMetadata: async () => 0,
      validateDraftVersionMetadata: async () => 0,
      calculatePendingDigests: async () => 0,
      resumeStalledUploads: async () => 0,
      resumeIngestingZarrs: async () => 0,
    };

    registerScheduledTasks({ every }, jobs, 600);

    expect(every.mock.calls).toEqual([
      [600, "validate-pending-asset-metadata", jobs.validatePendingAssetMetadata],
      [600, "validate-draft-version-metadata", jobs.validateDraftVersionMetadata],
      [600, "calculate-pending-digests", jobs.calculatePendingDigests],
      [600, "resume-stalled-uploads", jobs.resumeStalledUploads],
      [600, "resume-ingesting-zarrs", jobs.resumeIngestingZarrs],
    ]);
  });
});

describe("createIntervalScheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("runs a job every interval and logs failures", async () => {
    const logger = createSilentLogger();
    const scheduler = createIntervalScheduler(logger);
    const failure = new Error("sweep failed");
    const job = vi.fn(async () => {}).mockRejectedValueOnce(failure);

    scheduler.every(10, "sweep", job);
    await vi.advanceTimersByTimeAsync(10_000);
    expect(logger.error).toHaveBeenCalledWith("[scheduled] sweep failed:", failure);

    await vi.advanceTimersByTimeAsync(10_000);
    expect(job).toHaveBeenCalledTimes(2);

    scheduler.stop();
    await vi.advanceTimersByTimeAsync(30_000);
    expect(job).toHaveBeenCalledTimes(2);
  });

  it("skips a tick while the previous run is still going", async () => {
    const scheduler = createIntervalScheduler(createSilentLogger());
    let finish: () => void = () => {};
    const job = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        })
    );

    scheduler.every(1, "slow", job);
    await vi.advanceTimersByTimeAsync(3_000);
    expect(job).toHaveBeenCalledTimes(1);

    finish();
    await vi.advanceTimersByTimeAsync(1_000);
    expect(job).toHaveBeenCalledTimes(2);
    scheduler.stop();
  });
});
