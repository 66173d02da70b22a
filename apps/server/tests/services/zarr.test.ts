/**
 * Unit tests for the ZarrService: file totals, upload completion and
 * ingestion with link reconciliation.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";
import { createMemoryArchiveStore } from "../../src/db/memory-store.ts";
import type { ArchiveStore } from "../../src/db/store.ts";
import { createAssetChain } from "../../src/services/asset-chain.ts";
import { createPathIndex } from "../../src/services/path-index.ts";
import { createZarrService, type ZarrService } from "../../src/services/zarr.ts";
import { createZarrChecksumCalculator } from "../../src/services/zarr-checksum.ts";
import type { ZarrArchive } from "../../src/types.ts";
import { createNodeHashProvider } from "../../src/util/hash-provider.ts";
import {
  createIdSequence,
  createRecordingQueue,
  createSilentLogger,
  DANDISET_ID,
  DRAFT_ID,
  ETAG,
  ok,
  seedDraft,
} from "../helpers.ts";

const OTHER_ETAG = "f".repeat(32);

describe("ZarrService", () => {
  let store: ArchiveStore;
  let zarrs: ZarrService;
  let recording: ReturnType<typeof createRecordingQueue>;
  let logger: ReturnType<typeof createSilentLogger>;
  let zarr: ZarrArchive;

  const checksum = createZarrChecksumCalculator(createNodeHashProvider());

  beforeEach(async () => {
    store = createMemoryArchiveStore();
    recording = createRecordingQueue();
    logger = createSilentLogger();
    const assetChain = createAssetChain({
      store,
      pathIndex: createPathIndex({ store }),
      maxRetries: 1,
      logger,
      newId: createIdSequence("asset"),
    });
    zarrs = createZarrService({
      store,
      checksum,
      assetChain,
      queue: recording.queue,
      maxRetries: 1,
      logger,
    });
    await seedDraft(store);
    zarr = ok(await zarrs.createZarr({ name: "sample.zarr", dandisetId: DANDISET_ID }));
  });

  describe("createZarr", () => {
    it("starts empty and PENDING", () => {
      expect(zarr).toMatchObject({
        name: "sample.zarr",
        dandisetId: DANDISET_ID,
        fileCount: 0,
        size: 0,
        checksum: null,
        status: "PENDING",
        revision: 0,
      });
    });

    it("validates the request and the dandiset", async () => {
      expect(await zarrs.createZarr({ name: "", dandisetId: DANDISET_ID })).toMatchObject({
        code: "InvalidRequest",
      });
      expect(await zarrs.createZarr({ name: "x.zarr", dandisetId: "000404" })).toMatchObject({
        code: "NotFound",
      });
    });
  });

  describe("files", () => {
    it("keeps totals across add, overwrite and remove", async () => {
      ok(await zarrs.registerFile(zarr.zarrId, { path: "0/0", etag: ETAG, size: 10 }));
      ok(await zarrs.registerFile(zarr.zarrId, { path: "0/1", etag: ETAG, size: 5 }));
      const overwritten = ok(
        await zarrs.registerFile(zarr.zarrId, { path: "0/0", etag: OTHER_ETAG, size: 30 })
      );
      expect(overwritten).toMatchObject({ fileCount: 2, size: 35, revision: 3 });

      const removed = ok(await zarrs.removeFile(zarr.zarrId, "0/1"));
      expect(removed).toMatchObject({ fileCount: 1, size: 30, revision: 4 });
    });

    it("rejects malformed files and unknown paths", async () => {
      expect(
        await zarrs.registerFile(zarr.zarrId, { path: "0/0", etag: "nope", size: 1 })
      ).toMatchObject({ code: "InvalidRequest" });
      expect(await zarrs.removeFile(zarr.zarrId, "missing")).toMatchObject({ code: "NotFound" });
      expect(await zarrs.registerFile("zarr-404", { path: "a", etag: ETAG, size: 1 })).toMatchObject(
        { code: "NotFound" }
      );
    });

    it("sends a completed archive back to PENDING", async () => {
      ok(await zarrs.registerFile(zarr.zarrId, { path: "a", etag: ETAG, size: 1 }));
      ok(await zarrs.completeUpload(zarr.zarrId));
      ok(await zarrs.ingest(zarr.zarrId));

      const changed = ok(await zarrs.registerFile(zarr.zarrId, { path: "b", etag: ETAG, size: 1 }));
      expect(changed).toMatchObject({ status: "PENDING", checksum: null });
    });
  });

  describe("completion", () => {
    it("marks the archive UPLOADED and schedules ingestion", async () => {
      const uploaded = ok(await zarrs.completeUpload(zarr.zarrId));
      expect(uploaded.status).toBe("UPLOADED");
      expect(recording.tasks).toEqual([
        { type: "complete-zarr", payload: { zarrId: zarr.zarrId } },
      ]);
    });

    it("schedules ingestion again for an archive still waiting on it", async () => {
      ok(await zarrs.completeUpload(zarr.zarrId));
      const again = ok(await zarrs.completeUpload(zarr.zarrId));

      expect(again).toMatchObject({ status: "UPLOADED", revision: 0 });
      expect(recording.ofType("complete-zarr")).toHaveLength(2);
    });

    it("does not schedule a complete archive", async () => {
      ok(await zarrs.completeUpload(zarr.zarrId));
      ok(await zarrs.ingest(zarr.zarrId));
      recording.tasks.length = 0;

      expect(ok(await zarrs.completeUpload(zarr.zarrId)).status).toBe("COMPLETE");
      expect(recording.tasks).toEqual([]);
    });

    it("falls back to UPLOADED when ingestion fails and can be completed again", async () => {
      ok(await zarrs.registerFile(zarr.zarrId, { path: "0/0", etag: ETAG, size: 10 }));
      ok(await zarrs.completeUpload(zarr.zarrId));
      const failure = new Error("listing unavailable");
      vi.spyOn(store, "listZarrFiles").mockRejectedValueOnce(failure);

      await expect(zarrs.ingest(zarr.zarrId)).rejects.toBe(failure);
      expect(await store.getZarr(zarr.zarrId)).toMatchObject({ status: "UPLOADED" });

      recording.tasks.length = 0;
      expect(ok(await zarrs.completeUpload(zarr.zarrId)).status).toBe("UPLOADED");
      expect(recording.tasks).toEqual([
        { type: "complete-zarr", payload: { zarrId: zarr.zarrId } },
      ]);
      expect(ok(await zarrs.ingest(zarr.zarrId))).toMatchObject({ status: "COMPLETE", size: 10 });
    });

    it("resumes an archive left INGESTING", async () => {
      ok(await zarrs.completeUpload(zarr.zarrId));
      await store.setZarrStatus(zarr.zarrId, 0, "INGESTING");

      ok(await zarrs.completeUpload(zarr.zarrId));
      expect(recording.ofType("complete-zarr")).toHaveLength(2);
      expect(ok(await zarrs.ingest(zarr.zarrId)).status).toBe("COMPLETE");
    });

    it("ingests to COMPLETE with the computed checksum", async () => {
      ok(await zarrs.registerFile(zarr.zarrId, { path: "0/0", etag: ETAG, size: 10 }));
      ok(await zarrs.completeUpload(zarr.zarrId));

      const completed = ok(await zarrs.ingest(zarr.zarrId));
      const expected = await checksum.compute([
        { zarrId: zarr.zarrId, path: "0/0", etag: ETAG, size: 10 },
      ]);
      expect(completed).toMatchObject({ status: "COMPLETE", checksum: expected });
      expect(await store.getZarr(zarr.zarrId)).toMatchObject({
        status: "COMPLETE",
        checksum: expected,
      });
    });

    it("leaves a PENDING archive alone", async () => {
      expect(ok(await zarrs.ingest(zarr.zarrId)).status).toBe("PENDING");
      expect(logger.info).toHaveBeenCalledWith(`[zarr] ${zarr.zarrId} is PENDING; nothing to ingest`);
    });

    it("reports a change during ingestion", async () => {
      ok(await zarrs.completeUpload(zarr.zarrId));
      vi.spyOn(store, "completeZarr").mockResolvedValueOnce(false);

      expect(await zarrs.ingest(zarr.zarrId)).toMatchObject({ code: "ConcurrentModification" });
    });

    it("resizes linked draft assets and schedules their validation", async () => {
      const asset = ok(
        await createAssetChain({
          store,
          pathIndex: createPathIndex({ store }),
          maxRetries: 0,
          newId: () => "asset-z",
        }).attach(DRAFT_ID, {
          path: "micr/sample.zarr",
          metadata: { path: "micr/sample.zarr" },
          content: { kind: "zarr", zarrId: zarr.zarrId },
        })
      );
      expect(await store.findLiveAsset(DRAFT_ID, asset.path)).toMatchObject({ size: 0 });

      ok(await zarrs.registerFile(zarr.zarrId, { path: "0/0", etag: ETAG, size: 64 }));
      ok(await zarrs.completeUpload(zarr.zarrId));
      ok(await zarrs.ingest(zarr.zarrId));

      expect(await store.findLiveAsset(DRAFT_ID, asset.path)).toMatchObject({ size: 64 });
      expect(await store.getPathNode(DRAFT_ID, "")).toMatchObject({ totalSize: 64 });
      expect(recording.tasks.slice(1)).toEqual([
        { type: "validate-asset", payload: { assetId: "asset-z" } },
        { type: "validate-version", payload: { versionId: DRAFT_ID } },
        { type: "aggregate-summary", payload: { versionId: DRAFT_ID } },
      ]);
    });
  });
});
