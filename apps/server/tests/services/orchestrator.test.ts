/**
 * Unit tests for the VersionOrchestrator: request parsing, asset lifecycle
 * and read models, on a memory store with the default validator.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";
import { createMemoryArchiveStore } from "../../src/db/memory-store.ts";
import type { ArchiveStore } from "../../src/db/store.ts";
import { createAssetChain } from "../../src/services/asset-chain.ts";
import { createZodSchemaValidator } from "../../src/services/metadata-validator.ts";
import {
  createVersionOrchestrator,
  type VersionOrchestrator,
} from "../../src/services/orchestrator.ts";
import { createPathIndex } from "../../src/services/path-index.ts";
import { createValidationEngine, type ValidationEngine } from "../../src/services/validation.ts";
import type { Asset } from "../../src/types.ts";
import {
  createIdSequence,
  createRecordingQueue,
  createSilentLogger,
  DANDISET_ID,
  DRAFT_ID,
  makeBlob,
  makeDandiset,
  makeDraft,
  ok,
} from "../helpers.ts";

const SCHEMA_VERSION = "0.6.4";
const BLOB_1 = "00000000-0000-4000-8000-000000000001";
const BLOB_2 = "00000000-0000-4000-8000-000000000002";
const EMBARGOED = "00000000-0000-4000-8000-000000000003";
const MISSING = "00000000-0000-4000-8000-0000000000ff";

const assetRequest = (path: string, blobId = BLOB_1, extra: Record<string, unknown> = {}) => ({
  metadata: { path, encodingFormat: "application/x-nwb", ...extra },
  blobId,
});

describe("VersionOrchestrator", () => {
  let store: ArchiveStore;
  let validation: ValidationEngine;
  let orchestrator: VersionOrchestrator;
  let recording: ReturnType<typeof createRecordingQueue>;
  let logger: ReturnType<typeof createSilentLogger>;

  beforeEach(async () => {
    store = createMemoryArchiveStore();
    recording = createRecordingQueue();
    logger = createSilentLogger();
    const pathIndex = createPathIndex({ store });
    validation = createValidationEngine({
      store,
      validator: createZodSchemaValidator({ allowedSchemaVersions: [SCHEMA_VERSION] }),
      schemaVersion: SCHEMA_VERSION,
      aggregation: { maxRetries: 0, baseDelayMs: 1, maxDelayMs: 1 },
      logger,
    });
    orchestrator = createVersionOrchestrator({
      store,
      assetChain: createAssetChain({
        store,
        pathIndex,
        maxRetries: 1,
        logger,
        newId: createIdSequence("asset"),
      }),
      pathIndex,
      validation,
      queue: recording.queue,
      schemaVersion: SCHEMA_VERSION,
      logger,
    });

    ok(await orchestrator.createDandiset({ metadata: { name: "Test dandiset" } }));
    await store.putBlob(makeBlob(BLOB_1, { size: 100 }));
    await store.putBlob(makeBlob(BLOB_2, { size: 50 }));
    await store.putBlob(makeBlob(EMBARGOED, { embargoedDandisetId: DANDISET_ID }));
    recording.tasks.length = 0;
  });

  // --------------------------------------------------------------------------
  // Dandisets
  // --------------------------------------------------------------------------

  describe("createDandiset", () => {
    it("creates a PENDING draft with the default schemaVersion", async () => {
      const { dandiset, draft } = ok(await orchestrator.createDandiset({ metadata: {} }));

      expect(dandiset).toMatchObject({ dandisetId: "000002", embargoStatus: "OPEN" });
      expect(draft).toMatchObject({
        versionId: "000002/draft",
        version: "draft",
        status: "PENDING",
        revision: 0,
        metadata: { schemaVersion: SCHEMA_VERSION },
      });
      expect(recording.tasks).toEqual([
        { type: "validate-version", payload: { versionId: "000002/draft" } },
      ]);
      expect(logger.info).toHaveBeenCalledWith("[dandisets] Created 000002");
    });

    it("rejects a request without metadata", async () => {
      expect(await orchestrator.createDandiset({})).toMatchObject({
        code: "InvalidRequest",
        details: { issues: [{ field: "metadata", message: "Required" }] },
      });
    });
  });

  // --------------------------------------------------------------------------
  // Asset mutations
  // --------------------------------------------------------------------------

  describe("createAsset", () => {
    it("adds assets, updates the path index and validates inline", async () => {
      const a = ok(await orchestrator.createAsset(DANDISET_ID, "draft", assetRequest("sub/a.nwb")));
      ok(await orchestrator.createAsset(DANDISET_ID, "draft", assetRequest("sub/b.nwb", BLOB_2)));

      expect(a).toMatchObject({
        path: "sub/a.nwb",
        status: "VALID",
        metadata: { path: "sub/a.nwb", schemaVersion: SCHEMA_VERSION },
      });

      const root = ok(await orchestrator.listPaths(DANDISET_ID, "draft"));
      expect(root.items).toEqual([
        {
          path: "sub/",
          parentPath: "",
          name: "sub/",
          isLeaf: false,
          fileCount: 2,
          totalSize: 150,
          assetId: null,
        },
      ]);

      expect(await store.getVersion(DRAFT_ID)).toMatchObject({ status: "PENDING", revision: 2 });
      expect(recording.ofType("validate-version")).toHaveLength(2);
      expect(recording.ofType("aggregate-summary")).toHaveLength(2);

      const aggregated = await validation.aggregateWithRetry(DRAFT_ID);
      expect(aggregated?.summary).toMatchObject({ numberOfFiles: 2, numberOfBytes: 150 });
    });

    it("stores the embargoed kind for embargoed blobs", async () => {
      const asset = ok(
        await orchestrator.createAsset(DANDISET_ID, "draft", assetRequest("e.nwb", EMBARGOED))
      );
      expect(asset.content).toEqual({ kind: "embargoedBlob", blobId: EMBARGOED });
    });

    it("maps request problems to error codes", async () => {
      const create = (request: unknown) => orchestrator.createAsset(DANDISET_ID, "draft", request);

      expect(await create({ metadata: {}, blobId: BLOB_1 })).toMatchObject({
        code: "InvalidRequest",
      });
      expect(await create({ metadata: { path: "a.nwb" }, blobId: "not-a-uuid" })).toMatchObject({
        code: "InvalidRequest",
      });
      expect(await create({ metadata: { path: "a.nwb" } })).toMatchObject({
        code: "ContentRefConflict",
      });
      expect(await create({ metadata: { path: "a.nwb" }, blobId: BLOB_1, zarrId: BLOB_2 })).toMatchObject(
        { code: "ContentRefConflict" }
      );
      expect(await create(assetRequest("a.nwb", MISSING))).toMatchObject({
        code: "ContentNotFound",
      });
      expect(await create(assetRequest("/a.nwb"))).toMatchObject({ code: "InvalidPath" });
    });

    it("refuses versions that are missing or published", async () => {
      await store.createDandiset(makeDandiset("000050"), {
        ...makeDraft("000050"),
        versionId: "000050/0.1.0",
        version: "0.1.0",
      });

      expect(await orchestrator.createAsset("000050", "0.1.0", assetRequest("a.nwb"))).toMatchObject(
        { code: "VersionImmutable" }
      );
      expect(await orchestrator.createAsset("000099", "draft", assetRequest("a.nwb"))).toMatchObject(
        { code: "NotFound" }
      );
    });

    it("keeps the asset when inline validation fails", async () => {
      const failure = new Error("validator down");
      vi.spyOn(validation, "validateAsset").mockRejectedValueOnce(failure);

      const asset = ok(await orchestrator.createAsset(DANDISET_ID, "draft", assetRequest("a.nwb")));
      expect(asset.status).toBe("PENDING");
      expect(logger.warn).toHaveBeenCalledWith(
        `[assets] Inline validation of ${asset.assetId} failed:`,
        failure
      );
    });
  });

  describe("updateAsset", () => {
    let original: Asset;

    beforeEach(async () => {
      original = ok(await orchestrator.createAsset(DANDISET_ID, "draft", assetRequest("a.nwb")));
      recording.tasks.length = 0;
    });

    it("replaces the asset and keeps its history", async () => {
      const successor = ok(
        await orchestrator.updateAsset(
          DANDISET_ID,
          "draft",
          original.assetId,
          assetRequest("a.nwb", BLOB_2)
        )
      );

      expect(successor.previousId).toBe(original.assetId);
      const history = ok(await orchestrator.getAssetHistory(successor.assetId));
      expect(history.map((asset) => asset.assetId)).toEqual([successor.assetId, original.assetId]);
      expect(recording.tasks).toHaveLength(2);
    });

    it("returns the asset unchanged for an identical update", async () => {
      const result = ok(
        await orchestrator.updateAsset(
          DANDISET_ID,
          "draft",
          original.assetId,
          assetRequest("a.nwb", BLOB_1, { schemaVersion: SCHEMA_VERSION })
        )
      );

      expect(result).toEqual(original);
      expect(recording.tasks).toEqual([]);
    });

    it("reports an unknown asset", async () => {
      expect(
        await orchestrator.updateAsset(DANDISET_ID, "draft", "asset-404", assetRequest("a.nwb"))
      ).toMatchObject({ code: "AssetNotFound" });
    });
  });

  it("deletes an asset from the draft but keeps the record", async () => {
    const asset = ok(await orchestrator.createAsset(DANDISET_ID, "draft", assetRequest("a.nwb")));
    recording.tasks.length = 0;

    expect(await orchestrator.deleteAsset(DANDISET_ID, "draft", asset.assetId)).toBe(true);
    expect(ok(await orchestrator.listAssets(DANDISET_ID, "draft")).items).toEqual([]);
    expect(ok(await orchestrator.getAsset(asset.assetId)).assetId).toBe(asset.assetId);
    expect(recording.tasks.map((task) => task.type)).toEqual([
      "validate-version",
      "aggregate-summary",
    ]);
  });

  // --------------------------------------------------------------------------
  // Reads
  // --------------------------------------------------------------------------

  describe("listAssets", () => {
    beforeEach(async () => {
      ok(await orchestrator.createAsset(DANDISET_ID, "draft", assetRequest("sub/a.nwb")));
      ok(await orchestrator.createAsset(DANDISET_ID, "draft", assetRequest("sub/notes.txt", BLOB_2)));
      ok(await orchestrator.createAsset(DANDISET_ID, "draft", assetRequest("top.nwb")));
    });

    it("lists in path order with sizes", async () => {
      const page = ok(await orchestrator.listAssets(DANDISET_ID, "draft"));
      expect(page.items.map((item) => [item.path, item.size])).toEqual([
        ["sub/a.nwb", 100],
        ["sub/notes.txt", 50],
        ["top.nwb", 100],
      ]);
      expect(page.items[0]?.metadata).toBeUndefined();
    });

    it("filters by prefix and glob", async () => {
      const byPrefix = ok(await orchestrator.listAssets(DANDISET_ID, "draft", { path: "sub/" }));
      expect(byPrefix.items.map((item) => item.path)).toEqual(["sub/a.nwb", "sub/notes.txt"]);

      const byGlob = ok(await orchestrator.listAssets(DANDISET_ID, "draft", { glob: "*.nwb" }));
      expect(byGlob.items.map((item) => item.path)).toEqual(["sub/a.nwb", "top.nwb"]);
    });

    it("fills a glob page across the store's pages", async () => {
      const first = ok(
        await orchestrator.listAssets(DANDISET_ID, "draft", { glob: "*.nwb", limit: "1" })
      );
      expect(first.items.map((item) => item.path)).toEqual(["sub/a.nwb"]);
      expect(first.hasMore).toBe(true);

      const second = ok(
        await orchestrator.listAssets(DANDISET_ID, "draft", {
          glob: "*.nwb",
          limit: "1",
          cursor: first.nextCursor,
        })
      );
      expect(second.items.map((item) => item.path)).toEqual(["top.nwb"]);
      expect(second.hasMore).toBe(false);
      expect(second.nextCursor).toBeUndefined();
    });

    it("returns a full glob page when matches are sparse", async () => {
      const page = ok(
        await orchestrator.listAssets(DANDISET_ID, "draft", { glob: "*.nwb", limit: "2" })
      );
      expect(page.items.map((item) => item.path)).toEqual(["sub/a.nwb", "top.nwb"]);
      expect(page.hasMore).toBe(false);
    });

    it("includes metadata on request", async () => {
      const page = ok(
        await orchestrator.listAssets(DANDISET_ID, "draft", { path: "top", metadata: "true" })
      );
      expect(page.items[0]?.metadata).toMatchObject({ path: "top.nwb" });
    });
  });

  describe("listPaths", () => {
    it("rejects prefixes that are not directories", async () => {
      expect(
        await orchestrator.listPaths(DANDISET_ID, "draft", { pathPrefix: "sub" })
      ).toMatchObject({ code: "InvalidRequest" });
      expect(
        await orchestrator.listPaths(DANDISET_ID, "draft", { pathPrefix: "nope/" })
      ).toMatchObject({ code: "NotFound", message: 'Directory "nope/" not found.' });
    });
  });

  it("exposes asset validation errors", async () => {
    const asset = ok(
      await orchestrator.createAsset(DANDISET_ID, "draft", {
        metadata: { path: "raw.bin" },
        blobId: BLOB_1,
      })
    );
    expect(ok(await orchestrator.getAssetValidation(asset.assetId))).toEqual({
      status: "INVALID",
      validationErrors: [{ field: "encodingFormat", message: "field required" }],
    });
    expect(await orchestrator.getAssetValidation("asset-404")).toMatchObject({
      code: "AssetNotFound",
    });
  });
});
