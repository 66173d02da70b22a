/**
 * Unit tests for createS3BlobStore
 *
 * Uses a mocked S3Client whose send() dispatches on the command class name.
 */
import type { S3Client } from "@aws-sdk/client-s3";
import { describe, expect, it, vi } from "vitest";
import { createS3BlobStore } from "../src/s3-storage.ts";

type SentCommand = { input: Record<string, unknown>; constructor: { name: string } };

function createMockS3(objects: Map<string, Uint8Array>) {
  const send = vi.fn(async (command: SentCommand) => {
    const name = command.constructor.name;
    const key = String(command.input.Key);

    if (name === "HeadObjectCommand") {
      const value = objects.get(key);
      if (!value) {
        throw Object.assign(new Error("Not Found"), {
          name: "NotFound",
          $metadata: { httpStatusCode: 404 },
        });
      }
      return { ContentLength: value.length, ETag: '"0123456789abcdef0123456789abcdef"' };
    }
    if (name === "GetObjectCommand") {
      const value = objects.get(key);
      if (!value) {
        throw Object.assign(new Error("The specified key does not exist."), { name: "NoSuchKey" });
      }
      return { Body: { transformToByteArray: async () => value } };
    }
    if (name === "PutObjectCommand") {
      const body = command.input.Body;
      if (body instanceof Uint8Array) objects.set(key, body);
      return {};
    }
    if (name === "DeleteObjectCommand") {
      objects.delete(key);
      return {};
    }
    throw new Error(`Unexpected command ${name}`);
  });
  return { send };
}

const DATA = new Uint8Array([1, 2, 3]);

describe("createS3BlobStore", () => {
  it("prefixes keys and reports head with unquoted etag", async () => {
    const objects = new Map<string, Uint8Array>([["dev/blobs/a", DATA]]);
    const client = createMockS3(objects);
    const store = createS3BlobStore({
      bucket: "test-bucket",
      prefix: "dev/",
      client: client as unknown as S3Client,
    });

    expect(await store.head("blobs/a")).toEqual({
      size: 3,
      etag: "0123456789abcdef0123456789abcdef",
    });
    expect(client.send.mock.calls[0]?.[0].input).toEqual({
      Bucket: "test-bucket",
      Key: "dev/blobs/a",
    });
  });

  it("returns null for missing objects", async () => {
    const store = createS3BlobStore({
      bucket: "test-bucket",
      client: createMockS3(new Map()) as unknown as S3Client,
    });

    expect(await store.head("missing")).toBeNull();
    expect(await store.get("missing")).toBeNull();
    expect(await store.has("missing")).toBe(false);
  });

  it("caches existence after a successful put", async () => {
    const client = createMockS3(new Map());
    const store = createS3BlobStore({ bucket: "test-bucket", client: client as unknown as S3Client });

    await store.put("blobs/b", DATA);
    expect(await store.has("blobs/b")).toBe(true);
    // put only; has() answered from the cache
    expect(client.send).toHaveBeenCalledTimes(1);
  });

  it("round-trips content through get and forgets it on del", async () => {
    const client = createMockS3(new Map());
    const store = createS3BlobStore({ bucket: "test-bucket", client: client as unknown as S3Client });

    await store.put("blobs/c", DATA);
    expect(await store.get("blobs/c")).toEqual(DATA);
    await store.del("blobs/c");
    expect(await store.has("blobs/c")).toBe(false);
  });

  it("rethrows unexpected errors", async () => {
    const send = vi.fn(async () => {
      throw Object.assign(new Error("Access Denied"), { name: "AccessDenied" });
    });
    const store = createS3BlobStore({
      bucket: "test-bucket",
      client: { send } as unknown as S3Client,
    });

    await expect(store.head("x")).rejects.toThrow("Access Denied");
  });
});
