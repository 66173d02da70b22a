/**
 * Stored record schemas
 *
 * Items read back from DynamoDB are parsed against these; key and index
 * attributes (pk, sk, gsi1pk, ...) are stripped by the object schemas.
 */

import {
  EmbargoStatusSchema,
  FieldErrorSchema,
  UploadValidationStateSchema,
  ValidationStatusSchema,
  ZarrStatusSchema,
} from "@dandiset/protocol";
import { z } from "zod";
import type {
  Asset,
  ContentBlob,
  ContentRef,
  Dandiset,
  PathNode,
  UploadValidation,
  Version,
  ZarrArchive,
  ZarrUploadFile,
} from "../types.ts";
import type { ZarrLink } from "./store.ts";

const MetadataSchema = z.record(z.unknown());

export const DandisetRecord: z.ZodType<Dandiset> = z.object({
  dandisetId: z.string(),
  embargoStatus: EmbargoStatusSchema,
  createdAt: z.number(),
  modifiedAt: z.number(),
});

export const VersionRecord: z.ZodType<Version> = z.object({
  versionId: z.string(),
  dandisetId: z.string(),
  version: z.string(),
  metadata: MetadataSchema,
  status: ValidationStatusSchema,
  validationErrors: z.array(FieldErrorSchema),
  revision: z.number().int(),
  createdAt: z.number(),
  modifiedAt: z.number(),
});

const ContentRefRecord: z.ZodType<ContentRef> = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("blob"), blobId: z.string() }),
  z.object({ kind: z.literal("embargoedBlob"), blobId: z.string() }),
  z.object({ kind: z.literal("zarr"), zarrId: z.string() }),
]);

export const AssetRecord: z.ZodType<Asset> = z.object({
  assetId: z.string(),
  lineageId: z.string(),
  path: z.string(),
  metadata: MetadataSchema,
  content: ContentRefRecord,
  previousId: z.string().nullable(),
  status: ValidationStatusSchema,
  validationErrors: z.array(FieldErrorSchema),
  createdAt: z.number(),
  modifiedAt: z.number(),
});

/** Live membership of an asset in a version, keyed by path */
export const MembershipRecord = z.object({
  assetId: z.string(),
  size: z.number(),
});

export const PathNodeRecord: z.ZodType<PathNode> = z.object({
  path: z.string(),
  parentPath: z.string(),
  name: z.string(),
  isLeaf: z.boolean(),
  fileCount: z.number().int(),
  totalSize: z.number(),
  assetId: z.string().nullable(),
});

export const BlobRecord: z.ZodType<ContentBlob> = z.object({
  blobId: z.string(),
  objectKey: z.string(),
  sha256: z.string().nullable(),
  etag: z.string(),
  size: z.number(),
  embargoedDandisetId: z.string().nullable(),
  createdAt: z.number(),
});

export const DigestPointerRecord = z.object({ blobId: z.string() });

export const UploadValidationRecord: z.ZodType<UploadValidation> = z.object({
  sha256: z.string(),
  objectKey: z.string(),
  state: UploadValidationStateSchema,
  error: z.string().nullable(),
  createdAt: z.number(),
  modifiedAt: z.number(),
});

export const ZarrRecord: z.ZodType<ZarrArchive> = z.object({
  zarrId: z.string(),
  name: z.string(),
  dandisetId: z.string(),
  fileCount: z.number().int(),
  size: z.number(),
  checksum: z.string().nullable(),
  status: ZarrStatusSchema,
  revision: z.number().int(),
  createdAt: z.number(),
  modifiedAt: z.number(),
});

export const ZarrFileRecord: z.ZodType<ZarrUploadFile> = z.object({
  zarrId: z.string(),
  path: z.string(),
  etag: z.string(),
  size: z.number(),
});

export const ZarrLinkRecord: z.ZodType<ZarrLink> = z.object({
  zarrId: z.string(),
  assetId: z.string(),
  versionId: z.string(),
  path: z.string(),
});

export const CounterRecord = z.object({ value: z.number().int() });
