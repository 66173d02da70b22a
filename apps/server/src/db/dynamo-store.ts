/**
 * DynamoDB ArchiveStore (single table, see util/db-keys.ts for the layout)
 *
 * Revision-guarded writes are conditional updates; a draft commit is one
 * TransactWriteItems call covering the version, new assets, zarr links,
 * path nodes and membership items. DynamoDB allows one operation per item
 * per transaction, which the path index satisfies by merging its deltas
 * per node before the commit.
 */

import type { DynamoDBDocumentClient, TransactWriteCommandInput } from "@aws-sdk/lib-dynamodb";
import {
  BatchGetCommand,
  GetCommand,
  PutCommand,
  QueryCommand,
  TransactWriteCommand,
  UpdateCommand,
} from "@aws-sdk/lib-dynamodb";
import type { z } from "zod";
import { ConcurrentModificationError } from "../errors.ts";
import type {
  Asset,
  ListOptions,
  LiveAsset,
  PaginatedResult,
  PathNode,
  ValidationStatus,
  Version,
  ZarrStatus,
  ZarrUploadFile,
} from "../types.ts";
import {
  COUNTER_KEY,
  decodeCursor,
  encodeCursor,
  type ItemKey,
  PENDING_ASSETS_GSI1PK,
  PENDING_BLOBS_GSI1PK,
  PENDING_DRAFTS_GSI1PK,
  PENDING_UPLOADS_GSI1PK,
  PENDING_ZARRS_GSI1PK,
  splitVersionId,
  toAssetKey,
  toBlobKey,
  toDandisetKey,
  toDigestKey,
  toMembershipKey,
  toMembershipPk,
  toPathChildrenPk,
  toPathNodeKey,
  toUploadKey,
  toVersionKey,
  toZarrFileKey,
  toZarrKey,
  toZarrLinkKey,
  toZarrPk,
  ZARR_FILE_PREFIX,
  ZARR_LINK_PREFIX,
} from "../util/db-keys.ts";
import { formatDandisetId } from "../util/id.ts";
import {
  AssetRecord,
  BlobRecord,
  CounterRecord,
  DandisetRecord,
  DigestPointerRecord,
  MembershipRecord,
  PathNodeRecord,
  UploadValidationRecord,
  VersionRecord,
  ZarrFileRecord,
  ZarrLinkRecord,
  ZarrRecord,
} from "./records.ts";
import type { ArchiveStore } from "./store.ts";

// ============================================================================
// Types & helpers
// ============================================================================

type DynamoArchiveStoreConfig = {
  tableName: string;
  client: DynamoDBDocumentClient;
};

type TransactItem = NonNullable<TransactWriteCommandInput["TransactItems"]>[number];

type Item = Record<string, unknown>;

const DEFAULT_LIMIT = 100;
const BATCH_GET_SIZE = 100;

const hasErrorName = (error: unknown, name: string): boolean =>
  error instanceof Error && error.name === name;

const isConditionFailure = (error: unknown): boolean =>
  hasErrorName(error, "ConditionalCheckFailedException");

const isTransactionCanceled = (error: unknown): boolean =>
  hasErrorName(error, "TransactionCanceledException");

const parseItem = <T>(schema: z.ZodType<T>, item: Item | undefined): T | null =>
  item ? schema.parse(item) : null;

/** Sparse GSI1 attributes: present only while the record is PENDING */
const pendingIndex = (gsi1pk: string, gsi1sk: string, status: ValidationStatus): Item =>
  status === "PENDING" ? { gsi1pk, gsi1sk } : {};

/** Sparse GSI1 attributes of outstanding work other than validation */
const workIndex = (gsi1pk: string, gsi1sk: string, outstanding: boolean): Item =>
  outstanding ? { gsi1pk, gsi1sk } : {};

const isIngesting = (status: ZarrStatus): boolean =>
  status === "UPLOADED" || status === "INGESTING";

const isDraft = (versionId: string): boolean => splitVersionId(versionId)[1] === "draft";

// ============================================================================
// Factory
// ============================================================================

export const createDynamoArchiveStore = (config: DynamoArchiveStoreConfig): ArchiveStore => {
  const { client, tableName } = config;

  const getItem = async (key: ItemKey): Promise<Item | undefined> => {
    const result = await client.send(
      new GetCommand({ TableName: tableName, Key: key, ConsistentRead: true })
    );
    return result.Item;
  };

  /**
   * One page of a key-condition query; the cursor is the LastEvaluatedKey
   */
  const queryPage = async <T>(
    schema: z.ZodType<T>,
    input: {
      indexName?: string;
      keyCondition: string;
      values: Item;
    },
    options: ListOptions = {}
  ): Promise<PaginatedResult<T>> => {
    const result = await client.send(
      new QueryCommand({
        TableName: tableName,
        IndexName: input.indexName,
        KeyConditionExpression: input.keyCondition,
        ExpressionAttributeValues: input.values,
        Limit: options.limit ?? DEFAULT_LIMIT,
        ExclusiveStartKey: options.cursor ? decodeCursor(options.cursor) : undefined,
      })
    );
    const items = (result.Items ?? []).map((item) => schema.parse(item));
    return {
      items,
      nextCursor: result.LastEvaluatedKey ? encodeCursor(result.LastEvaluatedKey) : undefined,
      hasMore: !!result.LastEvaluatedKey,
    };
  };

  const queryWorkIndex = <T>(schema: z.ZodType<T>, gsi1pk: string, options?: ListOptions) =>
    queryPage(
      schema,
      { indexName: "gsi1", keyCondition: "gsi1pk = :pk", values: { ":pk": gsi1pk } },
      options
    );

  const queryAll = async <T>(
    schema: z.ZodType<T>,
    input: { keyCondition: string; values: Item }
  ): Promise<T[]> => {
    const items: T[] = [];
    let cursor: string | undefined;
    do {
      const page = await queryPage(schema, input, { limit: 1000, cursor });
      items.push(...page.items);
      cursor = page.nextCursor;
    } while (cursor);
    return items;
  };

  /**
   * Fetch assets by id, chunked to the BatchGetItem limit. Unprocessed keys
   * are retried until the response is complete.
   */
  const batchGetAssets = async (assetIds: string[]): Promise<Map<string, Asset>> => {
    const result = new Map<string, Asset>();
    const uniqueIds = [...new Set(assetIds)];

    for (let i = 0; i < uniqueIds.length; i += BATCH_GET_SIZE) {
      let keys: Item[] = uniqueIds.slice(i, i + BATCH_GET_SIZE).map((id) => toAssetKey(id));
      while (keys.length > 0) {
        const response = await client.send(
          new BatchGetCommand({ RequestItems: { [tableName]: { Keys: keys } } })
        );
        for (const item of response.Responses?.[tableName] ?? []) {
          const asset = AssetRecord.parse(item);
          result.set(asset.assetId, asset);
        }
        keys = response.UnprocessedKeys?.[tableName]?.Keys ?? [];
      }
    }
    return result;
  };

  const revisionConflict = async (versionId: string, expected: number) => {
    const current = parseItem(VersionRecord, await getItem(toVersionKey(versionId)));
    return new ConcurrentModificationError(
      `version ${versionId}`,
      expected,
      current?.revision ?? null
    );
  };

  const requireVersion = async (versionId: string): Promise<Version> => {
    const version = parseItem(VersionRecord, await getItem(toVersionKey(versionId)));
    if (!version) throw new Error(`Version not found after write: ${versionId}`);
    return version;
  };

  // --------------------------------------------------------------------------
  // Draft commit
  // --------------------------------------------------------------------------

  const commitDraftChange: ArchiveStore["commitDraftChange"] = async (change) => {
    const { versionId, expectedRevision } = change;
    const now = Date.now();
    const items: TransactItem[] = [
      {
        Update: {
          TableName: tableName,
          Key: toVersionKey(versionId),
          ConditionExpression: "#rev = :expected",
          UpdateExpression:
            "SET #rev = :next, #status = :pending, modifiedAt = :now, gsi1pk = :gsi1pk, gsi1sk = :gsi1sk",
          ExpressionAttributeNames: { "#rev": "revision", "#status": "status" },
          ExpressionAttributeValues: {
            ":expected": expectedRevision,
            ":next": expectedRevision + 1,
            ":pending": "PENDING",
            ":now": now,
            ":gsi1pk": PENDING_DRAFTS_GSI1PK,
            ":gsi1sk": versionId,
          },
        },
      },
    ];

    for (const asset of change.newAssets) {
      items.push({
        Put: {
          TableName: tableName,
          Item: {
            ...toAssetKey(asset.assetId),
            ...asset,
            ...pendingIndex(PENDING_ASSETS_GSI1PK, asset.assetId, asset.status),
          },
          ConditionExpression: "attribute_not_exists(pk)",
        },
      });
      if (asset.content.kind === "zarr") {
        items.push({
          Put: {
            TableName: tableName,
            Item: {
              ...toZarrLinkKey(asset.content.zarrId, asset.assetId),
              zarrId: asset.content.zarrId,
              assetId: asset.assetId,
              versionId,
              path: asset.path,
            },
          },
        });
      }
    }

    for (const path of change.nodeDeletes) {
      items.push({ Delete: { TableName: tableName, Key: toPathNodeKey(versionId, path) } });
      if (path !== "" && !path.endsWith("/")) {
        items.push({ Delete: { TableName: tableName, Key: toMembershipKey(versionId, path) } });
      }
    }

    for (const node of change.nodePuts) {
      items.push({
        Put: { TableName: tableName, Item: { ...toPathNodeKey(versionId, node.path), ...node } },
      });
      if (node.isLeaf && node.assetId) {
        items.push({
          Put: {
            TableName: tableName,
            Item: {
              ...toMembershipKey(versionId, node.path),
              assetId: node.assetId,
              size: node.totalSize,
            },
          },
        });
      }
    }

    try {
      await client.send(new TransactWriteCommand({ TransactItems: items }));
    } catch (error) {
      if (!isTransactionCanceled(error)) throw error;
      const conflict = await revisionConflict(versionId, expectedRevision);
      if (conflict.actual !== expectedRevision) throw conflict;
      throw error;
    }
    return requireVersion(versionId);
  };

  // --------------------------------------------------------------------------
  // Zarr file writes
  // --------------------------------------------------------------------------

  /** Totals adjustment of a zarr, bundled into a file transaction */
  const adjustZarr = (zarrId: string, fileDelta: number, sizeDelta: number): TransactItem => ({
    Update: {
      TableName: tableName,
      Key: toZarrKey(zarrId),
      ConditionExpression: "attribute_exists(pk)",
      UpdateExpression:
        "ADD fileCount :df, #size :ds, #rev :one SET #status = :pending, checksum = :null, modifiedAt = :now REMOVE gsi1pk, gsi1sk",
      ExpressionAttributeNames: { "#size": "size", "#rev": "revision", "#status": "status" },
      ExpressionAttributeValues: {
        ":df": fileDelta,
        ":ds": sizeDelta,
        ":one": 1,
        ":pending": "PENDING",
        ":null": null,
        ":now": Date.now(),
      },
    },
  });

  /** Condition matching a stored file record exactly */
  const fileMatches = (file: ZarrUploadFile) => ({
    ConditionExpression: "etag = :etag AND #size = :size",
    ExpressionAttributeNames: { "#size": "size" },
    ExpressionAttributeValues: { ":etag": file.etag, ":size": file.size },
  });

  const sendFileTransaction = async (
    file: ZarrUploadFile,
    items: TransactItem[]
  ): Promise<void> => {
    try {
      await client.send(new TransactWriteCommand({ TransactItems: items }));
    } catch (error) {
      if (!isTransactionCanceled(error)) throw error;
      throw new ConcurrentModificationError(`zarr file ${file.zarrId}/${file.path}`, null, null);
    }
  };

  // --------------------------------------------------------------------------
  // Conditional status updates
  // --------------------------------------------------------------------------

  /** Run a conditional write; false when its condition failed */
  const conditionalWrite = async (send: () => Promise<unknown>): Promise<boolean> => {
    try {
      await send();
      return true;
    } catch (error) {
      if (isConditionFailure(error)) return false;
      throw error;
    }
  };

  /**
   * First blob registered for a digest wins the pointer
   */
  const putDigestPointer = async (sha256: string, blobId: string): Promise<void> => {
    await conditionalWrite(() =>
      client.send(
        new PutCommand({
          TableName: tableName,
          Item: { ...toDigestKey(sha256), blobId },
          ConditionExpression: "attribute_not_exists(pk)",
        })
      )
    );
  };

  return {
    // ------------------------------------------------------------------------
    // Dandisets & versions
    // ------------------------------------------------------------------------

    allocateDandisetId: async () => {
      const result = await client.send(
        new UpdateCommand({
          TableName: tableName,
          Key: COUNTER_KEY,
          UpdateExpression: "ADD #value :one",
          ExpressionAttributeNames: { "#value": "value" },
          ExpressionAttributeValues: { ":one": 1 },
          ReturnValues: "UPDATED_NEW",
        })
      );
      return formatDandisetId(CounterRecord.parse(result.Attributes).value);
    },

    createDandiset: async (dandiset, draft) => {
      await client.send(
        new TransactWriteCommand({
          TransactItems: [
            {
              Put: {
                TableName: tableName,
                Item: { ...toDandisetKey(dandiset.dandisetId), ...dandiset },
                ConditionExpression: "attribute_not_exists(pk)",
              },
            },
            {
              Put: {
                TableName: tableName,
                Item: {
                  ...toVersionKey(draft.versionId),
                  ...draft,
                  ...pendingIndex(PENDING_DRAFTS_GSI1PK, draft.versionId, draft.status),
                },
                ConditionExpression: "attribute_not_exists(pk)",
              },
            },
          ],
        })
      );
    },

    getDandiset: async (dandisetId) =>
      parseItem(DandisetRecord, await getItem(toDandisetKey(dandisetId))),

    getVersion: async (versionId) =>
      parseItem(VersionRecord, await getItem(toVersionKey(versionId))),

    listPendingDraftVersions: (options) =>
      queryWorkIndex(VersionRecord, PENDING_DRAFTS_GSI1PK, options),

    setVersionValidation: (versionId, expectedRevision, status, errors) =>
      conditionalWrite(() =>
        client.send(
          new UpdateCommand({
            TableName: tableName,
            Key: toVersionKey(versionId),
            ConditionExpression: "#rev = :expected",
            UpdateExpression:
              status === "PENDING"
                ? "SET #status = :status, validationErrors = :errors"
                : "SET #status = :status, validationErrors = :errors REMOVE gsi1pk, gsi1sk",
            ExpressionAttributeNames: { "#rev": "revision", "#status": "status" },
            ExpressionAttributeValues: {
              ":expected": expectedRevision,
              ":status": status,
              ":errors": errors,
            },
          })
        )
      ),

    writeVersionMetadata: async (versionId, expectedRevision, metadata) => {
      const indexed = isDraft(versionId);
      try {
        const result = await client.send(
          new UpdateCommand({
            TableName: tableName,
            Key: toVersionKey(versionId),
            ConditionExpression: "#rev = :expected",
            UpdateExpression: indexed
              ? "SET metadata = :metadata, #status = :pending, #rev = :next, modifiedAt = :now, gsi1pk = :gsi1pk, gsi1sk = :gsi1sk"
              : "SET metadata = :metadata, #status = :pending, #rev = :next, modifiedAt = :now",
            ExpressionAttributeNames: { "#rev": "revision", "#status": "status" },
            ExpressionAttributeValues: {
              ":expected": expectedRevision,
              ":next": expectedRevision + 1,
              ":metadata": metadata,
              ":pending": "PENDING",
              ":now": Date.now(),
              ...(indexed ? { ":gsi1pk": PENDING_DRAFTS_GSI1PK, ":gsi1sk": versionId } : {}),
            },
            ReturnValues: "ALL_NEW",
          })
        );
        return VersionRecord.parse(result.Attributes);
      } catch (error) {
        if (isConditionFailure(error)) throw await revisionConflict(versionId, expectedRevision);
        throw error;
      }
    },

    // ------------------------------------------------------------------------
    // Assets
    // ------------------------------------------------------------------------

    getAsset: async (assetId) => parseItem(AssetRecord, await getItem(toAssetKey(assetId))),

    findLiveAsset: async (versionId, path) => {
      const member = parseItem(MembershipRecord, await getItem(toMembershipKey(versionId, path)));
      if (!member) return null;
      const asset = parseItem(AssetRecord, await getItem(toAssetKey(member.assetId)));
      return asset ? { asset, size: member.size } : null;
    },

    listVersionAssets: async (versionId, options = {}) => {
      const prefix = options.pathPrefix ?? "";
      const page = await queryPage(
        MembershipRecord,
        prefix
          ? {
              keyCondition: "pk = :pk AND begins_with(sk, :prefix)",
              values: { ":pk": toMembershipPk(versionId), ":prefix": prefix },
            }
          : { keyCondition: "pk = :pk", values: { ":pk": toMembershipPk(versionId) } },
        options
      );
      const assets = await batchGetAssets(page.items.map((member) => member.assetId));
      const items: LiveAsset[] = [];
      for (const member of page.items) {
        const asset = assets.get(member.assetId);
        if (asset) items.push({ asset, size: member.size });
      }
      return { ...page, items };
    },

    listPendingAssets: (options) => queryWorkIndex(AssetRecord, PENDING_ASSETS_GSI1PK, options),

    setAssetValidation: async (assetId, status, errors) => {
      await conditionalWrite(() =>
        client.send(
          new UpdateCommand({
            TableName: tableName,
            Key: toAssetKey(assetId),
            ConditionExpression: "attribute_exists(pk)",
            UpdateExpression:
              status === "PENDING"
                ? "SET #status = :status, validationErrors = :errors, modifiedAt = :now"
                : "SET #status = :status, validationErrors = :errors, modifiedAt = :now REMOVE gsi1pk, gsi1sk",
            ExpressionAttributeNames: { "#status": "status" },
            ExpressionAttributeValues: { ":status": status, ":errors": errors, ":now": Date.now() },
          })
        )
      );
    },

    commitDraftChange,

    // ------------------------------------------------------------------------
    // Path index
    // ------------------------------------------------------------------------

    getPathNode: async (versionId, path) =>
      parseItem(PathNodeRecord, await getItem(toPathNodeKey(versionId, path))),

    listPathChildren: (versionId, dirPath, options) =>
      queryPage<PathNode>(
        PathNodeRecord,
        { keyCondition: "pk = :pk", values: { ":pk": toPathChildrenPk(versionId, dirPath) } },
        options
      ),

    // ------------------------------------------------------------------------
    // Blobs & uploads
    // ------------------------------------------------------------------------

    getBlob: async (blobId) => parseItem(BlobRecord, await getItem(toBlobKey(blobId))),

    findBlobByDigest: async (sha256) => {
      const pointer = parseItem(DigestPointerRecord, await getItem(toDigestKey(sha256)));
      if (!pointer) return null;
      return parseItem(BlobRecord, await getItem(toBlobKey(pointer.blobId)));
    },

    putBlob: async (blob) => {
      await client.send(
        new PutCommand({
          TableName: tableName,
          Item: {
            ...toBlobKey(blob.blobId),
            ...blob,
            ...workIndex(PENDING_BLOBS_GSI1PK, blob.blobId, blob.sha256 === null),
          },
          ConditionExpression: "attribute_not_exists(pk)",
        })
      );
      if (blob.sha256) await putDigestPointer(blob.sha256, blob.blobId);
    },

    setBlobDigest: async (blobId, sha256) => {
      const written = await conditionalWrite(() =>
        client.send(
          new UpdateCommand({
            TableName: tableName,
            Key: toBlobKey(blobId),
            ConditionExpression: "attribute_exists(pk) AND attribute_type(sha256, :nullType)",
            UpdateExpression: "SET sha256 = :sha256 REMOVE gsi1pk, gsi1sk",
            ExpressionAttributeValues: { ":sha256": sha256, ":nullType": "NULL" },
          })
        )
      );
      if (written) await putDigestPointer(sha256, blobId);
      return parseItem(BlobRecord, await getItem(toBlobKey(blobId)));
    },

    listUndigestedBlobs: (options) => queryWorkIndex(BlobRecord, PENDING_BLOBS_GSI1PK, options),

    getUploadValidation: async (sha256) =>
      parseItem(UploadValidationRecord, await getItem(toUploadKey(sha256))),

    putUploadValidation: async (record) => {
      await client.send(
        new PutCommand({
          TableName: tableName,
          Item: {
            ...toUploadKey(record.sha256),
            ...record,
            ...workIndex(PENDING_UPLOADS_GSI1PK, record.sha256, record.state === "IN_PROGRESS"),
          },
        })
      );
    },

    listInProgressUploads: (options) =>
      queryWorkIndex(UploadValidationRecord, PENDING_UPLOADS_GSI1PK, options),

    // ------------------------------------------------------------------------
    // Zarr archives
    // ------------------------------------------------------------------------

    createZarr: async (zarr) => {
      await client.send(
        new PutCommand({
          TableName: tableName,
          Item: {
            ...toZarrKey(zarr.zarrId),
            ...zarr,
            ...workIndex(PENDING_ZARRS_GSI1PK, zarr.zarrId, isIngesting(zarr.status)),
          },
          ConditionExpression: "attribute_not_exists(pk)",
        })
      );
    },

    getZarr: async (zarrId) => parseItem(ZarrRecord, await getItem(toZarrKey(zarrId))),

    getZarrFile: async (zarrId, path) =>
      parseItem(ZarrFileRecord, await getItem(toZarrFileKey(zarrId, path))),

    putZarrFile: (file, previous) =>
      sendFileTransaction(file, [
        {
          Put: {
            TableName: tableName,
            Item: { ...toZarrFileKey(file.zarrId, file.path), ...file },
            ...(previous
              ? fileMatches(previous)
              : { ConditionExpression: "attribute_not_exists(pk)" }),
          },
        },
        adjustZarr(file.zarrId, previous ? 0 : 1, file.size - (previous?.size ?? 0)),
      ]),

    deleteZarrFile: (file) =>
      sendFileTransaction(file, [
        {
          Delete: {
            TableName: tableName,
            Key: toZarrFileKey(file.zarrId, file.path),
            ...fileMatches(file),
          },
        },
        adjustZarr(file.zarrId, -1, -file.size),
      ]),

    listZarrFiles: (zarrId, options) =>
      queryPage(
        ZarrFileRecord,
        {
          keyCondition: "pk = :pk AND begins_with(sk, :prefix)",
          values: { ":pk": toZarrPk(zarrId), ":prefix": ZARR_FILE_PREFIX },
        },
        options
      ),

    setZarrStatus: (zarrId, expectedRevision, status) =>
      conditionalWrite(() =>
        client.send(
          new UpdateCommand({
            TableName: tableName,
            Key: toZarrKey(zarrId),
            ConditionExpression: "#rev = :expected",
            UpdateExpression: isIngesting(status)
              ? "SET #status = :status, modifiedAt = :now, gsi1pk = :gsi1pk, gsi1sk = :gsi1sk"
              : "SET #status = :status, modifiedAt = :now REMOVE gsi1pk, gsi1sk",
            ExpressionAttributeNames: { "#rev": "revision", "#status": "status" },
            ExpressionAttributeValues: {
              ":expected": expectedRevision,
              ":status": status,
              ":now": Date.now(),
              ...(isIngesting(status) ? { ":gsi1pk": PENDING_ZARRS_GSI1PK, ":gsi1sk": zarrId } : {}),
            },
          })
        )
      ),

    completeZarr: (zarrId, expectedRevision, checksum) =>
      conditionalWrite(() =>
        client.send(
          new UpdateCommand({
            TableName: tableName,
            Key: toZarrKey(zarrId),
            ConditionExpression: "#rev = :expected",
            UpdateExpression:
              "SET #status = :complete, checksum = :checksum, modifiedAt = :now REMOVE gsi1pk, gsi1sk",
            ExpressionAttributeNames: { "#rev": "revision", "#status": "status" },
            ExpressionAttributeValues: {
              ":expected": expectedRevision,
              ":complete": "COMPLETE",
              ":checksum": checksum,
              ":now": Date.now(),
            },
          })
        )
      ),

    listIngestingZarrs: (options) => queryWorkIndex(ZarrRecord, PENDING_ZARRS_GSI1PK, options),

    listZarrLinks: (zarrId) =>
      queryAll(ZarrLinkRecord, {
        keyCondition: "pk = :pk AND begins_with(sk, :prefix)",
        values: { ":pk": toZarrPk(zarrId), ":prefix": ZARR_LINK_PREFIX },
      }),
  };
};
