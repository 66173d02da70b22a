/**
 * Default SchemaValidator backed by zod
 *
 * Field errors use the archive's established wording ("field required",
 * "value is not a valid list", ...) with dotted field paths. A missing or
 * unknown schema version short-circuits to a single document-level error.
 */

import { z } from "zod";
import type { FieldError, Metadata } from "../types.ts";

// ============================================================================
// Types
// ============================================================================

export type MetadataKind = "asset" | "dandiset";

/**
 * Pluggable metadata validator. Returns violations in schema order; an
 * empty list means valid.
 */
export type SchemaValidator = {
  validate: (document: Metadata, schemaVersion: unknown, kind: MetadataKind) => FieldError[];
};

export type ZodSchemaValidatorConfig = {
  allowedSchemaVersions: string[];
};

// ============================================================================
// Schemas
// ============================================================================

export const DIGEST_MISSING_MESSAGE = "Digest is missing dandi-etag or sha256 keys.";

const NamedItemSchema = z.object({ name: z.string() }).passthrough();

const DigestSchema = z
  .record(z.string())
  .refine(
    (digest) =>
      "dandi:dandi-zarr-checksum" in digest ||
      ("dandi:dandi-etag" in digest && "dandi:sha2-256" in digest),
    { message: DIGEST_MISSING_MESSAGE }
  );

const ParticipantSchema = z
  .object({
    identifier: z.string().optional(),
    species: NamedItemSchema.optional(),
  })
  .passthrough();

export const AssetMetadataSchema = z
  .object({
    schemaVersion: z.string(),
    id: z.string(),
    identifier: z.string(),
    path: z.string(),
    contentSize: z.number().int(),
    encodingFormat: z.string(),
    digest: DigestSchema,
    keywords: z.array(z.string()).optional(),
    approach: z.array(NamedItemSchema).optional(),
    measurementTechnique: z.array(NamedItemSchema).optional(),
    variableMeasured: z
      .array(z.union([z.string(), z.object({ value: z.string() }).passthrough()]))
      .optional(),
    wasAttributedTo: z.array(ParticipantSchema).optional(),
  })
  .passthrough();

const AssetsSummarySchema = z
  .object({
    numberOfBytes: z.number().int(),
    numberOfFiles: z.number().int(),
  })
  .passthrough();

export const DandisetMetadataSchema = z
  .object({
    schemaVersion: z.string(),
    name: z.string(),
    description: z.string(),
    license: z.array(z.string()),
    keywords: z.array(z.string()).optional(),
    contributor: z.array(z.record(z.unknown())).optional(),
    assetsSummary: AssetsSummarySchema.optional(),
  })
  .passthrough();

// ============================================================================
// Messages
// ============================================================================

/**
 * Translate a zod issue into the archive's message wording
 */
export const toFieldMessage = (issue: z.ZodIssue): string => {
  if (issue.code === z.ZodIssueCode.invalid_type) {
    if (issue.received === "undefined") return "field required";
    if (issue.received === "null") return "none is not an allowed value";
    switch (issue.expected) {
      case "array":
        return "value is not a valid list";
      case "string":
        return "str type expected";
      case "integer":
      case "number":
        return "value is not a valid integer";
      case "object":
        return "value is not a valid dict";
    }
  }
  return issue.message;
};

const describeVersion = (schemaVersion: unknown): string =>
  schemaVersion === undefined || schemaVersion === null ? "None" : String(schemaVersion);

// ============================================================================
// Factory
// ============================================================================

export const createZodSchemaValidator = (config: ZodSchemaValidatorConfig): SchemaValidator => ({
  validate: (document, schemaVersion, kind) => {
    if (typeof schemaVersion !== "string" || !config.allowedSchemaVersions.includes(schemaVersion)) {
      return [
        {
          field: "",
          message: `Metadata version ${describeVersion(schemaVersion)} is not allowed. Allowed are: ${config.allowedSchemaVersions.join(", ")}.`,
        },
      ];
    }

    const schema = kind === "asset" ? AssetMetadataSchema : DandisetMetadataSchema;
    const result = schema.safeParse(document);
    if (result.success) return [];
    return result.error.issues.map((issue) => ({
      field: issue.path.join("."),
      message: toFieldMessage(issue),
    }));
  },
});
