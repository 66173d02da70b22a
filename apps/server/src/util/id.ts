/**
 * ID generation utilities
 */

import { randomUUID } from "node:crypto";

/** Generate a record id (assets, blobs, zarr archives) */
export const generateId = (): string => randomUUID();

/** Format a counter value as a dandiset identifier: 1 -> "000001" */
export const formatDandisetId = (value: number): string => value.toString().padStart(6, "0");
