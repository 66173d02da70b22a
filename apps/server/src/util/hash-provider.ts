/**
 * Hash provider backed by node:crypto
 */

import { createHash } from "node:crypto";
import type { HashProvider } from "@dandiset/storage-core";

export const createNodeHashProvider = (): HashProvider => ({
  sha256: async (data) => new Uint8Array(createHash("sha256").update(data).digest()),
  md5: async (data) => new Uint8Array(createHash("md5").update(data).digest()),
});
