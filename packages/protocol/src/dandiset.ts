/**
 * Dandiset schemas
 */

import { z } from "zod";
import { EmbargoStatusSchema } from "./common.ts";

export const CreateDandisetSchema = z.object({
  metadata: z.record(z.unknown()),
  embargoStatus: EmbargoStatusSchema.optional().default("OPEN"),
});

export type CreateDandiset = z.infer<typeof CreateDandisetSchema>;
