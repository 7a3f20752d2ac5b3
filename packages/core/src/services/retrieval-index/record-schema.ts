import { z } from "zod";
import type { JsonValue } from "../../models/json";

export const METADATA_FILE = "metadata.json";

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const IndexRecordSchema = z.object({
  id: z.string(),
  task: z.string(),
  createdAt: z.string(),
  updatedAt: z.string().optional(),
  numDocuments: z.number().int().min(0),
  cacheReferences: z.array(
    z.object({
      url: z.string(),
      cacheFile: z.string(),
      title: z.string(),
    })
  ),
  metadata: z.record(JsonValueSchema),
});
