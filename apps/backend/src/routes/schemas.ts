import { z } from "zod";
import { CONTEXT_ID_PATTERN } from "core";

// Identifiers end up in file names, so they are restricted to a safe alphabet.
const Identifier = z.string().regex(CONTEXT_ID_PATTERN, "must be 1-128 letters, digits, '_' or '-'");

export const ContextParams = z.object({ contextId: Identifier });

export const GroupParams = z.object({ contextId: Identifier, groupId: Identifier });

export const IndexParams = z.object({ indexId: Identifier });

export const CreateGroupBody = z.object({
  prompt: z.string().trim().min(1),
  tasks: z.array(z.string().trim().min(1)).min(1),
});

export const GroupQueryBody = z.object({
  query: z.string(),
});

export const IndexQueryBody = z.object({
  query: z.string().trim().min(1),
  topK: z.number().int().positive().max(50).optional(),
  scoreThreshold: z.number().min(-1).max(1).optional(),
});

export const EvictQuery = z.object({
  olderThanDays: z.coerce.number().min(0).optional(),
});
