import { z } from "zod";
import { isoDateSchema } from "../../lib/validation";

// Digits only, so "1e3", "0x10" and " 7" are not read as numbers.
// rfps.id is a Postgres INTEGER.
export const rfpIdParamsSchema = z.object({
  id: z
    .string()
    .regex(/^\d+$/, "Expected a positive integer id")
    .transform(Number)
    .pipe(z.number().int().positive().max(2_147_483_647)),
});

export const uploadRfpSchema = z.object({
  title: z.string().trim().min(1, "Title is required").max(300),
});

/**
 * PUT /rfp/:id replaces all four fields; there is no partial update.
 */
export const updateRfpSchema = z.object({
  draft_text: z.string(),
  company_name: z.string().trim().max(200),
  document_type: z.string().trim().max(100),
  submission_date: isoDateSchema,
});
