/**
 * Request schemas for /register and /login
 */

import { z } from "zod";
import { isoDateSchema } from "../../lib/validation";

// bcrypt ignores everything past 72 bytes
const passwordSchema = z
  .string()
  .min(8, "Password must be at least 8 characters")
  .refine((p) => Buffer.byteLength(p, "utf8") <= 72, {
    message: "Password must be at most 72 bytes",
  });

/**
 * POST /register (JSON)
 */
export const registerSchema = z.object({
  email: z.string().trim().email(),
  password: passwordSchema,
  default_company_name: z.string().trim().min(1).max(200).nullish(),
  default_document_type: z.string().trim().min(1).max(100).nullish(),
  default_submission_date: isoDateSchema.nullish(),
});

/**
 * POST /login (form-encoded password grant, JSON also accepted)
 */
export const loginSchema = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1),
});
