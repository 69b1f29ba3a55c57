import { z } from "zod";
import { ValidationError } from "./errors";

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** True for real calendar dates in YYYY-MM-DD form (rejects 2024-02-30). */
export function isCalendarDate(value: string): boolean {
  const m = ISO_DATE_RE.exec(value);
  if (!m) return false;
  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const d = new Date(Date.UTC(year, month - 1, day));
  return (
    d.getUTCFullYear() === year &&
    d.getUTCMonth() === month - 1 &&
    d.getUTCDate() === day
  );
}

export const isoDateSchema = z
  .string()
  .trim()
  .refine(isCalendarDate, { message: "Expected a date in YYYY-MM-DD form" });

export function todayIsoDate(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}

export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  message = "Invalid request data"
): z.output<T> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new ValidationError(
      message,
      parsed.error.issues.map((i) => ({
        path: i.path.join("."),
        message: i.message,
      }))
    );
  }
  return parsed.data;
}
