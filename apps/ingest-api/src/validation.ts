import { z } from "zod";
import type { IssueLocation, ValidationIssue } from "@sensor-ingest/types";
import { ValidationError } from "./errors";

export const DEFAULT_LIST_LIMIT = 100;
export const MAX_LIST_LIMIT = 1000;

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

// Decimal strings ("21.5") are accepted like numbers; hex, binary and
// anything else are left for the number check to reject.
const fromNumericString = (value: unknown): unknown =>
  typeof value === "string" && DECIMAL.test(value.trim()) ? Number(value) : value;

// Postgres keeps microseconds; finer fractions would not survive a round trip.
const SUB_MICROSECOND = /\.\d{7,}/;

// ─── Input shapes ─────────────────────────────────────────
// Only client-settable fields. Unknown keys (including `id`) are stripped,
// so a client can never choose a server-owned value.
export const measurementInputSchema = z.object({
  device_id: z.string(),
  sensor: z.string(),
  value: z.preprocess(fromNumericString, z.number().finite()),
  ts: z
    .string()
    .datetime({ offset: true, message: "Invalid ISO-8601 timestamp; include a zone offset or Z" })
    .refine((value) => !SUB_MICROSECOND.test(value), {
      message: "Timestamps carry at most 6 fractional digits",
    })
    .optional(),
});

export type MeasurementInput = z.infer<typeof measurementInputSchema>;

export const heroInputSchema = z.object({
  name: z.string(),
  secret_name: z.string(),
  age: z.preprocess(fromNumericString, z.number().int()).nullable().optional(),
});

export type HeroInput = z.infer<typeof heroInputSchema>;

export const listQuerySchema = z.object({
  limit: z.coerce
    .number()
    .int()
    .min(1, `limit must be between 1 and ${MAX_LIST_LIMIT}`)
    .max(MAX_LIST_LIMIT, `limit must be between 1 and ${MAX_LIST_LIMIT}`)
    .default(DEFAULT_LIST_LIMIT),
});

export function toValidationIssues(error: z.ZodError, location: IssueLocation): ValidationIssue[] {
  return error.issues.map((issue) => ({
    location,
    field: issue.path.join("."),
    message: issue.message,
  }));
}

/** Parses `input` or throws a ValidationError carrying field-level issues. */
export function parseOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
  location: IssueLocation,
): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(toValidationIssues(result.error, location));
  }
  return result.data;
}
