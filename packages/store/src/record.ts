/**
 * Catalog record schema and validation
 *
 * A record is identified by its name alone. Names are compared exactly
 * (case-sensitive) and never change after creation.
 */

import { z } from "zod";
import { ValidationError, type ValidationIssue } from "./errors.js";

const RequiredText = z
  .string({ required_error: "is required", invalid_type_error: "must be a string" })
  .refine((value) => value.trim().length > 0, { message: "must not be empty" });

/**
 * Record schema - all three fields are required, non-empty strings
 */
export const RecordSchema = z
  .object({
    name: RequiredText,
    category: RequiredText,
    description: RequiredText,
  })
  .strict();

/**
 * Partial update schema - `name` is absent, so `.strict()` rejects it
 */
export const RecordUpdateSchema = z
  .object({
    category: RequiredText.optional(),
    description: RequiredText.optional(),
  })
  .strict("only category and description can be updated");

export type CatalogRecord = z.infer<typeof RecordSchema>;
export type RecordUpdate = z.infer<typeof RecordUpdateSchema>;

/**
 * Filter for list() - linear scan, case-insensitive
 */
export interface RecordFilter {
  /** Exact category match */
  category?: string;
  /** Substring match against name or description */
  search?: string;
}

export function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Validate an incoming record
 * @throws ValidationError listing every problem found
 */
export function validateRecord(input: unknown): CatalogRecord {
  const result = RecordSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(toIssues(result.error));
  }
  return result.data;
}

/**
 * Validate a partial update
 * @throws ValidationError if a field is empty or not updatable
 */
export function validateUpdate(input: unknown): RecordUpdate {
  const result = RecordUpdateSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(toIssues(result.error));
  }
  return result.data;
}

/**
 * Copy a record with its fields in canonical order
 */
export function cloneRecord(record: CatalogRecord): CatalogRecord {
  return {
    name: record.name,
    category: record.category,
    description: record.description,
  };
}
