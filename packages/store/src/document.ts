/**
 * Collection document codec and whole-document mutations
 *
 * Persisted format:
 *   { "services": [ { "name": ..., "category": ..., "description": ... }, ... ] }
 *
 * Invariants:
 * - Array order is the canonical list order
 * - No two records share a name
 * - Mutation helpers never modify their input; they return a new array
 */

import { z } from "zod";
import { DuplicateNameError, MalformedDataError, NotFoundError } from "./errors.js";
import {
  RecordSchema,
  cloneRecord,
  toIssues,
  type CatalogRecord,
  type RecordFilter,
  type RecordUpdate,
} from "./record.js";

export const DOCUMENT_KEY = "services";

const RecordListSchema = z.array(RecordSchema);

// Older files hold a bare array; both are accepted on read
const DocumentSchema = z.union([
  z.object({ [DOCUMENT_KEY]: RecordListSchema }).strict(),
  RecordListSchema,
]);

/**
 * Parse a raw document into records
 * @param raw - File or object contents
 * @param location - Path or object URL, used in error messages
 * @throws MalformedDataError if the content is not a valid collection document
 */
export function parseDocument(raw: string, location: string): CatalogRecord[] {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedDataError(location, `invalid JSON (${reason})`, { cause: err });
  }

  return decodeDocument(data, location);
}

/**
 * Validate already-parsed document data
 * @throws MalformedDataError on a wrong shape, an incomplete record or a duplicate name
 */
export function decodeDocument(data: unknown, location: string): CatalogRecord[] {
  const result = DocumentSchema.safeParse(data);
  if (!result.success) {
    const reason = toIssues(result.error)
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join("; ");
    throw new MalformedDataError(location, reason, { cause: result.error });
  }

  const records = Array.isArray(result.data) ? result.data : result.data[DOCUMENT_KEY];

  const seen = new Set<string>();
  for (const record of records) {
    if (seen.has(record.name)) {
      throw new MalformedDataError(location, `duplicate record name "${record.name}"`);
    }
    seen.add(record.name);
  }

  return records;
}

/**
 * Serialize records into the persisted document format
 */
export function serializeDocument(records: readonly CatalogRecord[]): string {
  return JSON.stringify({ [DOCUMENT_KEY]: records.map(cloneRecord) }, null, 2) + "\n";
}

export function findRecord(
  records: readonly CatalogRecord[],
  name: string
): CatalogRecord | undefined {
  return records.find((record) => record.name === name);
}

/**
 * Append a record
 * @throws DuplicateNameError if the name is taken
 */
export function insertRecord(
  records: readonly CatalogRecord[],
  record: CatalogRecord
): CatalogRecord[] {
  if (findRecord(records, record.name)) {
    throw new DuplicateNameError(record.name);
  }
  return [...records, cloneRecord(record)];
}

/**
 * Merge category/description into an existing record, keeping its position
 * @throws NotFoundError if no record has the name
 */
export function mergeRecord(
  records: readonly CatalogRecord[],
  name: string,
  update: RecordUpdate
): { records: CatalogRecord[]; record: CatalogRecord } {
  const index = records.findIndex((record) => record.name === name);
  const current = records[index];
  if (!current) {
    throw new NotFoundError(name);
  }

  const record: CatalogRecord = {
    name: current.name,
    category: update.category ?? current.category,
    description: update.description ?? current.description,
  };

  const next = [...records];
  next[index] = record;
  return { records: next, record };
}

/**
 * Remove a record by name
 * @throws NotFoundError if no record has the name
 */
export function removeRecord(records: readonly CatalogRecord[], name: string): CatalogRecord[] {
  const next = records.filter((record) => record.name !== name);
  if (next.length === records.length) {
    throw new NotFoundError(name);
  }
  return next;
}

/**
 * Apply a list filter by linear scan
 */
export function filterRecords(
  records: readonly CatalogRecord[],
  filter?: RecordFilter
): CatalogRecord[] {
  const category = filter?.category?.toLowerCase();
  const search = filter?.search?.toLowerCase();

  return records
    .filter((record) => {
      if (category && record.category.toLowerCase() !== category) {
        return false;
      }
      if (search) {
        const nameMatch = record.name.toLowerCase().includes(search);
        const descriptionMatch = record.description.toLowerCase().includes(search);
        if (!nameMatch && !descriptionMatch) {
          return false;
        }
      }
      return true;
    })
    .map(cloneRecord);
}
