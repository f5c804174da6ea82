/**
 * Storage contract shared by every catalog backend
 */

import type { CatalogRecord, RecordFilter, RecordUpdate } from "./record.js";

export type BackendKind = "local" | "remote";

/**
 * Where a store keeps its document
 */
export interface StoreDescription {
  backend: BackendKind;
  /** File path or object URL */
  location: string;
}

/**
 * Catalog store interface
 *
 * Every mutation rewrites and persists the whole document before it resolves.
 * Records handed out are copies.
 */
export interface CatalogStore {
  /**
   * List records in insertion order, optionally filtered
   * @throws {MalformedDataError} If the persisted document is corrupt
   * @throws {UnavailableError} If the backing store cannot be read
   */
  list(filter?: RecordFilter): Promise<CatalogRecord[]>;

  /**
   * Get a record by exact name
   * @throws {NotFoundError} If no record has that name
   */
  get(name: string): Promise<CatalogRecord>;

  /**
   * Append a new record
   * @throws {ValidationError} If a field is missing or empty
   * @throws {DuplicateNameError} If the name is already taken
   */
  create(record: CatalogRecord): Promise<CatalogRecord>;

  /**
   * Merge category and/or description into an existing record
   * @throws {ValidationError} If a field is empty or not updatable
   * @throws {NotFoundError} If no record has that name
   */
  update(name: string, fields: RecordUpdate): Promise<CatalogRecord>;

  /**
   * Remove a record
   * @throws {NotFoundError} If no record has that name
   */
  delete(name: string): Promise<void>;

  describe(): StoreDescription;
}

/**
 * Loads the dataset used to create a missing document
 */
export type SeedLoader = () => Promise<CatalogRecord[]>;
