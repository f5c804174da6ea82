/**
 * Whole-document catalog store shared by the local and remote adapters
 *
 * Every mutation is a read-modify-write of the entire document:
 * load → mutate in memory → persist, all while holding the instance mutex.
 * Reads take no lock; they rely on the backend replacing the document
 * atomically.
 *
 * A missing document is the only condition recovered locally: it is
 * created from the seed dataset, under the mutex and after re-checking that
 * no mutation created it in the meantime.
 */

import type { BackendKind, CatalogStore, SeedLoader, StoreDescription } from "../contract.js";
import {
  filterRecords,
  findRecord,
  insertRecord,
  mergeRecord,
  parseDocument,
  removeRecord,
  serializeDocument,
} from "../document.js";
import { NotFoundError } from "../errors.js";
import { Mutex } from "../lock.js";
import { logger } from "../observability/logger.js";
import {
  cloneRecord,
  validateRecord,
  validateUpdate,
  type CatalogRecord,
  type RecordFilter,
  type RecordUpdate,
} from "../record.js";

export interface DocumentStoreOptions {
  /** Dataset written when the document does not exist yet */
  seed: SeedLoader;
}

export abstract class DocumentCatalogStore implements CatalogStore {
  readonly #mutex = new Mutex();
  readonly #seed: SeedLoader;

  protected abstract readonly backend: BackendKind;

  /** File path or object URL, used in errors and logs */
  protected abstract readonly location: string;

  /**
   * Read the raw document
   * @returns Document text, or null if the document does not exist
   * @throws {UnavailableError} If the backing store cannot be read
   */
  protected abstract readDocument(): Promise<string | null>;

  /**
   * Replace the whole document
   * @throws {UnavailableError} If the backing store cannot be written
   */
  protected abstract writeDocument(content: string): Promise<void>;

  constructor(options: DocumentStoreOptions) {
    this.#seed = options.seed;
  }

  describe(): StoreDescription {
    return { backend: this.backend, location: this.location };
  }

  async list(filter?: RecordFilter): Promise<CatalogRecord[]> {
    const records = await this.#load();
    const result = filterRecords(records, filter);
    logger.debug("store.list", { backend: this.backend, count: result.length });
    return result;
  }

  async get(name: string): Promise<CatalogRecord> {
    const records = await this.#load();
    const record = findRecord(records, name);
    if (!record) {
      throw new NotFoundError(name);
    }
    return cloneRecord(record);
  }

  async create(record: CatalogRecord): Promise<CatalogRecord> {
    const valid = validateRecord(record);

    return this.#mutex.withLock(async () => {
      const records = await this.#loadLocked();
      await this.#persist(insertRecord(records, valid));
      logger.info("store.create", { backend: this.backend, name: valid.name });
      return cloneRecord(valid);
    });
  }

  async update(name: string, fields: RecordUpdate): Promise<CatalogRecord> {
    const update = validateUpdate(fields);

    return this.#mutex.withLock(async () => {
      const records = await this.#loadLocked();
      const merged = mergeRecord(records, name, update);
      await this.#persist(merged.records);
      logger.info("store.update", {
        backend: this.backend,
        name,
        fields: Object.keys(update),
      });
      return cloneRecord(merged.record);
    });
  }

  async delete(name: string): Promise<void> {
    await this.#mutex.withLock(async () => {
      const records = await this.#loadLocked();
      await this.#persist(removeRecord(records, name));
      logger.info("store.delete", { backend: this.backend, name });
    });
  }

  /**
   * Lock-free read; falls back to seeding under the mutex
   */
  async #load(): Promise<CatalogRecord[]> {
    const raw = await this.readDocument();
    if (raw !== null) {
      return this.#parse(raw);
    }
    return this.#mutex.withLock(() => this.#loadLocked());
  }

  /**
   * Read with the mutex held, seeding a missing document
   */
  async #loadLocked(): Promise<CatalogRecord[]> {
    const raw = await this.readDocument();
    if (raw !== null) {
      return this.#parse(raw);
    }

    const records = await this.#seed();
    await this.writeDocument(serializeDocument(records));
    logger.info("store.seeded", {
      backend: this.backend,
      location: this.location,
      count: records.length,
    });
    return records;
  }

  #parse(raw: string): CatalogRecord[] {
    try {
      return parseDocument(raw, this.location);
    } catch (err) {
      logger.error("store.malformed", {
        backend: this.backend,
        location: this.location,
        err_message: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  }

  async #persist(records: CatalogRecord[]): Promise<void> {
    await this.writeDocument(serializeDocument(records));
  }
}
