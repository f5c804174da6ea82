/**
 * Local adapter: the catalog document is a JSON file on disk
 */

import * as path from "node:path";
import { atomicWrite, readFileIfExists } from "../io.js";
import { logger } from "../observability/logger.js";
import { DocumentCatalogStore, type DocumentStoreOptions } from "./document-store.js";

export interface LocalStoreOptions extends DocumentStoreOptions {
  /** Path to the document file; resolved to an absolute path */
  filePath: string;
}

/**
 * Catalog store backed by a local JSON file
 *
 * Writes go to a temp file that is atomically renamed over the target, so a
 * crash mid-write leaves the previous document intact.
 *
 * @example
 * ```typescript
 * const store = new LocalCatalogStore({
 *   filePath: './data/services.json',
 *   seed: loadDefaultSeed,
 * });
 * await store.create({ name: 'Queue', category: 'Messaging', description: 'Durable queues' });
 * ```
 */
export class LocalCatalogStore extends DocumentCatalogStore {
  protected readonly backend = "local";
  protected readonly location: string;

  constructor(options: LocalStoreOptions) {
    super(options);
    this.location = path.resolve(options.filePath);
    logger.info("store.init", { backend: this.backend, location: this.location });
  }

  get filePath(): string {
    return this.location;
  }

  protected async readDocument(): Promise<string | null> {
    return readFileIfExists(this.location);
  }

  protected async writeDocument(content: string): Promise<void> {
    await atomicWrite(this.location, content);
  }
}
