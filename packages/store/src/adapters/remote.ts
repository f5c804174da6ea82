/**
 * Remote adapter: the catalog document is a single object in an object store
 *
 * Mutations are read-modify-write over the network. Calls on one instance
 * are serialized by its mutex, but nothing coordinates separate processes:
 * two writers racing on the same object resolve as last-write-wins.
 *
 * Failures reaching the store surface as UnavailableError and are not
 * retried here.
 */

import { UnavailableError } from "../errors.js";
import { logger } from "../observability/logger.js";
import type { ObjectStore } from "../object-store.js";
import { DocumentCatalogStore, type DocumentStoreOptions } from "./document-store.js";

export interface RemoteStoreOptions extends DocumentStoreOptions {
  objectStore: ObjectStore;
  /** Object key holding the document */
  key: string;
}

export class RemoteCatalogStore extends DocumentCatalogStore {
  protected readonly backend = "remote";
  protected readonly location: string;
  readonly #objectStore: ObjectStore;
  readonly #key: string;

  constructor(options: RemoteStoreOptions) {
    super(options);
    this.#objectStore = options.objectStore;
    this.#key = options.key;
    this.location = options.objectStore.urlFor(options.key);
    logger.info("store.init", { backend: this.backend, location: this.location });
  }

  protected async readDocument(): Promise<string | null> {
    try {
      return await this.#objectStore.getObject(this.#key);
    } catch (err) {
      this.#logFailure("read", err);
      throw new UnavailableError(this.location, "read", { cause: err });
    }
  }

  protected async writeDocument(content: string): Promise<void> {
    try {
      await this.#objectStore.putObject(this.#key, content);
    } catch (err) {
      this.#logFailure("write", err);
      throw new UnavailableError(this.location, "write", { cause: err });
    }
  }

  #logFailure(operation: "read" | "write", err: unknown): void {
    logger.error("store.remote.unavailable", {
      location: this.location,
      operation,
      err_name: err instanceof Error ? err.name : "unknown",
      err_message: err instanceof Error ? err.message : String(err),
    });
  }
}
