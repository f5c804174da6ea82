/**
 * Backend selection
 *
 * The only module that knows both adapters exist. Everything else receives
 * the CatalogStore built here at startup.
 */

import { S3Client } from "@aws-sdk/client-s3";
import { LocalCatalogStore } from "./adapters/local.js";
import { RemoteCatalogStore } from "./adapters/remote.js";
import type { CatalogConfig, RemoteBackendConfig } from "./config.js";
import type { CatalogStore, SeedLoader } from "./contract.js";
import { InstrumentedCatalogStore, type InstrumentationOptions } from "./instrumented.js";
import { S3ObjectStore, type ObjectStore } from "./object-store.js";
import { logger } from "./observability/logger.js";
import { fileSeed, loadDefaultSeed } from "./seed.js";

export interface SelectorOptions {
  /** Overrides config.seedPath and the bundled dataset */
  seed?: SeedLoader;
  /** Object store for the remote backend; built from config when omitted */
  objectStore?: ObjectStore;
  /** Passed to the instrumentation wrapper; non-empty hooks enable it regardless of config.instrument */
  instrumentation?: InstrumentationOptions;
}

/**
 * Build the S3 client for a remote backend
 */
export function createS3Client(config: RemoteBackendConfig): S3Client {
  return new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle,
    maxAttempts: config.maxAttempts,
    credentials:
      config.credentials.source === "static"
        ? {
            accessKeyId: config.credentials.accessKeyId,
            secretAccessKey: config.credentials.secretAccessKey,
          }
        : undefined,
  });
}

/**
 * Construct the one store instance for this process
 *
 * Leaves the shared logger's level alone; config.logLevel is applied once by
 * the process entry point.
 *
 * @example
 * ```typescript
 * const store = createCatalogStore(loadConfig());
 * const services = await store.list();
 * ```
 */
export function createCatalogStore(
  config: CatalogConfig,
  options: SelectorOptions = {}
): CatalogStore {
  const seed = options.seed ?? (config.seedPath ? fileSeed(config.seedPath) : loadDefaultSeed);

  let store: CatalogStore;
  if (config.storage.backend === "remote") {
    const objectStore =
      options.objectStore ??
      new S3ObjectStore(createS3Client(config.storage), config.storage.bucket);
    store = new RemoteCatalogStore({ objectStore, key: config.storage.key, seed });
  } else {
    store = new LocalCatalogStore({ filePath: config.storage.filePath, seed });
  }

  // Hooks passed by the caller force the wrapper even when config.instrument is off
  const instrument = config.instrument || (options.instrumentation?.hooks?.length ?? 0) > 0;

  logger.info("store.selected", { ...store.describe(), instrumented: instrument });

  return instrument ? new InstrumentedCatalogStore(store, options.instrumentation) : store;
}
