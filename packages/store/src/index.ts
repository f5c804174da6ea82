/**
 * Service catalog store
 *
 * A whole-document record store with local-file and object-store backends
 */

// Contract and record types
export type { BackendKind, CatalogStore, SeedLoader, StoreDescription } from "./contract.js";
export type { CatalogRecord, RecordFilter, RecordUpdate } from "./record.js";
export { RecordSchema, RecordUpdateSchema, validateRecord, validateUpdate } from "./record.js";

// Document codec
export { DOCUMENT_KEY, parseDocument, serializeDocument } from "./document.js";

// Adapters
export { DocumentCatalogStore, type DocumentStoreOptions } from "./adapters/document-store.js";
export { LocalCatalogStore, type LocalStoreOptions } from "./adapters/local.js";
export { RemoteCatalogStore, type RemoteStoreOptions } from "./adapters/remote.js";
export { S3ObjectStore, isMissingObjectError, type ObjectStore } from "./object-store.js";

// Selection and configuration
export { createCatalogStore, createS3Client, type SelectorOptions } from "./selector.js";
export {
  loadConfig,
  resolvePath,
  type CatalogConfig,
  type Environment,
  type LocalBackendConfig,
  type RemoteBackendConfig,
  type RemoteCredentials,
} from "./config.js";
export { DEFAULT_SEED_PATH, fileSeed, loadDefaultSeed, staticSeed } from "./seed.js";

// Instrumentation
export {
  InstrumentedCatalogStore,
  type InstrumentationHooks,
  type InstrumentationOptions,
  type OperationEvent,
  type OperationName,
} from "./instrumented.js";
export { OperationMetrics, metrics, type OperationStats } from "./observability/metrics.js";
export { Logger, logger, type LogLevel } from "./observability/logger.js";

// Errors
export {
  CatalogStoreError,
  ValidationError,
  DuplicateNameError,
  NotFoundError,
  MalformedDataError,
  UnavailableError,
  ConfigError,
  isCatalogStoreError,
  type CatalogErrorCode,
  type ValidationIssue,
} from "./errors.js";
