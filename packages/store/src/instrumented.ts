/**
 * Observational decorator for any CatalogStore
 *
 * Records timing, result size and outcome for every call, then hands the
 * original result or error back untouched. Removing the wrapper never
 * changes store behavior.
 */

import { performance } from "node:perf_hooks";
import type { CatalogStore, StoreDescription } from "./contract.js";
import { isCatalogStoreError } from "./errors.js";
import { logger } from "./observability/logger.js";
import { metrics as defaultMetrics, type OperationMetrics } from "./observability/metrics.js";
import type { CatalogRecord, RecordFilter, RecordUpdate } from "./record.js";

export type OperationName = "list" | "get" | "create" | "update" | "delete";

export interface OperationEvent {
  operation: OperationName;
  backend: StoreDescription["backend"];
  location: string;
  /** Target record, for single-record operations */
  recordName?: string;
  /** Epoch milliseconds */
  startedAt: number;
  endedAt: number;
  durationMs: number;
  ok: boolean;
  /** Error code on failure ("UNKNOWN" for errors outside the catalog taxonomy) */
  errorCode?: string;
  /** Number of records returned by list */
  resultCount?: number;
}

/**
 * Span/event sink for an external telemetry pipeline
 */
export interface InstrumentationHooks {
  onOperation(event: OperationEvent): void;
}

export interface InstrumentationOptions {
  metrics?: OperationMetrics;
  hooks?: InstrumentationHooks[];
}

function recordNameOf(record: unknown): string | undefined {
  if (typeof record === "object" && record !== null && "name" in record) {
    return typeof record.name === "string" ? record.name : undefined;
  }
  return undefined;
}

export class InstrumentedCatalogStore implements CatalogStore {
  readonly #inner: CatalogStore;
  readonly #metrics: OperationMetrics;
  readonly #hooks: InstrumentationHooks[];

  constructor(inner: CatalogStore, options: InstrumentationOptions = {}) {
    this.#inner = inner;
    this.#metrics = options.metrics ?? defaultMetrics;
    this.#hooks = options.hooks ?? [];
  }

  describe(): StoreDescription {
    return this.#inner.describe();
  }

  async list(filter?: RecordFilter): Promise<CatalogRecord[]> {
    return this.#run("list", undefined, () => this.#inner.list(filter), (records) => records.length);
  }

  async get(name: string): Promise<CatalogRecord> {
    return this.#run("get", name, () => this.#inner.get(name));
  }

  async create(record: CatalogRecord): Promise<CatalogRecord> {
    // Input is unvalidated here; the inner store reports bad records
    return this.#run("create", recordNameOf(record), () => this.#inner.create(record));
  }

  async update(name: string, fields: RecordUpdate): Promise<CatalogRecord> {
    return this.#run("update", name, () => this.#inner.update(name, fields));
  }

  async delete(name: string): Promise<void> {
    return this.#run("delete", name, () => this.#inner.delete(name));
  }

  async #run<T>(
    operation: OperationName,
    recordName: string | undefined,
    fn: () => Promise<T>,
    count?: (result: T) => number
  ): Promise<T> {
    const startedAt = Date.now();
    const start = performance.now();

    try {
      const result = await fn();
      this.#finish(operation, recordName, startedAt, start, {
        ok: true,
        resultCount: count?.(result),
      });
      return result;
    } catch (err) {
      this.#finish(operation, recordName, startedAt, start, {
        ok: false,
        errorCode: isCatalogStoreError(err) ? err.code : "UNKNOWN",
        errorMessage: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  }

  #finish(
    operation: OperationName,
    recordName: string | undefined,
    startedAt: number,
    start: number,
    outcome: { ok: boolean; resultCount?: number; errorCode?: string; errorMessage?: string }
  ): void {
    const durationMs = performance.now() - start;
    const { backend, location } = this.#inner.describe();

    this.#metrics.record(backend, operation, durationMs, outcome.errorCode);

    if (outcome.ok) {
      logger.debug("store.op.success", {
        op: operation,
        backend,
        duration_ms: durationMs,
        count: outcome.resultCount,
      });
    } else {
      logger.warn("store.op.error", {
        op: operation,
        backend,
        duration_ms: durationMs,
        err_code: outcome.errorCode,
        err_message: outcome.errorMessage,
      });
    }

    const event: OperationEvent = {
      operation,
      backend,
      location,
      recordName,
      startedAt,
      endedAt: startedAt + durationMs,
      durationMs,
      ok: outcome.ok,
      errorCode: outcome.errorCode,
      resultCount: outcome.resultCount,
    };

    for (const hook of this.#hooks) {
      try {
        hook.onOperation(event);
      } catch (hookErr) {
        // A broken telemetry sink must not change the store's result
        logger.warn("store.hook.error", {
          op: operation,
          err_message: hookErr instanceof Error ? hookErr.message : String(hookErr),
        });
      }
    }
  }
}
