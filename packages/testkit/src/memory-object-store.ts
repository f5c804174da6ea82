/**
 * In-process object store for exercising the remote adapter
 */

import type { ObjectStore } from "@service-catalog/store";
import { sleep } from "./timers.js";

export type FailingOperation = "get" | "put" | "any";

export interface MemoryObjectStoreOptions {
  bucket?: string;
  /** Delay applied to every call, to widen interleaving windows */
  latencyMs?: number;
}

export class MemoryObjectStore implements ObjectStore {
  readonly #objects = new Map<string, string>();
  readonly #bucket: string;
  readonly #latencyMs: number;
  #failure: { error: Error; operation: FailingOperation } | null = null;

  /** Number of getObject calls served */
  gets = 0;
  /** Number of putObject calls served */
  puts = 0;

  constructor(options: MemoryObjectStoreOptions = {}) {
    this.#bucket = options.bucket ?? "test-bucket";
    this.#latencyMs = options.latencyMs ?? 0;
  }

  urlFor(key: string): string {
    return `memory://${this.#bucket}/${key}`;
  }

  async getObject(key: string): Promise<string | null> {
    await this.#tick("get");
    this.gets++;
    return this.#objects.get(key) ?? null;
  }

  async putObject(key: string, body: string): Promise<void> {
    await this.#tick("put");
    this.puts++;
    this.#objects.set(key, body);
  }

  /**
   * Place an object directly, bypassing counters
   */
  setRaw(key: string, body: string): void {
    this.#objects.set(key, body);
  }

  getRaw(key: string): string | undefined {
    return this.#objects.get(key);
  }

  /**
   * Make following calls reject with `err` until cleared with null
   */
  failWith(err: Error | null, operation: FailingOperation = "any"): void {
    this.#failure = err ? { error: err, operation } : null;
  }

  async #tick(operation: "get" | "put"): Promise<void> {
    if (this.#latencyMs > 0) {
      await sleep(this.#latencyMs);
    }
    if (this.#failure && (this.#failure.operation === "any" || this.#failure.operation === operation)) {
      throw this.#failure.error;
    }
  }
}
