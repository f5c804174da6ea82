/**
 * Metrics tracking for store operations
 */

const MAX_SAMPLES = 100;

export interface OperationStats {
  calls: number;
  errors: number;
  /** Error count per error code */
  errorsByCode: Record<string, number>;
  /** Most recent durations, oldest first */
  durationMs: number[];
}

export class OperationMetrics {
  #stats = new Map<string, OperationStats>();

  /**
   * Get or create stats for an operation
   */
  #getStats(backend: string, operation: string): OperationStats {
    const key = `${backend}/${operation}`;
    let stats = this.#stats.get(key);
    if (!stats) {
      stats = { calls: 0, errors: 0, errorsByCode: {}, durationMs: [] };
      this.#stats.set(key, stats);
    }
    return stats;
  }

  /**
   * Record a completed call
   * @param errorCode - Set when the call failed
   */
  record(backend: string, operation: string, durationMs: number, errorCode?: string): void {
    const stats = this.#getStats(backend, operation);
    stats.calls++;

    if (errorCode !== undefined) {
      stats.errors++;
      stats.errorsByCode[errorCode] = (stats.errorsByCode[errorCode] ?? 0) + 1;
    }

    stats.durationMs.push(durationMs);
    // Sliding window of MAX_SAMPLES
    if (stats.durationMs.length > MAX_SAMPLES) {
      stats.durationMs.shift();
    }
  }

  getStats(backend: string, operation: string): OperationStats | undefined {
    return this.#stats.get(`${backend}/${operation}`);
  }

  getAllStats(): Map<string, OperationStats> {
    return new Map(this.#stats);
  }

  /**
   * Calculate p95 for a list of samples
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  getP95Duration(backend: string, operation: string): number {
    return this.getP95(this.getStats(backend, operation)?.durationMs ?? []);
  }

  reset(): void {
    this.#stats.clear();
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new OperationMetrics();
