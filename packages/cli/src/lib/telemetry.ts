/**
 * Telemetry and observability helpers
 */

import type { InstrumentationHooks, OperationEvent } from "@service-catalog/store";

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Format a metric line: `metric <key> k=v k=v`
 */
export function formatMetric(key: string, fields: Record<string, unknown>): string {
  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    if (v !== undefined) {
      parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
    }
  }
  return parts.join(" ") + "\n";
}

/**
 * Instrumentation hook that writes one metric line per store operation
 */
export function metricHook(write: (text: string) => void): InstrumentationHooks {
  return {
    onOperation(event: OperationEvent): void {
      write(
        formatMetric(`store.${event.operation}`, {
          backend: event.backend,
          duration_ms: event.durationMs.toFixed(2),
          success: event.ok,
          err_code: event.errorCode,
          count: event.resultCount,
        })
      );
    },
  };
}
