/**
 * Timing utilities for concurrency tests
 */

/**
 * Wait for a specified duration
 * @param ms - Milliseconds to wait
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
