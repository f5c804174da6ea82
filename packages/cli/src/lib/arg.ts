/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { CliError } from "./errors.js";

/**
 * Parse JSON with descriptive error messages
 * Used inside command actions, so failures are CliErrors rather than commander errors
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new CliError(`Invalid JSON in ${source}: ${err.message}`, { cause: err });
    }
    throw err;
  }
}

/**
 * Parse a JSON object argument (record or update payload)
 */
export function parseJsonObject(value: string, source: string): Record<string, unknown> {
  const parsed = parseJson(value, source);
  if (!isPlainObject(parsed)) {
    throw new CliError(`${source} must be a JSON object`);
  }
  return parsed;
}

/**
 * Merge explicit field flags over a JSON payload; unset flags are skipped
 */
export function mergeFields(
  base: Record<string, unknown>,
  fields: Record<string, string | undefined>
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return merged;
}

/**
 * Validate a backend selection flag (commander argParser)
 */
export function parseBackend(value: string): "local" | "remote" {
  if (value !== "local" && value !== "remote") {
    throw new InvalidArgumentError('backend must be "local" or "remote"');
  }
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
