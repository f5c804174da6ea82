/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import { isCatalogStoreError } from "@service-catalog/store";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * Map store errors to CLI exit codes
 * - 0: success
 * - 1: usage/validation/IO/unknown error
 * - 2: record not found
 * - 3: duplicate record name
 */
export function mapErrorToExitCode(error: unknown): number {
  if (error instanceof CliError || error instanceof CommanderError) {
    return error.exitCode;
  }

  if (isCatalogStoreError(error)) {
    switch (error.code) {
      case "E_NOT_FOUND":
        return 2;
      case "E_DUPLICATE_NAME":
        return 3;
      default:
        return 1;
    }
  }

  return 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${error.cause instanceof Error ? error.cause.message : String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
