/**
 * Error types for catalog store operations
 *
 * Invariants:
 * - Every failure mode has its own class with a stable `name` and `code`
 * - All errors support a `cause` property for wrapping underlying errors
 * - Storage-level errors include the backend location in the message
 */

/**
 * A single field-level validation problem
 */
export interface ValidationIssue {
  /** Dotted path to the offending field ("" for the record itself) */
  path: string;
  message: string;
}

/**
 * Base class for all catalog store errors
 */
export abstract class CatalogStoreError extends Error {
  abstract readonly code: CatalogErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export type CatalogErrorCode =
  | "E_VALIDATION"
  | "E_DUPLICATE_NAME"
  | "E_NOT_FOUND"
  | "E_MALFORMED_DATA"
  | "E_UNAVAILABLE"
  | "E_CONFIG";

/**
 * Thrown when a record or update has empty, missing or unknown fields
 */
export class ValidationError extends CatalogStoreError {
  readonly code = "E_VALIDATION";

  constructor(
    public readonly issues: ValidationIssue[],
    options?: ErrorOptions
  ) {
    super(`Invalid record: ${issues.map(formatIssue).join("; ")}`, options);
  }
}

/**
 * Thrown when creating a record whose name is already taken
 */
export class DuplicateNameError extends CatalogStoreError {
  readonly code = "E_DUPLICATE_NAME";

  constructor(
    public readonly recordName: string,
    options?: ErrorOptions
  ) {
    super(`Record already exists: ${recordName}`, options);
  }
}

/**
 * Thrown when no record has the requested name
 */
export class NotFoundError extends CatalogStoreError {
  readonly code = "E_NOT_FOUND";

  constructor(
    public readonly recordName: string,
    options?: ErrorOptions
  ) {
    super(`Record not found: ${recordName}`, options);
  }
}

/**
 * Thrown when a persisted document (or seed dataset) cannot be parsed.
 * The document is never repaired or rewritten after this error.
 */
export class MalformedDataError extends CatalogStoreError {
  readonly code = "E_MALFORMED_DATA";

  constructor(
    public readonly location: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Malformed catalog document at ${location}: ${reason}`, options);
  }
}

/**
 * Thrown when the backing file or object store cannot be reached
 */
export class UnavailableError extends CatalogStoreError {
  readonly code = "E_UNAVAILABLE";

  constructor(
    public readonly location: string,
    operation: "read" | "write",
    options?: ErrorOptions
  ) {
    super(`Catalog storage unavailable (${operation}): ${location}`, options);
  }
}

/**
 * Thrown when configuration values are missing or invalid
 */
export class ConfigError extends CatalogStoreError {
  readonly code = "E_CONFIG";

  constructor(
    public readonly issues: ValidationIssue[],
    options?: ErrorOptions
  ) {
    super(`Invalid configuration: ${issues.map(formatIssue).join("; ")}`, options);
  }
}

function formatIssue(issue: ValidationIssue): string {
  return issue.path ? `${issue.path}: ${issue.message}` : issue.message;
}

export function isCatalogStoreError(err: unknown): err is CatalogStoreError {
  return err instanceof CatalogStoreError;
}
