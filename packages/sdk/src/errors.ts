/**
 * Error types for datamap operations
 *
 * Invariants:
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - All errors support a `cause` property for wrapping underlying errors
 */

import type { ZodIssue } from "zod";

/**
 * Base class for all datamap errors
 */
export abstract class DataMapError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a required field is missing from an entry
 */
export class MissingFieldError extends DataMapError {
  readonly code = "E_MISSING_FIELD";

  constructor(
    public readonly field: string,
    message = `Entry is missing required field "${field}"`,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * Thrown when an id or a (language, name) pair is already taken
 */
export class DuplicateKeyError extends DataMapError {
  readonly code = "E_DUPLICATE_KEY";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }

  static forId(id: number): DuplicateKeyError {
    return new DuplicateKeyError(`An entry with id ${id} already exists`);
  }

  static forName(language: string, name: string, ownerId: number): DuplicateKeyError {
    return new DuplicateKeyError(
      `Name "${name}" (${language}) is already used by entry ${ownerId}`
    );
  }
}

/**
 * Thrown when an id, field or language cannot be found
 */
export class KeyNotFoundError extends DataMapError {
  readonly code = "E_KEY_NOT_FOUND";

  constructor(
    public readonly key: string | number,
    message = `Key not found: ${String(key)}`,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * Thrown when an id or a name map is malformed
 */
export class InvalidEntryError extends DataMapError {
  readonly code = "E_INVALID_ENTRY";

  constructor(
    message: string,
    public readonly issues: ZodIssue[] = [],
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}
