/**
 * Typed error catalog for the index store, scanner, importer, search engine
 * and task orchestrator.
 */

export interface ErrorDescription {
  name: string;
  errorCode: string;
  message: string;
}

export class FinderError extends Error {
  constructor(
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

/** The durable medium is unreachable or corrupt. */
export class StorageError extends FinderError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super("STORAGE_FAILURE", message, details, options);
  }
}

/** The scan root is missing, not a directory, or unreadable. */
export class ScanError extends FinderError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super("SCAN_FAILED", message, details, options);
  }
}

/** Malformed identifier input, empty query or out-of-range argument. */
export class ValidationError extends FinderError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("VALIDATION_FAILED", message, details);
  }
}

/** config.json is unreadable, not JSON, or fails the schema. */
export class ConfigError extends FinderError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super("CONFIG_INVALID", message, details, options);
  }
}

/** A request arrived while an invocation of the same kind is running. */
export class BusyError extends FinderError {
  constructor(kind: string) {
    super("TASK_BUSY", `A ${kind} task is already running`, { kind });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Flattens any thrown value into the payload carried by a failed task message. */
export function describeError(err: unknown): ErrorDescription {
  if (err instanceof FinderError) {
    return { name: err.name, errorCode: err.errorCode, message: err.message };
  }
  if (err instanceof Error) {
    return { name: err.name, errorCode: "INTERNAL", message: err.message };
  }
  return { name: "Error", errorCode: "INTERNAL", message: String(err) };
}
