/**
 * Typed error catalog for the dedup index.
 */

export class IndexError extends Error {
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

// Store failures

export class StorageError extends IndexError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super("STORAGE_ERROR", message, details, options);
  }
}

// Merge failures

export class ChecksumMismatchError extends IndexError {
  constructor(details?: Record<string, unknown>) {
    super("CHECKSUM_MISMATCH", "Checksums differ at merge time", details);
  }
}

export class SymlinkNotMergeableError extends IndexError {
  constructor(details?: Record<string, unknown>) {
    super("SYMLINK_NOT_MERGEABLE", "Symlinks cannot be merged", details);
  }
}

// Relocation failures

export class RelocationError extends IndexError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("RELOCATION_REFUSED", message, details);
  }
}

/**
 * Runs a store operation, rethrowing anything that is not already an
 * IndexError as a StorageError carrying the original as `cause`.
 */
export function withStorage<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err: unknown) {
    if (err instanceof IndexError) {
      throw err;
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new StorageError(`${operation} failed: ${message}`, { operation }, {
      cause: err,
    });
  }
}
