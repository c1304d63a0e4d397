/**
 * Error hierarchy for sharded Bloom filters.
 *
 * Every error thrown by this package extends {@link BloomError}, which carries
 * a `code` for programmatic handling and the underlying `cause` when one
 * exists.
 *
 * @example
 * ```typescript
 * try {
 *   await ShardedBloom.restore(store, 'visitors');
 * } catch (error) {
 *   if (error instanceof NotFoundError) {
 *     // create it instead
 *   }
 * }
 * ```
 */

export type BloomErrorCode =
  | 'INVALID_PARAMETER'
  | 'ALREADY_EXISTS'
  | 'NOT_FOUND'
  | 'STORAGE_ERROR'
  | 'RESTORE_ERROR'
  | 'HASH_EXHAUSTED'
  | 'OUT_OF_RANGE';

export class BloomError extends Error {
  /** Error code for programmatic handling */
  readonly code: BloomErrorCode;

  constructor(message: string, code: BloomErrorCode, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'BloomError';
    this.code = code;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/** Capacity or error rate outside its domain. Raised before any I/O. */
export class InvalidParameterError extends BloomError {
  constructor(message: string) {
    super(message, 'INVALID_PARAMETER');
    this.name = 'InvalidParameterError';
  }
}

export class AlreadyExistsError extends BloomError {
  readonly filterName: string;

  constructor(filterName: string) {
    super(`bloom filter "${filterName}" already exists`, 'ALREADY_EXISTS');
    this.name = 'AlreadyExistsError';
    this.filterName = filterName;
  }
}

export class NotFoundError extends BloomError {
  readonly filterName: string;

  constructor(filterName: string) {
    super(`bloom filter "${filterName}" does not exist`, 'NOT_FOUND');
    this.name = 'NotFoundError';
    this.filterName = filterName;
  }
}

export type StorageOperation = 'create' | 'save' | 'load' | 'add' | 'exists';

/**
 * Failure reported by the bitmap store, transport and command errors alike.
 * The original error is kept as `cause`.
 */
export class StorageError extends BloomError {
  readonly operation: StorageOperation;
  readonly filterName: string;

  constructor(
    filterName: string,
    operation: StorageOperation,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} failed for bloom filter "${filterName}": ${reason}`, 'STORAGE_ERROR', {
      cause,
    });
    this.name = 'StorageError';
    this.operation = operation;
    this.filterName = filterName;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), operation: this.operation, filterName: this.filterName };
  }
}

/** A metadata record exists but one of its fields cannot be parsed. */
export class RestoreError extends BloomError {
  readonly filterName: string;
  readonly field: string;

  constructor(filterName: string, field: string, detail: string) {
    super(`cannot restore bloom filter "${filterName}": invalid ${field} (${detail})`, 'RESTORE_ERROR');
    this.name = 'RestoreError';
    this.filterName = filterName;
    this.field = field;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), filterName: this.filterName, field: this.field };
  }
}

export class InternalError extends BloomError {
  constructor(message: string, code: 'HASH_EXHAUSTED' | 'OUT_OF_RANGE') {
    super(message, code);
    this.name = 'InternalError';
  }
}
