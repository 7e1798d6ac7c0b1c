/*********************************************************************
 * src/errors.ts
 *
 * Error hierarchy for the track synchronisation core.
 *
 *   TrackSyncError (abstract)
 *     ├─ ValidationError
 *     │    ├─ ReservedKeywordError
 *     │    └─ DuplicateKeywordError
 *     ├─ IllegalIdentityChangeError
 *     ├─ UnsupportedOperationError
 *     ├─ CannotMergeError
 *     └─ StorageError
 *
 * Nothing in the core catches these; they always reach the caller.
 *********************************************************************/

export abstract class TrackSyncError extends Error {
  public readonly code: string;
  public readonly context: Record<string, unknown>;

  constructor(message: string, code: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;

    Object.setPrototypeOf(this, new.target.prototype);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/* ------------------------------------------------------------------ */
/* Validation – raised before any state is touched                     */
/* ------------------------------------------------------------------ */

export class ValidationError extends TrackSyncError {
  public readonly field?: string;

  constructor(message: string, field?: string, context: Record<string, unknown> = {}) {
    super(message, "VALIDATION_ERROR", { ...context, field });
    this.field = field;
  }
}

/** A plain tag used one of the prefixes the codec reserves for typed fields. */
export class ReservedKeywordError extends ValidationError {
  public readonly keyword: string;

  constructor(keyword: string, setter: string) {
    super(`Do not use "${keyword}" directly, use TrackRecord.${setter}()`, "tags", { keyword });
    this.keyword = keyword;
  }
}

/** An encoded tag string carried the same reserved prefix twice. */
export class DuplicateKeywordError extends ValidationError {
  public readonly prefix: string;

  constructor(prefix: string, raw: string) {
    super(`"${prefix}:" appears more than once in "${raw}"`, "tags", { prefix, raw });
    this.prefix = prefix;
  }
}

/* ------------------------------------------------------------------ */
/* Lifecycle                                                           */
/* ------------------------------------------------------------------ */

export class IllegalIdentityChangeError extends TrackSyncError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, "ILLEGAL_IDENTITY_CHANGE", context);
  }
}

export class UnsupportedOperationError extends TrackSyncError {
  public readonly operation: string;

  constructor(operation: string, collection: string) {
    super(`${collection}: "${operation}" is not supported`, "UNSUPPORTED_OPERATION", {
      operation,
      collection,
    });
    this.operation = operation;
  }
}

export class CannotMergeError extends TrackSyncError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, "CANNOT_MERGE", context);
  }
}

/* ------------------------------------------------------------------ */
/* Storage – whatever a collection adapter raised, wrapped once        */
/* ------------------------------------------------------------------ */

export class StorageError extends TrackSyncError {
  public readonly cause?: unknown;

  constructor(message: string, cause?: unknown, context: Record<string, unknown> = {}) {
    super(message, "STORAGE_ERROR", context);
    this.cause = cause;
  }
}

/** Wrap anything that is not already ours; our own errors pass through untouched. */
export function asStorageError(operation: string, err: unknown): TrackSyncError {
  if (err instanceof TrackSyncError) return err;
  const detail = err instanceof Error ? err.message : String(err);
  return new StorageError(`${operation} failed: ${detail}`, err, { operation });
}
