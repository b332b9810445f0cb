// packages/temporal/src/errors.ts
import Database from "better-sqlite3";

export type TemporalErrorCode =
  | "NOT_FOUND"
  | "VALIDATION_FAILED"
  | "UPSERT_CONFLICT"
  | "STORAGE_UNAVAILABLE";

/**
 * Base class for every error the store (and the tracker facade) raises on purpose.
 * Callers switch on `code` rather than on message text.
 */
export abstract class TemporalStoreError extends Error {
  abstract readonly code: TemporalErrorCode;
  readonly transient: boolean;

  constructor(message: string, opts: { cause?: unknown; transient?: boolean } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.transient = opts.transient ?? false;
  }
}

export class NotFoundError extends TemporalStoreError {
  readonly code = "NOT_FOUND" as const;
}

export class ValidationError extends TemporalStoreError {
  readonly code = "VALIDATION_FAILED" as const;
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.issues = issues;
  }
}

export class UpsertConflictError extends TemporalStoreError {
  readonly code = "UPSERT_CONFLICT" as const;

  constructor(message: string, cause?: unknown) {
    super(message, { cause, transient: true });
  }
}

export class StorageUnavailableError extends TemporalStoreError {
  readonly code = "STORAGE_UNAVAILABLE" as const;

  constructor(message: string, cause?: unknown) {
    super(message, { cause, transient: true });
  }
}

export function isTemporalStoreError(err: unknown): err is TemporalStoreError {
  return err instanceof TemporalStoreError;
}

export function httpStatusForError(err: unknown): number {
  if (!isTemporalStoreError(err)) return 500;
  switch (err.code) {
    case "NOT_FOUND":
      return 404;
    case "VALIDATION_FAILED":
      return 400;
    case "UPSERT_CONFLICT":
      return 409;
    case "STORAGE_UNAVAILABLE":
      return 503;
  }
}

const CONFLICT_CODES = new Set([
  "SQLITE_CONSTRAINT_UNIQUE",
  "SQLITE_CONSTRAINT_PRIMARYKEY",
  "SQLITE_BUSY",
  "SQLITE_BUSY_SNAPSHOT",
  "SQLITE_LOCKED",
]);

const UNAVAILABLE_PREFIXES = [
  "SQLITE_CANTOPEN",
  "SQLITE_IOERR",
  "SQLITE_FULL",
  "SQLITE_READONLY",
  "SQLITE_CORRUPT",
  "SQLITE_NOTADB",
];

export type StorageErrorClass = "conflict" | "unavailable" | "other";

export function classifyStorageError(err: unknown): StorageErrorClass {
  if (err instanceof UpsertConflictError) return "conflict";
  if (err instanceof StorageUnavailableError) return "unavailable";
  if (err instanceof Database.SqliteError) {
    const code = err.code;
    if (CONFLICT_CODES.has(code)) return "conflict";
    if (UNAVAILABLE_PREFIXES.some((p) => code.startsWith(p))) return "unavailable";
    return "other";
  }
  // better-sqlite3 throws a plain TypeError once the handle is closed
  if (err instanceof TypeError && /database connection is not open/i.test(err.message)) {
    return "unavailable";
  }
  return "other";
}

/**
 * Rethrow a storage-layer failure as a typed error where it has a meaning for callers.
 * Errors that are already typed pass through untouched.
 */
export function toStoreError(err: unknown, context: string): unknown {
  if (isTemporalStoreError(err)) return err;
  switch (classifyStorageError(err)) {
    case "conflict":
      return new UpsertConflictError(`UPSERT_CONFLICT: ${context}`, err);
    case "unavailable":
      return new StorageUnavailableError(`STORAGE_UNAVAILABLE: ${context}`, err);
    default:
      return err;
  }
}
