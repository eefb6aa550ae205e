/**
 * Error taxonomy for the store.
 *
 * Fatal conditions (StorageUnavailable, IncompatibleSchema, MigrationFailed)
 * stop startup; everything else is recoverable and surfaced at the operation
 * that raised it.
 */

export type ErrorCode =
  | 'STORAGE_UNAVAILABLE'
  | 'INCOMPATIBLE_SCHEMA'
  | 'MIGRATION_FAILED'
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'CONSTRAINT_VIOLATION'
  | 'OPERATION_CANCELLED'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'INTERNAL_ERROR';

/**
 * Custom Error class with status code
 */
export class AppError extends Error {
  statusCode: number;
  code: ErrorCode;
  isOperational: boolean;

  constructor(message: string, statusCode: number = 500, code: ErrorCode = 'INTERNAL_ERROR') {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = true;

    Error.captureStackTrace(this, this.constructor);
  }

  /** Fatal errors prevent the application from reaching a usable state */
  get isFatal(): boolean {
    return false;
  }
}

export class StorageUnavailableError extends AppError {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, 503, 'STORAGE_UNAVAILABLE');
    this.path = path;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  get isFatal(): boolean {
    return true;
  }
}

export class IncompatibleSchemaError extends AppError {
  readonly storeVersion: number;
  readonly supportedVersion: number;

  constructor(storeVersion: number, supportedVersion: number, path?: string) {
    super(
      `${path ? `Store ${path}` : 'Store'} has schema version ${storeVersion}, which does not match the supported version ${supportedVersion}`,
      500,
      'INCOMPATIBLE_SCHEMA'
    );
    this.storeVersion = storeVersion;
    this.supportedVersion = supportedVersion;
  }

  get isFatal(): boolean {
    return true;
  }
}

export class MigrationFailedError extends AppError {
  readonly version: number;

  constructor(version: number, name: string, cause: unknown) {
    super(
      `Migration ${version} (${name}) failed and was rolled back: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      500,
      'MIGRATION_FAILED'
    );
    this.version = version;
    this.cause = cause;
  }

  get isFatal(): boolean {
    return true;
  }
}

export class ValidationError extends AppError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`Invalid ${field}: ${message}`, 400, 'VALIDATION_ERROR');
    this.field = field;
  }
}

export class NotFoundError extends AppError {
  readonly entity: string;
  readonly key: string | number;

  constructor(entity: string, key: string | number) {
    super(`${entity} ${key} not found`, 404, 'NOT_FOUND');
    this.entity = entity;
    this.key = key;
  }
}

export class ConstraintViolationError extends AppError {
  readonly constraint: string;
  readonly detail: Record<string, string | number>;

  constructor(constraint: string, message: string, detail: Record<string, string | number> = {}) {
    super(message, 409, 'CONSTRAINT_VIOLATION');
    this.constraint = constraint;
    this.detail = detail;
  }
}

export class OperationCancelledError extends AppError {
  constructor(operation: string) {
    super(`${operation} was cancelled`, 499, 'OPERATION_CANCELLED');
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Authentication required') {
    super(message, 401, 'UNAUTHORIZED');
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string) {
    super(message, 403, 'FORBIDDEN');
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * better-sqlite3 raises SqliteError with a string `code` such as
 * SQLITE_CONSTRAINT_UNIQUE; this reads it without depending on the class.
 */
export function sqliteCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
