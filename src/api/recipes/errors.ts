/**
 * Error taxonomy for recipe storage and the recipe service.
 *
 * Storage backends throw the RecipeStorageFailure subclasses. The service
 * translates them into RecipeServiceError, whose code and status are the
 * only things callers see.
 */

/**
 * Base class for errors raised by storage backends.
 */
export abstract class RecipeStorageFailure extends Error {}

/**
 * The referenced recipe does not exist.
 */
export class RecipeNotFoundError extends RecipeStorageFailure {
  constructor(public readonly recipeId: string) {
    super(`Recipe not found: ${recipeId}`);
    this.name = 'RecipeNotFoundError';
  }
}

/**
 * A recipe with the requested id already exists.
 */
export class RecipeAlreadyExistsError extends RecipeStorageFailure {
  constructor(public readonly recipeId: string) {
    super(`Recipe already exists: ${recipeId}`);
    this.name = 'RecipeAlreadyExistsError';
  }
}

/**
 * Backend-level failure: I/O error, lost connection, corrupt record, aborted call.
 * The original error is kept as `cause` for logging.
 */
export class RecipeStorageError extends RecipeStorageFailure {
  constructor(
    message: string,
    public readonly backend: string,
    options?: { cause?: unknown },
  ) {
    super(message);
    this.name = 'RecipeStorageError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export type RecipeErrorCode = 'VALIDATION_ERROR' | 'NOT_FOUND' | 'ALREADY_EXISTS' | 'STORAGE_ERROR';

/** HTTP status for each caller-visible error code */
export const ERROR_STATUS: Record<RecipeErrorCode, number> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  ALREADY_EXISTS: 409,
  STORAGE_ERROR: 500,
};

/** One schema violation */
export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Caller-visible service error.
 */
export class RecipeServiceError extends Error {
  readonly statusCode: number;

  constructor(
    public readonly code: RecipeErrorCode,
    message: string,
    public readonly details?: ValidationIssue[],
  ) {
    super(message);
    this.name = 'RecipeServiceError';
    this.statusCode = ERROR_STATUS[code];
  }

  toResponse(): { error: string; code: RecipeErrorCode; details?: ValidationIssue[] } {
    return this.details ? { error: this.message, code: this.code, details: this.details } : { error: this.message, code: this.code };
  }
}

/**
 * Throws a RecipeStorageError when the signal has been aborted.
 */
export function throwIfAborted(signal: AbortSignal | undefined, backend: string): void {
  if (signal?.aborted) {
    throw new RecipeStorageError('Storage operation aborted', backend, { cause: signal.reason });
  }
}
