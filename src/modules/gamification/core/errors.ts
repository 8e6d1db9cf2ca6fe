/**
 * Gamification Module - Domain Errors
 *
 * All errors are plain values with a 'type' discriminator, returned through neverthrow Results.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Error Interfaces
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Referenced lesson, course or achievement does not exist.
 */
export interface NotFoundError {
  readonly type: 'NotFoundError';
  readonly message: string;
  readonly resource: 'lesson' | 'course' | 'achievement';
  readonly id: string;
}

/**
 * Explicit completion requested below the completion threshold.
 */
export interface InsufficientProgressError {
  readonly type: 'InsufficientProgressError';
  readonly message: string;
  readonly lessonId: string;
  readonly completionPercentage: number;
  readonly required: number;
}

/**
 * Input rejected before touching the store.
 */
export interface InvalidInputError {
  readonly type: 'InvalidInputError';
  readonly message: string;
  readonly field: string;
}

/**
 * Write conflict on the same user's rows that outlived the retry budget.
 */
export interface ConcurrencyConflictError {
  readonly type: 'ConcurrencyConflictError';
  readonly message: string;
  readonly retryable: true;
  readonly cause?: unknown;
}

/**
 * The durable store failed. Callers own retry and backoff.
 */
export interface StoreUnavailableError {
  readonly type: 'StoreUnavailableError';
  readonly message: string;
  readonly retryable: true;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

export type GamificationError =
  | NotFoundError
  | InsufficientProgressError
  | InvalidInputError
  | ConcurrencyConflictError
  | StoreUnavailableError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createNotFoundError = (resource: NotFoundError['resource'], id: string): NotFoundError => ({
  type: 'NotFoundError',
  message: `The ${resource} '${id}' does not exist`,
  resource,
  id,
});

export const createInsufficientProgressError = (
  lessonId: string,
  completionPercentage: number,
  required: number
): InsufficientProgressError => ({
  type: 'InsufficientProgressError',
  message: `Lesson '${lessonId}' is at ${String(completionPercentage)}%; at least ${String(required)}% is required to mark it complete`,
  lessonId,
  completionPercentage,
  required,
});

export const createInvalidInputError = (field: string, message: string): InvalidInputError => ({
  type: 'InvalidInputError',
  message,
  field,
});

export const createConcurrencyConflictError = (
  message: string,
  cause?: unknown
): ConcurrencyConflictError => ({
  type: 'ConcurrencyConflictError',
  message,
  retryable: true,
  cause,
});

export const createStoreUnavailableError = (
  message: string,
  cause?: unknown
): StoreUnavailableError => ({
  type: 'StoreUnavailableError',
  message,
  retryable: true,
  cause,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const GAMIFICATION_ERROR_HTTP_STATUS: Record<GamificationError['type'], number> = {
  NotFoundError: 404,
  InsufficientProgressError: 422,
  InvalidInputError: 400,
  ConcurrencyConflictError: 409,
  StoreUnavailableError: 503,
};

export const getHttpStatusForError = (error: GamificationError): number => {
  return GAMIFICATION_ERROR_HTTP_STATUS[error.type];
};
