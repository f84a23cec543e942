/**
 * Management Module - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Infrastructure Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Statement failed in the store (constraint violation, malformed SQL, closed store).
 */
export interface DatabaseError {
  readonly type: 'DatabaseError';
  readonly message: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Domain Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Input rejected before anything was written.
 */
export interface ValidationError {
  readonly type: 'ValidationError';
  readonly message: string;
  readonly field: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

export type ManagementError = DatabaseError | ValidationError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createDatabaseError = (message: string, cause?: unknown): DatabaseError => ({
  type: 'DatabaseError',
  message,
  retryable: false,
  cause,
});

export const createValidationError = (field: string, message: string): ValidationError => ({
  type: 'ValidationError',
  message,
  field,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const MANAGEMENT_ERROR_HTTP_STATUS: Record<ManagementError['type'], number> = {
  DatabaseError: 500,
  ValidationError: 400,
};

export const getHttpStatusForError = (error: ManagementError): number => {
  return MANAGEMENT_ERROR_HTTP_STATUS[error.type];
};
