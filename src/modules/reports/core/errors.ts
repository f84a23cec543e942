/**
 * Reports Module - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Infrastructure Errors
// ─────────────────────────────────────────────────────────────────────────────

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
 * No report with the requested id.
 */
export interface ReportNotFoundError {
  readonly type: 'ReportNotFoundError';
  readonly message: string;
  readonly reportId: string;
}

/**
 * A required report parameter was absent or blank. The report was not run.
 */
export interface MissingReportParameterError {
  readonly type: 'MissingReportParameterError';
  readonly message: string;
  readonly reportId: string;
  readonly field: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

export type ReportsError = DatabaseError | ReportNotFoundError | MissingReportParameterError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createDatabaseError = (message: string, cause?: unknown): DatabaseError => ({
  type: 'DatabaseError',
  message,
  retryable: false,
  cause,
});

export const createReportNotFoundError = (reportId: string): ReportNotFoundError => ({
  type: 'ReportNotFoundError',
  message: `Report '${reportId}' not found`,
  reportId,
});

export const createMissingReportParameterError = (
  reportId: string,
  field: string
): MissingReportParameterError => ({
  type: 'MissingReportParameterError',
  message: `Report '${reportId}' requires a non-empty '${field}' parameter`,
  reportId,
  field,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const REPORTS_ERROR_HTTP_STATUS: Record<ReportsError['type'], number> = {
  DatabaseError: 500,
  ReportNotFoundError: 404,
  MissingReportParameterError: 400,
};

export const getHttpStatusForError = (error: ReportsError): number => {
  return REPORTS_ERROR_HTTP_STATUS[error.type];
};
