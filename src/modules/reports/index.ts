/**
 * Reports Module - Public API
 *
 * Thirteen canned, read-only analytical reports over the food store.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types & Catalog
// ─────────────────────────────────────────────────────────────────────────────

export type {
  ReportId,
  ReportParameter,
  ReportParameterName,
  ChartHint,
  ReportDefinition,
  ReportQuery,
  ReportCell,
  ReportRow,
  ReportResult,
} from './core/types.js';

export { REPORT_IDS, isReportId } from './core/types.js';
export { REPORT_CATALOG, CHART_METRIC_COLUMNS, deriveChartHint, findReport } from './core/catalog.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  ReportsError,
  DatabaseError,
  ReportNotFoundError,
  MissingReportParameterError,
} from './core/errors.js';

export {
  createDatabaseError,
  createReportNotFoundError,
  createMissingReportParameterError,
  REPORTS_ERROR_HTTP_STATUS,
  getHttpStatusForError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export type { ReportsRepository } from './core/ports.js';
export { listReports } from './core/usecases/list-reports.js';
export {
  runReport,
  bindReportQuery,
  type RunReportDeps,
  type RunReportInput,
} from './core/usecases/run-report.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell
// ─────────────────────────────────────────────────────────────────────────────

export {
  makeReportsRepo,
  buildReportStatement,
  type ReportsRepoOptions,
} from './shell/repo/reports-repo.js';
export { makeReportsRoutes, type MakeReportsRoutesDeps } from './shell/rest/routes.js';
