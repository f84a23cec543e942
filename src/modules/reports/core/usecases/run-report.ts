/**
 * Run Report Use Case
 *
 * Resolves a report id against the catalog, binds its runtime parameters and
 * runs it. A report with a missing required parameter is never executed.
 */

import { ok, err, type Result } from 'neverthrow';

import { findReport } from '../catalog.js';
import {
  createMissingReportParameterError,
  createReportNotFoundError,
  type ReportsError,
} from '../errors.js';

import type { ReportsRepository } from '../ports.js';
import type { ReportDefinition, ReportQuery, ReportResult } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface RunReportDeps {
  reportsRepo: ReportsRepository;
}

export interface RunReportInput {
  reportId: string;
  params: {
    city?: string | undefined;
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Binds request parameters to a catalog report.
 */
export const bindReportQuery = (
  report: ReportDefinition,
  params: RunReportInput['params']
): Result<ReportQuery, ReportsError> => {
  if (report.id === 'provider-contacts') {
    const city = params.city?.trim() ?? '';
    if (city === '') {
      return err(createMissingReportParameterError(report.id, 'city'));
    }
    return ok({ id: report.id, city });
  }

  return ok({ id: report.id });
};

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

export const runReport = async (
  deps: RunReportDeps,
  input: RunReportInput
): Promise<Result<ReportResult, ReportsError>> => {
  const report = findReport(input.reportId);
  if (report === undefined) {
    return err(createReportNotFoundError(input.reportId));
  }

  const queryResult = bindReportQuery(report, input.params);
  if (queryResult.isErr()) {
    return err(queryResult.error);
  }

  const rowsResult = await deps.reportsRepo.run(queryResult.value);
  if (rowsResult.isErr()) {
    return err(rowsResult.error);
  }

  return ok({ report, rows: rowsResult.value });
};
