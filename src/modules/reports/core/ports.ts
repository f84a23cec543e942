/**
 * Reports Module - Port Interfaces
 */

import type { ReportsError } from './errors.js';
import type { ReportQuery, ReportRow } from './types.js';
import type { Result } from 'neverthrow';

export interface ReportsRepository {
  /**
   * Runs one catalog report with its bound parameters. Never writes.
   */
  run(query: ReportQuery): Promise<Result<ReportRow[], ReportsError>>;
}
