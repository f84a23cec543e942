import { REPORT_CATALOG } from '../catalog.js';

import type { ReportDefinition } from '../types.js';

/**
 * Lists the report catalog in display order.
 */
export const listReports = (): readonly ReportDefinition[] => {
  return REPORT_CATALOG;
};
