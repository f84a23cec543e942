/**
 * Reports Module - Domain Types
 */

// ─────────────────────────────────────────────────────────────────────────────
// Identifiers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Report ids in catalog order.
 */
export const REPORT_IDS = [
  'providers-receivers-per-city',
  'food-by-provider-type',
  'provider-contacts',
  'top-claiming-receivers',
  'total-quantity-available',
  'top-listing-city',
  'common-food-types',
  'claims-per-food-item',
  'top-completed-claims-provider',
  'claim-status-distribution',
  'avg-quantity-per-receiver',
  'claimed-meal-types',
  'quantity-per-provider',
] as const;

export type ReportId = (typeof REPORT_IDS)[number];

export const isReportId = (value: string): value is ReportId => {
  return (REPORT_IDS as readonly string[]).includes(value);
};

// ─────────────────────────────────────────────────────────────────────────────
// Definitions
// ─────────────────────────────────────────────────────────────────────────────

export type ReportParameterName = 'city';

export interface ReportParameter {
  readonly name: ReportParameterName;
  readonly label: string;
  readonly required: boolean;
}

/**
 * Bar chart suggestion for a report's rows.
 */
export interface ChartHint {
  readonly kind: 'bar';
  readonly x: string;
  readonly y: string;
}

export interface ReportDefinition {
  readonly id: ReportId;
  readonly title: string;
  readonly parameters: readonly ReportParameter[];
  /** Output columns, in result order */
  readonly columns: readonly string[];
  readonly chart?: ChartHint;
}

// ─────────────────────────────────────────────────────────────────────────────
// Execution
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A report ready to run, with its runtime parameters bound.
 */
export type ReportQuery =
  | { readonly id: 'provider-contacts'; readonly city: string }
  | { readonly id: Exclude<ReportId, 'provider-contacts'> };

export type ReportCell = string | number | null;

export type ReportRow = Record<string, ReportCell>;

export interface ReportResult {
  report: ReportDefinition;
  rows: ReportRow[];
}
