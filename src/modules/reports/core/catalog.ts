/**
 * Report Catalog
 *
 * Metadata of the thirteen canned reports. The SQL behind each id lives in the
 * repository; this is what the dashboard needs to list, label and chart them.
 */

import {
  isReportId,
  type ChartHint,
  type ReportDefinition,
  type ReportId,
  type ReportParameter,
} from './types.js';

/**
 * Columns that mark a report as chartable.
 */
export const CHART_METRIC_COLUMNS: readonly string[] = ['Count', 'Total_Food_Items', 'Total_Claims'];

/**
 * A report whose columns include a metric column charts as bars of the last
 * column against the first.
 */
export const deriveChartHint = (columns: readonly string[]): ChartHint | undefined => {
  const x = columns[0];
  const y = columns[columns.length - 1];

  if (x === undefined || y === undefined) {
    return undefined;
  }
  if (!columns.some((c) => CHART_METRIC_COLUMNS.includes(c))) {
    return undefined;
  }

  return { kind: 'bar', x, y };
};

const CITY_PARAMETER: ReportParameter = { name: 'city', label: 'City', required: true };

const define = (
  id: ReportId,
  title: string,
  columns: readonly string[],
  parameters: readonly ReportParameter[] = []
): ReportDefinition => {
  const chart = deriveChartHint(columns);
  return {
    id,
    title,
    parameters,
    columns,
    ...(chart !== undefined && { chart }),
  };
};

export const REPORT_CATALOG: readonly ReportDefinition[] = [
  define('providers-receivers-per-city', 'Providers & Receivers per City', [
    'City',
    'Providers',
    'Receivers',
  ]),
  define('food-by-provider-type', 'Food contribution by Provider Type', [
    'Provider_Type',
    'Total_Food_Items',
  ]),
  define(
    'provider-contacts',
    'Contact info of Providers in a city',
    ['Name', 'Type', 'City', 'Contact'],
    [CITY_PARAMETER]
  ),
  define('top-claiming-receivers', 'Receivers with most claims', [
    'Receiver_ID',
    'Receiver_Name',
    'Total_Claims',
  ]),
  define('total-quantity-available', 'Total quantity of food available', ['Total_Food_Quantity']),
  define('top-listing-city', 'City with highest number of food listings', [
    'City',
    'Total_Listings',
  ]),
  define('common-food-types', 'Most common food types', ['Food_Type', 'Count']),
  define('claims-per-food-item', 'Claims per food item', [
    'Food_ID',
    'Food_Name',
    'Total_Claims',
  ]),
  define('top-completed-claims-provider', 'Provider with most completed claims', [
    'Provider_ID',
    'Provider_Name',
    'Successful_Claims',
  ]),
  define('claim-status-distribution', 'Claim status distribution (%)', ['Status', 'Percentage']),
  define('avg-quantity-per-receiver', 'Avg quantity per receiver', [
    'Receiver_Name',
    'Approx_Avg_Quantity',
  ]),
  define('claimed-meal-types', 'Most claimed meal type', ['Meal_Type', 'Total_Claims']),
  define('quantity-per-provider', 'Total quantity donated by each provider', [
    'Provider_ID',
    'Provider_Name',
    'Total_Quantity',
  ]),
];

/**
 * Looks up a report by id; ids are matched exactly (case-sensitive).
 */
export const findReport = (id: string): ReportDefinition | undefined => {
  if (!isReportId(id)) {
    return undefined;
  }
  return REPORT_CATALOG.find((report) => report.id === id);
};
