/**
 * Reports Repository Implementation
 *
 * One read-only SQL statement per catalog report. Runtime parameters are bound,
 * never spliced into the SQL text.
 */

import { sql, type RawBuilder } from 'kysely';
import { ok, err, type Result } from 'neverthrow';

import { createDatabaseError, type ReportsError } from '../../core/errors.js';

import type { ReportsRepository } from '../../core/ports.js';
import type { ReportQuery, ReportRow } from '../../core/types.js';
import type { FoodStore } from '@/infra/database/store.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Statements
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Builds the statement behind a report.
 */
export const buildReportStatement = (query: ReportQuery): RawBuilder<ReportRow> => {
  switch (query.id) {
    case 'providers-receivers-per-city':
      return sql<ReportRow>`
        SELECT P.City, COUNT(DISTINCT P.Provider_ID) AS Providers,
               COUNT(DISTINCT R.Receiver_ID) AS Receivers
        FROM Providers P
        LEFT JOIN Receivers R ON P.City = R.City
        GROUP BY P.City
        ORDER BY P.City
      `;

    case 'food-by-provider-type':
      return sql<ReportRow>`
        SELECT Provider_Type, COUNT(Food_ID) AS Total_Food_Items
        FROM Food_Listings
        GROUP BY Provider_Type
        ORDER BY Total_Food_Items DESC
      `;

    case 'provider-contacts':
      return sql<ReportRow>`
        SELECT Name, Type, City, Contact
        FROM Providers
        WHERE City = ${query.city}
      `;

    case 'top-claiming-receivers':
      return sql<ReportRow>`
        SELECT R.Receiver_ID, R.Name AS Receiver_Name, COUNT(C.Claim_ID) AS Total_Claims
        FROM Receivers R
        JOIN Claims C ON R.Receiver_ID = C.Receiver_ID
        GROUP BY R.Receiver_ID, R.Name
        ORDER BY Total_Claims DESC
        LIMIT 10
      `;

    case 'total-quantity-available':
      return sql<ReportRow>`
        SELECT SUM(Quantity) AS Total_Food_Quantity
        FROM Food_Listings
      `;

    case 'top-listing-city':
      return sql<ReportRow>`
        SELECT P.City, COUNT(F.Food_ID) AS Total_Listings
        FROM Food_Listings F
        JOIN Providers P ON F.Provider_ID = P.Provider_ID
        GROUP BY P.City
        ORDER BY Total_Listings DESC
        LIMIT 1
      `;

    case 'common-food-types':
      return sql<ReportRow>`
        SELECT Food_Type, COUNT(*) AS Count
        FROM Food_Listings
        GROUP BY Food_Type
        ORDER BY Count DESC
      `;

    case 'claims-per-food-item':
      return sql<ReportRow>`
        SELECT F.Food_ID, F.Food_Name, COUNT(C.Claim_ID) AS Total_Claims
        FROM Claims C
        JOIN Food_Listings F ON C.Food_ID = F.Food_ID
        GROUP BY F.Food_ID, F.Food_Name
        ORDER BY Total_Claims DESC
      `;

    case 'top-completed-claims-provider':
      return sql<ReportRow>`
        SELECT P.Provider_ID, P.Name AS Provider_Name, COUNT(*) AS Successful_Claims
        FROM Claims C
        JOIN Food_Listings F ON C.Food_ID = F.Food_ID
        JOIN Providers P ON F.Provider_ID = P.Provider_ID
        WHERE C.Status = 'Completed'
        GROUP BY P.Provider_ID, P.Name
        ORDER BY Successful_Claims DESC
        LIMIT 1
      `;

    case 'claim-status-distribution':
      return sql<ReportRow>`
        SELECT Status, ROUND(100.0 * COUNT(*) / (SELECT COUNT(*) FROM Claims), 2) AS Percentage
        FROM Claims
        GROUP BY Status
        ORDER BY Percentage DESC
      `;

    case 'avg-quantity-per-receiver':
      return sql<ReportRow>`
        SELECT R.Name AS Receiver_Name, ROUND(AVG(F.Quantity), 2) AS Approx_Avg_Quantity
        FROM Claims C
        JOIN Receivers R ON C.Receiver_ID = R.Receiver_ID
        JOIN Food_Listings F ON C.Food_ID = F.Food_ID
        GROUP BY R.Name
        ORDER BY Approx_Avg_Quantity DESC
      `;

    case 'claimed-meal-types':
      return sql<ReportRow>`
        SELECT F.Meal_Type, COUNT(*) AS Total_Claims
        FROM Claims C
        JOIN Food_Listings F ON C.Food_ID = F.Food_ID
        GROUP BY F.Meal_Type
        ORDER BY Total_Claims DESC
      `;

    case 'quantity-per-provider':
      return sql<ReportRow>`
        SELECT P.Provider_ID, P.Name AS Provider_Name, SUM(F.Quantity) AS Total_Quantity
        FROM Food_Listings F
        JOIN Providers P ON F.Provider_ID = P.Provider_ID
        GROUP BY P.Provider_ID, P.Name
        ORDER BY Total_Quantity DESC
      `;
  }
};

// ─────────────────────────────────────────────────────────────────────────────
// Repository Implementation
// ─────────────────────────────────────────────────────────────────────────────

export interface ReportsRepoOptions {
  store: FoodStore;
  logger: Logger;
}

class SqliteReportsRepo implements ReportsRepository {
  private readonly store: FoodStore;
  private readonly log: Logger;

  constructor(options: ReportsRepoOptions) {
    this.store = options.store;
    this.log = options.logger.child({ repo: 'ReportsRepo' });
  }

  async run(query: ReportQuery): Promise<Result<ReportRow[], ReportsError>> {
    this.log.debug({ query }, 'Running report');

    try {
      const rows = await this.store.query(buildReportStatement(query));
      this.log.debug({ reportId: query.id, rowCount: rows.length }, 'Report completed');
      return ok(rows);
    } catch (error) {
      this.log.error({ err: error, reportId: query.id }, 'Failed to run report');
      return err(createDatabaseError(`Failed to run report '${query.id}'`, error));
    }
  }
}

export const makeReportsRepo = (options: ReportsRepoOptions): ReportsRepository => {
  return new SqliteReportsRepo(options);
};
