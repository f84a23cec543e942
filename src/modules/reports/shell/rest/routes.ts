/**
 * Reports Module REST Routes
 *
 * - GET /api/v1/reports: Report catalog
 * - GET /api/v1/reports/:reportId: Run one report (`?city=` for provider-contacts)
 */

import {
  ErrorResponseSchema,
  ListReportsResponseSchema,
  RunReportParamsSchema,
  RunReportQuerySchema,
  RunReportResponseSchema,
  type RunReportParams,
  type RunReportQuery,
} from './schemas.js';
import { getHttpStatusForError } from '../../core/errors.js';
import { listReports } from '../../core/usecases/list-reports.js';
import { runReport } from '../../core/usecases/run-report.js';

import type { ReportsRepository } from '../../core/ports.js';
import type { FastifyPluginAsync } from 'fastify';

export interface MakeReportsRoutesDeps {
  reportsRepo: ReportsRepository;
}

export const makeReportsRoutes = (deps: MakeReportsRoutesDeps): FastifyPluginAsync => {
  const { reportsRepo } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/reports - Report catalog
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get(
      '/api/v1/reports',
      {
        schema: {
          response: {
            200: ListReportsResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        return reply.status(200).send({ ok: true, data: listReports() });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/reports/:reportId - Run report
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: RunReportParams; Querystring: RunReportQuery }>(
      '/api/v1/reports/:reportId',
      {
        schema: {
          params: RunReportParamsSchema,
          querystring: RunReportQuerySchema,
          response: {
            200: RunReportResponseSchema,
            400: ErrorResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const { reportId } = request.params;
        const { city } = request.query;

        const result = await runReport({ reportsRepo }, { reportId, params: { city } });

        if (result.isErr()) {
          const error = result.error;
          return reply.status(getHttpStatusForError(error)).send({
            ok: false,
            error: error.type,
            message: error.message,
            ...(error.type === 'MissingReportParameterError' && { field: error.field }),
          });
        }

        return reply.status(200).send({ ok: true, data: result.value });
      }
    );
  };
};
