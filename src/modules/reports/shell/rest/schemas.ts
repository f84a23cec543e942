/**
 * Reports Module REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const RunReportParamsSchema = Type.Object(
  {
    reportId: Type.String({ minLength: 1, maxLength: 100 }),
  },
  { additionalProperties: false }
);

export type RunReportParams = Static<typeof RunReportParamsSchema>;

export const RunReportQuerySchema = Type.Object(
  {
    city: Type.Optional(
      Type.String({ maxLength: 200, description: 'Required by the provider-contacts report' })
    ),
  },
  { additionalProperties: false }
);

export type RunReportQuery = Static<typeof RunReportQuerySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const ReportDefinitionSchema = Type.Object({
  id: Type.String(),
  title: Type.String(),
  parameters: Type.Array(
    Type.Object({
      name: Type.String(),
      label: Type.String(),
      required: Type.Boolean(),
    })
  ),
  columns: Type.Array(Type.String()),
  chart: Type.Optional(
    Type.Object({
      kind: Type.Literal('bar'),
      x: Type.String(),
      y: Type.String(),
    })
  ),
});

export const ReportRowSchema = Type.Record(
  Type.String(),
  Type.Union([Type.String(), Type.Number(), Type.Null()])
);

export const ListReportsResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Array(ReportDefinitionSchema),
});

export const RunReportResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    report: ReportDefinitionSchema,
    rows: Type.Array(ReportRowSchema),
  }),
});

export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String(),
  message: Type.String(),
  field: Type.Optional(Type.String()),
});
