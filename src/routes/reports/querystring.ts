import {
  REPORT_ENGINES,
  REPORT_FORMULATIONS,
  WINDOW_POLICIES,
  type ReportEngine,
  type ReportFormulation,
  type WindowPolicy,
} from '../../reports/types.js';
import { MAX_REPORT_LIMIT, MAX_WINDOW_DAYS } from '../../reports/reportOptions.js';
import type { GenerateReportInput } from '../../services/salesReportService.js';

export interface SalesReportQuerystring {
  now?: string;
  formulation?: ReportFormulation;
  engine?: ReportEngine;
  windowPolicy?: WindowPolicy;
  windowDays?: number;
  limit?: number;
}

// A date alone is read as UTC midnight. A time must carry its offset, since
// a bare local time would be resolved in the server's zone.
const ISO_DATE_PATTERN = '^\\d{4}-\\d{2}-\\d{2}(T\\d{2}:\\d{2}(:\\d{2}(\\.\\d+)?)?(Z|[+-]\\d{2}:\\d{2}))?$';

const sharedProperties = {
  now: { type: 'string' as const, pattern: ISO_DATE_PATTERN },
  engine: { type: 'string' as const, enum: [...REPORT_ENGINES] },
  windowPolicy: { type: 'string' as const, enum: [...WINDOW_POLICIES] },
  windowDays: { type: 'integer' as const, minimum: 1, maximum: MAX_WINDOW_DAYS },
  limit: { type: 'integer' as const, minimum: 1, maximum: MAX_REPORT_LIMIT },
};

export const salesReportQuerystringSchema = {
  type: 'object' as const,
  additionalProperties: false,
  properties: {
    ...sharedProperties,
    formulation: { type: 'string' as const, enum: [...REPORT_FORMULATIONS] },
  },
};

export const formulationComparisonQuerystringSchema = {
  type: 'object' as const,
  additionalProperties: false,
  properties: sharedProperties,
};

export function toReportInput(query: SalesReportQuerystring): GenerateReportInput {
  return {
    now: query.now !== undefined ? new Date(query.now) : undefined,
    formulation: query.formulation,
    engine: query.engine,
    windowPolicy: query.windowPolicy,
    windowDays: query.windowDays,
    limit: query.limit,
  };
}
