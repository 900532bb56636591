import { ValidationError } from '../utils/errors.js';
import {
  DEFAULT_REPORT_LIMIT,
  DEFAULT_WINDOW_DAYS,
  WINDOW_POLICIES,
  type SalesReportOptions,
  type WindowPolicy,
} from './types.js';

export const MAX_WINDOW_DAYS = 3650;
export const MAX_REPORT_LIMIT = 1000;

export interface ReportOptionsInput {
  now?: Date;
  windowDays?: number;
  limit?: number;
  windowPolicy?: WindowPolicy;
}

/**
 * Fills in defaults and rejects values the report cannot honour.
 * `now` defaults to the moment of the call.
 */
export function resolveReportOptions(
  input: ReportOptionsInput = {},
  defaults: Partial<Omit<SalesReportOptions, 'now'>> = {},
): SalesReportOptions {
  const now = input.now ?? new Date();
  const windowDays = input.windowDays ?? defaults.windowDays ?? DEFAULT_WINDOW_DAYS;
  const limit = input.limit ?? defaults.limit ?? DEFAULT_REPORT_LIMIT;
  const windowPolicy = input.windowPolicy ?? defaults.windowPolicy ?? 'calendar_day';

  if (Number.isNaN(now.getTime())) {
    throw new ValidationError('Invalid now: must be a valid date');
  }
  if (!Number.isInteger(windowDays) || windowDays < 1 || windowDays > MAX_WINDOW_DAYS) {
    throw new ValidationError(`windowDays must be an integer between 1 and ${MAX_WINDOW_DAYS}`);
  }
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_REPORT_LIMIT) {
    throw new ValidationError(`limit must be an integer between 1 and ${MAX_REPORT_LIMIT}`);
  }
  if (!WINDOW_POLICIES.includes(windowPolicy)) {
    throw new ValidationError(`windowPolicy must be one of: ${WINDOW_POLICIES.join(', ')}`);
  }

  return { now, windowDays, limit, windowPolicy };
}
