import { z } from 'zod';
import {
  dateRangeQuerySchema,
  positiveIntQuery,
} from '../../common/validation/query.schemas';
import { TREND_PERIODS } from '../reports.types';

export const complianceSummaryQuerySchema = z
  .object({ department: z.string().trim().min(1).optional() })
  .and(dateRangeQuerySchema);
export type ComplianceSummaryQuery = z.infer<typeof complianceSummaryQuerySchema>;

export const trendQuerySchema = z.object({
  period: z.enum(TREND_PERIODS).default('month'),
  limit: positiveIntQuery(12, 366),
});
export type TrendQuery = z.infer<typeof trendQuerySchema>;

export const criteriaFailuresQuerySchema = z.object({
  top: positiveIntQuery(20, 500),
});
export type CriteriaFailuresQuery = z.infer<typeof criteriaFailuresQuerySchema>;
