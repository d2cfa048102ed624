import { z } from 'zod';
import { isoDate } from '../../common/validation/query.schemas';
import { SEVERITIES } from '../../compliance/compliance.types';
import { NON_CONFORMANCE_STATUSES } from '../../database/entities/non-conformance.entity';

export const createNonConformanceSchema = z.object({
  title: z.string().trim().min(1).max(500),
  description: z.string().trim().min(1),
  severity: z.enum(SEVERITIES),
  category: z.string().trim().max(100).optional(),
  recordId: z.number().int().positive().optional(),
  recordItemId: z.number().int().positive().optional(),
  detectedDate: isoDate.optional(),
  targetClosureDate: isoDate.optional(),
  costImpact: z.number().finite().min(0).optional(),
  customerImpact: z.boolean().default(false),
});
export type CreateNonConformanceDto = z.infer<typeof createNonConformanceSchema>;

export const createFromItemSchema = z.object({
  description: z.string().trim().min(1).optional(),
  category: z.string().trim().max(100).optional(),
  targetClosureDate: isoDate.optional(),
});
export type CreateFromItemDto = z.infer<typeof createFromItemSchema>;

export const updateNonConformanceSchema = z.object({
  status: z.enum(NON_CONFORMANCE_STATUSES).optional(),
  rootCause: z.string().trim().min(1).nullable().optional(),
  correctiveAction: z.string().trim().min(1).nullable().optional(),
  targetClosureDate: isoDate.nullable().optional(),
  costImpact: z.number().finite().min(0).nullable().optional(),
  customerImpact: z.boolean().optional(),
});
export type UpdateNonConformanceDto = z.infer<typeof updateNonConformanceSchema>;

export const listNonConformancesQuerySchema = z.object({
  status: z.enum(NON_CONFORMANCE_STATUSES).optional(),
});
export type ListNonConformancesQuery = z.infer<
  typeof listNonConformancesQuerySchema
>;
