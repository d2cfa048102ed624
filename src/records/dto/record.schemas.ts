import { z } from 'zod';
import { dateRangeQuerySchema, isoDate } from '../../common/validation/query.schemas';

/** Values arrive as typed JSON but are stored raw */
const rawValue = z
  .union([z.string(), z.number().finite(), z.boolean()])
  .transform((value) => String(value));

const override = z.enum(['pass', 'fail']);

export const createRecordSchema = z.object({
  templateId: z.number().int().positive(),
  title: z.string().trim().min(1).max(255).optional(),
  department: z.string().trim().max(100).optional(),
  batchNumber: z.string().trim().max(100).optional(),
  createdBy: z.string().trim().max(255).optional(),
  notes: z.string().optional(),
});
export type CreateRecordDto = z.infer<typeof createRecordSchema>;

export const measurementEntrySchema = z.object({
  criterionId: z.number().int().positive(),
  value: rawValue.nullable(),
  measuredBy: z.string().trim().max(255).optional(),
  measuredAt: isoDate.optional(),
  remarks: z.string().optional(),
  override: override.optional(),
  acceptableOptions: z.array(z.string()).optional(),
});
export type MeasurementEntryDto = z.infer<typeof measurementEntrySchema>;

export const addItemsSchema = z.object({
  items: z.array(measurementEntrySchema).min(1),
});
export type AddItemsDto = z.infer<typeof addItemsSchema>;

export const correctItemSchema = z.object({
  value: rawValue.nullable(),
  reason: z.string().trim().min(1),
  measuredBy: z.string().trim().max(255).optional(),
  override: override.optional(),
});
export type CorrectItemDto = z.infer<typeof correctItemSchema>;

export const listRecordsQuerySchema = z
  .object({
    templateId: z.coerce.number().int().positive().optional(),
  })
  .and(dateRangeQuerySchema);
export type ListRecordsQuery = z.infer<typeof listRecordsQuerySchema>;
