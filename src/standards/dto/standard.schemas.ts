import { z } from 'zod';
import {
  CRITERION_DATA_TYPES,
  REQUIREMENT_TYPES,
  SEVERITIES,
} from '../../compliance/compliance.types';

const code = z.string().trim().min(1).max(100);
const optionalText = z.string().trim().min(1).optional();
const limit = z.number().finite().nullable().optional();
const optionList = z.array(z.string().trim().min(1)).nullable().optional();

export const createStandardSchema = z.object({
  code,
  name: z.string().trim().min(1).max(255),
  version: z.string().trim().min(1).max(50).default('1.0'),
  description: optionalText,
  industry: z.string().trim().max(100).optional(),
});
export type CreateStandardDto = z.infer<typeof createStandardSchema>;

const criterionFields = {
  title: z.string().trim().min(1).max(500),
  description: optionalText,
  requirementType: z.enum(REQUIREMENT_TYPES),
  limitMin: limit,
  limitMax: limit,
  unit: z.string().trim().max(50).nullable().optional(),
  severity: z.enum(SEVERITIES),
  options: optionList,
  acceptableOptions: optionList,
  helpText: optionalText,
  sortOrder: z.number().int().min(0).optional(),
  isActive: z.boolean().optional(),
};

const limitsInOrder = (value: {
  limitMin?: number | null;
  limitMax?: number | null;
}): boolean =>
  value.limitMin === undefined ||
  value.limitMin === null ||
  value.limitMax === undefined ||
  value.limitMax === null ||
  value.limitMin <= value.limitMax;

const limitOrderIssue = {
  message: 'limitMin must not exceed limitMax',
  path: ['limitMin'],
};

export const createCriterionSchema = z
  .object({
    code: z.string().trim().min(1).max(50),
    dataType: z.enum(CRITERION_DATA_TYPES),
    ...criterionFields,
    requirementType: criterionFields.requirementType.default('mandatory'),
    severity: criterionFields.severity.default('minor'),
  })
  .refine(limitsInOrder, limitOrderIssue);
export type CreateCriterionDto = z.infer<typeof createCriterionSchema>;

export const updateCriterionSchema = z
  .object({
    dataType: z.enum(CRITERION_DATA_TYPES).optional(),
    ...criterionFields,
    requirementType: criterionFields.requirementType.optional(),
    severity: criterionFields.severity.optional(),
  })
  .refine(limitsInOrder, limitOrderIssue);
export type UpdateCriterionDto = z.infer<typeof updateCriterionSchema>;

export const createTemplateSchema = z.object({
  code,
  name: z.string().trim().min(1).max(255),
  standardId: z.number().int().positive(),
  category: z.string().trim().max(100).optional(),
  version: z.string().trim().min(1).max(50).default('1.0'),
  description: optionalText,
  /** In field order */
  criterionIds: z.array(z.number().int().positive()).min(1),
});
export type CreateTemplateDto = z.infer<typeof createTemplateSchema>;
