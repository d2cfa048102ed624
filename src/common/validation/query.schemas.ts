import { z } from 'zod';

/** ISO-8601 date or date-time string turned into a `Date`. */
export const isoDate = z.string().transform((value, ctx) => {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid date: ${value}. Use ISO 8601 format`,
    });
    return z.NEVER;
  }
  return date;
});

export const dateRangeQuerySchema = z
  .object({
    start: isoDate.optional(),
    end: isoDate.optional(),
  })
  .refine(
    (range) => !range.start || !range.end || range.start <= range.end,
    { message: 'start must not be after end', path: ['start'] },
  );

export type DateRangeQuery = z.infer<typeof dateRangeQuerySchema>;

export const positiveIntQuery = (fallback: number, max = 1000) =>
  z.coerce.number().int().positive().max(max).default(fallback);
